import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Redis } from 'ioredis';
import type { DependencyContainer } from '@/core/dep';
import { RedisDeps } from '@/infra/redis/redis.dep';
import type { IRoute } from '@/view/route.interface';
import { EventDispatchService } from './app/event-dispatch.service';
import { EventStreamService } from './app/event-stream.service';
import { EventDeps } from './domain/dep/event.dep';
import type { IEventPublisher } from './domain/port/event-publisher.interface';
import { RedisEventPublisher } from './infra/redis-event.publisher';
import { EventRoute } from './view/event.route';

export function registerEventDeps(dep: DependencyContainer, options: { redisEnabled: boolean }) {
  dep.add(EventDeps.EventStreamService, EventStreamService);
  dep.add(EventDeps.EventSink, EventDispatchService);
  dep.add(EventDeps.EventRoute, EventRoute);
  dep.addDynamic<IEventPublisher[]>(EventDeps.EventPublishers, () =>
    options.redisEnabled ? [new RedisEventPublisher(dep.get<Redis>(RedisDeps.Client))] : [],
  );
}

export function registerEventRoutes(app: OpenAPIHono, dep: DependencyContainer) {
  app.route('/incidents', dep.get<IRoute>(EventDeps.EventRoute).getApp());
}

export function stopEventStream(dep: DependencyContainer) {
  dep.get<EventStreamService>(EventDeps.EventStreamService).stop();
}

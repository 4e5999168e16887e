import type { OpenAPIHono } from '@hono/zod-openapi';
import type { DependencyContainer } from '@/core/dep';
import { env } from '@/core/env';
import type { IRoute } from '@/view/route.interface';
import { type PushQueueOptions, PushQueueService } from './app/push-queue.service';
import { WebhookDeps } from './domain/dep/webhook.dep';
import { WebhookEndpoints } from './domain/webhook.enums';
import { WebhookRoute } from './view/webhook.route';

export function registerWebhookDeps(dep: DependencyContainer) {
  dep.addValue<PushQueueOptions>(WebhookDeps.PushQueueOptions, {
    capacity: env.PUSH_QUEUE_CAPACITY,
    concurrency: env.PUSH_CONCURRENCY,
    secrets: {
      [WebhookEndpoints.IncidentIo]: env.INCIDENT_IO_WEBHOOK_SECRET,
      [WebhookEndpoints.Generic]: env.GENERIC_WEBHOOK_SECRET,
    },
  });
  dep.add(WebhookDeps.PushQueueService, PushQueueService);
  dep.add(WebhookDeps.WebhookRoute, WebhookRoute);
}

export function registerWebhookRoutes(app: OpenAPIHono, dep: DependencyContainer) {
  app.route('/webhook', dep.get<IRoute>(WebhookDeps.WebhookRoute).getApp());
}

export async function drainPushQueue(dep: DependencyContainer): Promise<void> {
  await dep.get<PushQueueService>(WebhookDeps.PushQueueService).drain();
}

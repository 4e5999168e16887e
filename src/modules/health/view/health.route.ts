import { createRoute, OpenAPIHono } from '@hono/zod-openapi';
import { inject, injectable } from 'inversify';
import type { EventStreamService } from '@/modules/events/app/event-stream.service';
import { EventDeps } from '@/modules/events/domain/dep/event.dep';
import type { FeedPollerService } from '@/modules/ingest/app/feed-poller.service';
import { IngestDeps } from '@/modules/ingest/domain/dep/ingest.dep';
import type { IIngestionCoordinator } from '@/modules/ingest/domain/port/ingestion-coordinator.interface';
import type { PushQueueService } from '@/modules/webhooks/app/push-queue.service';
import { WebhookDeps } from '@/modules/webhooks/domain/dep/webhook.dep';
import type { IRoute } from '@/view/route.interface';
import { schemaGetPingResBody } from '../domain/dto/get-ping-res-body.dto';
import { schemaGetStatsResBody } from '../domain/dto/get-stats-res-body.dto';

@injectable()
export class HealthRoute implements IRoute {
  constructor(
    @inject(IngestDeps.IngestionCoordinator)
    coordinator: IIngestionCoordinator,
    @inject(WebhookDeps.PushQueueService)
    pushQueue: PushQueueService,
    @inject(IngestDeps.FeedPollerService)
    poller: FeedPollerService,
    @inject(EventDeps.EventStreamService)
    eventStream: EventStreamService,
  ) {
    this.app.openapi(
      createRoute({
        tags: ['Health'],
        method: 'get',
        path: '/ping',
        summary: 'Ping',
        description: 'Endpoint to check the health status of the application.',
        responses: {
          200: {
            content: {
              'application/json': {
                schema: schemaGetPingResBody,
              },
            },
            description: 'Ping successful',
          },
        },
      }),
      (c) => c.json({ ok: true, uptimeSec: Math.floor(process.uptime()), timestamp: Date.now() }),
    );

    this.app.openapi(
      createRoute({
        tags: ['Health'],
        method: 'get',
        path: '/stats',
        summary: 'Ingestion stats',
        responses: {
          200: {
            content: {
              'application/json': {
                schema: schemaGetStatsResBody,
              },
            },
            description: 'Current ingestion counters',
          },
        },
      }),
      (c) =>
        c.json({
          seenIncidentsCount: coordinator.seenCount,
          pendingPushJobs: pushQueue.depth,
          pollerRunning: poller.running,
          streamClients: eventStream.clientCount,
          timestamp: new Date().toISOString(),
        }),
    );
  }

  private readonly app = new OpenAPIHono();

  public getApp(): OpenAPIHono {
    return this.app;
  }
}

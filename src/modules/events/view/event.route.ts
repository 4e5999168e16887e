import { createRoute, OpenAPIHono, z } from '@hono/zod-openapi';
import { streamSSE } from 'hono/streaming';
import { inject, injectable } from 'inversify';
import type { IRoute } from '@/view/route.interface';
import type { EventStreamService } from '../app/event-stream.service';
import { EventDeps } from '../domain/dep/event.dep';

const KEEP_ALIVE_INTERVAL_MS = 15000;

@injectable()
export class EventRoute implements IRoute {
  constructor(
    @inject(EventDeps.EventStreamService)
    eventStreamService: EventStreamService,
  ) {
    this.app.openapi(
      createRoute({
        tags: ['Incidents'],
        method: 'get',
        path: '/stream',
        summary: 'Stream newly seen incidents',
        responses: {
          200: {
            content: {
              'text/event-stream': {
                schema: z.string(),
              },
            },
            description: 'SSE stream of normalized incidents',
          },
        },
      }),
      async (c) => {
        return streamSSE(c, async (stream) => {
          eventStreamService.addClient(stream);
          while (!stream.aborted && !stream.closed) {
            await stream.writeSSE({ event: 'ping', data: 'keep-alive' });
            await stream.sleep(KEEP_ALIVE_INTERVAL_MS);
          }
        });
      },
    );
  }

  private readonly app = new OpenAPIHono();

  public getApp(): OpenAPIHono {
    return this.app;
  }
}

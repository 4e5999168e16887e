import type { SSEStreamingApi } from 'hono/streaming';
import { injectable } from 'inversify';
import { logger } from '@/core/logger';
import type { EventDto } from '../domain/dto/event.dto';

@injectable()
export class EventStreamService {
  private readonly clients = new Set<SSEStreamingApi>();

  public get clientCount(): number {
    return this.clients.size;
  }

  public addClient(stream: SSEStreamingApi): void {
    this.clients.add(stream);
    logger.debug({ clientCount: this.clients.size }, 'SSE client connected');

    stream.onAbort(() => {
      this.clients.delete(stream);
      logger.debug({ clientCount: this.clients.size }, 'SSE client disconnected');
    });
  }

  public async broadcast(event: EventDto): Promise<number> {
    const payload = JSON.stringify(event);
    let sentCount = 0;

    for (const client of this.clients) {
      if (client.aborted || client.closed) {
        this.clients.delete(client);
        continue;
      }

      try {
        await client.writeSSE({ event: 'incident', data: payload, id: event.id });
        sentCount += 1;
      } catch (error) {
        this.clients.delete(client);
        logger.warn({ error }, 'Failed to broadcast SSE');
      }
    }
    return sentCount;
  }

  public stop(): void {
    for (const client of this.clients) {
      client.abort();
    }
    this.clients.clear();
    logger.debug('Event stream stopped');
  }
}

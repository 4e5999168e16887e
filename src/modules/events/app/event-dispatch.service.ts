import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { EventDeps } from '../domain/dep/event.dep';
import type { NormalizedEvent } from '../domain/entity/normalized-event.entity';
import type { IEventPublisher } from '../domain/port/event-publisher.interface';
import type { IEventSink } from '../domain/port/event-sink.interface';
import type { EventStreamService } from './event-stream.service';
import { formatEventSummary, toEventDto } from './event.mapper';

/**
 * Fans a newly seen event out to the log, connected SSE clients and any configured
 * publishers. A failing publisher does not stop the others.
 */
@injectable()
export class EventDispatchService implements IEventSink {
  constructor(
    @inject(EventDeps.EventStreamService)
    private readonly eventStream: EventStreamService,
    @inject(EventDeps.EventPublishers)
    private readonly publishers: IEventPublisher[],
  ) {}

  public async emit(event: NormalizedEvent): Promise<void> {
    logger.info(
      { eventId: event.id, source: event.sourceName, origin: event.origin, status: event.status },
      formatEventSummary(event),
    );

    const dto = toEventDto(event);
    const sentCount = await this.eventStream.broadcast(dto);
    logger.debug({ eventId: event.id, sentCount }, 'Broadcasted SSE event');

    for (const publisher of this.publishers) {
      try {
        await publisher.publish(dto);
        logger.debug({ eventId: event.id, publisher: publisher.name }, 'Published event');
      } catch (error) {
        logger.warn({ error, eventId: event.id, publisher: publisher.name }, 'Failed to publish event');
      }
    }
  }
}

import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { EventDeps } from '@/modules/events/domain/dep/event.dep';
import type { NormalizedEvent } from '@/modules/events/domain/entity/normalized-event.entity';
import { EventOrigins } from '@/modules/events/domain/event.enums';
import { NormalizationError } from '@/modules/events/domain/event.errors';
import type { IEventSink } from '@/modules/events/domain/port/event-sink.interface';
import { IngestDeps } from '../domain/dep/ingest.dep';
import type { FeedEntry } from '../domain/entity/feed.entity';
import { IngestFailures, IngestOutcomes } from '../domain/ingest.enums';
import type { IDedupStore } from '../domain/port/dedup-store.interface';
import type { IIngestionCoordinator } from '../domain/port/ingestion-coordinator.interface';
import { normalizeFeedEntry } from './poll-normalizer';
import { normalizePushPayload } from './push-normalizer';

type ItemContext = {
  origin: EventOrigins;
  sourceName: string;
  partialId: string | null;
};

/**
 * Runs one item through normalize → dedup → emit. Every failure ends that item only:
 * the outcome is logged and returned, never thrown.
 */
@injectable()
export class IngestionCoordinatorService implements IIngestionCoordinator {
  constructor(
    @inject(IngestDeps.DedupStore)
    private readonly dedupStore: IDedupStore,
    @inject(EventDeps.EventSink)
    private readonly sink: IEventSink,
  ) {}

  public get seenCount(): number {
    return this.dedupStore.size;
  }

  public async ingestPush(payload: unknown, providerName: string): Promise<IngestOutcomes> {
    return this.process(
      { origin: EventOrigins.Push, sourceName: providerName, partialId: null },
      () => normalizePushPayload(payload, providerName),
    );
  }

  public async ingestPollEntry(entry: FeedEntry, feedName: string): Promise<IngestOutcomes> {
    return this.process(
      { origin: EventOrigins.Poll, sourceName: feedName, partialId: entry.id ?? entry.guid ?? entry.title ?? null },
      () => normalizeFeedEntry(entry, feedName),
    );
  }

  private async process(context: ItemContext, normalize: () => NormalizedEvent): Promise<IngestOutcomes> {
    let event: NormalizedEvent;
    try {
      event = normalize();
    } catch (error) {
      if (error instanceof NormalizationError) {
        logger.error(
          { ...context, title: error.context.title ?? null, failure: IngestFailures.Normalization },
          'Dropping event without identity',
        );
      } else {
        logger.error({ ...context, error, failure: IngestFailures.Unexpected }, 'Failed to normalize event');
      }
      return IngestOutcomes.Error;
    }

    try {
      const isNew = await this.dedupStore.checkAndMark(event.id);
      if (!isNew) {
        logger.debug({ eventId: event.id, origin: event.origin, source: event.sourceName }, 'Duplicate event dropped');
        return IngestOutcomes.Dropped;
      }

      await this.sink.emit(event);
      return IngestOutcomes.Emitted;
    } catch (error) {
      logger.error(
        { ...context, eventId: event.id, error, failure: IngestFailures.Unexpected },
        'Failed to process event',
      );
      return IngestOutcomes.Error;
    }
  }
}

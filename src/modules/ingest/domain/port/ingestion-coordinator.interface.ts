import type { FeedEntry } from '../entity/feed.entity';
import type { IngestOutcomes } from '../ingest.enums';

export interface IIngestionCoordinator {
  readonly seenCount: number;
  ingestPush(payload: unknown, providerName: string): Promise<IngestOutcomes>;
  ingestPollEntry(entry: FeedEntry, feedName: string): Promise<IngestOutcomes>;
}

export const IngestDeps = {
  DedupStore: Symbol.for('DedupStore'),
  ConditionalFetcher: Symbol.for('ConditionalFetcher'),
  IngestionCoordinator: Symbol.for('IngestionCoordinator'),
  FeedPollerService: Symbol.for('FeedPollerService'),
  FeedPollerOptions: Symbol.for('FeedPollerOptions'),
  FetcherOptions: Symbol.for('FetcherOptions'),
};

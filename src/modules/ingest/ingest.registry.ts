import type { DependencyContainer } from '@/core/dep';
import { env } from '@/core/env';
import { logger } from '@/core/logger';
import { ConditionalFetcher, type FetcherOptions } from './app/conditional-fetcher';
import { InMemoryDedupStore } from './app/dedup-store';
import { loadFeedConfigs } from './app/feed-config.loader';
import { type FeedPollerOptions, FeedPollerService } from './app/feed-poller.service';
import { IngestionCoordinatorService } from './app/ingestion-coordinator.service';
import { IngestDeps } from './domain/dep/ingest.dep';

export function registerIngestDeps(dep: DependencyContainer) {
  dep.addValue<FetcherOptions>(IngestDeps.FetcherOptions, { requestTimeoutMs: env.FEED_REQUEST_TIMEOUT_MS });
  dep.addDynamic<FeedPollerOptions>(IngestDeps.FeedPollerOptions, () => ({
    feeds: env.POLL_ENABLED === 1 ? loadFeedConfigs(env.FEEDS_CONFIG_PATH) : [],
    intervalSec: env.POLL_INTERVAL_SEC,
  }));
  dep.add(IngestDeps.DedupStore, InMemoryDedupStore);
  dep.add(IngestDeps.ConditionalFetcher, ConditionalFetcher);
  dep.add(IngestDeps.IngestionCoordinator, IngestionCoordinatorService);
  dep.add(IngestDeps.FeedPollerService, FeedPollerService);
}

export function startPolling(dep: DependencyContainer): void {
  if (env.POLL_ENABLED !== 1) {
    logger.info({ pollEnabled: env.POLL_ENABLED }, 'Feed polling disabled');
    return;
  }

  dep.get<FeedPollerService>(IngestDeps.FeedPollerService).start();
}

export async function stopPolling(dep: DependencyContainer): Promise<void> {
  await dep.get<FeedPollerService>(IngestDeps.FeedPollerService).stop();
}

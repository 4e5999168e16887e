import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { IngestDeps } from '../domain/dep/ingest.dep';
import type { FeedConfig, FeedEntry } from '../domain/entity/feed.entity';
import { IngestFailures, IngestOutcomes } from '../domain/ingest.enums';
import type { IConditionalFetcher } from '../domain/port/conditional-fetcher.interface';
import type { IIngestionCoordinator } from '../domain/port/ingestion-coordinator.interface';
import { parseFeedDocument } from './feed-parser';

const ERROR_BACKOFF_MS = 10000;

export type FeedPollerOptions = {
  feeds: FeedConfig[];
  intervalSec: number;
};

export type PollCycleSummary = {
  feedCount: number;
  changedCount: number;
  failedCount: number;
  emitted: number;
  dropped: number;
  errors: number;
};

type FeedCheckResult = {
  changed: boolean;
  outcomes: IngestOutcomes[];
};

@injectable()
export class FeedPollerService {
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;

  constructor(
    @inject(IngestDeps.ConditionalFetcher)
    private readonly fetcher: IConditionalFetcher,
    @inject(IngestDeps.IngestionCoordinator)
    private readonly coordinator: IIngestionCoordinator,
    @inject(IngestDeps.FeedPollerOptions)
    private readonly options: FeedPollerOptions,
  ) {}

  public get running(): boolean {
    return this.loop !== null;
  }

  public start(): void {
    if (this.loop) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    logger.info({ feedCount: this.options.feeds.length, intervalSec: this.options.intervalSec }, 'Feed poller started');
  }

  /**
   * Wakes the loop if it is sleeping and waits for the current cycle to wind down. Fetches
   * in flight are cancelled and logged; entries not yet ingested are skipped.
   */
  public async stop(): Promise<void> {
    if (!this.loop || !this.controller) {
      return;
    }

    this.controller.abort();
    try {
      await this.loop;
    } finally {
      this.loop = null;
      this.controller = null;
    }
    logger.info('Feed poller stopped');
  }

  public async pollOnce(signal?: AbortSignal): Promise<PollCycleSummary> {
    const feeds = this.options.feeds;
    const results = await Promise.allSettled(feeds.map((feed) => this.checkFeed(feed, signal)));

    const summary: PollCycleSummary = {
      feedCount: feeds.length,
      changedCount: 0,
      failedCount: 0,
      emitted: 0,
      dropped: 0,
      errors: 0,
    };

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        summary.failedCount += 1;
        logger.error(
          { error: result.reason, feed: feeds[index]?.name, failure: IngestFailures.Unexpected },
          'Feed check failed',
        );
        return;
      }

      if (result.value.changed) {
        summary.changedCount += 1;
      }
      for (const outcome of result.value.outcomes) {
        if (outcome === IngestOutcomes.Emitted) {
          summary.emitted += 1;
        } else if (outcome === IngestOutcomes.Dropped) {
          summary.dropped += 1;
        } else {
          summary.errors += 1;
        }
      }
    });

    logger.debug(summary, 'Poll cycle completed');
    return summary;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
        await sleep(this.options.intervalSec * 1000, signal);
      } catch (error) {
        logger.error({ error }, 'Error in poll loop');
        await sleep(ERROR_BACKOFF_MS, signal);
      }
    }
  }

  private async checkFeed(feed: FeedConfig, signal?: AbortSignal): Promise<FeedCheckResult> {
    const result = await this.fetcher.fetch(feed, signal);
    if (!result.changed) {
      return { changed: false, outcomes: [] };
    }

    const entries: FeedEntry[] = parseFeedDocument(result.content);
    logger.debug({ feed: feed.name, entryCount: entries.length }, 'Feed document changed');

    const outcomes: IngestOutcomes[] = [];
    for (const entry of entries) {
      if (signal?.aborted) {
        logger.info({ feed: feed.name, skipped: entries.length - outcomes.length }, 'Poller stopping, skipping entries');
        break;
      }
      outcomes.push(await this.coordinator.ingestPollEntry(entry, feed.name));
    }

    return { changed: true, outcomes };
  }
}

const sleep = (ms: number, signal: AbortSignal): Promise<void> => {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
};

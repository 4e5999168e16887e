import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { IngestDeps } from '../domain/dep/ingest.dep';
import type { FeedConfig, FeedRevalidationState, FetchResult } from '../domain/entity/feed.entity';
import { IngestFailures } from '../domain/ingest.enums';
import type { IConditionalFetcher } from '../domain/port/conditional-fetcher.interface';

export type FetcherOptions = {
  requestTimeoutMs: number;
};

const UNCHANGED: FetchResult = { changed: false, content: null };

/**
 * Retrieves feed documents with ETag / Last-Modified revalidation. Validators are stored
 * per URL only after a 200 body has been read in full; 304s, error statuses and transport
 * failures leave them untouched. Never throws.
 */
@injectable()
export class ConditionalFetcher implements IConditionalFetcher {
  private readonly states = new Map<string, FeedRevalidationState>();

  constructor(
    @inject(IngestDeps.FetcherOptions)
    private readonly options: FetcherOptions,
  ) {}

  public getState(url: string): FeedRevalidationState | undefined {
    const state = this.states.get(url);
    return state ? { ...state } : undefined;
  }

  public async fetch(feed: FeedConfig, signal?: AbortSignal): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      const response = await fetch(feed.url, {
        headers: this.buildConditionalHeaders(feed.url),
        signal: signal ? AbortSignal.any([controller.signal, signal]) : controller.signal,
      });

      if (response.status === 304) {
        logger.debug({ feed: feed.name }, 'Feed not modified');
        await discardBody(response);
        return UNCHANGED;
      }

      if (response.status !== 200) {
        logger.error(
          { feed: feed.name, url: feed.url, status: response.status, failure: IngestFailures.Transport },
          'Feed request failed',
        );
        await discardBody(response);
        return UNCHANGED;
      }

      const content = await response.text();
      this.storeValidators(feed.url, response.headers);
      return { changed: true, content };
    } catch (error) {
      if (signal?.aborted) {
        logger.warn({ feed: feed.name, url: feed.url, failure: IngestFailures.Transport }, 'Feed request cancelled');
      } else if (controller.signal.aborted) {
        logger.error(
          { feed: feed.name, url: feed.url, timeoutMs: this.options.requestTimeoutMs, failure: IngestFailures.Transport },
          'Feed request timed out',
        );
      } else {
        logger.error({ error, feed: feed.name, url: feed.url, failure: IngestFailures.Transport }, 'Feed request error');
      }
      return UNCHANGED;
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildConditionalHeaders(url: string): Record<string, string> {
    const headers: Record<string, string> = {};
    const state = this.states.get(url);

    if (state?.etag) {
      headers['If-None-Match'] = state.etag;
    }
    if (state?.lastModified) {
      headers['If-Modified-Since'] = state.lastModified;
    }

    return headers;
  }

  private storeValidators(url: string, headers: Headers): void {
    const state = this.states.get(url) ?? {};
    const etag = headers.get('etag');
    const lastModified = headers.get('last-modified');

    if (etag) {
      state.etag = etag;
    }
    if (lastModified) {
      state.lastModified = lastModified;
    }

    this.states.set(url, state);
  }
}

const discardBody = async (response: Response): Promise<void> => {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug({ error }, 'Failed to discard response body');
  }
};

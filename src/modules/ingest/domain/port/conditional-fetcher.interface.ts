import type { FeedConfig, FeedRevalidationState, FetchResult } from '../entity/feed.entity';

export interface IConditionalFetcher {
  /**
   * Aborting `signal` cancels the request like a timeout does; the result is then unchanged.
   */
  fetch(feed: FeedConfig, signal?: AbortSignal): Promise<FetchResult>;
  getState(url: string): FeedRevalidationState | undefined;
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FeedEntry } from '../domain/entity/feed.entity';
import { IngestOutcomes } from '../domain/ingest.enums';
import type { IConditionalFetcher } from '../domain/port/conditional-fetcher.interface';
import type { IIngestionCoordinator } from '../domain/port/ingestion-coordinator.interface';
import { ConditionalFetcher } from './conditional-fetcher';
import { FeedPollerService } from './feed-poller.service';

const FEEDS = [
  { name: 'Alpha', url: 'https://alpha.example.com/feed.rss' },
  { name: 'Beta', url: 'https://beta.example.com/feed.rss' },
  { name: 'Gamma', url: 'https://gamma.example.com/feed.rss' },
];

const RSS = `<rss><channel>
  <item><guid>a-1</guid><title>First</title></item>
  <item><guid>a-2</guid><title>Second</title></item>
</channel></rss>`;

const createPoller = (feeds = FEEDS, intervalSec = 60) => {
  const fetcher = {
    fetch: vi.fn<IConditionalFetcher['fetch']>().mockResolvedValue({ changed: false, content: null }),
    getState: vi.fn<IConditionalFetcher['getState']>(),
  };
  const ingestPollEntry = vi
    .fn<(entry: FeedEntry, feedName: string) => Promise<IngestOutcomes>>()
    .mockResolvedValue(IngestOutcomes.Emitted);
  const coordinator: IIngestionCoordinator = {
    seenCount: 0,
    ingestPush: vi.fn<IIngestionCoordinator['ingestPush']>(),
    ingestPollEntry,
  };
  const poller = new FeedPollerService(fetcher, coordinator, { feeds, intervalSec });
  return { poller, fetcher, ingestPollEntry };
};

describe('FeedPollerService', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it('should ingest entries of changed feeds and isolate failing ones', async () => {
    const { poller, fetcher, ingestPollEntry } = createPoller();
    fetcher.fetch.mockImplementation(async (feed) => {
      if (feed.name === 'Alpha') {
        return { changed: true, content: RSS };
      }
      if (feed.name === 'Beta') {
        throw new Error('boom');
      }
      return { changed: false, content: null };
    });
    ingestPollEntry.mockResolvedValueOnce(IngestOutcomes.Emitted).mockResolvedValueOnce(IngestOutcomes.Dropped);

    const summary = await poller.pollOnce();

    expect(summary).toEqual({ feedCount: 3, changedCount: 1, failedCount: 1, emitted: 1, dropped: 1, errors: 0 });
    expect(ingestPollEntry.mock.calls.map(([entry, feedName]) => [entry.guid, feedName])).toEqual([
      ['a-1', 'Alpha'],
      ['a-2', 'Alpha'],
    ]);
  });

  it('should count error outcomes', async () => {
    const { poller, fetcher, ingestPollEntry } = createPoller([FEEDS[0]]);
    fetcher.fetch.mockResolvedValue({ changed: true, content: RSS });
    ingestPollEntry.mockResolvedValue(IngestOutcomes.Error);

    const summary = await poller.pollOnce();

    expect(summary.errors).toBe(2);
    expect(summary.emitted).toBe(0);
  });

  it('should skip remaining entries once stopping', async () => {
    const { poller, fetcher, ingestPollEntry } = createPoller([FEEDS[0]]);
    fetcher.fetch.mockResolvedValue({ changed: true, content: RSS });
    const controller = new AbortController();
    controller.abort();

    const summary = await poller.pollOnce(controller.signal);

    expect(summary.changedCount).toBe(1);
    expect(ingestPollEntry).not.toHaveBeenCalled();
  });

  it('should poll on an interval until stopped', async () => {
    vi.useFakeTimers();
    const { poller, fetcher } = createPoller([FEEDS[0]], 60);

    poller.start();
    expect(poller.running).toBe(true);

    await vi.advanceTimersByTimeAsync(0);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(59_000);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);

    await poller.stop();
    expect(poller.running).toBe(false);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);
  });

  it('should start a single loop and tolerate stop without start', async () => {
    vi.useFakeTimers();
    const { poller, fetcher } = createPoller([FEEDS[0]], 60);

    await poller.stop();
    poller.start();
    poller.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    await poller.stop();
  });

  it('should cancel a hanging fetch when stopped', async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<typeof fetch>().mockImplementation((_input, init) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });
    vi.stubGlobal('fetch', fetchMock);
    const coordinator: IIngestionCoordinator = {
      seenCount: 0,
      ingestPush: vi.fn<IIngestionCoordinator['ingestPush']>(),
      ingestPollEntry: vi.fn<IIngestionCoordinator['ingestPollEntry']>(),
    };
    const poller = new FeedPollerService(new ConditionalFetcher({ requestTimeoutMs: 30_000 }), coordinator, {
      feeds: [FEEDS[0]],
      intervalSec: 60,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(fetchMock).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = poller.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);

    expect(stopped).toBe(true);
    await stopping;
    expect(poller.running).toBe(false);
    expect(coordinator.ingestPollEntry).not.toHaveBeenCalled();
  });
});

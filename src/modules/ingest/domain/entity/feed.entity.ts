export type FeedConfig = {
  name: string;
  url: string;
};

/**
 * One entry of a parsed RSS/Atom document. Every field is optional because feeds omit
 * them freely.
 */
export type FeedEntry = {
  id?: string;
  guid?: string;
  title?: string;
  link?: string;
  published?: string;
  description?: string;
  summary?: string;
};

export type FeedRevalidationState = {
  etag?: string;
  lastModified?: string;
};

export type FetchResult = { changed: true; content: string } | { changed: false; content: null };

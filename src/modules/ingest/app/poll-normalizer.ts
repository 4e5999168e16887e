import { createHash } from 'node:crypto';
import { type CheerioAPI, load } from 'cheerio';
import { type AnyNode, hasChildren, isText } from 'domhandler';
import { createNormalizedEvent } from '@/modules/events/app/normalized-event.factory';
import type { NormalizedEvent } from '@/modules/events/domain/entity/normalized-event.entity';
import { EventOrigins } from '@/modules/events/domain/event.enums';
import type { FeedEntry } from '../domain/entity/feed.entity';
import { parseOccurredAt } from './occurred-at';

const UNKNOWN_TITLE = 'Unknown Incident';
const UNKNOWN_STATUS = 'Unknown';

const STATUS_PATTERNS = [
  /(operational|degraded|partial|major|maintenance|outage|incident|investigating|monitoring|resolved)/i,
  /status:\s*(\w+)/i,
];

export function normalizeFeedEntry(entry: FeedEntry, feedName: string, ingestedAt = new Date()): NormalizedEvent {
  const description = entry.description ?? entry.summary ?? '';
  const { components, status } = description ? inspectDescription(description) : { components: [], status: null };
  const occurredAt = parseOccurredAt(entry.published, ingestedAt);

  return createNormalizedEvent({
    id: deriveEntryIdentity(entry),
    sourceName: feedName,
    origin: EventOrigins.Poll,
    eventKind: '',
    title: entry.title ?? UNKNOWN_TITLE,
    status: status ?? UNKNOWN_STATUS,
    severity: '',
    description,
    affectedComponents: components,
    link: entry.link ?? '',
    occurredAt: occurredAt.value.toISOString(),
    occurredAtEstimated: occurredAt.kind === 'fallback',
  });
}

/**
 * Feed-supplied id or guid; otherwise a content hash of title and published date, stable
 * across polls of an unchanged entry.
 */
export function deriveEntryIdentity(entry: FeedEntry): string {
  const supplied = entry.id || entry.guid;
  if (supplied) {
    return supplied;
  }

  return createHash('md5')
    .update(`${entry.title ?? ''}${entry.published ?? ''}`)
    .digest('hex');
}

export function inferStatus(text: string): string | null {
  for (const pattern of STATUS_PATTERNS) {
    const matched = text.match(pattern);
    if (matched) {
      return toTitleCase(matched[1]);
    }
  }
  return null;
}

const inspectDescription = (html: string): { components: string[]; status: string | null } => {
  const $ = load(html);
  return {
    components: extractComponents($),
    status: inferStatus(extractPlainText($)),
  };
};

// Bold spans name components, except those starting with "status" which are labels.
const extractComponents = ($: CheerioAPI): string[] => {
  const components: string[] = [];
  for (const element of $('strong, b').toArray()) {
    const text = normalizeText($(element).text());
    if (text && !text.toLowerCase().startsWith('status')) {
      components.push(text);
    }
  }
  return components;
};

const extractPlainText = ($: CheerioAPI): string => {
  const parts: string[] = [];
  const walk = (nodes: AnyNode[]) => {
    for (const node of nodes) {
      if (isText(node)) {
        const text = normalizeText(node.data);
        if (text) {
          parts.push(text);
        }
      } else if (hasChildren(node)) {
        walk(node.children);
      }
    }
  };

  walk($.root().toArray());
  return parts.join(' ');
};

const normalizeText = (value: string): string => {
  return value.replace(/\s+/g, ' ').trim();
};

const toTitleCase = (value: string): string => {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, prefix: string, letter: string) => {
    return `${prefix}${letter.toUpperCase()}`;
  });
};

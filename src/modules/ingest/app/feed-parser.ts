import { type CheerioAPI, load } from 'cheerio';
import type { Element } from 'domhandler';
import type { FeedEntry } from '../domain/entity/feed.entity';

/**
 * Parses an RSS 2.0 or Atom document into entries, in document order. Returns an empty
 * list for documents with neither `<item>` nor `<entry>` elements.
 */
export function parseFeedDocument(xml: string): FeedEntry[] {
  const $ = load(xml, { xml: true });

  const items = $('item').toArray();
  if (items.length > 0) {
    return items.map((item) => toRssEntry($, item));
  }

  return $('entry')
    .toArray()
    .map((entry) => toAtomEntry($, entry));
}

const toRssEntry = ($: CheerioAPI, item: Element): FeedEntry => {
  return {
    guid: childText($, item, 'guid'),
    title: childText($, item, 'title'),
    link: childText($, item, 'link'),
    published: childText($, item, 'pubDate') ?? childText($, item, 'dc:date'),
    description: childText($, item, 'description') ?? childText($, item, 'content:encoded'),
  };
};

const toAtomEntry = ($: CheerioAPI, entry: Element): FeedEntry => {
  return {
    id: childText($, entry, 'id'),
    title: childText($, entry, 'title'),
    link: atomLink($, entry),
    published: childText($, entry, 'published') ?? childText($, entry, 'updated'),
    summary: childText($, entry, 'summary'),
    description: childText($, entry, 'content'),
  };
};

// Matched on the qualified tag name, so prefixed elements such as `dc:date` need no escaping.
const childElements = ($: CheerioAPI, parent: Element, tagName: string): Element[] => {
  return $(parent)
    .children()
    .toArray()
    .filter((element) => element.name === tagName);
};

const childText = ($: CheerioAPI, parent: Element, tagName: string): string | undefined => {
  const [child] = childElements($, parent, tagName);
  if (!child) {
    return undefined;
  }

  // Atom xhtml constructs carry their markup as child elements.
  const text = $(child).attr('type') === 'xhtml' ? ($(child).html() ?? '').trim() : $(child).text().trim();
  return text.length > 0 ? text : undefined;
};

// rel="alternate" (or no rel) wins over other link relations.
const atomLink = ($: CheerioAPI, entry: Element): string | undefined => {
  const links = childElements($, entry, 'link');
  const preferred =
    links.find((link) => {
      const rel = $(link).attr('rel');
      return !rel || rel === 'alternate';
    }) ?? links[0];
  if (!preferred) {
    return undefined;
  }

  const href = $(preferred).attr('href');
  return href && href.length > 0 ? href : undefined;
};

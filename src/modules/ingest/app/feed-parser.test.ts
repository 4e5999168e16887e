import { describe, expect, it } from 'vitest';
import { parseFeedDocument } from './feed-parser';
import { normalizeFeedEntry } from './poll-normalizer';

describe('parseFeedDocument', () => {
  it('should read RSS items in document order', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example Status</title>
    <item>
      <title>Elevated errors</title>
      <link>https://status.example.com/incidents/1</link>
      <guid isPermaLink="false">inc-1</guid>
      <pubDate>Mon, 06 May 2024 10:00:00 GMT</pubDate>
      <description><![CDATA[<p><b>API</b></p><p>Status: Investigating</p>]]></description>
    </item>
    <item>
      <title>Scheduled maintenance</title>
      <guid>inc-2</guid>
      <description>&lt;b&gt;Billing&lt;/b&gt; offline</description>
    </item>
  </channel>
</rss>`;

    expect(parseFeedDocument(xml)).toEqual([
      {
        guid: 'inc-1',
        title: 'Elevated errors',
        link: 'https://status.example.com/incidents/1',
        published: 'Mon, 06 May 2024 10:00:00 GMT',
        description: '<p><b>API</b></p><p>Status: Investigating</p>',
      },
      {
        guid: 'inc-2',
        title: 'Scheduled maintenance',
        link: undefined,
        published: undefined,
        description: '<b>Billing</b> offline',
      },
    ]);
  });

  it('should fall back to dc:date and content:encoded', () => {
    const xml = `<rss xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <item>
      <title>Outage</title>
      <dc:date>2024-05-06T10:00:00Z</dc:date>
      <content:encoded>Full outage</content:encoded>
    </item>
  </channel>
</rss>`;

    const [entry] = parseFeedDocument(xml);

    expect(entry?.published).toBe('2024-05-06T10:00:00Z');
    expect(entry?.description).toBe('Full outage');
  });

  it('should read Atom entries and prefer the alternate link', () => {
    const xml = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Status</title>
  <entry>
    <id>tag:status.example.com,2024:inc-3</id>
    <title type="html">Degraded search</title>
    <link rel="self" href="https://status.example.com/feed/inc-3"/>
    <link rel="alternate" href="https://status.example.com/incidents/3"/>
    <updated>2024-05-06T11:00:00Z</updated>
    <summary>Search is slow</summary>
    <content type="html">&lt;strong&gt;Search&lt;/strong&gt; degraded</content>
  </entry>
</feed>`;

    expect(parseFeedDocument(xml)).toEqual([
      {
        id: 'tag:status.example.com,2024:inc-3',
        title: 'Degraded search',
        link: 'https://status.example.com/incidents/3',
        published: '2024-05-06T11:00:00Z',
        summary: 'Search is slow',
        description: '<strong>Search</strong> degraded',
      },
    ]);
  });

  it('should use the first link when none is alternate', () => {
    const xml = `<feed><entry><id>a</id><link rel="related" href="https://one"/><link rel="via" href="https://two"/></entry></feed>`;

    expect(parseFeedDocument(xml)[0]?.link).toBe('https://one');
  });

  it('should treat blank elements as absent', () => {
    const xml = '<rss><channel><item><title>   </title><guid>x</guid></item></channel></rss>';

    expect(parseFeedDocument(xml)[0]?.title).toBeUndefined();
  });

  it('should return no entries for empty or unrelated documents', () => {
    expect(parseFeedDocument('')).toEqual([]);
    expect(parseFeedDocument('<rss><channel><title>Quiet</title></channel></rss>')).toEqual([]);
    expect(parseFeedDocument('not xml at all')).toEqual([]);
  });

  it('should keep the markup of xhtml content and summary', () => {
    const xml = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>inc-4</id>
    <summary type="xhtml"><b>Login</b> slow</summary>
    <content type="xhtml"><strong>Auth</strong> major outage</content>
  </entry>
</feed>`;

    const [entry] = parseFeedDocument(xml);

    expect(entry?.summary).toBe('<b>Login</b> slow');
    expect(entry?.description).toBe('<strong>Auth</strong> major outage');
  });

  it('should expose xhtml components to the poll normalizer', () => {
    const xml = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>inc-5</id>
    <content type="xhtml">
      <div xmlns="http://www.w3.org/1999/xhtml"><strong>Auth</strong> major outage</div>
    </content>
  </entry>
</feed>`;

    const [entry] = parseFeedDocument(xml);
    const event = normalizeFeedEntry(entry ?? {}, 'Example', new Date('2024-05-06T09:30:00.000Z'));

    expect(event.affectedComponents).toEqual(['Auth']);
    expect(event.status).toBe('Major');
  });
});

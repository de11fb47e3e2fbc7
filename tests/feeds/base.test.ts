/**
 * Tests for the RSS/Atom feed fetcher
 *
 * fetch is stubbed with in-memory responses; parsing is real.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { RssFeedFetcher } from '../../src/feeds/base';
import { normalizeEntries } from '../../src/feeds/normalizer';
import { createCapturingLogger } from '../helpers/logger';

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Example</title>
    <link>http://example.com/</link>
    <description>Example feed</description>
    <item>
      <title>First post</title>
      <link>http://example.com/1</link>
      <pubDate>Mon, 02 Jan 2006 15:04:05 +0000</pubDate>
      <dc:creator>Jane</dc:creator>
      <category>go</category>
      <category>rss</category>
    </item>
    <item>
      <title>Second post</title>
      <link>http://example.com/2</link>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <link href="http://example.org/"/>
  <updated>2006-01-03T10:00:00Z</updated>
  <id>urn:uuid:feed</id>
  <entry>
    <title>Atom entry</title>
    <link rel="alternate" href="http://example.org/2006/01/02/atom"/>
    <id>urn:uuid:entry-1</id>
    <published>2006-01-02T15:04:05Z</published>
    <updated>2006-01-03T10:00:00Z</updated>
    <author><name>Sam</name></author>
    <category term="typescript" label="TypeScript"/>
    <category term="feeds"/>
  </entry>
</feed>`;

function stubFetch(body: string, init: ResponseInit) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('RssFeedFetcher', () => {
  it('should parse an RSS feed into raw entries', async () => {
    const { logger } = createCapturingLogger();
    stubFetch(RSS_FEED, { status: 200, headers: { 'content-type': 'application/rss+xml; charset=utf-8' } });

    const result = await new RssFeedFetcher({ logger }).fetch('http://example.com/feed.xml');

    expect(result.malformed).toBe(false);
    expect(result.diagnostic).toBeUndefined();
    expect(result.entries).toHaveLength(2);
    expect(result.entries[0]).toMatchObject({
      title: 'First post',
      link: 'http://example.com/1',
      pubDate: 'Mon, 02 Jan 2006 15:04:05 +0000',
      creator: 'Jane',
      categories: ['go', 'rss'],
    });
    expect(result.entries[1]).toMatchObject({ title: 'Second post', link: 'http://example.com/2' });
  });

  it('should keep Atom publication dates and category terms', async () => {
    const { logger } = createCapturingLogger();
    stubFetch(ATOM_FEED, { status: 200, headers: { 'content-type': 'application/atom+xml' } });

    const result = await new RssFeedFetcher({ logger }).fetch('http://example.org/atom.xml');

    expect(result.entries).toHaveLength(1);
    expect(result.entries[0]).toMatchObject({
      title: 'Atom entry',
      link: 'http://example.org/2006/01/02/atom',
      author: 'Sam',
      published: '2006-01-02T15:04:05Z',
      updated: '2006-01-03T10:00:00Z',
      tags: [{ term: 'typescript', label: 'TypeScript' }, { term: 'feeds' }],
    });

    const [record] = normalizeEntries(result.entries, 'http://example.org/atom.xml', { logger });
    expect(record).toEqual({
      timestamp: '2006-01-02T15:04:05+00:00',
      title: 'Atom entry',
      author: 'Sam',
      feed_url: 'http://example.org/atom.xml',
      entry_url: 'http://example.org/2006/01/02/atom',
      topics: ['typescript', 'feeds'],
    });
  });

  it('should send the configured user agent', async () => {
    const { logger } = createCapturingLogger();
    const fetchMock = stubFetch(RSS_FEED, { status: 200, headers: { 'content-type': 'text/xml' } });

    await new RssFeedFetcher({ logger, userAgent: 'test-agent/1.0' }).fetch('http://example.com/feed.xml');

    expect(fetchMock).toHaveBeenCalledWith(
      'http://example.com/feed.xml',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' }),
      })
    );
  });

  it('should flag a feed served with a non-XML content type', async () => {
    const { logger } = createCapturingLogger();
    stubFetch(RSS_FEED, { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } });

    const result = await new RssFeedFetcher({ logger }).fetch('http://example.com/feed.xml');

    expect(result.malformed).toBe(true);
    expect(result.diagnostic).toBe('Unexpected content type: text/html; charset=utf-8');
    expect(result.entries).toHaveLength(2);
  });

  it('should reject on an HTTP error status', async () => {
    const { logger } = createCapturingLogger();
    stubFetch('missing', { status: 404, statusText: 'Not Found' });

    await expect(new RssFeedFetcher({ logger }).fetch('http://example.com/gone.xml')).rejects.toThrow(
      'Failed to fetch feed: 404 Not Found'
    );
  });

  it('should reject a body that is not a feed', async () => {
    const { logger } = createCapturingLogger();
    stubFetch('this is not xml', { status: 200, headers: { 'content-type': 'application/xml' } });

    await expect(new RssFeedFetcher({ logger }).fetch('http://example.com/feed.xml')).rejects.toThrow();
  });
});

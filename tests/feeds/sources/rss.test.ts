/**
 * Tests for the RSS / Atom adapter.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { RssSource } from '../../../src/feeds/sources/rss';
import { FetchError } from '../../../src/lib/errors';
import { RssSourceSchema } from '../../../src/types';

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Example Wire</title>
    <link>https://ex.com</link>
    <item>
      <title>Storm hits coast</title>
      <link>https://ex.com/a1</link>
      <guid>a1</guid>
      <pubDate>Tue, 10 Mar 2026 08:30:00 GMT</pubDate>
      <description>Heavy rain expected.</description>
    </item>
    <item>
      <title>Council approves budget</title>
      <link>https://ex.com/a2</link>
      <content:encoded><![CDATA[<p>Full text</p>]]></content:encoded>
    </item>
    <item>
      <description>Neither a title nor a link</description>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <entry>
    <title>Atom story</title>
    <link href="https://ex.com/atom1"/>
    <id>tag:ex.com,2026:1</id>
    <updated>2026-03-10T09:00:00Z</updated>
    <summary>Short</summary>
  </entry>
</feed>`;

function createSource(): RssSource {
  return new RssSource(RssSourceSchema.parse({ id: 'wire', kind: 'rss', url: 'https://ex.com/rss' }));
}

describe('RssSource', () => {
  let mockFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
  });

  it('should map RSS items to raw items', async () => {
    const { items, softErrors } = await createSource().parse(RSS_FEED);

    expect(softErrors).toBe(1);
    expect(items).toHaveLength(2);
    expect(items[0]).toMatchObject({
      sourceId: 'wire',
      nativeId: 'a1',
      title: 'Storm hits coast',
      url: 'https://ex.com/a1',
      publishedRaw: 'Tue, 10 Mar 2026 08:30:00 GMT',
    });
    expect(items[0].body).toContain('Heavy rain expected.');
  });

  it('should prefer content:encoded for the body', async () => {
    const { items } = await createSource().parse(RSS_FEED);

    expect(items[1].title).toBe('Council approves budget');
    expect(items[1].body).toBe('<p>Full text</p>');
  });

  it('should read Atom entries', async () => {
    const { items, softErrors } = await createSource().parse(ATOM_FEED);

    expect(softErrors).toBe(0);
    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      nativeId: 'tag:ex.com,2026:1',
      title: 'Atom story',
      url: 'https://ex.com/atom1',
      body: 'Short',
    });
    expect(Date.parse(String(items[0].publishedRaw))).toBe(Date.parse('2026-03-10T09:00:00Z'));
  });

  it('should reject a body that is not XML', async () => {
    await expect(createSource().parse('this is not xml')).rejects.toMatchObject({
      kind: 'malformed_response',
      sourceId: 'wire',
    });
  });

  it('should reject XML that is not a feed', async () => {
    await expect(createSource().parse('<html><body>hi</body></html>')).rejects.toBeInstanceOf(FetchError);
  });

  it('should fetch the configured URL', async () => {
    mockFetch.mockResolvedValueOnce(new Response(RSS_FEED, { headers: { 'content-type': 'application/rss+xml' } }));

    const result = await createSource().fetch(1000);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://ex.com/rss');
    expect(result.items.map(item => item.url)).toEqual(['https://ex.com/a1', 'https://ex.com/a2']);
    expect(result.softErrors).toBe(1);
  });
});

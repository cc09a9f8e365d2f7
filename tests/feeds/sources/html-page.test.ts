/**
 * Tests for the HTML listing page adapter.
 */

import { describe, it, expect } from 'vitest';
import { HtmlPageSource } from '../../../src/feeds/sources/html-page';
import { HtmlPageSourceSchema } from '../../../src/types';

const LISTING = `<!doctype html>
<html><body>
  <div class="story">
    <h2>  Storm   hits coast </h2>
    <a href="/world/storm">Read</a>
    <p class="dek">Heavy <b>rain</b>.</p>
    <time datetime="2026-03-10T08:30:00Z">This morning</time>
  </div>
  <div class="story">
    <h2>No link story</h2>
  </div>
  <div class="story"><span>nothing useful</span></div>
</body></html>`;

function createSource(): HtmlPageSource {
  return new HtmlPageSource(
    HtmlPageSourceSchema.parse({
      id: 'newsroom',
      kind: 'html_page',
      url: 'https://news.example/latest',
      selectors: {
        item: 'div.story',
        title: 'h2',
        summary: 'p.dek',
        date: 'time',
        dateAttribute: 'datetime',
      },
    })
  );
}

describe('HtmlPageSource', () => {
  it('should extract one raw item per story block', async () => {
    const { items } = await createSource().parse(LISTING);

    expect(items).toHaveLength(2);
    expect(items[0]).toMatchObject({
      sourceId: 'newsroom',
      title: 'Storm hits coast',
      url: 'https://news.example/world/storm',
      body: 'Heavy <b>rain</b>.',
      publishedRaw: '2026-03-10T08:30:00Z',
    });
  });

  it('should keep blocks that have a title but no link', async () => {
    const { items } = await createSource().parse(LISTING);

    expect(items[1].title).toBe('No link story');
    expect(items[1].url).toBeUndefined();
    expect(items[1].body).toBeUndefined();
    expect(items[1].publishedRaw).toBeUndefined();
  });

  it('should count blocks with neither title nor link as soft errors', async () => {
    const { softErrors } = await createSource().parse(LISTING);

    expect(softErrors).toBe(1);
  });

  it('should reject a body that is not HTML', async () => {
    await expect(createSource().parse('{"status":"ok"}')).rejects.toMatchObject({
      kind: 'malformed_response',
      message: 'Response is not an HTML document',
    });
  });
});

/**
 * Tests for URL validation and the on-demand article extractor.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ArticleExtractor, validateUrl } from '../../src/extract/extractor';
import { ExtractionError } from '../../src/lib/errors';

const PAGE = '<html><head><title>Ignored</title></head><body><article><h1>Storm hits coast</h1><p>Heavy rain.</p></article></body></html>';

function htmlResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { headers: { 'content-type': 'text/html; charset=utf-8' }, ...init });
}

describe('validateUrl', () => {
  it('should accept https URLs', () => {
    expect(validateUrl('https://news.example/a').hostname).toBe('news.example');
  });

  it.each([
    ['not a url', 'Invalid URL'],
    ['http://news.example/a', 'Only https URLs are allowed'],
    ['file:///etc/passwd', 'Only https URLs are allowed'],
  ])('should reject %s', (url, message) => {
    expect(() => validateUrl(url)).toThrow(message);
  });

  it('should allow listed hosts and their subdomains', () => {
    const allowed = ['example.com'];

    expect(validateUrl('https://example.com/a', allowed).hostname).toBe('example.com');
    expect(validateUrl('https://news.EXAMPLE.com/a', allowed).hostname).toBe('news.example.com');
    expect(() => validateUrl('https://example.com.evil.net/a', allowed)).toThrow(
      'Host not allowed: example.com.evil.net'
    );
    expect(() => validateUrl('https://notexample.com/a', allowed)).toThrow(ExtractionError);
  });
});

describe('ArticleExtractor', () => {
  let mockFetch: Mock<typeof fetch>;
  let extractor: ArticleExtractor;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
    extractor = new ArticleExtractor({ allowedHosts: ['news.example'] });
  });

  it('should fetch and convert an article page', async () => {
    mockFetch.mockResolvedValueOnce(htmlResponse(PAGE));

    const result = await extractor.extract('https://news.example/storm');

    expect(result).toEqual({
      markdown: '# Storm hits coast\n\nHeavy rain.',
      title: 'Storm hits coast',
      sourceUrl: 'https://news.example/storm',
      images: [],
    });
    expect(mockFetch.mock.calls[0][0]).toBe('https://news.example/storm');
  });

  it('should not fetch a URL that fails validation', async () => {
    await expect(extractor.extract('https://elsewhere.example/a')).rejects.toMatchObject({
      kind: 'invalid_url',
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should report upstream error statuses', async () => {
    mockFetch.mockResolvedValueOnce(htmlResponse('gone', { status: 404 }));

    await expect(extractor.extract('https://news.example/missing')).rejects.toMatchObject({
      kind: 'upstream',
      message: 'Upstream returned an error',
    });
  });

  it('should reject responses that are not HTML', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('{"ok":true}', { headers: { 'content-type': 'application/json' } })
    );

    await expect(extractor.extract('https://news.example/api')).rejects.toMatchObject({
      kind: 'not_html',
    });
  });

  it('should report network failures', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(extractor.extract('https://news.example/a')).rejects.toMatchObject({
      kind: 'request',
      message: 'Upstream request failed: fetch failed',
    });
  });
});

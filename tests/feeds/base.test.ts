/**
 * Tests for the source adapter base: deadlines, HTTP error mapping
 * and item limits.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { SourceAdapter, USER_AGENT, type ParseResult } from '../../src/feeds/base';
import { FetchError } from '../../src/lib/errors';
import { RssSourceSchema, type RawItem, type RssSourceConfig } from '../../src/types';

type Collector = (signal: AbortSignal) => Promise<ParseResult>;

class StubSource extends SourceAdapter<RssSourceConfig> {
  readonly kind = 'rss' as const;

  constructor(
    config: RssSourceConfig,
    private readonly collector: Collector
  ) {
    super(config);
  }

  protected collect(signal: AbortSignal): Promise<ParseResult> {
    return this.collector(signal);
  }

  async parse(): Promise<ParseResult> {
    return { items: [], softErrors: 0 };
  }

  get(url: string, signal: AbortSignal): Promise<string> {
    return this.request(url, signal, 'text/plain');
  }
}

function config(overrides: Partial<RssSourceConfig> = {}): RssSourceConfig {
  return { ...RssSourceSchema.parse({ id: 'stub', kind: 'rss', url: 'https://feeds.example/rss' }), ...overrides };
}

function rawItems(count: number): RawItem[] {
  return Array.from({ length: count }, (_, i) => ({
    sourceId: 'stub',
    title: `Story ${i}`,
    fetchedAt: '2026-03-10T12:00:00.000Z',
  }));
}

async function captureError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('Expected a FetchError');
}

// ============================================================
// FETCH
// ============================================================

describe('SourceAdapter.fetch', () => {
  it('should return items with the soft error count', async () => {
    const source = new StubSource(config(), async () => ({ items: rawItems(2), softErrors: 1 }));

    const result = await source.fetch(1000);

    expect(result.items).toHaveLength(2);
    expect(result.softErrors).toBe(1);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should cap items at maxItems', async () => {
    const source = new StubSource(config({ maxItems: 2 }), async () => ({ items: rawItems(5), softErrors: 0 }));

    const result = await source.fetch(1000);

    expect(result.items.map(i => i.title)).toEqual(['Story 0', 'Story 1']);
  });

  it('should fail with a timeout and abort the request when the deadline passes', async () => {
    let seen: AbortSignal | undefined;
    const source = new StubSource(config(), signal => {
      seen = signal;
      return new Promise(() => {});
    });

    const error = await captureError(source.fetch(20));

    expect(error.kind).toBe('timeout');
    expect(error.sourceId).toBe('stub');
    expect(error.message).toBe('Timeout after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('should wrap unexpected errors as unreachable', async () => {
    const source = new StubSource(config(), async () => {
      throw new Error('socket hang up');
    });

    const error = await captureError(source.fetch(1000));

    expect(error.kind).toBe('unreachable');
    expect(error.message).toBe('socket hang up');
  });

  it('should pass FetchErrors through unchanged', async () => {
    const original = new FetchError('malformed_response', 'stub', 'Invalid feed');
    const source = new StubSource(config(), async () => {
      throw original;
    });

    await expect(source.fetch(1000)).rejects.toBe(original);
  });
});

// ============================================================
// REQUEST
// ============================================================

describe('SourceAdapter.request', () => {
  let mockFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
  });

  it('should send the service user agent and configured headers', async () => {
    mockFetch.mockResolvedValueOnce(new Response('ok'));
    const source = new StubSource(config({ headers: { 'X-Api-Key': 'test-key' } }), async () => ({
      items: [],
      softErrors: 0,
    }));

    const body = await source.get('https://feeds.example/rss', new AbortController().signal);

    expect(body).toBe('ok');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://feeds.example/rss');
    expect(init?.headers).toEqual({
      'User-Agent': USER_AGENT,
      Accept: 'text/plain',
      'X-Api-Key': 'test-key',
    });
  });

  it('should map a non-2xx status to unreachable, keeping the status', async () => {
    mockFetch.mockResolvedValueOnce(new Response('down', { status: 503 }));
    const source = new StubSource(config(), async () => ({ items: [], softErrors: 0 }));

    const error = await captureError(source.get('https://feeds.example/rss', new AbortController().signal));

    expect(error.kind).toBe('unreachable');
    expect(error.status).toBe(503);
    expect(error.message).toBe('HTTP 503 from https://feeds.example/rss');
  });

  it('should map network failures to unreachable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const source = new StubSource(config(), async () => ({ items: [], softErrors: 0 }));

    const error = await captureError(source.get('https://feeds.example/rss', new AbortController().signal));

    expect(error.kind).toBe('unreachable');
    expect(error.message).toBe('Request failed: fetch failed');
  });

  it('should report a timeout rather than the abort it caused', async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        })
    );
    const source: StubSource = new StubSource(config(), signal =>
      source.get('https://feeds.example/rss', signal).then(() => ({ items: [], softErrors: 0 }))
    );

    const error = await captureError(source.fetch(20));

    expect(error.kind).toBe('timeout');
  });
});

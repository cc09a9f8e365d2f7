/**
 * News Reader — Article Extractor
 *
 * On-demand fetch of a single article page, converted to Markdown.
 * Independent of the cache and the refresh cycle.
 */

import { ExtractionError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { USER_AGENT } from '../feeds/base';
import { htmlToMarkdown, type ExtractedImage } from './markdown';

export interface ExtractResult {
  markdown: string;
  title: string | null;
  sourceUrl: string;
  images: ExtractedImage[];
}

export interface ExtractorOptions {
  /** Hosts (and their subdomains) that may be fetched. Empty allows any https host */
  allowedHosts?: string[];
  timeoutMs?: number;
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const DEFAULT_TIMEOUT_MS = 10_000;

const log = logger.child({ component: 'extractor' });

/**
 * Check that a URL may be fetched. Throws ExtractionError (`invalid_url`).
 */
export function validateUrl(url: string, allowedHosts: string[] = []): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ExtractionError('invalid_url', 'Invalid URL');
  }

  if (parsed.protocol !== 'https:') {
    throw new ExtractionError('invalid_url', 'Only https URLs are allowed');
  }

  if (allowedHosts.length > 0) {
    const host = parsed.hostname.toLowerCase();
    const allowed = allowedHosts.some(entry => {
      const expected = entry.toLowerCase();
      return host === expected || host.endsWith(`.${expected}`);
    });
    if (!allowed) {
      throw new ExtractionError('invalid_url', `Host not allowed: ${host}`);
    }
  }

  return parsed;
}

export class ArticleExtractor {
  private readonly allowedHosts: string[];
  private readonly timeoutMs: number;

  constructor(options: ExtractorOptions = {}) {
    this.allowedHosts = options.allowedHosts ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async extract(url: string): Promise<ExtractResult> {
    validateUrl(url, this.allowedHosts);

    const startTime = Date.now();
    const html = await this.fetchHtml(url);
    const result = htmlToMarkdown(html, url);

    log.info('Article extracted', {
      url,
      title: result.title,
      images: result.images.length,
      durationMs: Date.now() - startTime,
    });

    return { ...result, sourceUrl: url };
  }

  private async fetchHtml(url: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        redirect: 'follow',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: HTML_ACCEPT,
          'Accept-Language': 'en-US,en;q=0.9',
        },
      });
    } catch (error) {
      throw new ExtractionError('request', `Upstream request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ExtractionError('upstream', 'Upstream returned an error');
    }

    const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';
    if (!contentType.includes('text/html') && !contentType.includes('application/xhtml+xml')) {
      throw new ExtractionError('not_html', 'URL did not return HTML');
    }

    try {
      return await response.text();
    } catch (error) {
      throw new ExtractionError('request', `Upstream request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

/**
 * News Reader — Source Adapter Base
 *
 * Abstract base class for all source adapters.
 * Each variant implements collection and parsing for one feed format;
 * the base owns timeouts, HTTP error mapping and logging.
 */

import type { RawItem, SourceConfig, SourceKind } from '../types';
import { FetchError, errorMessage } from '../lib/errors';
import { logger, type Logger } from '../lib/logger';

export const USER_AGENT = 'news-reader-api/1.0';

/**
 * Items parsed from one response, plus the count of entries skipped as malformed.
 */
export interface ParseResult {
  items: RawItem[];
  softErrors: number;
}

export interface AdapterFetchResult extends ParseResult {
  durationMs: number;
}

/**
 * Abstract base class for source adapters.
 */
export abstract class SourceAdapter<TConfig extends SourceConfig = SourceConfig> {
  abstract readonly kind: SourceKind;

  protected readonly logger: Logger;

  constructor(protected readonly config: TConfig) {
    this.logger = logger.child({ source: config.id });
  }

  get id(): string {
    return this.config.id;
  }

  get endpoint(): string {
    return this.config.url;
  }

  /**
   * Retrieve and parse this source's content.
   * Must be implemented by each variant; must honor `signal`.
   */
  protected abstract collect(signal: AbortSignal): Promise<ParseResult>;

  /**
   * Parse one response body into raw items. Throws FetchError
   * (`malformed_response`) when the body as a whole is unusable.
   */
  abstract parse(body: string): Promise<ParseResult>;

  /**
   * Fetch with a deadline. Rejects only with FetchError.
   */
  async fetch(timeoutMs: number): Promise<AdapterFetchResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new FetchError('timeout', this.id, `Timeout after ${timeoutMs}ms`);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      const result = await Promise.race([this.collect(controller.signal), timeout]);
      const limited = result.items.slice(0, this.config.maxItems);
      const durationMs = Date.now() - startTime;

      this.logger.debug('Fetch completed', {
        items: limited.length,
        softErrors: result.softErrors,
        durationMs,
      });

      return { items: limited, softErrors: result.softErrors, durationMs };
    } catch (error) {
      const fetchError = this.toFetchError(error);
      this.logger.warn('Fetch failed', {
        kind: fetchError.kind,
        error: fetchError.message,
        durationMs: Date.now() - startTime,
      });
      throw fetchError;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * GET a URL and return its body text. Non-2xx and network failures
   * become `unreachable`.
   */
  protected async request(url: string, signal: AbortSignal, accept: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        signal,
        headers: {
          'User-Agent': USER_AGENT,
          Accept: accept,
          ...this.config.headers,
        },
      });
    } catch (error) {
      if (signal.aborted && signal.reason instanceof FetchError) {
        throw signal.reason;
      }
      throw new FetchError('unreachable', this.id, `Request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FetchError('unreachable', this.id, `HTTP ${response.status} from ${url}`, {
        status: response.status,
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FetchError('unreachable', this.id, `Failed to read body: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  protected rawItem(fields: Omit<RawItem, 'sourceId' | 'fetchedAt'>, fetchedAt: string): RawItem {
    return { sourceId: this.id, fetchedAt, ...fields };
  }

  private toFetchError(error: unknown): FetchError {
    if (error instanceof FetchError) return error;
    return new FetchError('unreachable', this.id, errorMessage(error), { cause: error });
  }
}

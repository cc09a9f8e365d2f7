/**
 * News Reader — JSON API Source
 *
 * Pages through a JSON endpoint and maps each entry through
 * configured field paths (dot notation, e.g. "meta.published").
 */

import { z } from 'zod';
import { SourceAdapter, type ParseResult } from '../base';
import { FetchError, errorMessage } from '../../lib/errors';
import type { JsonApiSourceConfig, RawItem } from '../../types';

const JSON_ACCEPT = 'application/json';

const EntrySchema = z.record(z.unknown());
type Entry = z.infer<typeof EntrySchema>;

/**
 * Read a dot-separated path from a JSON value.
 */
export function getPath(value: unknown, path: string): unknown {
  if (path === '') return value;

  let current: unknown = value;
  for (const key of path.split('.')) {
    if (current === null || typeof current !== 'object' || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export class JsonApiSource extends SourceAdapter<JsonApiSourceConfig> {
  readonly kind = 'json_api' as const;

  protected async collect(signal: AbortSignal): Promise<ParseResult> {
    const { startPage, maxPages } = this.config;
    const items: RawItem[] = [];
    let softErrors = 0;

    for (let page = startPage; page < startPage + maxPages; page++) {
      const body = await this.request(this.pageUrl(page), signal, JSON_ACCEPT);
      const result = await this.parse(body);

      items.push(...result.items);
      softErrors += result.softErrors;

      if (result.items.length + result.softErrors === 0 || items.length >= this.config.maxItems) {
        break;
      }
    }

    return { items, softErrors };
  }

  async parse(body: string): Promise<ParseResult> {
    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      throw new FetchError('malformed_response', this.id, `Invalid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const entries = getPath(document, this.config.itemsPath);
    if (!Array.isArray(entries)) {
      throw new FetchError(
        'malformed_response',
        this.id,
        `Expected an array at "${this.config.itemsPath}"`
      );
    }

    const fetchedAt = new Date().toISOString();
    const items: RawItem[] = [];
    let softErrors = 0;

    for (const entry of entries) {
      const parsed = EntrySchema.safeParse(entry);
      const item = parsed.success ? this.toRawItem(parsed.data, fetchedAt) : null;
      if (item) {
        items.push(item);
      } else {
        softErrors++;
      }
    }

    return { items, softErrors };
  }

  /**
   * Build the URL for one page, preserving any query the endpoint already has.
   */
  pageUrl(page: number): string {
    const url = new URL(this.config.url);
    url.searchParams.set(this.config.pageParam, String(page));
    return url.toString();
  }

  private toRawItem(entry: Entry, fetchedAt: string): RawItem | null {
    const { fields } = this.config;
    const title = asText(getPath(entry, fields.title));
    const url = fields.url ? asText(getPath(entry, fields.url)) : undefined;
    if (title === undefined && url === undefined) return null;

    const published = fields.publishedAt ? getPath(entry, fields.publishedAt) : undefined;

    return this.rawItem(
      {
        nativeId: fields.id ? asText(getPath(entry, fields.id)) : undefined,
        title,
        url,
        body: fields.body ? asText(getPath(entry, fields.body)) : undefined,
        publishedRaw: typeof published === 'number' || typeof published === 'string' ? published : undefined,
      },
      fetchedAt
    );
  }
}

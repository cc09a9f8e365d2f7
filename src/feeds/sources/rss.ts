/**
 * News Reader — RSS / Atom Source
 *
 * Polls an RSS 2.0 or Atom feed and maps its entries to raw items.
 */

import Parser from 'rss-parser';
import { SourceAdapter, type ParseResult } from '../base';
import { FetchError, errorMessage } from '../../lib/errors';
import type { RawItem, RssSourceConfig } from '../../types';

const FEED_ACCEPT =
  'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5';

interface EntryFields {
  id?: string;
  'content:encoded'?: string;
}

type FeedEntry = EntryFields & Parser.Item;

export class RssSource extends SourceAdapter<RssSourceConfig> {
  readonly kind = 'rss' as const;

  private readonly parser = new Parser<Record<string, unknown>, EntryFields>({
    customFields: { item: ['id', 'content:encoded'] },
  });

  protected async collect(signal: AbortSignal): Promise<ParseResult> {
    const body = await this.request(this.config.url, signal, FEED_ACCEPT);
    return this.parse(body);
  }

  async parse(body: string): Promise<ParseResult> {
    let entries: FeedEntry[];
    try {
      entries = (await this.parser.parseString(body)).items;
    } catch (error) {
      throw new FetchError('malformed_response', this.id, `Invalid feed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const fetchedAt = new Date().toISOString();
    const items: RawItem[] = [];
    let softErrors = 0;

    for (const entry of entries) {
      const item = this.toRawItem(entry, fetchedAt);
      if (item) {
        items.push(item);
      } else {
        softErrors++;
      }
    }

    if (softErrors > 0) {
      this.logger.debug('Skipped malformed feed entries', { softErrors });
    }

    return { items, softErrors };
  }

  private toRawItem(entry: FeedEntry, fetchedAt: string): RawItem | null {
    const title = entry.title?.trim();
    const link = entry.link?.trim();
    if (!title && !link) return null;

    return this.rawItem(
      {
        nativeId: entry.guid ?? entry.id,
        title,
        url: link,
        body: entry['content:encoded'] ?? entry.content ?? entry.summary ?? entry.contentSnippet,
        publishedRaw: entry.pubDate ?? entry.isoDate,
      },
      fetchedAt
    );
  }
}

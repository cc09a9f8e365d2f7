/**
 * News Reader — HTML Page Source
 *
 * Scrapes a listing page (a site's news index) with CSS selectors.
 * Each element matching `selectors.item` is one story block.
 */

import * as cheerio from 'cheerio';
import { SourceAdapter, type ParseResult } from '../base';
import { FetchError } from '../../lib/errors';
import { collapseWhitespace } from '../../lib/text';
import type { HtmlPageSourceConfig, RawItem } from '../../types';

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

export class HtmlPageSource extends SourceAdapter<HtmlPageSourceConfig> {
  readonly kind = 'html_page' as const;

  protected async collect(signal: AbortSignal): Promise<ParseResult> {
    const body = await this.request(this.config.url, signal, HTML_ACCEPT);
    return this.parse(body);
  }

  async parse(body: string): Promise<ParseResult> {
    if (!/<[a-z!]/i.test(body)) {
      throw new FetchError('malformed_response', this.id, 'Response is not an HTML document');
    }

    const $ = cheerio.load(body);
    const { selectors } = this.config;
    const fetchedAt = new Date().toISOString();
    const items: RawItem[] = [];
    let softErrors = 0;

    $(selectors.item).each((_, element) => {
      const block = $(element);
      const title = collapseWhitespace(block.find(selectors.title).first().text());

      const linkEl = block.find(selectors.link ?? 'a[href]').first();
      const href = linkEl.attr('href')?.trim();

      if (!title && !href) {
        softErrors++;
        return;
      }

      let publishedRaw: string | undefined;
      if (selectors.date) {
        const dateEl = block.find(selectors.date).first();
        const value = selectors.dateAttribute ? dateEl.attr(selectors.dateAttribute) : dateEl.text();
        publishedRaw = value ? collapseWhitespace(value) || undefined : undefined;
      }

      items.push(
        this.rawItem(
          {
            title: title || undefined,
            url: href ? this.resolve(href) : undefined,
            body: selectors.summary ? block.find(selectors.summary).first().html() ?? undefined : undefined,
            publishedRaw,
          },
          fetchedAt
        )
      );
    });

    if (softErrors > 0) {
      this.logger.debug('Skipped malformed page blocks', { softErrors });
    }

    return { items, softErrors };
  }

  private resolve(href: string): string {
    try {
      return new URL(href, this.config.url).toString();
    } catch {
      return href;
    }
  }
}

/**
 * News Reader — Source Registry
 *
 * Maps each source variant to its adapter class.
 * Adding a feed format means adding a variant to SourceConfig
 * and one case here.
 */

import type { SourceAdapter } from '../base';
import type { SourceConfig } from '../../types';
import { RssSource } from './rss';
import { JsonApiSource } from './json-api';
import { HtmlPageSource } from './html-page';

export { RssSource, JsonApiSource, HtmlPageSource };

/**
 * Build the adapter for one configured source.
 */
export function createAdapter(config: SourceConfig): SourceAdapter {
  switch (config.kind) {
    case 'rss':
      return new RssSource(config);
    case 'json_api':
      return new JsonApiSource(config);
    case 'html_page':
      return new HtmlPageSource(config);
    default: {
      const unknownKind: never = config;
      throw new Error(`Unsupported source kind: ${JSON.stringify(unknownKind)}`);
    }
  }
}

/**
 * Build adapters for every enabled source, preserving configured order.
 */
export function createAdapters(configs: SourceConfig[]): SourceAdapter[] {
  return configs.filter(config => config.enabled).map(createAdapter);
}

/**
 * News Reader — Feeds Module
 *
 * Source adapters, normalization and deduplication.
 */

export { SourceAdapter, USER_AGENT, type ParseResult, type AdapterFetchResult } from './base';

export { RssSource, JsonApiSource, HtmlPageSource, createAdapter, createAdapters } from './sources';

export {
  normalize,
  normalizeBatch,
  canonicalizeUrl,
  urlIdentityKey,
  computeArticleId,
  parsePublishedAt,
  type NormalizeOptions,
  type NormalizeBatchResult,
} from './normalizer';

export {
  reconcile,
  sortByPriority,
  titleSimilarity,
  NEAR_DUPLICATE_WINDOW_MS,
  type ReconcileOptions,
  type ReconcileDecision,
  type ReconcileResult,
  type SkippedItem,
} from './dedup';

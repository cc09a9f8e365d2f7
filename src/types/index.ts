/**
 * News Reader — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Articles
export type { RawItem, NormalizedArticle, Article, ArticleEntity } from './article';
export { ArticleSchema } from './article';

// Sources
export type {
  RssSourceConfig,
  JsonApiSourceConfig,
  HtmlPageSourceConfig,
  SourceConfig,
  SourceKind,
  SourceHealthStatus,
  SourceHealthSnapshot,
} from './source';
export {
  SourceConfigSchema,
  SourcesFileSchema,
  RssSourceSchema,
  JsonApiSourceSchema,
  HtmlPageSourceSchema,
} from './source';

/**
 * News Reader — Article Types v1.0
 *
 * Raw items as adapters produce them, and the canonical Article
 * the cache stores and serves.
 */

import { z } from 'zod';

// ============================================================
// RAW ITEM
// ============================================================

/**
 * Source-specific record before normalization.
 * Never retained past one refresh cycle.
 */
export interface RawItem {
  sourceId: string;
  nativeId?: string; // GUID, API id, etc.
  title?: string;
  body?: string;
  publishedRaw?: string | number; // format varies by source
  url?: string;
  fetchedAt: string;
}

// ============================================================
// NORMALIZED ARTICLE
// ============================================================

/**
 * Normalizer output. Carries the reporting source but none of
 * the ingestion bookkeeping yet.
 */
export interface NormalizedArticle {
  id: string;
  sourceId: string;
  title: string;
  summary: string;
  publishedAt: string;
  publishedAtInferred: boolean;
  canonicalUrl: string | null;
}

// ============================================================
// CANONICAL ARTICLE
// ============================================================

export const ArticleSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  summary: z.string(),
  publishedAt: z.string().datetime(),
  sourceIds: z.array(z.string().min(1)).min(1),
  canonicalUrl: z.string().url().nullable(),
  firstSeenAt: z.string().datetime(),
  lastSeenAt: z.string().datetime(),
});

/**
 * Deduplicated, normalized representation of one story,
 * possibly corroborated by several sources.
 */
export type Article = z.infer<typeof ArticleSchema>;

// ============================================================
// DATABASE ENTITY TYPE
// ============================================================

export interface ArticleEntity {
  id: string;
  title: string;
  summary: string;
  published_at: string;
  source_ids: string[];
  canonical_url: string | null;
  first_seen_at: string;
  last_seen_at: string;
}

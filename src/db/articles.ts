/**
 * News Reader — Article Persistence (Supabase)
 *
 * Mirrors the cache into one table keyed by article id. Column names
 * are the snake_case Article fields.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { handleSupabaseError } from './client';
import type { ArticlePersistence } from '../cache/store';
import type { Article, ArticleEntity } from '../types';
import { logger } from '../lib/logger';

const PAGE_SIZE = 1000;

const log = logger.child({ component: 'db' });

// Postgres returns timestamptz with a "+00:00" offset
const timestamp = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp')
  .transform(value => new Date(value).toISOString());

const ArticleRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string(),
  published_at: timestamp,
  source_ids: z.array(z.string()),
  canonical_url: z.string().nullable(),
  first_seen_at: timestamp,
  last_seen_at: timestamp,
});

// ============================================================
// MAPPING
// ============================================================

export function toEntity(article: Article): ArticleEntity {
  return {
    id: article.id,
    title: article.title,
    summary: article.summary,
    published_at: article.publishedAt,
    source_ids: [...article.sourceIds],
    canonical_url: article.canonicalUrl,
    first_seen_at: article.firstSeenAt,
    last_seen_at: article.lastSeenAt,
  };
}

export function fromEntity(row: ArticleEntity): Article {
  return {
    id: row.id,
    title: row.title,
    summary: row.summary,
    publishedAt: row.published_at,
    sourceIds: [...row.source_ids],
    canonicalUrl: row.canonical_url,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
  };
}

// ============================================================
// PERSISTENCE
// ============================================================

export class SupabaseArticlePersistence implements ArticlePersistence {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'articles'
  ) {}

  async loadAll(): Promise<Article[]> {
    const articles: Article[] = [];
    let skipped = 0;

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.table)
        .select('*')
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw handleSupabaseError(error);

      const rows = z.array(z.unknown()).parse(data ?? []);
      for (const row of rows) {
        const parsed = ArticleRowSchema.safeParse(row);
        if (parsed.success) {
          articles.push(fromEntity(parsed.data));
        } else {
          skipped++;
        }
      }

      if (rows.length < PAGE_SIZE) break;
    }

    if (skipped > 0) {
      log.warn('Skipped malformed article rows', { table: this.table, skipped });
    }

    return articles;
  }

  async saveMany(articles: Article[]): Promise<void> {
    if (articles.length === 0) return;

    const { error } = await this.client
      .from(this.table)
      .upsert(articles.map(toEntity), { onConflict: 'id' });

    if (error) throw handleSupabaseError(error);
  }

  async deleteMany(ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    const { error } = await this.client.from(this.table).delete().in('id', ids);

    if (error) throw handleSupabaseError(error);
  }
}

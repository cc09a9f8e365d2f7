/**
 * News Reader — Bootstrap
 *
 * Wires configuration into adapters, the cache store, the scheduler
 * and the HTTP app. Nothing starts until the caller says so.
 */

import type { Express } from 'express';
import type { AppConfig } from './config/environment';
import { createAdapters, type SourceAdapter } from './feeds';
import { ArticleStore, type ArticlePersistence } from './cache/store';
import { Scheduler, type CycleReport } from './scheduler/scheduler';
import { ArticleExtractor } from './extract/extractor';
import { createApp } from './server/api';
import { createSupabaseClient } from './db/client';
import { SupabaseArticlePersistence } from './db/articles';
import { setLogLevel } from './lib/logger';

export interface NewsReader {
  adapters: SourceAdapter[];
  store: ArticleStore;
  scheduler: Scheduler;
  app: Express;
}

export interface NewsReaderOverrides {
  /** Replaces the Supabase backend built from config */
  persistence?: ArticlePersistence;
  onCycleComplete?: (report: CycleReport) => void;
}

function buildPersistence(config: AppConfig): ArticlePersistence | undefined {
  if (!config.persistence) return undefined;
  const client = createSupabaseClient(config.persistence);
  return new SupabaseArticlePersistence(client, config.persistence.table);
}

export function createNewsReader(config: AppConfig, overrides: NewsReaderOverrides = {}): NewsReader {
  setLogLevel(config.logLevel);

  const adapters = createAdapters(config.sources);
  const store = new ArticleStore(overrides.persistence ?? buildPersistence(config));

  const scheduler = new Scheduler({
    adapters,
    store,
    options: {
      ...config.scheduler,
      sourcePriority: adapters.map(adapter => adapter.id),
    },
    onCycleComplete: overrides.onCycleComplete,
  });

  const app = createApp({
    store,
    scheduler,
    extractor: new ArticleExtractor({ allowedHosts: config.extractAllowedHosts }),
  });

  return { adapters, store, scheduler, app };
}

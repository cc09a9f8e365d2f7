/**
 * News Reader — Article Cache Store
 *
 * In-memory index of canonical articles keyed by id, with a secondary
 * index ordered by publish time for "most recent N" reads.
 *
 * Articles are frozen on write and replaced whole, so a reader always
 * sees either the previous or the next version of an article.
 */

import { ArticleSchema, type Article } from '../types';
import { logger } from '../lib/logger';

/**
 * Optional durable backend. The store stays the source of truth
 * for reads; the backend only receives flushed changes.
 */
export interface ArticlePersistence {
  loadAll(): Promise<Article[]>;
  saveMany(articles: Article[]): Promise<void>;
  deleteMany(ids: string[]): Promise<void>;
}

export interface FlushResult {
  saved: number;
  deleted: number;
}

interface IndexEntry {
  id: string;
  publishedMs: number;
}

export const MAX_LIST_LIMIT = 500;

const log = logger.child({ component: 'store' });

/**
 * publishedAt descending, ties by id ascending.
 */
function compareEntries(a: IndexEntry, b: IndexEntry): number {
  if (a.publishedMs !== b.publishedMs) return b.publishedMs - a.publishedMs;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined;
}

export class ArticleStore {
  private readonly articles = new Map<string, Readonly<Article>>();
  private index: IndexEntry[] = [];

  private readonly pendingSaves = new Set<string>();
  private readonly pendingDeletes = new Set<string>();

  constructor(private readonly persistence?: ArticlePersistence) {}

  get persistent(): boolean {
    return this.persistence !== undefined;
  }

  get(id: string): Article | undefined {
    return this.articles.get(id);
  }

  size(): number {
    return this.articles.size;
  }

  /**
   * Insert or replace an article and reposition it in the time index.
   */
  upsert(article: Article): void {
    if (article.sourceIds.length === 0) {
      throw new TypeError(`Article ${article.id} has no sourceIds`);
    }
    if (Date.parse(article.lastSeenAt) < Date.parse(article.firstSeenAt)) {
      throw new TypeError(`Article ${article.id} has lastSeenAt before firstSeenAt`);
    }

    const previous = this.articles.get(article.id);
    if (previous) {
      this.removeFromIndex({ id: previous.id, publishedMs: Date.parse(previous.publishedAt) });
    }

    this.articles.set(article.id, Object.freeze({ ...article, sourceIds: [...article.sourceIds] }));
    this.insertIntoIndex({ id: article.id, publishedMs: Date.parse(article.publishedAt) });

    if (this.persistence) {
      this.pendingDeletes.delete(article.id);
      this.pendingSaves.add(article.id);
    }
  }

  /**
   * Most recent articles by publish time. Never waits on a refresh.
   */
  listRecent(limit: number, offset = 0): Article[] {
    const safeLimit = Math.min(Math.max(0, Math.floor(limit)), MAX_LIST_LIMIT);
    const safeOffset = Math.max(0, Math.floor(offset));

    return this.index
      .slice(safeOffset, safeOffset + safeLimit)
      .map(entry => this.articles.get(entry.id))
      .filter(isPresent);
  }

  /**
   * Remove every article last seen before `cutoff`. The only path
   * that removes articles. Returns the evicted ids.
   */
  evictOlderThan(cutoff: Date): string[] {
    const cutoffMs = cutoff.getTime();
    const evicted: string[] = [];

    for (const [id, article] of this.articles) {
      if (Date.parse(article.lastSeenAt) < cutoffMs) {
        evicted.push(id);
      }
    }

    if (evicted.length === 0) return evicted;

    const gone = new Set(evicted);
    for (const id of evicted) {
      this.articles.delete(id);
      if (this.persistence) {
        this.pendingSaves.delete(id);
        this.pendingDeletes.add(id);
      }
    }
    this.index = this.index.filter(entry => !gone.has(entry.id));

    return evicted;
  }

  /**
   * Point-in-time copy of the contents, for reconciliation.
   */
  snapshot(): ReadonlyMap<string, Article> {
    return new Map(this.articles);
  }

  /**
   * Load persisted articles. Invalid rows are skipped.
   */
  async hydrate(): Promise<number> {
    if (!this.persistence) return 0;

    const rows = await this.persistence.loadAll();
    let loaded = 0;
    let invalid = 0;

    for (const row of rows) {
      const parsed = ArticleSchema.safeParse(row);
      if (!parsed.success) {
        invalid++;
        continue;
      }
      this.upsert(parsed.data);
      loaded++;
    }

    // Hydrated rows are already persisted
    this.pendingSaves.clear();

    log.info('Store hydrated', { loaded, invalid });
    return loaded;
  }

  /**
   * Write pending changes to the backend. On failure the changes stay
   * pending for the next flush and the error is rethrown.
   */
  async flush(): Promise<FlushResult> {
    if (!this.persistence) return { saved: 0, deleted: 0 };

    const saveIds = [...this.pendingSaves];
    const deleteIds = [...this.pendingDeletes];
    this.pendingSaves.clear();
    this.pendingDeletes.clear();

    const toSave = saveIds.map(id => this.articles.get(id)).filter(isPresent);

    try {
      if (toSave.length > 0) await this.persistence.saveMany(toSave);
      if (deleteIds.length > 0) await this.persistence.deleteMany(deleteIds);
    } catch (error) {
      for (const id of saveIds) {
        if (this.articles.has(id)) this.pendingSaves.add(id);
      }
      for (const id of deleteIds) {
        if (!this.articles.has(id)) this.pendingDeletes.add(id);
      }
      throw error;
    }

    return { saved: toSave.length, deleted: deleteIds.length };
  }

  /**
   * Number of changes not yet written to the backend.
   */
  pendingChanges(): number {
    return this.pendingSaves.size + this.pendingDeletes.size;
  }

  private position(entry: IndexEntry): number {
    let low = 0;
    let high = this.index.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareEntries(this.index[mid], entry) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private insertIntoIndex(entry: IndexEntry): void {
    this.index.splice(this.position(entry), 0, entry);
  }

  private removeFromIndex(entry: IndexEntry): void {
    const at = this.position(entry);
    if (this.index[at]?.id === entry.id) {
      this.index.splice(at, 1);
    }
  }
}

/**
 * News Reader — Deduplication
 *
 * Reconciles a cycle's normalized articles against the current cache
 * contents. Content is first-source-wins; later sightings only add
 * corroborating sources and refresh bookkeeping.
 */

import type { Article, NormalizedArticle } from '../types';

export interface ReconcileOptions {
  now: Date;
  /** Source ids in priority order; decides whose content wins on first insert */
  sourcePriority?: string[];
  /** Title similarity (0-1] at which unmatched items merge into a similar story. Off when unset */
  nearDuplicateThreshold?: number;
}

export interface ReconcileDecision {
  /** Full article state to upsert */
  article: Article;
  /** Source whose item led this decision */
  primarySourceId: string;
  /** Sources in this batch that reported the story */
  contributors: string[];
  matchedBy: 'new' | 'id' | 'near_duplicate';
}

export interface SkippedItem {
  item: NormalizedArticle;
  /** Id of the article the item was folded into */
  duplicateOf: string;
}

export interface ReconcileResult {
  toInsert: ReconcileDecision[];
  toUpdate: ReconcileDecision[];
  toSkip: SkippedItem[];
}

/** Near-duplicates must be published within this window of each other */
export const NEAR_DUPLICATE_WINDOW_MS = 48 * 60 * 60 * 1000;

interface Group {
  targetId: string;
  leader: NormalizedArticle;
  summary: string;
  contributors: Set<string>;
  existing?: Article;
  matchedBy: ReconcileDecision['matchedBy'];
}

// ============================================================
// ORDERING
// ============================================================

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deterministic batch order: configured priority, then source id,
 * then URL, title and id. Arrival order never matters.
 */
export function sortByPriority(batch: NormalizedArticle[], sourcePriority: string[] = []): NormalizedArticle[] {
  const rank = new Map(sourcePriority.map((id, index) => [id, index]));
  const rankOf = (sourceId: string) => rank.get(sourceId) ?? Number.MAX_SAFE_INTEGER;

  return [...batch].sort(
    (a, b) =>
      rankOf(a.sourceId) - rankOf(b.sourceId) ||
      compareStrings(a.sourceId, b.sourceId) ||
      compareStrings(a.canonicalUrl ?? '', b.canonicalUrl ?? '') ||
      compareStrings(a.title, b.title) ||
      compareStrings(a.id, b.id)
  );
}

// ============================================================
// SIMILARITY
// ============================================================

function titleWords(title: string): Set<string> {
  return new Set(
    title
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(w => w.length > 2)
  );
}

/**
 * Jaccard similarity between the word sets of two titles.
 */
export function titleSimilarity(a: string, b: string): number {
  const wordsA = titleWords(a);
  const wordsB = titleWords(b);

  if (wordsA.size === 0 && wordsB.size === 0) return 1;
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }

  return intersection / (wordsA.size + wordsB.size - intersection);
}

interface Candidate {
  id: string;
  title: string;
  publishedAt: string;
}

function findNearDuplicate(
  item: NormalizedArticle,
  candidates: Candidate[],
  threshold: number
): string | undefined {
  const publishedMs = Date.parse(item.publishedAt);
  let best: { id: string; score: number } | undefined;

  for (const candidate of candidates) {
    if (Math.abs(Date.parse(candidate.publishedAt) - publishedMs) > NEAR_DUPLICATE_WINDOW_MS) continue;

    const score = titleSimilarity(item.title, candidate.title);
    if (score >= threshold && (!best || score > best.score)) {
      best = { id: candidate.id, score };
    }
  }

  return best?.id;
}

// ============================================================
// RECONCILE
// ============================================================

function sortedUnion(...lists: Iterable<string>[]): string[] {
  const all = new Set<string>();
  for (const list of lists) {
    for (const id of list) all.add(id);
  }
  return [...all].sort(compareStrings);
}

function laterOf(a: string, b: string): string {
  return Date.parse(a) >= Date.parse(b) ? a : b;
}

/**
 * Classify a batch against a store snapshot. Pure: inputs are never
 * mutated and the same inputs always give the same result.
 */
export function reconcile(
  batch: NormalizedArticle[],
  snapshot: ReadonlyMap<string, Article>,
  options: ReconcileOptions
): ReconcileResult {
  const nowIso = options.now.toISOString();
  const threshold = options.nearDuplicateThreshold ?? 0;
  const nearDuplicates = threshold > 0;

  const groups = new Map<string, Group>();
  const toSkip: SkippedItem[] = [];

  const stored: Candidate[] = nearDuplicates
    ? [...snapshot.values()].sort((a, b) => compareStrings(a.id, b.id))
    : [];

  const fold = (group: Group, item: NormalizedArticle) => {
    group.contributors.add(item.sourceId);
    if (!group.summary && item.summary) group.summary = item.summary;
    toSkip.push({ item, duplicateOf: group.targetId });
  };

  const open = (targetId: string, item: NormalizedArticle, matchedBy: Group['matchedBy']) => {
    groups.set(targetId, {
      targetId,
      leader: item,
      summary: item.summary,
      contributors: new Set([item.sourceId]),
      existing: snapshot.get(targetId),
      matchedBy,
    });
  };

  for (const item of sortByPriority(batch, options.sourcePriority)) {
    const group = groups.get(item.id);
    if (group) {
      fold(group, item);
      continue;
    }

    if (snapshot.has(item.id)) {
      open(item.id, item, 'id');
      continue;
    }

    if (nearDuplicates) {
      const pending: Candidate[] = [...groups.values()].map(g => ({
        id: g.targetId,
        title: g.existing?.title ?? g.leader.title,
        publishedAt: g.existing?.publishedAt ?? g.leader.publishedAt,
      }));
      const match = findNearDuplicate(item, [...pending, ...stored], threshold);

      if (match !== undefined) {
        const target = groups.get(match);
        if (target) {
          fold(target, item);
        } else {
          open(match, item, 'near_duplicate');
        }
        continue;
      }
    }

    open(item.id, item, 'new');
  }

  const toInsert: ReconcileDecision[] = [];
  const toUpdate: ReconcileDecision[] = [];

  for (const group of groups.values()) {
    const contributors = sortedUnion(group.contributors);
    const base = {
      primarySourceId: group.leader.sourceId,
      contributors,
      matchedBy: group.matchedBy,
    };

    if (group.existing) {
      const existing = group.existing;
      toUpdate.push({
        ...base,
        article: {
          ...existing,
          summary: existing.summary || group.summary,
          sourceIds: sortedUnion(existing.sourceIds, contributors),
          lastSeenAt: laterOf(nowIso, existing.lastSeenAt),
        },
      });
    } else {
      const { leader } = group;
      toInsert.push({
        ...base,
        article: {
          id: group.targetId,
          title: leader.title,
          summary: group.summary,
          publishedAt: leader.publishedAt,
          sourceIds: contributors,
          canonicalUrl: leader.canonicalUrl,
          firstSeenAt: nowIso,
          lastSeenAt: nowIso,
        },
      });
    }
  }

  return { toInsert, toUpdate, toSkip };
}

/**
 * News Reader — Article Normalizer
 *
 * Converts raw items from any source into the normalized article
 * shape. Pure: no I/O, no shared state.
 */

import { createHash } from 'crypto';
import type { NormalizedArticle, RawItem } from '../types';
import { NormalizeError } from '../lib/errors';
import { cleanText, truncate } from '../lib/text';
import { logger } from '../lib/logger';

export interface NormalizeOptions {
  /** Ingestion time; used when the source omits a publish time */
  now: Date;
  /** Cap on summary length in characters */
  maxSummaryLength?: number;
  /** Base for resolving relative item URLs (usually the source endpoint) */
  baseUrl?: string;
}

export interface NormalizeBatchResult {
  articles: NormalizedArticle[];
  dropped: number;
  errors: NormalizeError[];
}

const DEFAULT_MAX_SUMMARY_LENGTH = 500;

// ============================================================
// URL CANONICALIZATION
// ============================================================

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'mc_cid', 'mc_eid']);

function isTrackingParam(name: string): boolean {
  return name.toLowerCase().startsWith('utm_') || TRACKING_PARAMS.has(name.toLowerCase());
}

/**
 * Canonical form of an article URL, or null when it isn't a usable
 * http(s) URL. Path case is preserved here; see urlIdentityKey.
 */
export function canonicalizeUrl(raw: string, baseUrl?: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim(), baseUrl);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

  // URL already lowercases scheme and host and drops default ports
  parsed.hash = '';
  parsed.username = '';
  parsed.password = '';

  const params = [...parsed.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => (a === b ? compare(av, bv) : compare(a, b)));
  parsed.search = new URLSearchParams(params).toString();

  if (parsed.pathname.length > 1) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.toString();
}

/**
 * Key two URLs share when they name the same article: no scheme,
 * no leading "www.", lowercased throughout.
 */
export function urlIdentityKey(canonicalUrl: string): string {
  const parsed = new URL(canonicalUrl);
  const host = parsed.host.replace(/^www\./, '');
  const path = parsed.pathname === '/' ? '' : parsed.pathname;
  return `${host}${path}${parsed.search}`.toLowerCase();
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ============================================================
// ARTICLE ID
// ============================================================

function hashKey(key: string): string {
  return createHash('sha256').update(key).digest('hex').slice(0, 16);
}

/**
 * Stable id for an article: from its canonical URL when it has one,
 * otherwise from a fingerprint of its cleaned title and body.
 */
export function computeArticleId(input: { canonicalUrl: string | null; title: string; body: string }): string {
  if (input.canonicalUrl) {
    return hashKey(`url:${urlIdentityKey(input.canonicalUrl)}`);
  }
  return hashKey(`content:${input.title.toLowerCase()}\n${input.body.toLowerCase()}`);
}

// ============================================================
// TIMESTAMP PARSING
// ============================================================

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const ZONE_OFFSETS_MINUTES: Record<string, number> = {
  GMT: 0, UT: 0, UTC: 0, Z: 0,
  EST: -300, EDT: -240,
  CST: -360, CDT: -300,
  MST: -420, MDT: -360,
  PST: -480, PDT: -420,
};

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const RFC2822_PATTERN =
  /^(?:[A-Za-z]{3,9},?\s+)?(\d{1,2})\s+([A-Za-z]{3,9})\.?\s+(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([A-Za-z]{1,3}|[+-]\d{4})?$/;

const SLASH_DATE_PATTERN = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const MONTH_FIRST_PATTERN = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/;
const DAY_FIRST_PATTERN = /^(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/;
const RELATIVE_PATTERN = /^(\d+)\s+(minute|hour|day)s?\s+ago$/i;

const RELATIVE_UNIT_MS: Record<string, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

function monthIndex(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

function parseOffsetMinutes(zone: string | undefined): number | undefined {
  if (!zone) return 0;
  const upper = zone.toUpperCase();
  if (Object.hasOwn(ZONE_OFFSETS_MINUTES, upper)) return ZONE_OFFSETS_MINUTES[upper];

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (!match) return undefined;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

function utcDate(
  year: number, month: number, day: number,
  hour = 0, minute = 0, second = 0, ms = 0, offsetMinutes = 0
): Date | null {
  if (month < 0 || month > 11 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 60) {
    return null;
  }
  const wall = new Date(Date.UTC(year, month, day, hour, minute, Math.min(second, 59), ms));
  // Date.UTC rolls Feb 31 into March and maps years 0-99 onto 19xx
  if (
    wall.getUTCFullYear() !== year ||
    wall.getUTCMonth() !== month ||
    wall.getUTCDate() !== day
  ) {
    return null;
  }
  return validDate(wall.getTime() - offsetMinutes * 60_000);
}

function validDate(time: number): Date | null {
  const date = new Date(time);
  return Number.isNaN(date.getTime()) ? null : date;
}

function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  // Values below 1e12 are seconds
  return validDate(value < 1e12 ? value * 1000 : value);
}

/**
 * Best-effort parse of a source timestamp. Every format is read as UTC
 * unless it carries its own zone. Returns null when nothing matches.
 */
export function parsePublishedAt(value: string | number, now: Date): Date | null {
  if (typeof value === 'number') return fromEpoch(value);

  const text = value.trim();
  if (/^\d{9,13}$/.test(text)) return fromEpoch(Number(text));

  let m = ISO_PATTERN.exec(text);
  if (m) {
    const offset = parseOffsetMinutes(m[8]);
    if (offset === undefined) return null;
    const ms = m[7] ? Number(m[7].slice(0, 3).padEnd(3, '0')) : 0;
    return utcDate(
      Number(m[1]), Number(m[2]) - 1, Number(m[3]),
      Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0), ms, offset
    );
  }

  m = RFC2822_PATTERN.exec(text);
  if (m) {
    const month = monthIndex(m[2]);
    const offset = parseOffsetMinutes(m[7]);
    if (month === undefined || offset === undefined) return null;
    return utcDate(
      Number(m[3]), month, Number(m[1]),
      Number(m[4]), Number(m[5]), Number(m[6] ?? 0), 0, offset
    );
  }

  m = SLASH_DATE_PATTERN.exec(text);
  if (m) return utcDate(Number(m[1]), Number(m[2]) - 1, Number(m[3]));

  m = MONTH_FIRST_PATTERN.exec(text);
  if (m) {
    const month = monthIndex(m[1]);
    return month === undefined ? null : utcDate(Number(m[3]), month, Number(m[2]));
  }

  m = DAY_FIRST_PATTERN.exec(text);
  if (m) {
    const month = monthIndex(m[2]);
    return month === undefined ? null : utcDate(Number(m[3]), month, Number(m[1]));
  }

  m = RELATIVE_PATTERN.exec(text);
  if (m) {
    return new Date(now.getTime() - Number(m[1]) * RELATIVE_UNIT_MS[m[2].toLowerCase()]);
  }

  return null;
}

// ============================================================
// MAIN NORMALIZER
// ============================================================

/**
 * Normalize one raw item. Throws NormalizeError when a required
 * field is missing or unusable.
 */
export function normalize(raw: RawItem, options: NormalizeOptions): NormalizedArticle {
  if (!raw.sourceId) {
    throw new NormalizeError('sourceId', raw.sourceId);
  }

  const title = raw.title ? cleanText(raw.title) : '';
  if (!title) {
    throw new NormalizeError('title', raw.sourceId);
  }

  const body = raw.body ? cleanText(raw.body) : '';
  const canonicalUrl = raw.url ? canonicalizeUrl(raw.url, options.baseUrl) : null;

  let publishedAt = options.now;
  let publishedAtInferred = true;
  const publishedRaw = typeof raw.publishedRaw === 'string' ? raw.publishedRaw.trim() : raw.publishedRaw;

  if (publishedRaw !== undefined && publishedRaw !== '') {
    const parsed = parsePublishedAt(publishedRaw, options.now);
    if (!parsed) {
      throw new NormalizeError('publishedAt', raw.sourceId, `Unparseable timestamp: ${publishedRaw}`);
    }
    publishedAt = parsed;
    publishedAtInferred = false;
  }

  return {
    id: computeArticleId({ canonicalUrl, title, body }),
    sourceId: raw.sourceId,
    title,
    summary: truncate(body, options.maxSummaryLength ?? DEFAULT_MAX_SUMMARY_LENGTH),
    publishedAt: publishedAt.toISOString(),
    publishedAtInferred,
    canonicalUrl,
  };
}

/**
 * Normalize multiple raw items, dropping and counting the ones that fail.
 */
export function normalizeBatch(rawItems: RawItem[], options: NormalizeOptions): NormalizeBatchResult {
  const articles: NormalizedArticle[] = [];
  const errors: NormalizeError[] = [];

  for (const raw of rawItems) {
    try {
      articles.push(normalize(raw, options));
    } catch (error) {
      if (!(error instanceof NormalizeError)) throw error;
      errors.push(error);
      logger.debug('Dropped item', {
        source: raw.sourceId,
        field: error.field,
        error: error.message,
      });
    }
  }

  return { articles, dropped: errors.length, errors };
}

/**
 * News Reader — Configuration
 *
 * Environment variables (optionally from .env) and the sources file,
 * validated once at startup. Any problem is a ConfigError.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../lib/errors';
import type { LogLevel } from '../lib/logger';
import type { SchedulerOptions } from '../scheduler/scheduler';
import type { SupabaseSettings } from '../db/client';
import { SourcesFileSchema, type SourceConfig } from '../types';

// ============================================================
// ENVIRONMENT
// ============================================================

const HOUR_MS = 60 * 60 * 1000;

// Largest delay setTimeout honours; anything above fires after 1ms
const MAX_TIMER_MS = 2_147_483_647;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SOURCES_FILE: z.string().default('config/sources.json'),
  REFRESH_INTERVAL_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(300_000),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(10_000),
  FETCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RETENTION_HOURS: z.coerce.number().positive().default(48),
  FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
  BACKOFF_BASE_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(60_000),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(3_600_000),
  MAX_SUMMARY_LENGTH: z.coerce.number().int().positive().default(500),
  NEAR_DUPLICATE_THRESHOLD: z.coerce.number().gt(0).max(1).optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  ARTICLES_TABLE: z.string().min(1).default('articles'),
  EXTRACT_ALLOWED_HOSTS: z.string().optional(),
});

export type Env = Record<string, string | undefined>;

export interface PersistenceConfig extends SupabaseSettings {
  table: string;
}

export interface EnvironmentConfig {
  port: number;
  logLevel: LogLevel;
  sourcesFile: string;
  scheduler: Omit<SchedulerOptions, 'sourcePriority'>;
  persistence?: PersistenceConfig;
  extractAllowedHosts: string[];
}

export interface AppConfig extends EnvironmentConfig {
  /** Every configured source, in priority order */
  sources: SourceConfig[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate settings from the environment. Empty values
 * count as unset.
 */
export function loadEnvironment(env: Env = process.env): EnvironmentConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  if (e.BACKOFF_MAX_MS < e.BACKOFF_BASE_MS) {
    throw new ConfigError('BACKOFF_MAX_MS must be at least BACKOFF_BASE_MS');
  }

  let persistence: PersistenceConfig | undefined;
  if (e.SUPABASE_URL || e.SUPABASE_SERVICE_ROLE_KEY) {
    if (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY) {
      throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together');
    }
    persistence = {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      table: e.ARTICLES_TABLE,
    };
  }

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    sourcesFile: e.SOURCES_FILE,
    scheduler: {
      intervalMs: e.REFRESH_INTERVAL_MS,
      concurrency: e.FETCH_CONCURRENCY,
      sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
      retentionMs: e.RETENTION_HOURS * HOUR_MS,
      failureThreshold: e.FAILURE_THRESHOLD,
      backoffBaseMs: e.BACKOFF_BASE_MS,
      backoffMaxMs: e.BACKOFF_MAX_MS,
      maxSummaryLength: e.MAX_SUMMARY_LENGTH,
      nearDuplicateThreshold: e.NEAR_DUPLICATE_THRESHOLD,
    },
    persistence,
    extractAllowedHosts: (e.EXTRACT_ALLOWED_HOSTS ?? '')
      .split(',')
      .map(host => host.trim().toLowerCase())
      .filter(Boolean),
  };
}

// ============================================================
// SOURCES FILE
// ============================================================

/**
 * Validate a parsed sources document and resolve `headersFromEnv`
 * for enabled sources. Order is preserved: it is the priority order.
 */
export function parseSources(document: unknown, env: Env = process.env): SourceConfig[] {
  const parsed = SourcesFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid sources file: ${formatIssues(parsed.error)}`);
  }

  const seen = new Set<string>();
  for (const source of parsed.data.sources) {
    if (seen.has(source.id)) {
      throw new ConfigError(`Duplicate source id: ${source.id}`);
    }
    seen.add(source.id);
  }

  return parsed.data.sources.map(source => {
    if (!source.enabled) return source;

    const headers = { ...source.headers };
    for (const [header, variable] of Object.entries(source.headersFromEnv)) {
      const value = env[variable];
      if (!value) {
        throw new ConfigError(`Source "${source.id}" needs environment variable ${variable}`);
      }
      headers[header] = value;
    }
    return { ...source, headers };
  });
}

export async function loadSourcesFile(path: string, env: Env = process.env): Promise<SourceConfig[]> {
  const fullPath = resolve(path);

  let text: string;
  try {
    text = await readFile(fullPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read sources file ${fullPath}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${fullPath}: ${errorMessage(error)}`);
  }

  return parseSources(document, env);
}

/**
 * Full startup configuration.
 */
export async function loadConfig(env: Env = process.env): Promise<AppConfig> {
  const environment = loadEnvironment(env);
  const sources = await loadSourcesFile(environment.sourcesFile, env);
  return { ...environment, sources };
}

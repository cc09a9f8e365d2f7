/**
 * News Reader — Source Types v1.0
 *
 * Source configuration is a closed set of tagged variants, one per
 * feed format. The sources file is validated against these schemas.
 */

import { z } from 'zod';

// ============================================================
// SOURCE CONFIGURATION
// ============================================================

const SourceIdSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Source ids use lowercase letters, digits, "-" and "_"');

const BaseSourceSchema = z.object({
  id: SourceIdSchema,
  url: z.string().url(),
  enabled: z.boolean().default(true),
  maxItems: z.number().int().positive().default(100),
  headers: z.record(z.string()).default({}),
  headersFromEnv: z.record(z.string()).default({}), // header name -> env var name
});

export const RssSourceSchema = BaseSourceSchema.extend({
  kind: z.literal('rss'),
});

export const JsonApiSourceSchema = BaseSourceSchema.extend({
  kind: z.literal('json_api'),
  itemsPath: z.string().default('items'),
  pageParam: z.string().default('page'),
  startPage: z.number().int().min(0).default(1),
  maxPages: z.number().int().positive().default(1),
  fields: z
    .object({
      id: z.string().optional(),
      title: z.string().default('title'),
      url: z.string().optional(),
      body: z.string().optional(),
      publishedAt: z.string().optional(),
    })
    .default({}),
});

export const HtmlPageSourceSchema = BaseSourceSchema.extend({
  kind: z.literal('html_page'),
  selectors: z.object({
    item: z.string().min(1),
    title: z.string().min(1),
    link: z.string().optional(), // defaults to the first <a> in the item
    summary: z.string().optional(),
    date: z.string().optional(),
    dateAttribute: z.string().optional(), // e.g. "datetime" on <time>
  }),
});

export const SourceConfigSchema = z.discriminatedUnion('kind', [
  RssSourceSchema,
  JsonApiSourceSchema,
  HtmlPageSourceSchema,
]);

export const SourcesFileSchema = z.object({
  sources: z.array(SourceConfigSchema),
});

export type RssSourceConfig = z.infer<typeof RssSourceSchema>;
export type JsonApiSourceConfig = z.infer<typeof JsonApiSourceSchema>;
export type HtmlPageSourceConfig = z.infer<typeof HtmlPageSourceSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type SourceKind = SourceConfig['kind'];

// ============================================================
// SOURCE HEALTH
// ============================================================

export type SourceHealthStatus = 'healthy' | 'failing' | 'degraded';

export interface SourceHealthSnapshot {
  sourceId: string;
  status: SourceHealthStatus;
  consecutiveFailures: number;
  lastSuccessAt?: string;
  lastFailureAt?: string;
  lastError?: string;
  nextProbeAt?: string; // only while degraded
}

/**
 * News Reader — Error Taxonomy
 *
 * Source-level failures (FetchError) and item-level failures
 * (NormalizeError) are contained where they occur and only surface
 * as counters and log events.
 */

export type FetchErrorKind = 'timeout' | 'unreachable' | 'malformed_response';

/**
 * Hard failure of one source's fetch for the current cycle.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly sourceId: string;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    sourceId: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.sourceId = sourceId;
    this.status = options.status;
  }
}

export type NormalizeErrorKind = 'missing_required_field';

/**
 * Item-level failure: the item is dropped and counted.
 */
export class NormalizeError extends Error {
  readonly kind: NormalizeErrorKind = 'missing_required_field';
  readonly field: string;
  readonly sourceId: string;

  constructor(field: string, sourceId: string, message?: string) {
    super(message ?? `Missing required field: ${field}`);
    this.name = 'NormalizeError';
    this.field = field;
    this.sourceId = sourceId;
  }
}

export type ExtractionErrorKind = 'invalid_url' | 'not_html' | 'upstream' | 'request';

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ExtractionError';
    this.kind = kind;
  }
}

/**
 * Startup-only: invalid environment or sources file.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ProgressionError } from '../engine/errors.js';
import type { ProgressionErrorKind } from '../engine/errors.js';
import type { Logger } from '../logging.js';

const STATUS_BY_KIND: Record<ProgressionErrorKind, ContentfulStatusCode> = {
  not_found: 404,
  already_owned: 409,
  not_owned: 403,
  prestige_only: 403,
  insufficient_currency: 402,
  invalid_stats: 400,
  invalid_input: 400,
  no_active_loot_tables: 503,
  no_drop: 200,
  empty_loot_table: 503,
  non_positive_weight: 503,
  storage_failure: 500,
};

export function statusForKind(kind: ProgressionErrorKind): ContentfulStatusCode {
  return STATUS_BY_KIND[kind];
}

export interface ErrorHandlerOptions {
  devMode: boolean;
  logger: Logger;
}

// ─── Error Handler ───
export function createErrorHandler(options: ErrorHandlerOptions) {
  return (err: Error, c: Context) => {
    if (err instanceof ProgressionError && err.kind !== 'storage_failure') {
      return c.json({ error: err.message, kind: err.kind }, statusForKind(err.kind));
    }

    // Storage failures were logged with player context by the engine
    if (!(err instanceof ProgressionError)) {
      options.logger.error('[Http] Unhandled error', { path: c.req.path, error: err.message, stack: err.stack });
    }
    return c.json({
      error: 'internal server error',
      message: options.devMode ? err.message : undefined,
    }, 500);
  };
}

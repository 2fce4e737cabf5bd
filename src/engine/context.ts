import { withUnitOfWork } from '../db/index.js';
import type { AppDatabase, UnitOfWork } from '../db/index.js';
import type { ProgressionConfig } from '../config.js';
import { DEFAULT_BASE_XP_PER_LEVEL } from '../config.js';
import { createConsoleLogger, describeError } from '../logging.js';
import type { Logger } from '../logging.js';
import { TtlCache } from '../services/cache.js';
import { ProgressionError, StorageFailureError } from './errors.js';

// ─── Randomness ───
export interface RandomSource {
  /** Uniform in [0, 1). */
  float(): number;
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

export const mathRandom: RandomSource = {
  float: () => Math.random(),
  int: (maxExclusive) => Math.floor(Math.random() * maxExclusive),
};

// ─── Engine Context ───
// Built once at start-up and passed to every operation. Holds no per-request state.
export interface EngineContext {
  db: AppDatabase;
  config: ProgressionConfig;
  logger: Logger;
  random: RandomSource;
  cache: TtlCache;
}

export function createEngineContext(
  db: AppDatabase,
  overrides: Partial<Omit<EngineContext, 'db'>> = {},
): EngineContext {
  return {
    db,
    config: overrides.config ?? { baseXpPerLevel: DEFAULT_BASE_XP_PER_LEVEL, catalogCacheTtlSeconds: 60 },
    logger: overrides.logger ?? createConsoleLogger(),
    random: overrides.random ?? mathRandom,
    cache: overrides.cache ?? new TtlCache(),
  };
}

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true && err === signal.reason;
}

/**
 * One logical operation = one unit of work. Business failures pass through
 * untouched; anything else is logged with the player and operation and
 * surfaced as StorageFailureError.
 */
export function runOperation<T>(
  ctx: EngineContext,
  operation: string,
  playerId: number | null,
  work: (uow: UnitOfWork) => T,
  signal?: AbortSignal,
): T {
  try {
    return withUnitOfWork(ctx.db, work, signal);
  } catch (err) {
    if (err instanceof ProgressionError || isAbort(err, signal)) {
      throw err;
    }
    ctx.logger.error(`[Progression] ${operation} failed`, {
      operation,
      playerId,
      error: describeError(err),
    });
    throw new StorageFailureError(operation, { cause: err });
  }
}

import { initializeDatabase, openDatabase, schema } from '../db/index.js';
import type { AppDatabase } from '../db/index.js';
import type Database from 'better-sqlite3';
import { createEngineContext } from '../engine/context.js';
import type { EngineContext, RandomSource } from '../engine/context.js';
import type { LogContext, Logger } from '../logging.js';
import type { CosmeticSlot, Rarity } from '../types.js';

// ─── Logger ───

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
  at(level: LogEntry['level']): LogEntry[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry['level']) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context });
  };
  return {
    entries,
    at: (level) => entries.filter((entry) => entry.level === level),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

// ─── Randomness ───

/** mulberry32: small, fast and reproducible. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  const next = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    float: next,
    int: (maxExclusive) => Math.floor(next() * maxExclusive),
  };
}

/** Replays fixed draws; throws when a test consumes more than it scripted. */
export function scriptedRandom(floats: number[], ints: number[] = []): RandomSource {
  const f = [...floats];
  const i = [...ints];
  return {
    float: () => {
      const value = f.shift();
      if (value === undefined) throw new Error('scriptedRandom: out of floats');
      return value;
    },
    int: (maxExclusive) => {
      const value = i.shift();
      if (value === undefined) throw new Error('scriptedRandom: out of ints');
      if (value >= maxExclusive) throw new Error(`scriptedRandom: ${value} >= ${maxExclusive}`);
      return value;
    },
  };
}

// ─── Database ───

export interface TestHarness {
  ctx: EngineContext;
  db: AppDatabase;
  sqlite: Database.Database;
  logger: RecordingLogger;
}

export function createTestHarness(options: { random?: RandomSource; baseXpPerLevel?: number } = {}): TestHarness {
  const { db, sqlite } = openDatabase(':memory:');
  initializeDatabase(sqlite);

  const logger = createRecordingLogger();
  const ctx = createEngineContext(db, {
    config: { baseXpPerLevel: options.baseXpPerLevel ?? 1000, catalogCacheTtlSeconds: 60 },
    logger,
    random: options.random ?? seededRandom(42),
  });
  return { ctx, db, sqlite, logger };
}

export interface CosmeticSeed {
  name?: string;
  slot?: CosmeticSlot;
  rarity?: Rarity;
  unlockLevel?: number;
  currencyCost?: number;
  isPrestigeOnly?: boolean;
}

let cosmeticCounter = 0;

export function seedCosmetic(db: AppDatabase, seed: CosmeticSeed = {}): number {
  cosmeticCounter++;
  const row = db
    .insert(schema.cosmeticItems)
    .values({
      name: seed.name ?? `Test Cosmetic ${cosmeticCounter}`,
      description: null,
      slot: seed.slot ?? 'character_skin',
      rarity: seed.rarity ?? 'common',
      unlockLevel: seed.unlockLevel ?? 1,
      currencyCost: seed.currencyCost ?? 0,
      isPrestigeOnly: seed.isPrestigeOnly ?? false,
      createdAt: new Date().toISOString(),
    })
    .returning({ cosmeticId: schema.cosmeticItems.cosmeticId })
    .get();
  return row.cosmeticId;
}

export function seedProgression(
  db: AppDatabase,
  playerId: number,
  values: { experience?: number; level?: number; prestigeTier?: number; currencyBalance?: number } = {},
): void {
  db.insert(schema.playerProgression)
    .values({ playerId, updatedAt: new Date().toISOString(), ...values })
    .run();
}

export function ownershipRows(db: AppDatabase, playerId: number) {
  return db
    .select()
    .from(schema.playerCosmetics)
    .all()
    .filter((row) => row.playerId === playerId);
}

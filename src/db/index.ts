import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { ExtractTablesWithRelations } from 'drizzle-orm';
import type { BaseSQLiteDatabase, SQLiteTransaction } from 'drizzle-orm/sqlite-core';
import * as schema from './schema.js';
import path from 'path';
import fs from 'fs';

export { schema };

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * The only handle mutating store functions accept. Obtained from
 * `withUnitOfWork`, never from the root database.
 */
export type UnitOfWork = SQLiteTransaction<'sync', RunResult, typeof schema, ExtractTablesWithRelations<typeof schema>>;

/** Anything reads can run against: the root database or an open unit of work. */
export type Reader = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  return { db: drizzle(sqlite, { schema }), sqlite };
}

/**
 * Runs `work` inside one BEGIN IMMEDIATE transaction. The write lock is taken
 * up front, so two writers touching the same player serialize instead of
 * racing. Throwing (or an abort observed before commit) rolls back every write.
 */
export function withUnitOfWork<T>(db: AppDatabase, work: (uow: UnitOfWork) => T, signal?: AbortSignal): T {
  signal?.throwIfAborted();
  return db.transaction((uow) => {
    const result = work(uow);
    signal?.throwIfAborted();
    return result;
  }, { behavior: 'immediate' });
}

// ─── Initialize tables ───
export function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS player_progression (
      player_id INTEGER PRIMARY KEY,
      level INTEGER NOT NULL DEFAULT 1 CHECK (level >= 1),
      experience INTEGER NOT NULL DEFAULT 0 CHECK (experience >= 0),
      prestige_tier INTEGER NOT NULL DEFAULT 0 CHECK (prestige_tier >= 0),
      currency_balance INTEGER NOT NULL DEFAULT 0 CHECK (currency_balance >= 0),
      matches_played INTEGER NOT NULL DEFAULT 0,
      kills INTEGER NOT NULL DEFAULT 0,
      deaths INTEGER NOT NULL DEFAULT 0,
      waves_survived INTEGER NOT NULL DEFAULT 0,
      scrap_earned INTEGER NOT NULL DEFAULT 0,
      currency_earned INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS player_progression_level_idx ON player_progression(level);
    CREATE INDEX IF NOT EXISTS player_progression_prestige_idx ON player_progression(prestige_tier);

    -- Ledger: rows are inserted, never updated or deleted
    CREATE TABLE IF NOT EXISTS currency_transactions (
      transaction_id INTEGER PRIMARY KEY AUTOINCREMENT,
      player_id INTEGER NOT NULL,
      amount INTEGER NOT NULL,
      balance_after INTEGER NOT NULL CHECK (balance_after >= 0),
      kind TEXT NOT NULL CHECK (kind IN ('match_reward', 'purchase', 'prestige_reward', 'admin_grant', 'refund', 'other')),
      reference_id INTEGER,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS currency_transactions_player_idx ON currency_transactions(player_id);
    CREATE INDEX IF NOT EXISTS currency_transactions_created_idx ON currency_transactions(created_at);

    CREATE TRIGGER IF NOT EXISTS currency_transactions_no_update
    BEFORE UPDATE ON currency_transactions
    BEGIN
      SELECT RAISE(ABORT, 'currency_transactions is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS currency_transactions_no_delete
    BEFORE DELETE ON currency_transactions
    BEGIN
      SELECT RAISE(ABORT, 'currency_transactions is append-only');
    END;

    CREATE TABLE IF NOT EXISTS cosmetic_items (
      cosmetic_id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT,
      slot TEXT NOT NULL CHECK (slot IN ('character_skin', 'weapon_skin', 'emote', 'taunt', 'badge', 'title', 'particle_effect', 'other')),
      rarity TEXT NOT NULL CHECK (rarity IN ('common', 'uncommon', 'rare', 'epic', 'legendary')),
      unlock_level INTEGER NOT NULL DEFAULT 1,
      currency_cost INTEGER NOT NULL DEFAULT 0 CHECK (currency_cost >= 0),
      is_prestige_only INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS player_cosmetics (
      player_id INTEGER NOT NULL,
      cosmetic_id INTEGER NOT NULL REFERENCES cosmetic_items(cosmetic_id) ON DELETE CASCADE,
      unlocked_at TEXT NOT NULL,
      unlock_method TEXT NOT NULL CHECK (unlock_method IN ('level_up', 'purchase', 'loot_drop', 'prestige')),
      PRIMARY KEY (player_id, cosmetic_id)
    );
    CREATE INDEX IF NOT EXISTS player_cosmetics_cosmetic_idx ON player_cosmetics(cosmetic_id);

    CREATE TABLE IF NOT EXISTS loadouts (
      loadout_id INTEGER PRIMARY KEY AUTOINCREMENT,
      player_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      is_active INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS loadouts_player_idx ON loadouts(player_id);
    CREATE UNIQUE INDEX IF NOT EXISTS loadouts_one_active_idx ON loadouts(player_id) WHERE is_active = 1;

    CREATE TABLE IF NOT EXISTS loadout_cosmetics (
      loadout_id INTEGER NOT NULL REFERENCES loadouts(loadout_id) ON DELETE CASCADE,
      slot TEXT NOT NULL,
      cosmetic_id INTEGER NOT NULL REFERENCES cosmetic_items(cosmetic_id) ON DELETE CASCADE,
      PRIMARY KEY (loadout_id, slot)
    );

    CREATE TABLE IF NOT EXISTS loot_tables (
      loot_table_id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT,
      drop_chance REAL NOT NULL CHECK (drop_chance >= 0 AND drop_chance <= 1),
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS loot_table_entries (
      loot_entry_id INTEGER PRIMARY KEY AUTOINCREMENT,
      loot_table_id INTEGER NOT NULL REFERENCES loot_tables(loot_table_id) ON DELETE CASCADE,
      cosmetic_id INTEGER NOT NULL REFERENCES cosmetic_items(cosmetic_id) ON DELETE CASCADE,
      weight INTEGER NOT NULL CHECK (weight >= 1),
      min_quantity INTEGER NOT NULL DEFAULT 1,
      max_quantity INTEGER NOT NULL DEFAULT 1,
      CHECK (min_quantity <= max_quantity)
    );
    CREATE INDEX IF NOT EXISTS loot_table_entries_table_idx ON loot_table_entries(loot_table_id);
    CREATE INDEX IF NOT EXISTS loot_table_entries_cosmetic_idx ON loot_table_entries(cosmetic_id);

    CREATE TABLE IF NOT EXISTS matches (
      match_id TEXT PRIMARY KEY,
      server_id INTEGER NOT NULL,
      map_name TEXT NOT NULL,
      game_mode TEXT NOT NULL,
      outcome TEXT NOT NULL,
      waves_survived INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      recorded_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS player_match_stats (
      match_id TEXT NOT NULL REFERENCES matches(match_id) ON DELETE CASCADE,
      player_id INTEGER NOT NULL,
      kills INTEGER NOT NULL DEFAULT 0,
      deaths INTEGER NOT NULL DEFAULT 0,
      waves_survived INTEGER NOT NULL DEFAULT 0,
      scrap_earned INTEGER NOT NULL DEFAULT 0,
      currency_earned INTEGER NOT NULL DEFAULT 0,
      xp_awarded INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (match_id, player_id)
    );
    CREATE INDEX IF NOT EXISTS player_match_stats_player_idx ON player_match_stats(player_id);
  `);
}

// ─── Constraint errors ───
const UNIQUE_CODES = ['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE'];

/** True when `err`, or anything in its cause chain, is a primary-key or unique violation. */
export function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; current instanceof Error && depth < 5; depth++) {
    if (current instanceof Database.SqliteError && UNIQUE_CODES.includes(current.code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

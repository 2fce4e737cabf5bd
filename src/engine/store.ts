import { eq, and, gte, sql } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { Reader, UnitOfWork } from '../db/index.js';
import type { LifetimeCounters, MatchStats, PlayerProgression, ProgressionView } from '../types.js';
import { experienceForLevel, experienceToNextLevel, levelForExperience } from './leveling.js';

type ProgressionRow = typeof schema.playerProgression.$inferSelect;

export function now(): string {
  return new Date().toISOString();
}

function emptyLifetime(): LifetimeCounters {
  return { matchesPlayed: 0, kills: 0, deaths: 0, wavesSurvived: 0, scrapEarned: 0, currencyEarned: 0 };
}

export function toProgression(row: ProgressionRow, baseXpPerLevel: number): PlayerProgression {
  return {
    playerId: row.playerId,
    // xp is authoritative; the stored level can lag when a level write was skipped
    level: levelForExperience(row.experience, baseXpPerLevel),
    experience: row.experience,
    prestigeTier: row.prestigeTier,
    currencyBalance: row.currencyBalance,
    lifetime: {
      matchesPlayed: row.matchesPlayed,
      kills: row.kills,
      deaths: row.deaths,
      wavesSurvived: row.wavesSurvived,
      scrapEarned: row.scrapEarned,
      currencyEarned: row.currencyEarned,
    },
    lastUpdated: row.updatedAt,
  };
}

// ─── Reads ───

/** Defaults for players with no row yet. Never writes. */
export function getProgression(reader: Reader, playerId: number, baseXpPerLevel: number): PlayerProgression {
  const row = reader
    .select()
    .from(schema.playerProgression)
    .where(eq(schema.playerProgression.playerId, playerId))
    .get();

  if (!row) {
    return {
      playerId,
      level: 1,
      experience: 0,
      prestigeTier: 0,
      currencyBalance: 0,
      lifetime: emptyLifetime(),
      lastUpdated: null,
    };
  }
  return toProgression(row, baseXpPerLevel);
}

export function getProgressionView(reader: Reader, playerId: number, baseXpPerLevel: number): ProgressionView {
  const progression = getProgression(reader, playerId, baseXpPerLevel);
  return {
    ...progression,
    xpIntoLevel: progression.experience - experienceForLevel(levelForExperience(progression.experience, baseXpPerLevel), baseXpPerLevel),
    xpToNextLevel: experienceToNextLevel(progression.experience, baseXpPerLevel),
  };
}

export function getBalance(reader: Reader, playerId: number): number {
  const row = reader
    .select({ balance: schema.playerProgression.currencyBalance })
    .from(schema.playerProgression)
    .where(eq(schema.playerProgression.playerId, playerId))
    .get();
  return row?.balance ?? 0;
}

// ─── Writes (unit of work only) ───

export function ensureProgression(uow: UnitOfWork, playerId: number): void {
  uow
    .insert(schema.playerProgression)
    .values({ playerId, updatedAt: now() })
    .onConflictDoNothing()
    .run();
}

export function incrementMatchCounters(uow: UnitOfWork, playerId: number, deltas: MatchStats): void {
  const p = schema.playerProgression;
  uow
    .update(p)
    .set({
      matchesPlayed: sql`${p.matchesPlayed} + 1`,
      kills: sql`${p.kills} + ${deltas.kills}`,
      deaths: sql`${p.deaths} + ${deltas.deaths}`,
      wavesSurvived: sql`${p.wavesSurvived} + ${deltas.wavesSurvived}`,
      scrapEarned: sql`${p.scrapEarned} + ${deltas.scrapEarned}`,
      currencyEarned: sql`${p.currencyEarned} + ${deltas.currencyEarned}`,
      updatedAt: now(),
    })
    .where(eq(p.playerId, playerId))
    .run();
}

export interface ExperienceUpdate {
  previousExperience: number;
  experience: number;
  storedLevel: number;
}

export function incrementExperience(uow: UnitOfWork, playerId: number, xp: number): ExperienceUpdate {
  const p = schema.playerProgression;
  const row = uow
    .update(p)
    .set({ experience: sql`${p.experience} + ${xp}`, updatedAt: now() })
    .where(eq(p.playerId, playerId))
    .returning({ experience: p.experience, level: p.level })
    .get();

  if (!row) {
    throw new Error(`progression row missing for player ${playerId}`);
  }
  return { previousExperience: row.experience - xp, experience: row.experience, storedLevel: row.level };
}

export function setLevel(uow: UnitOfWork, playerId: number, level: number): void {
  uow
    .update(schema.playerProgression)
    .set({ level, updatedAt: now() })
    .where(eq(schema.playerProgression.playerId, playerId))
    .run();
}

/** Level 1, xp 0, tier + 1. Returns the new tier. */
export function resetForPrestige(uow: UnitOfWork, playerId: number): number {
  const p = schema.playerProgression;
  const row = uow
    .update(p)
    .set({ level: 1, experience: 0, prestigeTier: sql`${p.prestigeTier} + 1`, updatedAt: now() })
    .where(eq(p.playerId, playerId))
    .returning({ prestigeTier: p.prestigeTier })
    .get();

  if (!row) {
    throw new Error(`progression row missing for player ${playerId}`);
  }
  return row.prestigeTier;
}

export function creditBalance(uow: UnitOfWork, playerId: number, amount: number): number {
  const p = schema.playerProgression;
  const row = uow
    .update(p)
    .set({ currencyBalance: sql`${p.currencyBalance} + ${amount}`, updatedAt: now() })
    .where(eq(p.playerId, playerId))
    .returning({ balance: p.currencyBalance })
    .get();

  if (!row) {
    throw new Error(`progression row missing for player ${playerId}`);
  }
  return row.balance;
}

/** Returns the new balance, or null when the balance does not cover `amount`. */
export function debitBalance(uow: UnitOfWork, playerId: number, amount: number): number | null {
  const p = schema.playerProgression;
  const row = uow
    .update(p)
    .set({ currencyBalance: sql`${p.currencyBalance} - ${amount}`, updatedAt: now() })
    .where(and(eq(p.playerId, playerId), gte(p.currencyBalance, amount)))
    .returning({ balance: p.currencyBalance })
    .get();

  return row ? row.balance : null;
}

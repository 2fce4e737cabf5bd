import { eq, desc } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { schema } from '../db/index.js';
import type { Reader, UnitOfWork } from '../db/index.js';
import type { MatchHistoryEntry, MatchReport, MatchRewardResult, MatchStats, RecordedMatch } from '../types.js';
import type { EngineContext } from './context.js';
import { runOperation } from './context.js';
import { runFollowUps } from './effects.js';
import { InvalidInputError, InvalidStatsError } from './errors.js';
import { applyCurrencyDelta } from './ledger.js';
import { levelForExperience } from './leveling.js';
import { ensureProgression, getBalance, incrementExperience, incrementMatchCounters, now, setLevel } from './store.js';

// ─── Experience formula ───
export const XP_PER_MATCH = 100;
export const XP_PER_KILL = 10;
export const XP_PER_WAVE = 50;
export const XP_PER_SCRAP = 1;

export const DEFAULT_HISTORY_LIMIT = 10;
export const MAX_HISTORY_LIMIT = 100;

export function computeMatchExperience(stats: Pick<MatchStats, 'kills' | 'wavesSurvived' | 'scrapEarned'>): number {
  return XP_PER_MATCH + XP_PER_KILL * stats.kills + XP_PER_WAVE * stats.wavesSurvived + XP_PER_SCRAP * stats.scrapEarned;
}

const STAT_FIELDS = ['kills', 'deaths', 'wavesSurvived', 'scrapEarned', 'currencyEarned'] as const;

export function validateMatchStats(stats: MatchStats): void {
  for (const field of STAT_FIELDS) {
    const value = stats[field];
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidStatsError(field, value);
    }
  }
}

// ─── Per-player rewards ───

function applyPlayerRewards(ctx: EngineContext, uow: UnitOfWork, playerId: number, stats: MatchStats): MatchRewardResult {
  const base = ctx.config.baseXpPerLevel;

  ensureProgression(uow, playerId);
  incrementMatchCounters(uow, playerId, stats);

  const xpAwarded = computeMatchExperience(stats);
  const update = incrementExperience(uow, playerId, xpAwarded);
  const previousLevel = levelForExperience(update.previousExperience, base);
  const level = levelForExperience(update.experience, base);

  // Level is derivable from xp, so a failed level write must not sink the match
  if (level > update.storedLevel) {
    runFollowUps(uow, [{
      name: 'recordLevel',
      context: { playerId, level, experience: update.experience },
      apply: (savepoint) => setLevel(savepoint, playerId, level),
    }], ctx.logger);
  }

  let currencyBalance: number;
  if (stats.currencyEarned > 0) {
    const transaction = applyCurrencyDelta(uow, playerId, stats.currencyEarned, 'match_reward');
    currencyBalance = transaction ? transaction.balanceAfter : getBalance(uow, playerId);
  } else {
    currencyBalance = getBalance(uow, playerId);
  }

  return {
    playerId,
    xpAwarded,
    experience: update.experience,
    previousLevel,
    level,
    leveledUp: level > previousLevel,
    currencyAwarded: stats.currencyEarned,
    currencyBalance,
  };
}

export function awardMatchRewards(
  ctx: EngineContext,
  playerId: number,
  stats: MatchStats,
  signal?: AbortSignal,
): MatchRewardResult {
  validateMatchStats(stats);
  return runOperation(ctx, 'awardMatchRewards', playerId, (uow) => applyPlayerRewards(ctx, uow, playerId, stats), signal);
}

// ─── Whole match ───

function validateReport(report: MatchReport): void {
  if (report.players.length === 0) {
    throw new InvalidInputError('a match needs at least one player');
  }
  if (!Number.isSafeInteger(report.wavesSurvived) || report.wavesSurvived < 0) {
    throw new InvalidStatsError('wavesSurvived', report.wavesSurvived);
  }

  const seen = new Set<number>();
  for (const player of report.players) {
    if (seen.has(player.playerId)) {
      throw new InvalidInputError(`player ${player.playerId} appears twice in the match`);
    }
    seen.add(player.playerId);
    validateMatchStats(player);
  }
}

/** Reported times carry any UTC offset; history sorts on the stored text, so store UTC. */
function toUtcTimestamp(field: string, value: string): string {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new InvalidInputError(`${field} must be an ISO 8601 timestamp, got ${value}`);
  }
  return new Date(time).toISOString();
}

/** Match row, every player's stats and every player's rewards commit together or not at all. */
export function recordMatch(ctx: EngineContext, report: MatchReport, signal?: AbortSignal): RecordedMatch {
  validateReport(report);
  const startedAt = toUtcTimestamp('startedAt', report.startedAt);
  const endedAt = report.endedAt === null ? null : toUtcTimestamp('endedAt', report.endedAt);
  const matchId = uuidv4();

  const rewards = runOperation(ctx, 'recordMatch', null, (uow) => {
    uow
      .insert(schema.matches)
      .values({
        matchId,
        serverId: report.serverId,
        mapName: report.mapName,
        gameMode: report.gameMode,
        outcome: report.outcome,
        wavesSurvived: report.wavesSurvived,
        startedAt,
        endedAt,
        recordedAt: now(),
      })
      .run();

    return report.players.map((player) => {
      const reward = applyPlayerRewards(ctx, uow, player.playerId, player);
      uow
        .insert(schema.playerMatchStats)
        .values({
          matchId,
          playerId: player.playerId,
          kills: player.kills,
          deaths: player.deaths,
          wavesSurvived: player.wavesSurvived,
          scrapEarned: player.scrapEarned,
          currencyEarned: player.currencyEarned,
          xpAwarded: reward.xpAwarded,
        })
        .run();
      return reward;
    });
  }, signal);

  ctx.logger.info('[Matches] Recorded match', {
    matchId,
    serverId: report.serverId,
    players: rewards.length,
  });
  return { matchId, rewards };
}

// ─── History ───

export function clampHistoryLimit(limit?: number): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_HISTORY_LIMIT;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_HISTORY_LIMIT);
}

/** Newest first. */
export function getMatchHistory(reader: Reader, playerId: number, limit?: number): MatchHistoryEntry[] {
  const m = schema.matches;
  const s = schema.playerMatchStats;
  return reader
    .select({
      matchId: m.matchId,
      mapName: m.mapName,
      gameMode: m.gameMode,
      outcome: m.outcome,
      startedAt: m.startedAt,
      endedAt: m.endedAt,
      kills: s.kills,
      deaths: s.deaths,
      wavesSurvived: s.wavesSurvived,
      scrapEarned: s.scrapEarned,
      currencyEarned: s.currencyEarned,
      xpAwarded: s.xpAwarded,
    })
    .from(s)
    .innerJoin(m, eq(s.matchId, m.matchId))
    .where(eq(s.playerId, playerId))
    .orderBy(desc(m.startedAt), desc(m.recordedAt))
    .limit(clampHistoryLimit(limit))
    .all();
}

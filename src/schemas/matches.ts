/**
 * Match report sent by a game server when a match ends. Stat values are only
 * checked for being numbers here; sign and integrality are the reward
 * orchestrator's call so they surface as invalid_stats.
 */

import { z } from 'zod';

const stat = z.number();

export const playerMatchSchema = z.object({
  playerId: z.number().int().positive(),
  kills: stat,
  deaths: stat,
  wavesSurvived: stat,
  scrapEarned: stat,
  currencyEarned: stat.default(0),
});

export const matchReportSchema = z.object({
  serverId: z.number().int().positive(),
  mapName: z.string().trim().min(1).max(64),
  gameMode: z.string().trim().min(1).max(32),
  outcome: z.string().trim().min(1).max(32),
  wavesSurvived: stat,
  startedAt: z.string().datetime({ offset: true }),
  endedAt: z.string().datetime({ offset: true }).nullable().default(null),
  players: z.array(playerMatchSchema).min(1).max(64),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { EngineContext } from '../engine/context.js';
import { getMatchHistory, recordMatch } from '../engine/rewards.js';
import { parseWith, readJson } from '../schemas/common.js';
import { historyQuerySchema, matchReportSchema } from '../schemas/matches.js';
import type { AppEnv } from './env.js';

export interface MatchGuards {
  player: MiddlewareHandler<AppEnv>;
  server: MiddlewareHandler<AppEnv>;
}

export function matchRoutes(ctx: EngineContext, guards: MatchGuards) {
  const matches = new Hono<AppEnv>();

  // POST /matches — Game servers report a finished match; all players commit together
  matches.post('/', guards.server, async (c) => {
    const report = parseWith(matchReportSchema, await readJson(c.req));
    return c.json(recordMatch(ctx, report, c.req.raw.signal), 201);
  });

  // GET /matches/history?limit=10
  matches.get('/history', guards.player, (c) => {
    const { limit } = parseWith(historyQuerySchema, c.req.query());
    return c.json({ matches: getMatchHistory(ctx.db, c.get('playerId'), limit) });
  });

  return matches;
}

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { EngineContext } from '../engine/context.js';
import { countTransactions, listTransactions } from '../engine/ledger.js';
import { prestigePlayer } from '../engine/prestige.js';
import { getBalance, getProgressionView } from '../engine/store.js';
import { parseWith } from '../schemas/common.js';
import { transactionsQuerySchema } from '../schemas/progression.js';
import type { AppEnv } from './env.js';

export function progressionRoutes(ctx: EngineContext, guard: MiddlewareHandler<AppEnv>) {
  const progression = new Hono<AppEnv>();
  progression.use('*', guard);

  // GET /progression — Level, xp, tier, balance and lifetime counters
  progression.get('/', (c) => {
    return c.json(getProgressionView(ctx.db, c.get('playerId'), ctx.config.baseXpPerLevel));
  });

  // GET /progression/currency — Balance only
  progression.get('/currency', (c) => {
    const playerId = c.get('playerId');
    return c.json({ playerId, currencyBalance: getBalance(ctx.db, playerId) });
  });

  // GET /progression/transactions — Ledger history, newest first
  progression.get('/transactions', (c) => {
    const playerId = c.get('playerId');
    const query = parseWith(transactionsQuerySchema, c.req.query());

    return c.json({
      transactions: listTransactions(ctx.db, playerId, query),
      total: countTransactions(ctx.db, playerId, query.kind),
      limit: query.limit,
      offset: query.offset,
    });
  });

  // POST /progression/prestige — Explicit player action only; every call advances a tier
  progression.post('/prestige', (c) => {
    const result = prestigePlayer(ctx, c.get('playerId'), c.req.raw.signal);
    return c.json({
      success: true,
      prestigeTier: result.prestigeTier,
      grantedCosmetics: result.grantedCosmeticIds,
    });
  });

  return progression;
}

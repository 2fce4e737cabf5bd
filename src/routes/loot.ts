import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { EngineContext } from '../engine/context.js';
import { NoDropFromAnyTableError } from '../engine/errors.js';
import { generateLootDrop } from '../engine/loot.js';
import type { AppEnv } from './env.js';

export function lootRoutes(ctx: EngineContext, guard: MiddlewareHandler<AppEnv>) {
  const loot = new Hono<AppEnv>();
  loot.use('*', guard);

  // POST /loot/drop — Rolls the active tables; a miss is a normal outcome, not an error
  loot.post('/drop', (c) => {
    try {
      const drop = generateLootDrop(ctx, c.get('playerId'), c.req.raw.signal);
      return c.json({ dropped: true, newlyGranted: drop.newlyGranted, cosmetic: drop.cosmetic });
    } catch (err) {
      if (err instanceof NoDropFromAnyTableError) {
        return c.json({ dropped: false });
      }
      throw err;
    }
  });

  return loot;
}

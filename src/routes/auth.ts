import { createMiddleware } from 'hono/factory';
import { timingSafeEqual } from 'crypto';
import type { AppEnv, PlayerResolver } from './env.js';

// ─── Player identity ───
export function requirePlayer(resolve: PlayerResolver) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const playerId = await resolve(c);
    if (playerId === null) {
      return c.json({ error: 'Player identity required. Include X-Player-Id header.' }, 401);
    }
    c.set('playerId', playerId);
    await next();
  });
}

// ─── Shared keys (game servers, admins) ───
function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** A null key disables the guarded routes entirely. */
export function requireKey(header: string, expected: string | null) {
  return createMiddleware<AppEnv>(async (c, next) => {
    if (expected === null) {
      return c.json({ error: 'Not found' }, 404);
    }

    const provided = c.req.header(header);
    if (!provided) {
      return c.json({ error: `API key required. Include ${header} header.` }, 401);
    }
    if (!keysMatch(provided, expected)) {
      return c.json({ error: 'Invalid API key' }, 401);
    }
    await next();
  });
}

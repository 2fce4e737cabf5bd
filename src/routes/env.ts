import type { Context } from 'hono';

export type AppEnv = {
  Variables: {
    playerId: number;
  };
};

/**
 * Resolves the authenticated player for a request. Authentication itself
 * lives upstream; the resolver only reads what the gateway forwarded.
 */
export type PlayerResolver = (c: Context) => number | null | Promise<number | null>;

export const headerPlayerResolver: PlayerResolver = (c) => {
  const raw = c.req.header('X-Player-Id');
  if (!raw || !/^\d+$/.test(raw)) return null;

  const playerId = Number(raw);
  return Number.isSafeInteger(playerId) && playerId > 0 ? playerId : null;
};

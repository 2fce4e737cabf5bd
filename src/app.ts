import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { EngineContext } from './engine/context.js';
import { adminRoutes } from './routes/admin.js';
import { requireKey, requirePlayer } from './routes/auth.js';
import { cosmeticRoutes } from './routes/cosmetics.js';
import type { AppEnv, PlayerResolver } from './routes/env.js';
import { headerPlayerResolver } from './routes/env.js';
import { createErrorHandler } from './routes/errors.js';
import { lootRoutes } from './routes/loot.js';
import { matchRoutes } from './routes/matches.js';
import { progressionRoutes } from './routes/progression.js';

export interface AppOptions {
  playerResolver?: PlayerResolver;
  adminApiKey?: string | null;
  serverApiKey?: string | null;
  devMode?: boolean;
  requestLogging?: boolean;
}

export function createApp(ctx: EngineContext, options: AppOptions = {}) {
  const app = new Hono<AppEnv>();
  const player = requirePlayer(options.playerResolver ?? headerPlayerResolver);

  // Middleware
  app.use('*', cors());
  if (options.requestLogging) {
    app.use('*', logger());
  }

  // ─── Routes ───
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/progression', progressionRoutes(ctx, player));
  app.route('/cosmetics', cosmeticRoutes(ctx, player));
  app.route('/loot', lootRoutes(ctx, player));
  app.route('/matches', matchRoutes(ctx, {
    player,
    server: requireKey('X-Server-Key', options.serverApiKey ?? null),
  }));
  app.route('/admin', adminRoutes(ctx, requireKey('X-Admin-Key', options.adminApiKey ?? null)));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError(createErrorHandler({ devMode: options.devMode ?? false, logger: ctx.logger }));

  return app;
}

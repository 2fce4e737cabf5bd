import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeDatabase, openDatabase } from './db/index.js';
import { createEngineContext } from './engine/context.js';
import { createConsoleLogger } from './logging.js';

// ─── Initialize ───
const config = loadConfig();
const log = createConsoleLogger({ debug: config.logDebug });

log.info('[Server] Opening database', { dbPath: config.dbPath });
const { db, sqlite } = openDatabase(config.dbPath);
initializeDatabase(sqlite);

const ctx = createEngineContext(db, { config: config.progression, logger: log });

if (config.devMode) {
  log.warn('[Server] DEV_MODE enabled: error details are included in 500 responses');
}
if (!config.serverApiKey) {
  log.warn('[Server] SERVER_API_KEY not set: match reporting is disabled');
}

// ─── App ───
const app = createApp(ctx, {
  adminApiKey: config.adminApiKey,
  serverApiKey: config.serverApiKey,
  devMode: config.devMode,
  requestLogging: config.requestLogging,
});

// ─── Start ───
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`[Server] Progression service listening on http://localhost:${info.port}`);
});

function shutdown(signal: string): void {
  log.info(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    sqlite.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;

import { describe, it, expect } from 'vitest';
import path from 'path';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      dbPath: path.join(process.cwd(), 'data', 'progression.db'),
      progression: { baseXpPerLevel: 1000, catalogCacheTtlSeconds: 60 },
      adminApiKey: null,
      serverApiKey: null,
      devMode: false,
      logDebug: false,
      requestLogging: true,
    });
  });

  it('reads overrides and treats empty strings as unset', () => {
    const config = loadConfig({
      PORT: '8080',
      DB_PATH: ':memory:',
      BASE_XP_PER_LEVEL: '500',
      CATALOG_CACHE_TTL_SECONDS: '0',
      ADMIN_API_KEY: 'test-admin-key',
      SERVER_API_KEY: '',
      DEV_MODE: 'true',
      REQUEST_LOGGING: '0',
    });

    expect(config.port).toBe(8080);
    expect(config.dbPath).toBe(':memory:');
    expect(config.progression).toEqual({ baseXpPerLevel: 500, catalogCacheTtlSeconds: 0 });
    expect(config.adminApiKey).toBe('test-admin-key');
    expect(config.serverApiKey).toBeNull();
    expect(config.devMode).toBe(true);
    expect(config.requestLogging).toBe(false);
  });

  it('accepts a non-positive base and leaves the fallback to the calculator', () => {
    expect(loadConfig({ BASE_XP_PER_LEVEL: '0' }).progression.baseXpPerLevel).toBe(0);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/PORT/);
    expect(() => loadConfig({ DEV_MODE: 'yes' })).toThrow(/DEV_MODE/);
  });
});

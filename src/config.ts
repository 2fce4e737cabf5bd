import { z } from 'zod';
import path from 'path';

export const DEFAULT_BASE_XP_PER_LEVEL = 1000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalSecret = z
  .string()
  .trim()
  .min(1)
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DB_PATH: z.string().min(1).default(path.join(process.cwd(), 'data', 'progression.db')),
  // <= 0 is tolerated here; the leveling calculator falls back to the default
  BASE_XP_PER_LEVEL: z.coerce.number().int().default(DEFAULT_BASE_XP_PER_LEVEL),
  CATALOG_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),
  ADMIN_API_KEY: optionalSecret,
  SERVER_API_KEY: optionalSecret,
  DEV_MODE: booleanFlag.default('false'),
  LOG_DEBUG: booleanFlag.default('false'),
  REQUEST_LOGGING: booleanFlag.default('true'),
});

export interface ProgressionConfig {
  baseXpPerLevel: number;
  catalogCacheTtlSeconds: number;
}

export interface AppConfig {
  port: number;
  dbPath: string;
  progression: ProgressionConfig;
  adminApiKey: string | null;
  serverApiKey: string | null;
  devMode: boolean;
  logDebug: boolean;
  requestLogging: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings mean "unset" so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    dbPath: vars.DB_PATH,
    progression: {
      baseXpPerLevel: vars.BASE_XP_PER_LEVEL,
      catalogCacheTtlSeconds: vars.CATALOG_CACHE_TTL_SECONDS,
    },
    adminApiKey: vars.ADMIN_API_KEY ?? null,
    serverApiKey: vars.SERVER_API_KEY ?? null,
    devMode: vars.DEV_MODE,
    logDebug: vars.LOG_DEBUG,
    requestLogging: vars.REQUEST_LOGGING,
  };
}

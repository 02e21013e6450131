import path from 'node:path';

import { z } from 'zod';

import type { StorageDriver } from '../../subscriptions/document_backend.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  APP_PORT: z.coerce.number().int().min(0).max(65535).default(3333),
  APP_HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATA_DIR: z.string().min(1).default('data'),
  STORAGE_DRIVER: z.enum(['json', 'sqlite']).default('json'),
  SQLITE_FILE: z.string().min(1).optional(),
  STEAM_API_KEY: z.string().min(1).optional(),
  // Both intervals end up in setTimeout, which caps delays at 2^31-1 ms.
  POLL_INTERVAL_MINUTES: z.coerce.number().int().min(1).max(35791).default(30),
  CATALOG_REFRESH_HOURS: z.coerce.number().int().min(1).max(596).default(24),
  DEFAULT_REGION: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/)
    .transform((value) => value.toLowerCase())
    .default('cn'),
  STORE_LANGUAGE: z.string().min(1).default('english'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(15000),
  CATALOG_PAGE_SIZE: z.coerce.number().int().min(1).max(50000).default(50000),
  CATALOG_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  DISPATCH_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  POLL_AFTER_SUBSCRIBE: booleanFlag,
  ADMIN_TOKEN: z.string().min(1).optional(),
  DISCORD_BOT_CONFIG: z.string().min(1).optional(),
});

export type AppConfig = {
  environment: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  dataDir: string;
  storageDriver: StorageDriver;
  sqliteFile: string;
  steamApiKey: string | null;
  pollIntervalMs: number;
  catalogRefreshMs: number;
  defaultRegion: string;
  storeLanguage: string;
  httpTimeoutMs: number;
  catalogPageSize: number;
  catalogPageDelayMs: number;
  dispatchDelayMs: number;
  pollAfterSubscribe: boolean;
  adminToken: string | null;
  discordBotConfig: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse({
    NODE_ENV: env.NODE_ENV,
    APP_PORT: env.APP_PORT ?? env.PORT,
    APP_HOST: env.APP_HOST ?? env.HOST,
    LOG_LEVEL: env.LOG_LEVEL,
    DATA_DIR: env.DATA_DIR,
    STORAGE_DRIVER: env.STORAGE_DRIVER,
    SQLITE_FILE: env.SQLITE_FILE,
    STEAM_API_KEY: env.STEAM_API_KEY || undefined,
    POLL_INTERVAL_MINUTES: env.POLL_INTERVAL_MINUTES,
    CATALOG_REFRESH_HOURS: env.CATALOG_REFRESH_HOURS,
    DEFAULT_REGION: env.DEFAULT_REGION,
    STORE_LANGUAGE: env.STORE_LANGUAGE,
    HTTP_TIMEOUT_MS: env.HTTP_TIMEOUT_MS,
    CATALOG_PAGE_SIZE: env.CATALOG_PAGE_SIZE,
    CATALOG_PAGE_DELAY_MS: env.CATALOG_PAGE_DELAY_MS,
    DISPATCH_DELAY_MS: env.DISPATCH_DELAY_MS,
    POLL_AFTER_SUBSCRIBE: env.POLL_AFTER_SUBSCRIBE,
    ADMIN_TOKEN: env.ADMIN_TOKEN || undefined,
    DISCORD_BOT_CONFIG: env.DISCORD_BOT_CONFIG || undefined,
  });

  const dataDir = path.resolve(parsed.DATA_DIR);
  return {
    environment: parsed.NODE_ENV,
    port: parsed.APP_PORT,
    host: parsed.APP_HOST,
    logLevel: parsed.LOG_LEVEL,
    dataDir,
    storageDriver: parsed.STORAGE_DRIVER,
    sqliteFile: parsed.SQLITE_FILE ? path.resolve(parsed.SQLITE_FILE) : path.join(dataDir, 'price_watch.db'),
    steamApiKey: parsed.STEAM_API_KEY ?? null,
    pollIntervalMs: parsed.POLL_INTERVAL_MINUTES * 60 * 1000,
    catalogRefreshMs: parsed.CATALOG_REFRESH_HOURS * 60 * 60 * 1000,
    defaultRegion: parsed.DEFAULT_REGION,
    storeLanguage: parsed.STORE_LANGUAGE,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    catalogPageSize: parsed.CATALOG_PAGE_SIZE,
    catalogPageDelayMs: parsed.CATALOG_PAGE_DELAY_MS,
    dispatchDelayMs: parsed.DISPATCH_DELAY_MS,
    pollAfterSubscribe: parsed.POLL_AFTER_SUBSCRIBE ?? true,
    adminToken: parsed.ADMIN_TOKEN ?? null,
    discordBotConfig: parsed.DISCORD_BOT_CONFIG ? path.resolve(parsed.DISCORD_BOT_CONFIG) : null,
  };
}

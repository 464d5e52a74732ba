import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import { LOG_LEVELS } from './settings';
import type { EnvConfig, LogLevel } from './types';

let cachedEnv: EnvConfig | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function readEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  const dbFile = source.LISTING_DB_FILE?.trim();
  const logLevel = source.LOG_LEVEL?.trim().toLowerCase();

  if (!logLevel) {
    return { dbFile: dbFile || undefined };
  }
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  return {
    dbFile: dbFile || undefined,
    logLevel
  };
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = readEnvConfig(process.env);
  return cachedEnv;
}

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

import type { EnvConfig, Settings } from './types';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const settingsSchema = z.object({
  paths: z.object({
    data_dir: z.string().min(1),
    db_file: z.string().min(1)
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    format: z.enum(['json', 'pretty'])
  }),
  store: z
    .object({
      busy_timeout_ms: z.number().int().nonnegative(),
      default_page_size: z.number().int().positive(),
      max_page_size: z.number().int().positive(),
      default_source: z.string().min(1)
    })
    .refine((store) => store.default_page_size <= store.max_page_size, {
      message: 'default_page_size must not exceed max_page_size'
    })
});

const cachedSettings = new Map<string, Settings>();

export function parseSettings(contents: string, origin = 'settings'): Settings {
  const result = settingsSchema.safeParse(parse(contents));
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ${origin}: ${details.join('; ')}`);
  }
  return result.data;
}

export function loadSettings(configPath = resolve(process.cwd(), 'configs', 'settings.yaml')): Settings {
  const cached = cachedSettings.get(configPath);
  if (cached) {
    return cached;
  }

  const fileContents = readFileSync(configPath, 'utf-8');
  const parsed = parseSettings(fileContents, configPath);

  cachedSettings.set(configPath, parsed);
  return parsed;
}

export function applyEnvOverrides(settings: Settings, env: EnvConfig): Settings {
  return {
    ...settings,
    paths: {
      ...settings.paths,
      db_file: env.dbFile ?? settings.paths.db_file
    },
    logging: {
      ...settings.logging,
      level: env.logLevel ?? settings.logging.level
    }
  };
}

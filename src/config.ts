/**
 * Environment configuration
 */

import 'dotenv/config';
import { z } from 'zod';

export const DEFAULT_CHAMPION_DATA_URL =
  'https://cdn.merakianalytics.com/riot/lol/resources/latest/en-US/champions.json';

const envSchema = z.object({
  LCU_LOCKFILE_PATH: z.string().min(1).optional(),
  LOL_INSTALL_DIR: z.string().min(1).optional(),
  LCU_BACKUP_DIR: z.string().min(1).default('.backup'),
  LCU_CHAMPION_DATA_URL: z.string().url().default(DEFAULT_CHAMPION_DATA_URL),
  LCU_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
});

export interface AppConfig {
  lockfilePath?: string;
  installDir?: string;
  backupDir: string;
  championDataUrl: string;
  requestDelayMs: number;
}

export class ConfigError extends Error {
  constructor(public readonly keys: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(keys, `Invalid configuration: ${keys.join(', ')}`);
  }

  return {
    lockfilePath: parsed.data.LCU_LOCKFILE_PATH,
    installDir: parsed.data.LOL_INSTALL_DIR,
    backupDir: parsed.data.LCU_BACKUP_DIR,
    championDataUrl: parsed.data.LCU_CHAMPION_DATA_URL,
    requestDelayMs: parsed.data.LCU_REQUEST_DELAY_MS,
  };
}

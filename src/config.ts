import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_EXPIRATION_DAYS, DEFAULT_PERSISTENT_FLAGS, DEFAULT_EXPERIMENT_ID } from './flags/index.js';
import { hasErrorCode, logger } from './utils/index.js';

const ConfigSchema = z.object({
  storePath: z.string().optional(),
  matching: z.object({
    fuzzyThreshold: z.number().min(0).max(1).default(0.9),
  }).default({}),
  flags: z.object({
    expirationDays: z.number().int().positive().default(DEFAULT_EXPIRATION_DAYS),
    persistentFlags: z.array(z.string()).default([...DEFAULT_PERSISTENT_FLAGS]),
    disabledRules: z.array(z.string()).default([]),
    experimentId: z.string().default(DEFAULT_EXPERIMENT_ID),
    abGroupOverrides: z.record(z.enum(['A', 'B'])).default({}),
  }).default({}),
});

export interface AppConfig {
  storePath: string;
  matching: {
    fuzzyThreshold: number;
  };
  flags: {
    expirationDays: number;
    persistentFlags: string[];
    disabledRules: string[];
    experimentId: string;
    abGroupOverrides: Record<string, 'A' | 'B'>;
  };
}

const DEFAULT_STORE_PATH = path.join(os.homedir(), '.customer-signals', 'store');

export function parseConfig(raw: unknown, storePathOverride?: string): AppConfig {
  const parsed = ConfigSchema.parse(raw);
  return {
    storePath: storePathOverride ?? parsed.storePath ?? DEFAULT_STORE_PATH,
    matching: parsed.matching,
    flags: parsed.flags,
  };
}

export async function loadConfig(): Promise<AppConfig> {
  const configPath = process.env.CUSTOMER_SIGNALS_CONFIG
    ?? path.join(os.homedir(), '.customer-signals', 'config.json');
  const storeOverride = process.env.CUSTOMER_SIGNALS_STORE;

  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (err) {
    // No config file yet: defaults apply. Anything else is a broken file.
    if (!hasErrorCode(err, 'ENOENT')) throw err;
    logger.debug('No config file at', configPath);
  }

  return parseConfig(raw, storeOverride);
}

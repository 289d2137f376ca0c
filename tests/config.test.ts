import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('should fill in defaults', () => {
    const config = parseConfig({}, '/tmp/store');

    expect(config).toEqual({
      storePath: '/tmp/store',
      matching: { fuzzyThreshold: 0.9 },
      flags: {
        expirationDays: 14,
        persistentFlags: ['active-membership', 'active-prepaid-pass', 'has-youth'],
        disabledRules: [],
        experimentId: 'day_pass_conversion',
        abGroupOverrides: {},
      },
    });
  });

  it('should let the override win over the file store path', () => {
    expect(parseConfig({ storePath: '/from/file' }, '/from/env').storePath).toBe('/from/env');
    expect(parseConfig({ storePath: '/from/file' }).storePath).toBe('/from/file');
  });

  it('should reject out-of-range values', () => {
    expect(() => parseConfig({ matching: { fuzzyThreshold: 2 } })).toThrow();
    expect(() => parseConfig({ flags: { abGroupOverrides: { c1: 'C' } } })).toThrow();
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(async () => {
    vi.unstubAllEnvs();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should read the config file and apply the store override', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'customer-signals-config-'));
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({
      storePath: '/from/file',
      flags: { expirationDays: 7, disabledRules: ['new_member'] },
    }));
    vi.stubEnv('CUSTOMER_SIGNALS_CONFIG', configPath);
    vi.stubEnv('CUSTOMER_SIGNALS_STORE', '/from/env');

    const config = await loadConfig();

    expect(config.storePath).toBe('/from/env');
    expect(config.flags.expirationDays).toBe(7);
    expect(config.flags.disabledRules).toEqual(['new_member']);
  });

  it('should fall back to defaults when the file is missing', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'customer-signals-config-'));
    vi.stubEnv('CUSTOMER_SIGNALS_CONFIG', path.join(dir, 'missing.json'));
    vi.stubEnv('CUSTOMER_SIGNALS_STORE', '/tmp/store');

    const config = await loadConfig();
    expect(config.matching.fuzzyThreshold).toBe(0.9);
  });

  it('should fail on a broken file', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'customer-signals-config-'));
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, '{ not json');
    vi.stubEnv('CUSTOMER_SIGNALS_CONFIG', configPath);

    await expect(loadConfig()).rejects.toThrow(SyntaxError);
  });
});

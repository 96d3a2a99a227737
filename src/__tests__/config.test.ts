/**
 * Tests for project configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  auditLogPath,
  ConfigError,
  defaultConfig,
  initializeProject,
  isInitialized,
  loadConfig,
  localConfigPath,
  parseConfig,
  safetyFlagsFor,
} from '../config.js';

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricewhy-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('initializes a project with the default config', async () => {
    expect(isInitialized(dir)).toBe(false);

    const config = await initializeProject(dir);

    expect(isInitialized(dir)).toBe(true);
    expect(config).toEqual(defaultConfig());
    expect(JSON.parse(await readFile(localConfigPath(dir), 'utf-8'))).toEqual(defaultConfig());
  });

  it('loads the local config', async () => {
    await initializeProject(dir);
    const custom = { ...defaultConfig(), productId: 'SKU-999', currency: 'USD' };
    await writeFile(localConfigPath(dir), JSON.stringify(custom), 'utf-8');

    expect(await loadConfig(dir)).toEqual(custom);
  });

  it('rejects an invalid local config', async () => {
    await mkdir(join(dir, '.pricewhy'), { recursive: true });
    await writeFile(localConfigPath(dir), JSON.stringify({ ...defaultConfig(), currency: 'rupees' }), 'utf-8');

    await expect(loadConfig(dir)).rejects.toThrow(ConfigError);
  });

  it('rejects a config that is not JSON', async () => {
    await mkdir(join(dir, '.pricewhy'), { recursive: true });
    await writeFile(localConfigPath(dir), '{ "productId": ', 'utf-8');

    await expect(loadConfig(dir)).rejects.toThrow(`Invalid ${localConfigPath(dir)}:`);
  });

  it('resolves the audit log against the project directory', () => {
    expect(auditLogPath(defaultConfig(), dir)).toBe(join(dir, '.pricewhy', 'audit.jsonl'));
  });
});

describe('parseConfig', () => {
  it('names the first invalid key', () => {
    expect(() => parseConfig({ ...defaultConfig(), currency: 'inr' }, 'test config')).toThrow(
      'Invalid test config: currency must be a three-letter ISO 4217 code',
    );
  });

  it('requires the safety section', () => {
    const { safety: _safety, ...rest } = defaultConfig();
    expect(() => parseConfig(rest)).toThrow(/^Invalid config: safety /);
  });
});

describe('safetyFlagsFor', () => {
  it('maps config safety settings to evidence flags', () => {
    const config = defaultConfig();
    config.safety.hideSupplierNames = false;

    expect(safetyFlagsFor(config)).toEqual({ hide_exact_costs: true, hide_supplier_names: false });
  });
});

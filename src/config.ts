/**
 * PriceWhy Configuration
 *
 * Manages .pricewhy/config.json in the current project directory.
 * Also supports global config at ~/.pricewhy/config.json.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { PriceWhyConfig, SafetyFlags } from './types.js';

/** Directory name for local PriceWhy config */
export const PRICEWHY_DIR = '.pricewhy';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Audit log filename inside the local config directory */
export const AUDIT_FILE = 'audit.jsonl';

/** Global PriceWhy home directory */
export const GLOBAL_PRICEWHY_DIR = join(homedir(), '.pricewhy');

export const configSchema = z.object({
  version: z.string(),
  productId: z.string().min(1),
  currency: z.string().regex(/^[A-Z]{3}$/, 'must be a three-letter ISO 4217 code'),
  modelPath: z.string().min(1).nullable(),
  audit: z.object({
    path: z.string().min(1),
  }),
  safety: z.object({
    hideExactCosts: z.boolean(),
    hideSupplierNames: z.boolean(),
    supplierNames: z.array(z.string()),
  }),
});

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): PriceWhyConfig {
  return {
    version: '0.1.0',
    productId: 'SKU-123',
    currency: 'INR',
    modelPath: null,
    audit: {
      path: join(PRICEWHY_DIR, AUDIT_FILE),
    },
    safety: {
      hideExactCosts: true,
      hideSupplierNames: true,
      supplierNames: [],
    },
  };
}

/**
 * Resolve the local .pricewhy directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), PRICEWHY_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Check if PriceWhy is initialized in the given directory.
 */
export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

/**
 * Validate a parsed config file.
 *
 * @throws ConfigError naming the first invalid key
 */
export function parseConfig(raw: unknown, source = 'config'): PriceWhyConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid ${source}: ${path} ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Load the PriceWhy config from the local .pricewhy/ directory.
 * Falls back to global config if local doesn't exist.
 */
export async function loadConfig(cwd?: string): Promise<PriceWhyConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(GLOBAL_PRICEWHY_DIR, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Invalid ${configPath}: ${message}`);
      }
      return parseConfig(json, configPath);
    }
  }

  return defaultConfig();
}

/**
 * Save the PriceWhy config to the local .pricewhy/ directory.
 */
export async function saveConfig(config: PriceWhyConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Initialize PriceWhy in the given directory.
 * Creates .pricewhy/ and writes default config.
 */
export async function initializeProject(cwd?: string): Promise<PriceWhyConfig> {
  const config = defaultConfig();
  await saveConfig(config, cwd);
  return config;
}

/**
 * Evidence safety flags for a config.
 */
export function safetyFlagsFor(config: PriceWhyConfig): SafetyFlags {
  return {
    hide_exact_costs: config.safety.hideExactCosts,
    hide_supplier_names: config.safety.hideSupplierNames,
  };
}

/**
 * Absolute audit log path; relative paths resolve against `cwd`.
 */
export function auditLogPath(config: PriceWhyConfig, cwd?: string): string {
  return resolve(cwd ?? process.cwd(), config.audit.path);
}

/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { AnalysisConfigError } from '../errors.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = ['module-atlas.config.json', '.moduleatlasrc.json', '.moduleatlasrc'];

/** Key holding the configuration inside package.json */
export const PACKAGE_JSON_KEY = 'moduleAtlas';

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new AnalysisConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new AnalysisConfigError(`Invalid JSON in config file: ${absolutePath}`);
  }

  return parseConfig(rawConfig);
}

/**
 * Validate a raw value against the schema, filling in defaults
 */
export function parseConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new AnalysisConfigError(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Walk up from `startDir` looking for a config file or a package.json key.
 * Returns the first one found, or null.
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const fromPackage = await readPackageConfig(path.join(currentDir, 'package.json'));
    if (fromPackage) return fromPackage;

    const parent = path.dirname(currentDir);
    if (parent === currentDir) return null;
    currentDir = parent;
  }
}

async function readPackageConfig(packagePath: string): Promise<Config | null> {
  if (!fs.existsSync(packagePath)) return null;

  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // A broken package.json belongs to someone else; keep walking
    return null;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !(PACKAGE_JSON_KEY in packageContent)) {
    return null;
  }
  return parseConfig(packageContent[PACKAGE_JSON_KEY]);
}

export async function loadConfigOrDefault(startDir: string, configPath?: string): Promise<Config> {
  if (configPath) return loadConfig(configPath);
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

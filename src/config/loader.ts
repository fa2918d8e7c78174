/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors/index.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'docsmith.config.json',
  '.docsmithrc.json',
  '.docsmithrc',
];

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`);
  }

  return parseConfig(rawConfig, absolutePath);
}

/**
 * Validate a raw configuration object
 */
export function parseConfig(rawConfig: unknown, source = 'configuration'): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Walk up from `startDir` to the filesystem root and load the first
 * configuration found. A `docsmith` key in package.json counts as one.
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        return parseConfig(packageConfig, `${packagePath} ("docsmith" key)`);
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) return null;
    currentDir = parentDir;
  }
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

async function readPackageConfig(packagePath: string): Promise<unknown> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // A package.json that is not JSON belongs to some other tool
    return undefined;
  }

  if (typeof packageContent === 'object' && packageContent !== null && 'docsmith' in packageContent) {
    return packageContent.docsmith;
  }
  return undefined;
}

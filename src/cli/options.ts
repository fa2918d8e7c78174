/**
 * Shared option handling for the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import {
  findConfig,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  type Config,
} from '../config/index.js';

export interface ConfigOverrides {
  config?: string;
  overwrite?: boolean;
  sections?: string[];
  dryRun?: boolean;
  draft?: boolean;
  concurrency?: number;
  private?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Load the configuration file (explicit, or found from `cwd` upwards) and
 * apply command-line overrides, validating the result as a whole
 */
export async function resolveConfig(options: ConfigOverrides, cwd: string = process.cwd()): Promise<Config> {
  const base = options.config
    ? await loadConfig(options.config)
    : (await findConfig(cwd)) ?? getDefaultConfig();

  return parseConfig({
    ...base,
    ...(options.overwrite !== undefined && { overwriteExisting: options.overwrite }),
    ...(options.sections !== undefined && { sections: options.sections }),
    ...(options.dryRun !== undefined && { dryRun: options.dryRun }),
    ...(options.draft !== undefined && { draft: options.draft }),
    ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
    ...(options.private !== undefined && { includePrivate: options.private }),
  }, 'command-line options');
}

/**
 * Expand command-line paths into the list of files to process
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import type { Config } from '../config/index.js';

/**
 * Directories are searched with the configured include/exclude globs; file
 * paths are taken as given, so a missing file is reported by the pipeline.
 * The result is absolute, sorted and free of duplicates.
 */
export async function discoverFiles(
  inputs: readonly string[],
  config: Pick<Config, 'include' | 'exclude'>,
  cwd: string = process.cwd()
): Promise<string[]> {
  const found = new Set<string>();

  for (const input of inputs.length > 0 ? inputs : ['.']) {
    const target = path.resolve(cwd, input);
    const stats = await fs.promises.stat(target).catch(() => null);

    if (stats?.isDirectory()) {
      const files = await fg(config.include, {
        cwd: target,
        ignore: config.exclude,
        absolute: true,
        onlyFiles: true,
        dot: false,
      });
      for (const file of files) found.add(path.normalize(file));
    } else {
      found.add(target);
    }
  }

  return [...found].sort();
}

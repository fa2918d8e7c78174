/**
 * Draft files
 *
 * A draft holds the regenerated source beside the original so it can be
 * reviewed before `finalizeDraft` copies it into place.
 */

import fs from 'node:fs';
import { ConfigError, FileIOError } from '../errors/index.js';
import { isNotFound, writeFileAtomic } from './atomic-write.js';
import { readSourceFile } from './source-file.js';

export const DEFAULT_DRAFT_EXTENSION = '.docsmith-draft.py';

export interface FinalizeOptions {
  /** Leave the draft file in place after copying it */
  keepDraft?: boolean;
  draftExtension?: string;
}

export interface FinalizeResult {
  draftPath: string;
  sourcePath: string;
  draftRemoved: boolean;
}

/**
 * `pkg/mod.py` becomes `pkg/mod.docsmith-draft.py`; stub files keep their
 * `.pyi` ending.
 */
export function draftPathFor(sourcePath: string, draftExtension: string = DEFAULT_DRAFT_EXTENSION): string {
  const match = sourcePath.match(/\.pyi?$/i);
  if (!match) return sourcePath + draftExtension;

  const base = sourcePath.slice(0, -match[0].length);
  return match[0].toLowerCase() === '.pyi' ? `${base}${draftExtension}i` : base + draftExtension;
}

export function sourcePathFor(draftPath: string, draftExtension: string = DEFAULT_DRAFT_EXTENSION): string {
  if (draftPath.endsWith(draftExtension)) {
    return `${draftPath.slice(0, -draftExtension.length)}.py`;
  }
  if (draftPath.endsWith(`${draftExtension}i`)) {
    return `${draftPath.slice(0, -draftExtension.length - 1)}.pyi`;
  }
  throw new ConfigError(`Not a draft file (expected a name ending in ${draftExtension}): ${draftPath}`);
}

/**
 * Copy a draft onto its source file and remove the draft
 */
export async function finalizeDraft(draftPath: string, options: FinalizeOptions = {}): Promise<FinalizeResult> {
  const sourcePath = sourcePathFor(draftPath, options.draftExtension);

  const content = await readSourceFile(draftPath);
  await writeFileAtomic(sourcePath, content);

  if (options.keepDraft) {
    return { draftPath, sourcePath, draftRemoved: false };
  }

  try {
    await fs.promises.unlink(draftPath);
  } catch (error) {
    if (!isNotFound(error)) throw new FileIOError(draftPath, 'remove', error);
  }
  return { draftPath, sourcePath, draftRemoved: true };
}

/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  const fixturePath = getFixturePath(...parts);
  return fs.promises.readFile(fixturePath, 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  readFile: (relativePath: string) => string;
  exists: (relativePath: string) => boolean;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = path.join(os.tmpdir(), `docsmith-project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  const addFile = (relativePath: string, content: string): string => {
    const filePath = getFilePath(relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    try {
      fs.rmSync(rootDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  };

  const readFile = (relativePath: string): string => fs.readFileSync(getFilePath(relativePath), 'utf-8');
  const exists = (relativePath: string): boolean => fs.existsSync(getFilePath(relativePath));

  return { rootDir, cleanup, addFile, readFile, exists, getFilePath };
}

/**
 * Lines joined with `\n`, for writing Python sources inline
 */
export function py(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

export const VALID_CONFIG = {
  include: ['src/**/*.py'],
  exclude: ['**/venv/**'],
  overwriteExisting: true,
  sections: ['Args', 'Returns', 'Raises', 'Examples'],
  concurrency: 2,
  placeholders: {
    description: 'Describe me.',
  },
};

export const INVALID_SCHEMA_CONFIG = {
  sections: ['Args', 'Notes'],
  concurrency: 0,
};

import { describe, it, expect, afterEach } from 'vitest';
import { discoverFiles } from '../../../src/cli/discovery.js';
import { formatFileReport, formatRunSummary } from '../../../src/cli/format.js';
import { getDefaultConfig } from '../../../src/config/index.js';
import type { FileReport } from '../../../src/types/index.js';
import { createTempProject, type TempProjectResult } from '../../helpers/fixtures.js';

describe('discoverFiles', () => {
  let project: TempProjectResult;

  afterEach(() => {
    project.cleanup();
  });

  it('should expand directories with the include and exclude globs', async () => {
    project = createTempProject({
      'a.py': '',
      'pkg/b.pyi': '',
      'pkg/b.docsmith-draft.py': '',
      'venv/lib/c.py': '',
      'pkg/__pycache__/d.py': '',
      'notes.txt': '',
    });

    const files = await discoverFiles([project.rootDir], getDefaultConfig());

    expect(files).toEqual([project.getFilePath('a.py'), project.getFilePath('pkg/b.pyi')]);
  });

  it('should take file paths as given and drop duplicates', async () => {
    project = createTempProject({ 'a.py': '', 'b.py': '' });

    const files = await discoverFiles(['b.py', 'a.py', '.', 'missing.py'], getDefaultConfig(), project.rootDir);

    expect(files).toEqual([
      project.getFilePath('a.py'),
      project.getFilePath('b.py'),
      project.getFilePath('missing.py'),
    ]);
  });

  it('should search the working directory when no path is given', async () => {
    project = createTempProject({ 'only.py': '' });

    expect(await discoverFiles([], getDefaultConfig(), project.rootDir)).toEqual([project.getFilePath('only.py')]);
  });
});

describe('report formatting', () => {
  const base: FileReport = {
    filePath: '/work/pkg/mod.py',
    status: 'modified',
    modified: true,
    outputPath: '/work/pkg/mod.py',
    processed: [
      { qualifiedName: 'f', kind: 'function', line: 1, action: 'inserted', warnings: [] },
      { qualifiedName: 'g', kind: 'function', line: 5, action: 'updated', warnings: ['return: quoted annotation "T" rendered as written'] },
    ],
    skipped: [
      { qualifiedName: 'h', kind: 'function', line: 9, code: 'DOCSTRING_FORMAT', reason: 'duplicate Args section (docstring line 4)' },
    ],
  };

  it('should describe a modified file with its skips and warnings', () => {
    expect(formatFileReport(base, '/work')).toEqual([
      '  modified   pkg/mod.py (1 inserted, 1 updated)',
      '    skipped h (line 9): [DOCSTRING_FORMAT] duplicate Args section (docstring line 4)',
      '    warning g: return: quoted annotation "T" rendered as written',
    ]);
  });

  it('should name the draft a file was written to', () => {
    const report = { ...base, outputPath: '/work/pkg/mod.docsmith-draft.py', skipped: [], processed: [] };

    expect(formatFileReport(report, '/work')).toEqual([
      '  modified   pkg/mod.py -> pkg/mod.docsmith-draft.py (0 inserted, 0 updated)',
    ]);
  });

  it('should describe a failed file', () => {
    const report: FileReport = {
      ...base,
      status: 'failed',
      modified: false,
      processed: [],
      skipped: [],
      error: { code: 'PARSE_ERROR', message: 'Invalid syntax (line 3)', line: 3 },
    };

    expect(formatFileReport(report, '/elsewhere/deep')).toEqual([
      '  failed     /work/pkg/mod.py: [PARSE_ERROR] Invalid syntax (line 3)',
    ]);
  });

  it('should summarize a run', () => {
    expect(formatRunSummary({
      files: [base],
      failures: [],
      modifiedFiles: 1,
      failedFiles: 0,
      success: true,
      dryRun: true,
      durationMs: 12,
    })).toBe('1 file, 1 would change, 0 failed, 1 declaration skipped (12ms)');
  });
});

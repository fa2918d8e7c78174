/**
 * Per-file and per-run reports
 */

import type { DeclarationKind } from './declarations.js';

export type ErrorCode =
  | 'PARSE_ERROR'
  | 'MODEL_VALIDATION'
  | 'DOCSTRING_FORMAT'
  | 'PATCH_CONFLICT'
  | 'IO_ERROR'
  | 'UNSUPPORTED_FILE'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

export type DeclarationAction = 'inserted' | 'updated' | 'unchanged';

export interface ProcessedDeclaration {
  qualifiedName: string;
  kind: DeclarationKind;
  line: number;
  action: DeclarationAction;
  warnings: string[];
}

export interface SkippedDeclaration {
  qualifiedName: string;
  kind: DeclarationKind;
  line: number;
  code: ErrorCode;
  reason: string;
}

export type FileStatus = 'modified' | 'unchanged' | 'failed';

export interface FileReport {
  filePath: string;
  status: FileStatus;
  /** True when at least one docstring changed (written unless dry run) */
  modified: boolean;
  outputPath: string;
  processed: ProcessedDeclaration[];
  skipped: SkippedDeclaration[];
  error?: { code: ErrorCode; message: string; line?: number };
}

export interface FailureEntry {
  filePath: string;
  qualifiedName?: string;
  code: ErrorCode;
  message: string;
}

export interface RunReport {
  files: FileReport[];
  failures: FailureEntry[];
  modifiedFiles: number;
  failedFiles: number;
  success: boolean;
  dryRun: boolean;
  durationMs: number;
}

/**
 * Error taxonomy for the docstring pipeline
 *
 * Every error raised on purpose carries a stable code so the pipeline can
 * record it in the report. Declaration-scoped errors skip one declaration;
 * file-scoped errors abort one file.
 */

import type { ErrorCode } from '../types/report.js';

export type ErrorScope = 'declaration' | 'file' | 'run';

/**
 * Base class for pipeline errors
 */
export class DocsmithError extends Error {
  readonly code: ErrorCode;
  readonly scope: ErrorScope;

  constructor(message: string, code: ErrorCode, scope: ErrorScope, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.scope = scope;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Source text is not valid Python syntax
 */
export class ParseError extends DocsmithError {
  readonly filePath: string;
  readonly line?: number;

  constructor(filePath: string, message: string, line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message, 'PARSE_ERROR', 'file');
    this.filePath = filePath;
    this.line = line;
  }
}

/**
 * A declaration's signature cannot be normalized into a model
 */
export class ModelValidationError extends DocsmithError {
  readonly qualifiedName: string;
  readonly issues: string[];

  constructor(qualifiedName: string, issues: string[]) {
    super(`${qualifiedName}: ${issues.join('; ')}`, 'MODEL_VALIDATION', 'declaration');
    this.qualifiedName = qualifiedName;
    this.issues = issues;
  }
}

/**
 * An existing docstring does not follow the structured section layout
 */
export class DocstringFormatError extends DocsmithError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `${message} (docstring line ${line})` : message, 'DOCSTRING_FORMAT', 'declaration');
    this.line = line;
  }
}

/**
 * A recorded span no longer matches the text it is applied to
 */
export class PatchConflictError extends DocsmithError {
  readonly qualifiedName: string;
  readonly offset: number;

  constructor(qualifiedName: string, offset: number, detail: string) {
    super(`Patch conflict for ${qualifiedName} at offset ${offset}: ${detail}`, 'PATCH_CONFLICT', 'file');
    this.qualifiedName = qualifiedName;
    this.offset = offset;
  }
}

/**
 * A file could not be read or written
 */
export class FileIOError extends DocsmithError {
  readonly filePath: string;

  constructor(filePath: string, action: 'read' | 'decode' | 'write' | 'remove', cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${action} ${filePath}: ${detail}`, 'IO_ERROR', 'file', { cause });
    this.filePath = filePath;
  }
}

/**
 * No extractor is registered for the file's extension
 */
export class UnsupportedFileError extends DocsmithError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Unsupported file type: ${filePath}`, 'UNSUPPORTED_FILE', 'file');
    this.filePath = filePath;
  }
}

/**
 * Configuration file or option is invalid
 */
export class ConfigError extends DocsmithError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 'run');
  }
}

export function isDeclarationError(error: unknown): error is ModelValidationError | DocstringFormatError {
  return error instanceof DocsmithError && error.scope === 'declaration';
}

/**
 * Describe any thrown value as a report code and message
 */
export function describeError(error: unknown): { code: ErrorCode; message: string; line?: number } {
  if (error instanceof DocsmithError) {
    const line = error instanceof ParseError ? error.line : undefined;
    return line !== undefined
      ? { code: error.code, message: error.message, line }
      : { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

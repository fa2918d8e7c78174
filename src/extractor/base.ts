/**
 * Abstract base class for declaration extractors
 */

import type { DeclarationRecord, LineEnding, SourceUnit } from '../types/index.js';

export type Language = 'python';

export interface ExtractorOptions {
  /** Largest file accepted, in bytes; 0 disables the limit */
  maxFileSize?: number;
}

export interface ExtractionResult {
  unit: SourceUnit;
  declarations: DeclarationRecord[];
}

export abstract class DeclarationExtractor {
  protected options: Required<ExtractorOptions>;

  constructor(options: ExtractorOptions = {}) {
    this.options = {
      maxFileSize: 1024 * 1024, // 1MB
      ...options,
    };
  }

  /**
   * Check if this extractor can handle the given file
   */
  abstract canParse(filePath: string): boolean;

  /**
   * Parse source text into an immutable SourceUnit
   */
  abstract parse(filePath: string, content: string): SourceUnit;

  /**
   * List the declarations of a parsed unit in document order
   */
  abstract extract(unit: SourceUnit): DeclarationRecord[];

  abstract get language(): Language;

  abstract get extensions(): string[];

  extractDeclarations(filePath: string, content: string): ExtractionResult {
    const unit = this.parse(filePath, content);
    return { unit, declarations: this.extract(unit) };
  }

  protected isFileTooLarge(content: string): boolean {
    const limit = this.options.maxFileSize;
    return limit > 0 && Buffer.byteLength(content, 'utf8') > limit;
  }

  protected detectLineEnding(text: string): LineEnding {
    return text.includes('\r\n') ? '\r\n' : '\n';
  }

  protected formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
}

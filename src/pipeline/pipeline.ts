/**
 * Docstring pipeline
 *
 * Runs extract, model, render and patch for each file. Declaration-level
 * errors skip one declaration; anything else fails the file, which is then
 * left untouched on disk.
 */

import type {
  DeclarationRecord,
  DocstringSections,
  FailureEntry,
  FileReport,
  ProcessedDeclaration,
  RunReport,
  SkippedDeclaration,
  SourceUnit,
} from '../types/index.js';
import { getDefaultConfig, type Config } from '../config/index.js';
import { createDefaultRegistry, type ExtractorRegistry } from '../extractor/index.js';
import { buildSignatureModel, type SignatureModel } from '../model/index.js';
import { readDocstring, renderDocstring } from '../render/index.js';
import { applyPatches, createPatch, type Patch } from '../patch/index.js';
import { SilentLogger, type Logger } from '../logger/index.js';
import {
  describeError,
  DocsmithError,
  DocstringFormatError,
  isDeclarationError,
  UnsupportedFileError,
} from '../errors/index.js';
import { parallelMap } from './parallel.js';
import { writeFileAtomic } from './atomic-write.js';
import { readSourceFile } from './source-file.js';
import { draftPathFor } from './draft.js';

export interface PipelineOptions {
  config?: Config;
  logger?: Logger;
  registry?: ExtractorRegistry;
}

export interface SourceResult {
  /** New file content; the input content when nothing changed or the file failed */
  output: string;
  report: FileReport;
}

interface DeclarationOutcome {
  patch: Patch | null;
  processed: ProcessedDeclaration;
}

export class DocstringPipeline {
  readonly config: Config;
  private logger: Logger;
  private registry: ExtractorRegistry;

  constructor(options: PipelineOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.logger = options.logger ?? new SilentLogger();
    this.registry = options.registry ?? createDefaultRegistry({ maxFileSize: this.config.parser.maxFileSize });
  }

  /**
   * Regenerate the docstrings of one file's content in memory
   */
  processSource(filePath: string, content: string): SourceResult {
    const report = this.emptyReport(filePath);

    try {
      const extractor = this.registry.getByFilePath(filePath);
      if (!extractor) {
        throw new UnsupportedFileError(filePath);
      }

      const { unit, declarations } = extractor.extractDeclarations(filePath, content);
      const patches: Patch[] = [];

      for (const record of declarations) {
        if (!this.config.includePrivate && isPrivate(record)) continue;

        try {
          const outcome = this.processDeclaration(unit, record);
          report.processed.push(outcome.processed);
          if (outcome.patch) patches.push(outcome.patch);
        } catch (error) {
          if (!isDeclarationError(error)) throw error;
          report.skipped.push(skippedEntry(record, error));
          this.logger.debug(`  skipped ${record.qualifiedName}: ${error.message}`);
        }
      }

      if (patches.length === 0) {
        report.status = 'unchanged';
        return { output: content, report };
      }

      const output = applyPatches(unit, patches);
      report.status = 'modified';
      report.modified = true;
      return { output, report };
    } catch (error) {
      return { output: content, report: this.failedReport(report, error) };
    }
  }

  /**
   * Process one file on disk; the result is written atomically unless the
   * run is a dry run or nothing changed
   */
  async processFile(filePath: string): Promise<FileReport> {
    let content: string;
    try {
      content = await readSourceFile(filePath);
    } catch (error) {
      return this.failedReport(this.emptyReport(filePath), error);
    }

    const { output, report } = this.processSource(filePath, content);

    if (report.modified && !this.config.dryRun) {
      try {
        await writeFileAtomic(report.outputPath, output, filePath);
      } catch (error) {
        return this.failedReport(report, error);
      }
    }

    this.logger.debug(`${filePath}: ${report.status} (${report.processed.length} processed, ${report.skipped.length} skipped)`);
    return report;
  }

  async processFiles(filePaths: readonly string[]): Promise<RunReport> {
    const startTime = Date.now();
    const results = await parallelMap(filePaths, filePath => this.processFile(filePath), this.config.concurrency);

    const files = results.map((result, index) => {
      if (result.success) return result.value;
      // processFile reports its own failures; this covers defects only
      const filePath = filePaths[index] ?? '';
      return this.failedReport(this.emptyReport(filePath), result.error);
    });

    const failures: FailureEntry[] = [];
    for (const file of files) {
      for (const skipped of file.skipped) {
        failures.push({
          filePath: file.filePath,
          qualifiedName: skipped.qualifiedName,
          code: skipped.code,
          message: skipped.reason,
        });
      }
      if (file.error) {
        failures.push({ filePath: file.filePath, code: file.error.code, message: file.error.message });
      }
    }

    const failedFiles = files.filter(f => f.status === 'failed').length;

    return {
      files,
      failures,
      modifiedFiles: files.filter(f => f.modified).length,
      failedFiles,
      success: failedFiles === 0,
      dryRun: this.config.dryRun,
      durationMs: Date.now() - startTime,
    };
  }

  private processDeclaration(unit: SourceUnit, record: DeclarationRecord): DeclarationOutcome {
    const model = buildSignatureModel(record, {
      inferReturns: this.config.inferReturns,
      summaryTemplate: this.config.placeholders.summary,
    });

    const rendered = renderDocstring(model, {
      sections: this.config.sections,
      placeholders: this.config.placeholders,
      existing: this.existingSections(record, model),
      preserveExisting: !this.config.overwriteExisting,
    });

    const patch = createPatch(unit, record, rendered);
    const action = !patch ? 'unchanged' : record.docstring ? 'updated' : 'inserted';

    return {
      patch,
      processed: {
        qualifiedName: record.qualifiedName,
        kind: record.kind,
        line: record.startLine,
        action,
        warnings: model.warnings,
      },
    };
  }

  /**
   * Sections of the current docstring. With overwriteExisting a docstring in
   * any other format is replaced instead of reported.
   */
  private existingSections(record: DeclarationRecord, model: SignatureModel): DocstringSections | null {
    if (!record.docstring) return null;

    try {
      return readDocstring(record.docstring, {
        parameters: model.parameters.map(param => param.name),
        raises: model.raises,
      });
    } catch (error) {
      if (error instanceof DocstringFormatError && this.config.overwriteExisting) {
        return null;
      }
      throw error;
    }
  }

  private emptyReport(filePath: string): FileReport {
    return {
      filePath,
      status: 'unchanged',
      modified: false,
      outputPath: this.config.draft ? draftPathFor(filePath, this.config.draftExtension) : filePath,
      processed: [],
      skipped: [],
    };
  }

  private failedReport(report: FileReport, error: unknown): FileReport {
    const described = describeError(error);
    this.logger.warn(`${report.filePath}: ${described.message}`);
    return {
      ...report,
      status: 'failed',
      modified: false,
      processed: [],
      skipped: [],
      error: described,
    };
  }
}

/**
 * Declarations with a `_name` segment anywhere in their qualified name.
 * Dunder names such as `__init__` are public.
 */
export function isPrivate(record: Pick<DeclarationRecord, 'qualifiedName'>): boolean {
  return record.qualifiedName
    .split('.')
    .some(segment => segment.startsWith('_') && !/^__.+__$/.test(segment));
}

function skippedEntry(record: DeclarationRecord, error: DocsmithError): SkippedDeclaration {
  return {
    qualifiedName: record.qualifiedName,
    kind: record.kind,
    line: record.startLine,
    code: error.code,
    reason: error.message,
  };
}

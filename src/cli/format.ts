/**
 * Human-readable report output
 */

import path from 'node:path';
import type { FileReport, RunReport } from '../types/index.js';

export function displayPath(filePath: string, cwd: string = process.cwd()): string {
  const relative = path.relative(cwd, filePath);
  return relative && !relative.startsWith('..') ? relative : filePath;
}

export function formatFileReport(report: FileReport, cwd?: string): string[] {
  const shown = displayPath(report.filePath, cwd);

  if (report.status === 'failed') {
    const error = report.error;
    return [`  failed     ${shown}: ${error ? `[${error.code}] ${error.message}` : 'unknown error'}`];
  }

  const lines: string[] = [];
  if (report.status === 'modified') {
    const inserted = report.processed.filter(d => d.action === 'inserted').length;
    const updated = report.processed.filter(d => d.action === 'updated').length;
    const target = report.outputPath !== report.filePath ? ` -> ${displayPath(report.outputPath, cwd)}` : '';
    lines.push(`  modified   ${shown}${target} (${inserted} inserted, ${updated} updated)`);
  } else {
    lines.push(`  unchanged  ${shown}`);
  }

  for (const skipped of report.skipped) {
    lines.push(`    skipped ${skipped.qualifiedName} (line ${skipped.line}): [${skipped.code}] ${skipped.reason}`);
  }
  for (const processed of report.processed) {
    for (const warning of processed.warnings) {
      lines.push(`    warning ${processed.qualifiedName}: ${warning}`);
    }
  }

  return lines;
}

export function formatRunSummary(report: RunReport): string {
  const skipped = report.files.reduce((count, file) => count + file.skipped.length, 0);
  const parts = [
    `${report.files.length} file${report.files.length === 1 ? '' : 's'}`,
    `${report.modifiedFiles} ${report.dryRun ? 'would change' : 'modified'}`,
    `${report.failedFiles} failed`,
    `${skipped} declaration${skipped === 1 ? '' : 's'} skipped`,
  ];
  return `${parts.join(', ')} (${report.durationMs}ms)`;
}

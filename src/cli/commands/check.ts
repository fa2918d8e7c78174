/**
 * check command - Report files whose docstrings are out of date
 */

import { Command } from 'commander';
import { DocstringPipeline } from '../../pipeline/index.js';
import { createLogger } from '../../logger/index.js';
import { discoverFiles } from '../discovery.js';
import { displayPath, formatFileReport } from '../format.js';
import { parseInteger, resolveConfig, type ConfigOverrides } from '../options.js';

interface CheckOptions extends Omit<ConfigOverrides, 'dryRun' | 'draft'> {
  json?: boolean;
  verbose?: boolean;
}

export const checkCommand = new Command('check')
  .description('List files whose docstrings would change, without writing')
  .argument('[paths...]', 'Files or directories to check', [])
  .option('-c, --config <path>', 'Path to config file')
  .option('--overwrite', 'Treat existing docstrings as replaceable')
  .option('--sections <names...>', 'Sections to emit (Args, Returns, Raises, Examples)')
  .option('--concurrency <n>', 'Files processed at once', parseInteger)
  .option('--private', 'Document _private declarations')
  .option('--no-private', 'Leave _private declarations alone')
  .option('--json', 'Output the run report as JSON', false)
  .option('--verbose', 'Show verbose output', false)
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      const config = await resolveConfig({ ...options, dryRun: true, draft: false });
      const files = await discoverFiles(paths, config);

      const logger = createLogger({ verbose: options.verbose, quiet: options.json });
      const report = await new DocstringPipeline({ config, logger }).processFiles(files);
      const stale = report.files.filter(f => f.modified);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        for (const file of stale) {
          console.log(`  would change  ${displayPath(file.filePath)}`);
        }
        for (const file of report.files.filter(f => f.status === 'failed')) {
          for (const line of formatFileReport(file)) console.log(line);
        }
        console.log(
          stale.length === 0 && report.success
            ? `All ${files.length} file${files.length === 1 ? '' : 's'} up to date.`
            : `${stale.length} file${stale.length === 1 ? '' : 's'} would change, ${report.failedFiles} failed.`
        );
      }

      if (stale.length > 0 || !report.success) {
        process.exit(1);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * generate command - Insert or refresh docstrings
 */

import { Command } from 'commander';
import { DocstringPipeline } from '../../pipeline/index.js';
import { createLogger } from '../../logger/index.js';
import { discoverFiles } from '../discovery.js';
import { formatFileReport, formatRunSummary } from '../format.js';
import { parseInteger, resolveConfig, type ConfigOverrides } from '../options.js';

interface GenerateOptions extends ConfigOverrides {
  json?: boolean;
  verbose?: boolean;
}

export const generateCommand = new Command('generate')
  .description('Generate structured docstrings for Python files')
  .argument('[paths...]', 'Files or directories to process', [])
  .option('-c, --config <path>', 'Path to config file')
  .option('--overwrite', 'Replace existing docstrings instead of keeping their written entries')
  .option('--sections <names...>', 'Sections to emit (Args, Returns, Raises, Examples)')
  .option('--dry-run', 'Report changes without writing files')
  .option('--draft', 'Write results to draft files beside the sources')
  .option('--concurrency <n>', 'Files processed at once', parseInteger)
  .option('--private', 'Document _private declarations')
  .option('--no-private', 'Leave _private declarations alone')
  .option('--json', 'Output the run report as JSON', false)
  .option('--verbose', 'Show verbose output', false)
  .action(async (paths: string[], options: GenerateOptions) => {
    try {
      const config = await resolveConfig(options);
      const files = await discoverFiles(paths, config);

      if (files.length === 0) {
        console.log('No Python files found.');
        return;
      }

      const logger = createLogger({ verbose: options.verbose, quiet: options.json });
      const pipeline = new DocstringPipeline({ config, logger });
      const report = await pipeline.processFiles(files);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        for (const file of report.files) {
          if (file.status === 'unchanged' && file.skipped.length === 0 && !options.verbose) continue;
          for (const line of formatFileReport(file)) console.log(line);
        }
        console.log(formatRunSummary(report));
      }

      if (!report.success) {
        process.exit(1);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

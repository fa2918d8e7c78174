/**
 * finalize command - Copy a reviewed draft over its source file
 */

import { Command } from 'commander';
import { finalizeDraft } from '../../pipeline/index.js';
import { resolveConfig } from '../options.js';
import { displayPath } from '../format.js';

interface FinalizeCommandOptions {
  config?: string;
  keepDraft?: boolean;
}

export const finalizeCommand = new Command('finalize')
  .description('Replace a source file with its draft')
  .argument('<draft>', 'Draft file written by `docsmith generate --draft`')
  .option('-c, --config <path>', 'Path to config file')
  .option('--keep-draft', 'Do not remove the draft file', false)
  .action(async (draft: string, options: FinalizeCommandOptions) => {
    try {
      const config = await resolveConfig({ config: options.config });
      const result = await finalizeDraft(draft, {
        keepDraft: options.keepDraft,
        draftExtension: config.draftExtension,
      });

      console.log(`Finalized ${displayPath(result.sourcePath)} from ${displayPath(result.draftPath)}`);
      if (result.draftRemoved) {
        console.log(`Draft ${displayPath(result.draftPath)} removed.`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

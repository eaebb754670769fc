/**
 * update command - apply changed paths to the saved cache.
 */
import { Command } from 'commander';
import { abortOnInterrupt, openProject, type ProjectOptions } from './shared.js';
import { formatUpdateSummary } from '../formatters/query.js';
import { logger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

interface UpdateOptions extends ProjectOptions {
  json?: boolean;
}

/**
 * Create the update command.
 */
export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Reindex changed, added or deleted files')
    .argument('<paths...>', 'Changed file paths')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('--strict', 'Reject files with malformed annotations')
    .option('--json', 'Output the update result as JSON')
    .option('-v, --verbose', 'Log per-phase details')
    .option('-q, --quiet', 'Only log warnings and errors')
    .action(async (paths: string[], options: UpdateOptions) => {
      const interrupt = abortOnInterrupt();
      try {
        const { store } = await openProject(options);
        await store.loadOrBuild(interrupt.signal);
        const result = await store.update(paths, interrupt.signal);
        await store.save();
        store.dispose();

        if (options.json) {
          const { reindexed, deleted, relinked } = result;
          console.log(JSON.stringify({ reindexed, deleted, relinked }, null, 2));
          return;
        }
        console.log(formatUpdateSummary(result));
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      } finally {
        interrupt.release();
      }
    });
}

/**
 * index command - full build of the annotation index.
 */
import { Command } from 'commander';
import { abortOnInterrupt, openProject, type ProjectOptions } from './shared.js';
import { formatIndexSummary } from '../formatters/query.js';
import { logger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

interface IndexOptions extends ProjectOptions {
  json?: boolean;
}

/**
 * Create the index command.
 */
export function createIndexCommand(): Command {
  return new Command('index')
    .description('Index @acp annotations and write the cache')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('--strict', 'Reject files with malformed annotations')
    .option('--json', 'Output a JSON summary')
    .option('-v, --verbose', 'Log per-phase details')
    .option('-q, --quiet', 'Only log warnings and errors')
    .action(async (options: IndexOptions) => {
      const interrupt = abortOnInterrupt();
      try {
        const { store } = await openProject(options);
        const root = await store.build(interrupt.signal);
        await store.save();
        store.dispose();

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                files: Object.keys(root.files).length,
                symbols: Object.keys(root.symbols).length,
                domains: Object.keys(root.domains).length,
                provenance: root.provenanceStats,
                constraints: root.constraintsIndex,
              },
              null,
              2
            )
          );
          return;
        }
        console.log(formatIndexSummary(root));
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      } finally {
        interrupt.release();
      }
    });
}

/**
 * watch command - keep the cache current while files change.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { openProject, type ProjectOptions } from './shared.js';
import { DEFAULT_DEBOUNCE_MS, watchProject } from '../../core/cache/watcher.js';
import { formatIndexSummary, formatUpdateSummary } from '../formatters/query.js';
import { logger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

interface WatchCommandOptions extends ProjectOptions {
  debounce?: string;
  poll?: boolean;
}

/**
 * Create the watch command.
 */
export function createWatchCommand(): Command {
  return new Command('watch')
    .description('Watch the project and update the cache on changes')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('--strict', 'Reject files with malformed annotations')
    .option('--debounce <ms>', 'Debounce delay in milliseconds', String(DEFAULT_DEBOUNCE_MS))
    .option('--no-poll', 'Use native file system events instead of polling')
    .option('-v, --verbose', 'Log per-phase details')
    .action(async (options: WatchCommandOptions) => {
      try {
        await runWatch(options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function timestamp(): string {
  return chalk.dim(`[${new Date().toLocaleTimeString()}]`);
}

async function runWatch(options: WatchCommandOptions): Promise<void> {
  const parsedDebounce = parseInt(options.debounce ?? String(DEFAULT_DEBOUNCE_MS), 10);
  const debounceMs = isNaN(parsedDebounce) || parsedDebounce < 0 ? DEFAULT_DEBOUNCE_MS : parsedDebounce;
  const { projectRoot, store } = await openProject(options);

  console.log();
  console.log(chalk.bold.cyan('ACP Watch Mode'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim(`Root:     ${projectRoot}`));
  console.log(chalk.dim(`Cache:    ${store.cachePath}`));
  console.log(chalk.dim(`Debounce: ${debounceMs}ms`));
  console.log(chalk.dim('Press Ctrl+C to stop'));
  console.log();

  const root = await store.loadOrBuild();
  await store.save();
  console.log(formatIndexSummary(root));

  const watcher = await watchProject(store, {
    debounceMs,
    usePolling: options.poll ?? true,
    onUpdate: (result) => {
      console.log(timestamp(), formatUpdateSummary(result));
    },
    onError: (error) => {
      log.error(`Watcher error: ${errorMessage(error)}`);
    },
  });
  console.log(timestamp(), chalk.green('✓ Watching for file changes...'));

  process.on('SIGINT', () => {
    console.log();
    console.log(chalk.dim('Stopping watch mode...'));
    watcher
      .close()
      .then(() => {
        store.dispose();
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error(errorMessage(error));
        process.exit(1);
      });
  });
}

/**
 * query command - look up symbols, files, domains and edges in the cache.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { openProject, type ProjectOptions } from './shared.js';
import { QueryEngine, queryOptionsFromConfig } from '../../core/query/engine.js';
import { QUERY_OPERATIONS, QueryOperationSchema, toQueryResponse } from '../../core/query/dispatch.js';
import type { QueryResult } from '../../core/query/types.js';
import { createDiskProbe } from '../../core/cache/staleness.js';
import {
  formatDomain,
  formatFile,
  formatNames,
  formatQueryFailure,
  formatSearch,
  formatStats,
  formatSymbol,
} from '../formatters/query.js';
import { logger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

interface QueryCommandOptions extends ProjectOptions {
  limit?: string;
  bestEffort?: boolean;
  json?: boolean;
}

/**
 * Print a result; returns false for anything but `ok`.
 */
function emit<T>(result: QueryResult<T>, format: (value: T) => string, json: boolean): boolean {
  if (json) {
    console.log(JSON.stringify(toQueryResponse(result), null, 2));
    return result.status === 'ok';
  }
  if (result.status !== 'ok') {
    console.log(formatQueryFailure(result));
    return false;
  }
  if (result.stale) {
    console.log(chalk.yellow(`(stale: ${(result.staleFiles ?? []).join(', ')})`));
  }
  console.log(format(result.value));
  return true;
}

/**
 * Create the query command.
 */
export function createQueryCommand(): Command {
  return new Command('query')
    .description(`Query the index (${QUERY_OPERATIONS.join(', ')})`)
    .argument('<type>', 'Query type')
    .argument('[name]', 'Symbol, file, domain name or search pattern')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('-l, --limit <n>', 'Maximum search matches')
    .option('--best-effort', 'Answer from a stale cache, flagging stale files')
    .option('--json', 'Output the protocol response as JSON')
    .option('-v, --verbose', 'Log per-phase details')
    .action(async (type: string, name: string | undefined, options: QueryCommandOptions) => {
      try {
        const op = QueryOperationSchema.safeParse(type);
        if (!op.success) {
          throw new Error(`Unknown query type "${type}". Expected one of: ${QUERY_OPERATIONS.join(', ')}`);
        }
        if (op.data !== 'stats' && name === undefined) {
          throw new Error(`Query type "${op.data}" needs a name`);
        }
        const limit = options.limit === undefined ? undefined : parseInt(options.limit, 10);
        if (limit !== undefined && (isNaN(limit) || limit < 0)) {
          throw new Error(`Invalid --limit: ${options.limit}`);
        }

        const { projectRoot, config, store } = await openProject({ ...options, quiet: !options.verbose });
        const root = await store.loadOrBuild();
        store.dispose();
        const engine = new QueryEngine(root, createDiskProbe(projectRoot), {
          ...queryOptionsFromConfig(config),
          ...(options.bestEffort ? { bestEffort: true } : {}),
        });

        const target = name ?? '';
        const json = options.json ?? false;
        let ok = false;
        switch (op.data) {
          case 'symbol':
            ok = emit(await engine.symbol(target), formatSymbol, json);
            break;
          case 'file':
            ok = emit(await engine.file(target), formatFile, json);
            break;
          case 'domain':
            ok = emit(await engine.domain(target), formatDomain, json);
            break;
          case 'callers':
            ok = emit(await engine.callers(target), formatNames, json);
            break;
          case 'callees':
            ok = emit(await engine.callees(target), formatNames, json);
            break;
          case 'search':
            ok = emit(await engine.search(target, limit), formatSearch, json);
            break;
          case 'stats':
            ok = emit(await engine.stats(), formatStats, json);
            break;
        }
        if (!ok) process.exitCode = 1;
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

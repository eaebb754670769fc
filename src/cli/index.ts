/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createIndexCommand } from './commands/index-command.js';
import { createUpdateCommand } from './commands/update.js';
import { createQueryCommand } from './commands/query.js';
import { createWatchCommand } from './commands/watch.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('acp')
    .description('Index @acp annotations and query the resulting cache')
    .version(VERSION);
  [createIndexCommand, createUpdateCommand, createQueryCommand, createWatchCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}

/**
 * Option handling shared by the commands.
 */
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { CacheStore } from '../../core/cache/store.js';
import { logger } from '../../utils/logger.js';

export interface ProjectOptions {
  config?: string;
  root?: string;
  strict?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface OpenProject {
  projectRoot: string;
  config: Config;
  store: CacheStore;
}

export async function openProject(options: ProjectOptions): Promise<OpenProject> {
  if (options.verbose) logger.setLevel('debug');
  else if (options.quiet) logger.setLevel('warn');

  const projectRoot = path.resolve(options.root ?? process.cwd());
  const loaded = await loadConfig(projectRoot, options.config);
  const config: Config = options.strict
    ? { ...loaded, annotations: { ...loaded.annotations, mode: 'strict' } }
    : loaded;
  return { projectRoot, config, store: new CacheStore(projectRoot, config) };
}

/**
 * Abort the signal on the first Ctrl+C; the caller removes the handler.
 */
export function abortOnInterrupt(): { signal: AbortSignal; release(): void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    release: () => process.removeListener('SIGINT', onInterrupt),
  };
}

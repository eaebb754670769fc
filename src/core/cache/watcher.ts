/**
 * File watching: chokidar events, debounced into batches and applied to a
 * store's serialized update queue.
 */
import * as path from 'node:path';
import chokidar from 'chokidar';
import type { CacheStore } from './store.js';
import type { UpdateResult } from './incremental.js';
import { loadProjectFilter, type ProjectFilter } from './scanner.js';
import { toProjectPath } from '../../utils/file-system.js';
import { compareStrings } from '../../utils/collections.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('watch');

export const DEFAULT_DEBOUNCE_MS = 300;

/**
 * Collects paths and flushes them once no new path arrived for the
 * debounce window.
 */
export class ChangeBatcher {
  private pending = new Set<string>();
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly debounceMs: number,
    private readonly flush: (paths: string[]) => Promise<void>,
    private readonly onError: (error: unknown) => void
  ) {}

  add(projectPath: string): void {
    this.pending.add(projectPath);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fire().catch(this.onError);
    }, this.debounceMs);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Flush now instead of waiting for the timer. */
  async drain(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.fire();
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pending.clear();
  }

  private async fire(): Promise<void> {
    if (this.pending.size === 0) return;
    const paths = [...this.pending].sort(compareStrings);
    this.pending.clear();
    await this.flush(paths);
  }
}

export interface WatchOptions {
  debounceMs?: number;
  /** Called after every applied batch */
  onUpdate?: (result: UpdateResult) => void | Promise<void>;
  /** Called for failed batches and watcher errors (default: logged) */
  onError?: (error: unknown) => void;
  /** Poll instead of native events (default: true) */
  usePolling?: boolean;
}

export interface ProjectWatcher {
  close(): Promise<void>;
}

/**
 * Watch a project and feed changed paths to `store.update`.
 */
export async function watchProject(store: CacheStore, options: WatchOptions = {}): Promise<ProjectWatcher> {
  const root = store.projectRoot;
  const filter: ProjectFilter = await loadProjectFilter(root, store.config);
  const onError = options.onError ?? ((error: unknown) => log.error(`Update failed: ${errorMessage(error)}`));

  const batcher = new ChangeBatcher(
    options.debounceMs ?? DEFAULT_DEBOUNCE_MS,
    async (paths) => {
      const result = await store.update(paths);
      await store.save();
      await options.onUpdate?.(result);
    },
    onError
  );

  const watcher = chokidar.watch(root, {
    ignored: (filePath: string) => {
      const relative = toProjectPath(root, filePath);
      return /(^|\/)(node_modules|\.git)(\/|$)/.test(relative);
    },
    ignoreInitial: true,
    persistent: true,
    usePolling: options.usePolling ?? true,
    interval: 500,
  });

  const onPath = (filePath: string): void => {
    const relative = toProjectPath(root, path.resolve(root, filePath));
    if (filter.matches(relative)) batcher.add(relative);
  };

  watcher
    .on('add', onPath)
    .on('change', onPath)
    .on('unlink', onPath)
    .on('error', onError);

  return {
    async close(): Promise<void> {
      batcher.cancel();
      await watcher.close();
    },
  };
}

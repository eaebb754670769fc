/**
 * CacheStore - owns the published index of one project.
 *
 * Builds and updates run one at a time; each publishes a deep-frozen
 * snapshot. A failed or cancelled run leaves the previous snapshot in place.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import type { ExtractorRegistry } from '../extract/registry.js';
import { createDefaultRegistry } from '../extract/register.js';
import { buildCache } from './builder.js';
import { deserializeCache, serializeCache } from './codec.js';
import { updateCache, type UpdateResult } from './incremental.js';
import type { CacheRoot } from './types.js';
import { CacheError, ErrorCodes } from '../../utils/errors.js';
import { readFileIfExists, writeFileAtomic } from '../../utils/file-system.js';
import { deepFreeze } from '../../utils/collections.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('cache');

export interface CacheStoreOptions {
  registry?: ExtractorRegistry;
}

export class CacheStore {
  private snapshot: CacheRoot | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly registry: ExtractorRegistry;

  constructor(
    readonly projectRoot: string,
    readonly config: Config,
    options: CacheStoreOptions = {}
  ) {
    this.registry = options.registry ?? createDefaultRegistry();
  }

  get cachePath(): string {
    return path.resolve(this.projectRoot, this.config.cache.path);
  }

  /** The published snapshot, if any. */
  get current(): CacheRoot | null {
    return this.snapshot;
  }

  /**
   * Load the persisted cache. Returns null when there is none; an
   * incompatible document throws CacheError.
   */
  load(): Promise<CacheRoot | null> {
    return this.enqueue(async () => {
      const content = await readFileIfExists(this.cachePath);
      if (content === null) return null;
      return this.publish(deserializeCache(content));
    });
  }

  /**
   * Load the persisted cache, rebuilding when it is missing or incompatible.
   */
  async loadOrBuild(signal?: AbortSignal): Promise<CacheRoot> {
    try {
      const loaded = await this.load();
      if (loaded) return loaded;
    } catch (error) {
      if (!(error instanceof CacheError) || error.code !== ErrorCodes.INCOMPATIBLE_CACHE) throw error;
      log.warn(`Discarding cache: ${error.message}`);
    }
    return this.build(signal);
  }

  build(signal?: AbortSignal): Promise<CacheRoot> {
    return this.enqueue(async () => {
      const root = await buildCache(this.projectRoot, this.config, {
        registry: this.registry,
        ...(signal ? { signal } : {}),
      });
      return this.publish(root);
    });
  }

  /**
   * Apply changed paths to the published snapshot. Without a snapshot this
   * is a full build.
   */
  update(changedPaths: string[], signal?: AbortSignal): Promise<UpdateResult> {
    return this.enqueue(async () => {
      const previous = this.snapshot;
      if (!previous) {
        const root = await buildCache(this.projectRoot, this.config, {
          registry: this.registry,
          ...(signal ? { signal } : {}),
        });
        return { root: this.publish(root), reindexed: Object.keys(root.files), deleted: [], relinked: [] };
      }
      const result = await updateCache(previous, this.projectRoot, changedPaths, this.config, {
        registry: this.registry,
        ...(signal ? { signal } : {}),
      });
      return { ...result, root: this.publish(result.root) };
    });
  }

  /**
   * Write the published snapshot atomically.
   */
  save(): Promise<void> {
    return this.enqueue(async () => {
      if (!this.snapshot) {
        throw new CacheError(ErrorCodes.INCOMPATIBLE_CACHE, 'Nothing to save: no index has been built or loaded');
      }
      await writeFileAtomic(this.cachePath, serializeCache(this.snapshot));
      log.debug(`Saved cache to ${this.cachePath}`);
    });
  }

  dispose(): void {
    this.registry.disposeAll();
  }

  private publish(root: CacheRoot): CacheRoot {
    this.snapshot = deepFreeze(root);
    return this.snapshot;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Failures reach the caller through `run`; the queue only orders work
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Cache module exports.
 */
export * from './types.js';
export { CacheRootSchema } from './schema.js';
export { stableStringify, serializeCache, deserializeCache } from './codec.js';
export { buildCache, assembleRoot, indexFiles, indexOptionsFromConfig, type IndexRunOptions } from './builder.js';
export { updateCache, restoreIndexedFile, importStatementsOf, type UpdateResult } from './incremental.js';
export { buildDomains, buildConstraintsIndex, buildProvenanceStats } from './reductions.js';
export { scanProject, createProjectFilter, loadProjectFilter, type ProjectFilter } from './scanner.js';
export { checkStaleness, createDiskProbe, type FileProbe, type StalenessReport } from './staleness.js';
export { CacheStore, type CacheStoreOptions } from './store.js';
export { ChangeBatcher, watchProject, DEFAULT_DEBOUNCE_MS, type WatchOptions, type ProjectWatcher } from './watcher.js';

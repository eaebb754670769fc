export * from './file-indexer.js';
export * from './pool.js';

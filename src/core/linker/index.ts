export * from './resolve-module.js';
export * from './tables.js';
export * from './linker.js';

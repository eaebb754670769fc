/**
 * ACP index - library exports.
 */

// Configuration
export * from './core/config/index.js';

// Annotations and provenance
export * from './core/annotations/index.js';
export * from './core/provenance/index.js';

// Constraints
export * from './core/constraints/index.js';

// Diagnostics
export * from './core/diagnostics/index.js';

// Structural extraction
export * from './core/extract/index.js';

// Indexing and linking
export * from './core/indexer/index.js';
export * from './core/linker/index.js';

// Cache
export * from './core/cache/index.js';

// Queries
export * from './core/query/index.js';

// Errors and logging
export { AcpError, ConfigError, AnnotationError, CacheError, SystemError, ErrorCodes, type ErrorCode } from './utils/errors.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';

/**
 * Full builds and the shared assembly step that turns indexed files into a
 * CacheRoot.
 */
import type { Config } from '../config/schema.js';
import type { ExtractorRegistry } from '../extract/registry.js';
import { createDefaultRegistry } from '../extract/register.js';
import { indexFile, type FileIndexOptions, type IndexedFile } from '../indexer/file-indexer.js';
import { defaultConcurrency, processInBatches, throwIfAborted } from '../indexer/pool.js';
import { LinkTables, type LinkUnit } from '../linker/tables.js';
import { linkUnit, reduceReverseEdges } from '../linker/linker.js';
import { buildConstraintsIndex, buildDomains, buildProvenanceStats } from './reductions.js';
import { scanProject } from './scanner.js';
import { CACHE_SCHEMA_VERSION, type CacheRoot, type FileEntry, type SymbolEntry } from './types.js';
import { fromProjectPath, readFile } from '../../utils/file-system.js';
import { compareStrings } from '../../utils/collections.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('index');

export interface IndexRunOptions {
  registry?: ExtractorRegistry;
  signal?: AbortSignal;
}

export function indexOptionsFromConfig(config: Config, registry: ExtractorRegistry): FileIndexOptions {
  return {
    registry,
    mode: config.annotations.mode,
    reviewThreshold: config.annotations.review_threshold,
    customNamespaces: new Set(config.annotations.custom_namespaces),
  };
}

/**
 * Read and index files concurrently. Paths are project-relative.
 */
export async function indexFiles(
  projectRoot: string,
  paths: string[],
  config: Config,
  options: IndexRunOptions & { registry: ExtractorRegistry }
): Promise<IndexedFile[]> {
  const indexOptions = indexOptionsFromConfig(config, options.registry);
  return processInBatches(
    paths,
    config.indexing.concurrency ?? defaultConcurrency(),
    async (projectPath) => {
      const text = await readFile(fromProjectPath(projectRoot, projectPath));
      return indexFile(projectPath, text, indexOptions);
    },
    options.signal
  );
}

/**
 * Index every file of a project from scratch.
 */
export async function buildCache(projectRoot: string, config: Config, options: IndexRunOptions = {}): Promise<CacheRoot> {
  const registry = options.registry ?? createDefaultRegistry();
  const started = Date.now();

  const paths = await scanProject(projectRoot, config);
  log.debug(`Scanned ${paths.length} files`);
  throwIfAborted(options.signal);

  const indexed = await indexFiles(projectRoot, paths, config, { ...options, registry });
  log.debug(`Indexed ${indexed.length} files in ${Date.now() - started}ms`);

  const root = assembleRoot(indexed, () => true);
  throwIfAborted(options.signal);
  log.debug(`Linked ${Object.keys(root.symbols).length} symbols in ${Date.now() - started}ms`);
  logDiagnosticCounts(root);
  return root;
}

export function toLinkUnit(indexed: IndexedFile): LinkUnit {
  return {
    path: indexed.path,
    language: indexed.file.language,
    symbols: indexed.symbols,
    exports: indexed.file.exports,
    imports: indexed.imports,
    calls: indexed.file.calls,
  };
}

/**
 * Link and reduce. Files for which `relink` is false keep the forward
 * edges they already carry.
 */
export function assembleRoot(indexed: IndexedFile[], relink: (path: string) => boolean): CacheRoot {
  const ordered = [...indexed].sort((a, b) => compareStrings(a.path, b.path));
  const tables = new LinkTables(ordered.map(toLinkUnit));

  const files: Record<string, FileEntry> = {};
  const symbols: Record<string, SymbolEntry> = {};
  const contentHashes: Record<string, string> = {};

  for (const unit of ordered) {
    if (relink(unit.path)) {
      const linked = linkUnit(toLinkUnit(unit), tables);
      unit.file.imports = linked.imports;
      for (const symbol of unit.symbols) {
        symbol.callees = linked.callees.get(symbol.qualifiedName) ?? [];
      }
    }
    files[unit.path] = unit.file;
    for (const symbol of unit.symbols) symbols[symbol.qualifiedName] = symbol;
    contentHashes[unit.path] = unit.hash;
  }

  reduceReverseEdges(files, symbols);

  return {
    schemaVersion: CACHE_SCHEMA_VERSION,
    files,
    symbols,
    domains: buildDomains(files, symbols),
    constraintsIndex: buildConstraintsIndex(files),
    provenanceStats: buildProvenanceStats(files, symbols),
    contentHashes,
  };
}

export function logDiagnosticCounts(root: CacheRoot): void {
  let errors = 0;
  let warnings = 0;
  for (const file of Object.values(root.files)) {
    for (const diagnostic of file.diagnostics ?? []) {
      if (diagnostic.severity === 'error') errors++;
      else if (diagnostic.severity === 'warning') warnings++;
    }
  }
  if (errors > 0 || warnings > 0) {
    log.info(`${errors} error and ${warnings} warning diagnostics`);
  }
}

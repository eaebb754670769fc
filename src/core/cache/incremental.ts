/**
 * Incremental update of a CacheRoot from a list of changed paths.
 *
 * Only changed and new files are parsed again. Pass 2 runs for those files,
 * for importers of changed or deleted files (transitively through files
 * that re-export), for files sharing a package directory with one, and for
 * files whose import targets differ under the new file set.
 */
import { posix } from 'node:path';
import type { Config } from '../config/schema.js';
import type { ImportStatement } from '../extract/types.js';
import { createDefaultRegistry } from '../extract/register.js';
import type { IndexedFile } from '../indexer/file-indexer.js';
import { throwIfAborted } from '../indexer/pool.js';
import { LinkTables } from '../linker/tables.js';
import { assembleRoot, indexFiles, logDiagnosticCounts, toLinkUnit, type IndexRunOptions } from './builder.js';
import { loadProjectFilter } from './scanner.js';
import { EXTERNAL, type CacheRoot, type FileEntry, type ImportEntry } from './types.js';
import { computeChecksum } from '../../utils/checksum.js';
import { fromProjectPath, readFileIfExists, toProjectPath } from '../../utils/file-system.js';
import { compareStrings } from '../../utils/collections.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('update');

const PACKAGE_SCOPED = new Set(['go', 'java']);

interface StatementTargets {
  statement: ImportStatement;
  targets: string[];
}

/**
 * Recover the import statements of a linked file together with the targets
 * they resolved to. Consecutive entries of one statement share line,
 * specifier and binding shape and never repeat a target.
 */
export function importStatementsOf(entries: ImportEntry[]): StatementTargets[] {
  const result: StatementTargets[] = [];
  let currentKey: string | null = null;
  let seen = new Set<string>();

  for (const entry of entries) {
    const key = `${entry.line}\0${entry.specifier}\0${entry.namespaceAlias ?? ''}\0${entry.wildcard ? '*' : ''}`;
    const last = result[result.length - 1];
    if (!last || key !== currentKey || seen.has(entry.target)) {
      result.push({
        statement: {
          specifier: entry.specifier,
          line: entry.line,
          names: entry.names.map(({ name, local }) => ({ name, local })),
          ...(entry.namespaceAlias !== undefined ? { namespaceAlias: entry.namespaceAlias } : {}),
          ...(entry.wildcard ? { wildcard: true } : {}),
        },
        targets: [],
      });
      currentKey = key;
      seen = new Set();
    }
    seen.add(entry.target);
    const current = result[result.length - 1];
    if (current && entry.target !== EXTERNAL) current.targets.push(entry.target);
  }
  return result;
}

/**
 * A mutable copy of a stored file, in the shape the indexer produces.
 */
export function restoreIndexedFile(root: CacheRoot, path: string): IndexedFile | null {
  const stored = root.files[path];
  const hash = root.contentHashes[path];
  if (!stored || hash === undefined) return null;
  const file = structuredClone(stored);
  const symbols = file.symbols.flatMap((name) => {
    const symbol = root.symbols[name];
    return symbol ? [structuredClone(symbol)] : [];
  });
  return {
    path,
    hash,
    file,
    symbols,
    imports: importStatementsOf(file.imports).map(({ statement }) => statement),
  };
}

function reexports(file: FileEntry, symbolNames: Set<string>): boolean {
  return file.exports.some((row) => row.from !== undefined || !symbolNames.has(`${file.path}:${row.local ?? row.name}`));
}

export interface UpdateResult {
  root: CacheRoot;
  reindexed: string[];
  deleted: string[];
  relinked: string[];
}

/**
 * Apply changed paths (added, modified or deleted, absolute or
 * project-relative) to a root. The result equals a full build of the
 * post-edit project.
 */
export async function updateCache(
  previous: CacheRoot,
  projectRoot: string,
  changedPaths: string[],
  config: Config,
  options: IndexRunOptions = {}
): Promise<UpdateResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const filter = await loadProjectFilter(projectRoot, config);

  const toReindex: string[] = [];
  const deleted: string[] = [];
  const candidates = [...new Set(changedPaths.map((p) => toProjectPath(projectRoot, p)))].sort(compareStrings);

  for (const path of candidates) {
    throwIfAborted(options.signal);
    const text = filter.matches(path) ? await readFileIfExists(fromProjectPath(projectRoot, path)) : null;
    if (text === null) {
      if (previous.files[path]) deleted.push(path);
      continue;
    }
    if (previous.contentHashes[path] !== computeChecksum(text)) toReindex.push(path);
  }

  if (toReindex.length === 0 && deleted.length === 0) {
    return { root: previous, reindexed: [], deleted: [], relinked: [] };
  }

  const fresh = await indexFiles(projectRoot, toReindex, config, { ...options, registry });
  const changed = new Set([...toReindex, ...deleted]);

  const units = new Map<string, IndexedFile>();
  for (const path of Object.keys(previous.files)) {
    if (changed.has(path)) continue;
    const restored = restoreIndexedFile(previous, path);
    if (restored) units.set(path, restored);
  }
  for (const indexed of fresh) units.set(indexed.path, indexed);

  const affected = affectedFiles(previous, units, toReindex, deleted);
  throwIfAborted(options.signal);

  const root = assembleRoot([...units.values()], (path) => affected.has(path));
  throwIfAborted(options.signal);

  const relinked = [...affected].filter((path) => units.has(path)).sort(compareStrings);
  log.debug(`Reindexed ${toReindex.length}, deleted ${deleted.length}, relinked ${relinked.length} files`);
  logDiagnosticCounts(root);
  return { root, reindexed: toReindex, deleted, relinked };
}

function affectedFiles(
  previous: CacheRoot,
  units: Map<string, IndexedFile>,
  reindexed: string[],
  deleted: string[]
): Set<string> {
  const affected = new Set<string>(reindexed);
  const previousSymbols = new Set(Object.keys(previous.symbols));

  // Importers, through re-exporting files
  const queue = [...reindexed, ...deleted];
  const visited = new Set(queue);
  while (queue.length > 0) {
    const path = queue.shift();
    if (path === undefined) break;
    for (const importer of previous.files[path]?.importedBy ?? []) {
      affected.add(importer);
      const importerFile = previous.files[importer];
      if (!visited.has(importer) && importerFile && reexports(importerFile, previousSymbols)) {
        visited.add(importer);
        queue.push(importer);
      }
    }
  }

  const tables = new LinkTables([...units.values()].map(toLinkUnit));

  // Files sharing a package directory with a changed file
  for (const path of [...reindexed, ...deleted]) {
    const language = units.get(path)?.file.language ?? previous.files[path]?.language ?? '';
    if (!PACKAGE_SCOPED.has(language)) continue;
    for (const sibling of tables.files.inDirectory(posix.dirname(path))) {
      if (units.get(sibling)?.file.language === language) affected.add(sibling);
    }
  }

  // Files whose imports now resolve elsewhere
  for (const [path, unit] of units) {
    if (affected.has(path)) continue;
    for (const { statement, targets } of importStatementsOf(unit.file.imports)) {
      const now = tables.resolveModule(statement, path);
      if (now.length !== targets.length || now.some((target, i) => target !== targets[i])) {
        affected.add(path);
        break;
      }
    }
  }

  return affected;
}

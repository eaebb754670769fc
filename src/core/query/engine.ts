/**
 * QueryEngine - read-only lookups over one published CacheRoot.
 *
 * Every query first compares recorded content hashes with the files the
 * probe sees. Stale snapshots fail with `stale` unless best-effort mode is
 * on, in which case results carry the stale paths.
 */
import type { Config } from '../config/schema.js';
import type { LockLevel } from '../annotations/types.js';
import { effectiveConstraint } from '../constraints/resolver.js';
import { displayName } from '../indexer/file-indexer.js';
import type { CacheRoot, DomainEntry, FileEntry, SymbolEntry } from '../cache/types.js';
import { checkStaleness, type FileProbe } from '../cache/staleness.js';
import { compareStrings, ownValue, sortedEntries } from '../../utils/collections.js';
import type {
  ProjectStats,
  QueryAmbiguous,
  QueryNotFound,
  QueryOptions,
  QueryResult,
  SearchMatch,
  SearchResult,
  SymbolView,
} from './types.js';

type Lookup<T> = { status: 'ok'; value: T } | QueryNotFound | QueryAmbiguous;

export function queryOptionsFromConfig(config: Config): Required<QueryOptions> {
  return {
    bestEffort: config.query.best_effort,
    caseSensitive: config.query.case_sensitive,
    defaultLimit: config.query.default_limit,
  };
}

function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.\//, '');
}

export class QueryEngine {
  private readonly bestEffort: boolean;
  private readonly caseSensitive: boolean;
  private readonly defaultLimit: number;

  constructor(
    private readonly root: CacheRoot,
    private readonly probe: FileProbe,
    options: QueryOptions = {}
  ) {
    this.bestEffort = options.bestEffort ?? false;
    this.caseSensitive = options.caseSensitive ?? true;
    this.defaultLimit = options.defaultLimit ?? 20;
  }

  /**
   * Find a symbol by qualified name, else by simple or `Container.member` name.
   */
  symbol(name: string): Promise<QueryResult<SymbolView>> {
    return this.guarded(() => {
      const found = this.findSymbol(name);
      if (found.status !== 'ok') return found;
      const entry = found.value;
      const file = ownValue(this.root.files, entry.file);
      if (!file) return { status: 'not_found', name };
      return { status: 'ok', value: { ...entry, effectiveConstraint: effectiveConstraint(entry.constraint, file.constraint) } };
    });
  }

  file(path: string): Promise<QueryResult<FileEntry>> {
    return this.guarded(() => {
      const entry = ownValue(this.root.files, normalizePath(path));
      return entry ? { status: 'ok', value: entry } : { status: 'not_found', name: path };
    });
  }

  domain(name: string): Promise<QueryResult<DomainEntry>> {
    return this.guarded(() => {
      const entry = ownValue(this.root.domains, name);
      return entry ? { status: 'ok', value: entry } : { status: 'not_found', name };
    });
  }

  /** Qualified names of the symbols calling `name`. */
  callers(name: string): Promise<QueryResult<string[]>> {
    return this.guarded(() => {
      const found = this.findSymbol(name);
      return found.status === 'ok' ? { status: 'ok', value: [...found.value.callers] } : found;
    });
  }

  /** Qualified names (or `external`) that `name` calls. */
  callees(name: string): Promise<QueryResult<string[]>> {
    return this.guarded(() => {
      const found = this.findSymbol(name);
      return found.status === 'ok' ? { status: 'ok', value: [...found.value.callees] } : found;
    });
  }

  /**
   * Substring search over symbol names and purposes, then file paths and
   * purposes.
   */
  search(pattern: string, limit: number = this.defaultLimit): Promise<QueryResult<SearchResult>> {
    return this.guarded(() => {
      const needle = this.fold(pattern);
      const hit = (text: string | undefined): boolean => text !== undefined && this.fold(text).includes(needle);
      const matches: SearchMatch[] = [];

      for (const [qualifiedName, entry] of sortedEntries(this.root.symbols)) {
        if (hit(entry.name) || hit(displayName(entry)) || hit(entry.purpose)) {
          matches.push({
            kind: 'symbol',
            qualifiedName,
            name: displayName(entry),
            file: entry.file,
            ...(entry.purpose !== undefined ? { purpose: entry.purpose } : {}),
          });
        }
      }
      for (const [path, entry] of sortedEntries(this.root.files)) {
        if (hit(path) || hit(entry.purpose)) {
          matches.push({ kind: 'file', path, ...(entry.purpose !== undefined ? { purpose: entry.purpose } : {}) });
        }
      }

      const bound = Math.max(0, limit);
      return {
        status: 'ok',
        value: { matches: matches.slice(0, bound), total: matches.length, truncated: matches.length > bound },
      };
    });
  }

  stats(): Promise<QueryResult<ProjectStats>> {
    return this.guarded(() => {
      const files = Object.values(this.root.files);
      const constraintCounts: Record<LockLevel, number> = {
        frozen: 0,
        restricted: 0,
        'approval-required': 0,
        'tests-required': 0,
        'docs-required': 0,
        normal: 0,
      };
      const languageBreakdown: Record<string, number> = {};
      let lineCount = 0;

      for (const file of files) {
        constraintCounts[file.constraint.level] += 1;
        languageBreakdown[file.language] = (languageBreakdown[file.language] ?? 0) + 1;
        lineCount += file.lines;
      }

      return {
        status: 'ok',
        value: {
          fileCount: files.length,
          symbolCount: Object.keys(this.root.symbols).length,
          lineCount,
          domainCount: Object.keys(this.root.domains).length,
          constraintCounts,
          languageBreakdown: Object.fromEntries(sortedEntries(languageBreakdown)),
        },
      };
    });
  }

  private findSymbol(name: string): Lookup<SymbolEntry> {
    const exact = ownValue(this.root.symbols, name);
    if (exact) return { status: 'ok', value: exact };

    const candidates = Object.values(this.root.symbols)
      .filter((entry) => entry.name === name || displayName(entry) === name)
      .map((entry) => entry.qualifiedName)
      .sort(compareStrings);

    const [only] = candidates;
    if (only === undefined) return { status: 'not_found', name };
    if (candidates.length > 1) return { status: 'ambiguous', name, candidates };
    const entry = ownValue(this.root.symbols, only);
    return entry ? { status: 'ok', value: entry } : { status: 'not_found', name };
  }

  private fold(text: string): string {
    return this.caseSensitive ? text : text.toLowerCase();
  }

  private async guarded<T>(compute: () => QueryResult<T>): Promise<QueryResult<T>> {
    const report = await checkStaleness(this.root, this.probe);
    if (report.stale && !this.bestEffort) {
      return { status: 'stale', staleFiles: report.staleFiles };
    }
    const result = compute();
    if (report.stale && result.status === 'ok') {
      return { ...result, stale: true, staleFiles: report.staleFiles };
    }
    return result;
  }
}

/**
 * Typed query results. Lookups never throw for absent or ambiguous names.
 */
import type { LockLevel } from '../annotations/types.js';
import type { EffectiveConstraint } from '../constraints/resolver.js';
import type { SymbolEntry } from '../cache/types.js';

export interface QueryOk<T> {
  status: 'ok';
  value: T;
  /** Present in best-effort mode when recorded files changed */
  stale?: true;
  staleFiles?: string[];
}

export interface QueryNotFound {
  status: 'not_found';
  name: string;
}

export interface QueryAmbiguous {
  status: 'ambiguous';
  name: string;
  /** Qualified names, sorted */
  candidates: string[];
}

export interface QueryStale {
  status: 'stale';
  staleFiles: string[];
}

export type QueryResult<T> = QueryOk<T> | QueryNotFound | QueryAmbiguous | QueryStale;

export type SymbolView = SymbolEntry & { effectiveConstraint: EffectiveConstraint };

export type SearchMatch =
  | { kind: 'symbol'; qualifiedName: string; name: string; file: string; purpose?: string }
  | { kind: 'file'; path: string; purpose?: string };

export interface SearchResult {
  matches: SearchMatch[];
  total: number;
  truncated: boolean;
}

export interface ProjectStats {
  fileCount: number;
  symbolCount: number;
  lineCount: number;
  domainCount: number;
  constraintCounts: Record<LockLevel, number>;
  languageBreakdown: Record<string, number>;
}

export interface QueryOptions {
  /** Serve stale results flagged as stale instead of failing */
  bestEffort?: boolean;
  caseSensitive?: boolean;
  defaultLimit?: number;
}

/**
 * Types for the persisted project index.
 * The cache is stored as `.acp.cache.json` by default.
 */
import type { AnnotationMap, LineSpan, LockLevel, ProvenanceOrigin } from '../annotations/types.js';
import type { Constraint } from '../constraints/resolver.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { ExportRow, SymbolKind } from '../extract/types.js';

/** Bumped on any incompatible change of the document shape */
export const CACHE_SCHEMA_VERSION = '1.0';

export const DEFAULT_CACHE_PATH = '.acp.cache.json';

/** Placeholder for an edge whose target lies outside the project */
export const EXTERNAL = 'external';

export interface SymbolEntry {
  qualifiedName: string;
  name: string;
  kind: SymbolKind;
  file: string;
  lineSpan: LineSpan;
  exported: boolean;
  container?: string;
  signature?: string;
  purpose?: string;
  /** Own constraint; null inherits the file constraint at query time */
  constraint: Constraint | null;
  annotations: AnnotationMap;
  callers: string[];
  callees: string[];
}

export interface InlineMarker {
  namespace: string;
  line: number;
  directive: string;
  value?: string;
  /** Qualified name of the owning symbol */
  symbol?: string;
}

export interface ImportedNameEntry {
  name: string;
  local: string;
  /** Qualified name, or `external` */
  symbol: string;
}

/**
 * One resolved import statement. A statement that resolves to several
 * files (a Go package) has one entry per file.
 */
export interface ImportEntry {
  specifier: string;
  line: number;
  /** Project path, or `external` */
  target: string;
  names: ImportedNameEntry[];
  namespaceAlias?: string;
  wildcard?: boolean;
}

/** A direct call site kept for relinking. */
export interface CallRecord {
  callee: string;
  line: number;
  /** Qualified name of the innermost enclosing symbol */
  caller?: string;
}

export interface FileEntry {
  path: string;
  language: string;
  lines: number;
  module?: string;
  summary?: string;
  purpose?: string;
  owner?: string;
  layer?: string;
  domains: string[];
  constraint: Constraint;
  annotations: AnnotationMap;
  /** Qualified names in declaration order */
  symbols: string[];
  inline: InlineMarker[];
  exports: ExportRow[];
  imports: ImportEntry[];
  importedBy: string[];
  calls: CallRecord[];
  diagnostics?: Diagnostic[];
}

export interface DomainEntry {
  name: string;
  description?: string;
  files: string[];
  symbols: string[];
}

export interface LowConfidenceEntry {
  file: string;
  line: number;
  namespace: string;
  origin: ProvenanceOrigin;
  confidence?: number;
}

export interface ProvenanceStats {
  byOrigin: Record<ProvenanceOrigin, number>;
  needsReview: number;
  reviewed: number;
  lowConfidence: LowConfidenceEntry[];
}

export interface CacheRoot {
  schemaVersion: string;
  files: Record<string, FileEntry>;
  symbols: Record<string, SymbolEntry>;
  domains: Record<string, DomainEntry>;
  constraintsIndex: Record<LockLevel, string[]>;
  provenanceStats: ProvenanceStats;
  /** path -> content checksum; the only input to staleness checks */
  contentHashes: Record<string, string>;
}

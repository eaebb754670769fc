/**
 * Structural extraction interface.
 *
 * Adapters locate symbol boundaries, import statements, export tables and
 * direct call sites. They never see annotations; association happens in the
 * indexer.
 */
import type { CommentSyntax } from '../annotations/comment-syntax.js';
import type { LineSpan } from '../annotations/types.js';

export const SYMBOL_KINDS = [
  'function',
  'class',
  'method',
  'const',
  'variable',
  'type',
  'interface',
  'enum',
  'struct',
  'trait',
  'module',
] as const;

export type SymbolKind = (typeof SYMBOL_KINDS)[number];

export interface FileBoundary {
  /** Line 1 to EOF */
  lineSpan: LineSpan;
  lines: number;
}

export interface SymbolBoundary {
  name: string;
  kind: SymbolKind;
  lineSpan: LineSpan;
  exported: boolean;
  /** Enclosing class, struct, impl or trait for methods */
  container?: string;
  signature?: string;
}

export interface ImportedName {
  /** Name as exported by the target module ('default' for default imports) */
  name: string;
  /** Binding in the importing file */
  local: string;
}

export interface ImportStatement {
  specifier: string;
  line: number;
  names: ImportedName[];
  /** Local binding of the whole module (`import * as ns`, `import pkg`) */
  namespaceAlias?: string;
  /** Every exported name becomes visible (`from m import *`, Go dot imports) */
  wildcard?: boolean;
}

/**
 * One row of a module's export table.
 * Local exports name a symbol of the file; re-exports name a specifier.
 */
export interface ExportRow {
  name: string;
  local?: string;
  from?: string;
  /** Name in the re-exported module when it differs from `name`; '*' for star re-exports */
  sourceName?: string;
}

export interface CallSite {
  /** `name`, `alias.member`, or `this.member` / `self.member` */
  callee: string;
  line: number;
}

export interface StructureResult {
  file: FileBoundary;
  symbols: SymbolBoundary[];
  imports: ImportStatement[];
  exports: ExportRow[];
  calls: CallSite[];
}

export interface StructuralExtractor {
  readonly id: string;
  readonly extensions: string[];
  readonly commentSyntax: CommentSyntax;

  extractStructure(text: string, filePath: string): StructureResult;

  /**
   * Release resources.
   */
  dispose(): void;
}

export type ExtractorFactory = () => StructuralExtractor;

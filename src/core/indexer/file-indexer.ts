/**
 * Per-file indexing: structure, annotations, association and constraints.
 *
 * A pure function of path, text and settings. Cross-file edges are left
 * empty for the linker.
 */
import { classifyLines, GENERIC_SYNTAX } from '../annotations/comment-syntax.js';
import { parseAnnotations } from '../annotations/lexer.js';
import type { AnnotationBlock, AnnotationMap, AnnotationRecord } from '../annotations/types.js';
import type { ValidationMode } from '../config/schema.js';
import { resolveFileConstraint, resolveOwnConstraint } from '../constraints/resolver.js';
import { compareDiagnostics, createDiagnostic, type Diagnostic } from '../diagnostics/types.js';
import { associateAnnotations, buildAnnotationMap } from '../extract/association.js';
import { detectLanguage } from '../extract/languages.js';
import type { ExtractorRegistry } from '../extract/registry.js';
import type { ImportStatement, StructureResult, SymbolBoundary } from '../extract/types.js';
import { fileBoundary, countLines } from '../extract/text.js';
import type { CallRecord, FileEntry, InlineMarker, SymbolEntry } from '../cache/types.js';
import { computeChecksum } from '../../utils/checksum.js';
import { compareStrings, sortedUnique } from '../../utils/collections.js';
import { AnnotationError, errorMessage } from '../../utils/errors.js';

export interface FileIndexOptions {
  registry: ExtractorRegistry;
  mode: ValidationMode;
  reviewThreshold: number;
  customNamespaces: ReadonlySet<string>;
}

export interface IndexedFile {
  path: string;
  hash: string;
  file: FileEntry;
  /** In declaration order, parallel to `file.symbols` */
  symbols: SymbolEntry[];
  imports: ImportStatement[];
}

const SYMBOL_NAME_NAMESPACES = ['fn', 'function', 'class', 'method', 'symbol'];

export function indexFile(filePath: string, text: string, options: FileIndexOptions): IndexedFile {
  const diagnostics: Diagnostic[] = [];
  const language = detectLanguage(filePath);
  const extractor = options.registry.getForFile(filePath);
  const syntax = extractor?.commentSyntax ?? GENERIC_SYNTAX;

  let structure: StructureResult;
  if (!extractor) {
    structure = fileOnlyStructure(text);
    diagnostics.push(
      createDiagnostic('UnsupportedLanguage', { file: filePath }, `No structural extractor for ${language} files`)
    );
  } else {
    try {
      structure = extractor.extractStructure(text, filePath);
    } catch (error) {
      structure = fileOnlyStructure(text);
      diagnostics.push(
        createDiagnostic('UnparsableFile', { file: filePath }, `Structure extraction failed: ${errorMessage(error)}`)
      );
    }
  }

  let blocks: AnnotationBlock[] = [];
  try {
    const lexed = parseAnnotations(text, syntax, {
      file: filePath,
      mode: options.mode,
      reviewThreshold: options.reviewThreshold,
      customNamespaces: options.customNamespaces,
    });
    blocks = lexed.blocks;
    diagnostics.push(...lexed.diagnostics);
  } catch (error) {
    if (!(error instanceof AnnotationError)) throw error;
    // Strict mode: the file keeps its structure but loses every annotation
    const line = numberDetail(error, 'line');
    const endLine = numberDetail(error, 'endLine');
    diagnostics.push(
      createDiagnostic(
        'MalformedAnnotation',
        { file: filePath, ...(line !== undefined ? { line } : {}), ...(endLine !== undefined ? { endLine } : {}) },
        error.message,
        'error'
      )
    );
  }

  const lineKinds = Array.from(classifyLines(text, syntax), (line) => line.kind);
  const association = associateAnnotations({ file: filePath, blocks, symbols: structure.symbols, lineKinds });
  diagnostics.push(...association.diagnostics);

  const qualifiedNames = qualifySymbols(filePath, structure.symbols);
  const symbols = structure.symbols.map((boundary, index) =>
    toSymbolEntry(filePath, boundary, qualifiedNames[index] ?? '', association.symbolAnnotations[index] ?? [])
  );

  const fileAnnotations = buildAnnotationMap(association.fileAnnotations);
  const inline: InlineMarker[] = association.inline
    .map(({ record, symbolIndex }) => {
      const owner = symbolIndex === null ? undefined : qualifiedNames[symbolIndex];
      return {
        namespace: record.namespace,
        line: record.lineSpan.start,
        directive: record.directive,
        ...(record.value ? { value: record.value } : {}),
        ...(owner ? { symbol: owner } : {}),
      };
    })
    .sort((a, b) => a.line - b.line);

  const file: FileEntry = {
    path: filePath,
    language,
    lines: structure.file.lines,
    ...fileText(fileAnnotations),
    domains: namesOf(fileAnnotations.domain),
    constraint: resolveFileConstraint(association.fileAnnotations),
    annotations: fileAnnotations,
    symbols: qualifiedNames,
    inline,
    exports: structure.exports,
    imports: [],
    importedBy: [],
    calls: collectCalls(structure, symbols),
    ...(diagnostics.length > 0 ? { diagnostics: [...diagnostics].sort(compareDiagnostics) } : {}),
  };

  return { path: filePath, hash: computeChecksum(text), file, symbols, imports: structure.imports };
}

function numberDetail(error: AnnotationError, key: string): number | undefined {
  const value = error.details?.[key];
  return typeof value === 'number' ? value : undefined;
}

function fileOnlyStructure(text: string): StructureResult {
  return { file: fileBoundary(countLines(text)), symbols: [], imports: [], exports: [], calls: [] };
}

export function displayName(symbol: { name: string; container?: string }): string {
  return symbol.container ? `${symbol.container}.${symbol.name}` : symbol.name;
}

/**
 * `<path>:<name>`; later symbols sharing a name get `@<start line>`.
 */
export function qualifySymbols(filePath: string, symbols: SymbolBoundary[]): string[] {
  const taken = new Set<string>();
  return symbols.map((symbol) => {
    const plain = `${filePath}:${displayName(symbol)}`;
    const qualified = taken.has(plain) ? `${plain}@${symbol.lineSpan.start}` : plain;
    taken.add(qualified);
    return qualified;
  });
}

function toSymbolEntry(
  filePath: string,
  boundary: SymbolBoundary,
  qualifiedName: string,
  records: AnnotationRecord[]
): SymbolEntry {
  const annotations = buildAnnotationMap(records);
  const purpose = symbolPurpose(annotations);
  return {
    qualifiedName,
    name: boundary.name,
    kind: boundary.kind,
    file: filePath,
    lineSpan: boundary.lineSpan,
    exported: boundary.exported,
    ...(boundary.container ? { container: boundary.container } : {}),
    ...(boundary.signature ? { signature: boundary.signature } : {}),
    ...(purpose ? { purpose } : {}),
    constraint: resolveOwnConstraint(records),
    annotations,
    callers: [],
    callees: [],
  };
}

function textOf(records: AnnotationRecord[] | undefined): string | undefined {
  const payload = records?.[0]?.payload;
  if (payload?.kind === 'text') return payload.text;
  if (payload?.kind === 'name') return payload.name;
  return undefined;
}

function namesOf(records: AnnotationRecord[] | undefined): string[] {
  return sortedUnique(
    (records ?? []).flatMap((record) => (record.payload.kind === 'name' ? [record.payload.name] : []))
  );
}

function symbolPurpose(annotations: AnnotationMap): string | undefined {
  const explicit = textOf(annotations.purpose) ?? textOf(annotations.summary);
  if (explicit) return explicit;
  for (const namespace of SYMBOL_NAME_NAMESPACES) {
    const directive = annotations[namespace]?.[0]?.directive;
    if (directive) return directive;
  }
  return undefined;
}

function fileText(annotations: AnnotationMap): Pick<FileEntry, 'module' | 'summary' | 'purpose' | 'owner' | 'layer'> {
  const fields: Pick<FileEntry, 'module' | 'summary' | 'purpose' | 'owner' | 'layer'> = {};
  const module = textOf(annotations.module);
  const summary = textOf(annotations.summary);
  const purpose = textOf(annotations.purpose);
  const owner = textOf(annotations.owner);
  const layer = textOf(annotations.layer);
  if (module) fields.module = module;
  if (summary) fields.summary = summary;
  if (purpose) fields.purpose = purpose;
  if (owner) fields.owner = owner;
  if (layer) fields.layer = layer;
  return fields;
}

/**
 * Direct call sites with their enclosing symbol, plus names listed by
 * `@acp:calls` on a symbol.
 */
function collectCalls(structure: StructureResult, symbols: SymbolEntry[]): CallRecord[] {
  const calls: CallRecord[] = structure.calls.map((call) => {
    const caller = innermostSymbol(symbols, call.line);
    return caller ? { ...call, caller } : { ...call };
  });

  for (const symbol of symbols) {
    for (const record of symbol.annotations.calls ?? []) {
      if (record.payload.kind !== 'list') continue;
      for (const callee of record.payload.names) {
        calls.push({ callee, line: record.lineSpan.start, caller: symbol.qualifiedName });
      }
    }
  }

  return calls.sort((a, b) => a.line - b.line || compareStrings(a.callee, b.callee));
}

function innermostSymbol(symbols: SymbolEntry[], line: number): string | undefined {
  let best: SymbolEntry | undefined;
  for (const symbol of symbols) {
    const { start, end } = symbol.lineSpan;
    if (start > line || line > end) continue;
    if (!best || end - start < best.lineSpan.end - best.lineSpan.start) best = symbol;
  }
  return best?.qualifiedName;
}

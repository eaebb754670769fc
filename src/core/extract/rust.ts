/**
 * Rust extractor using regex-based parsing over brace-masked lines.
 * Methods come from `impl` and `trait` blocks.
 */
import { C_STYLE_SYNTAX, splitLines } from '../annotations/comment-syntax.js';
import type {
  CallSite,
  ExportRow,
  ImportStatement,
  StructuralExtractor,
  StructureResult,
  SymbolBoundary,
  SymbolKind,
} from './types.js';
import { BraceIndex, fileBoundary, findCalls, includeLeadingAttributes, maskCode } from './text.js';

export const RUST_EXTENSIONS = ['.rs'];

const RUST_KEYWORDS = new Set([
  'if', 'while', 'for', 'match', 'return', 'loop', 'fn', 'in', 'as', 'move', 'where',
  'Some', 'Ok', 'Err', 'None',
]);

const VIS = String.raw`(?:pub(?:\s*\([^)]*\))?\s+)?`;
const FN_PATTERN = new RegExp(
  String.raw`^(${VIS})(?:(?:const|async|unsafe|default)\s+)*(?:extern\s+"[^"]*"\s+)?fn\s+(\w+)`
);
const ITEM_PATTERN = new RegExp(String.raw`^(${VIS})(struct|enum|trait|type|union)\s+(\w+)`);
const VALUE_PATTERN = new RegExp(String.raw`^(${VIS})(const|static)\s+(mut\s+)?(\w+)\s*:`);
const MOD_PATTERN = new RegExp(String.raw`^(${VIS})mod\s+(\w+)`);
const IMPL_PATTERN = /^(?:unsafe\s+)?impl\b(?:\s*<[^{]*?>)?\s+(?:(?:[\w:]+)(?:<[^{]*?>)?\s+for\s+)?([\w:]+)/;
const USE_PATTERN = new RegExp(String.raw`^(${VIS})use\s+`);
const ATTRIBUTE_LINE = /^#!?\[/;

interface UseLeaf {
  path: string[];
  alias?: string;
  glob: boolean;
}

export class RustExtractor implements StructuralExtractor {
  readonly id = 'rust';
  readonly extensions = RUST_EXTENSIONS;
  readonly commentSyntax = C_STYLE_SYNTAX;

  extractStructure(text: string, _filePath: string): StructureResult {
    const lines = splitLines(text);
    const code = maskCode(lines, { charLiterals: true });
    const index = new BraceIndex(code);

    const symbols = this.extractSymbols(lines, code, index);
    const { imports, reexports } = this.extractUses(code);
    const exports: ExportRow[] = symbols
      .filter((symbol) => symbol.exported && symbol.kind !== 'method')
      .map((symbol) => ({ name: symbol.name, local: symbol.name }));

    return {
      file: fileBoundary(lines.length),
      symbols,
      imports,
      exports: [...exports, ...reexports],
      calls: this.extractCalls(code),
    };
  }

  dispose(): void {
    // No resources to clean up for regex-based parsing
  }

  private extractSymbols(lines: string[], code: string[], index: BraceIndex): SymbolBoundary[] {
    const symbols: SymbolBoundary[] = [];

    for (let i = 0; i < code.length; i++) {
      if ((index.depthBefore[i] ?? 0) !== 0) continue;
      const trimmed = (code[i] ?? '').trim();
      if (trimmed.length === 0 || ATTRIBUTE_LINE.test(trimmed)) continue;

      const impl = IMPL_PATTERN.exec(trimmed);
      if (impl) {
        const end = index.blockEnd(i);
        const target = (impl[1] ?? '').split('::').pop() ?? '';
        const isTraitImpl = /\bfor\b/.test(trimmed.split('{')[0] ?? '');
        this.extractMembers(target, i, end, lines, code, index, isTraitImpl, symbols);
        i = end;
        continue;
      }

      const fn = FN_PATTERN.exec(trimmed);
      if (fn) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(fn[2] ?? '', 'function', i, end, lines, Boolean(fn[1])));
        i = end;
        continue;
      }

      const item = ITEM_PATTERN.exec(trimmed);
      if (item) {
        const end = index.blockEnd(i);
        const keyword = item[2] ?? '';
        const name = item[3] ?? '';
        const exported = Boolean(item[1]);
        symbols.push(this.symbol(name, itemKind(keyword), i, end, lines, exported));
        if (keyword === 'trait') {
          this.extractMembers(name, i, end, lines, code, index, exported, symbols);
        }
        i = end;
        continue;
      }

      const value = VALUE_PATTERN.exec(trimmed);
      if (value) {
        const end = index.blockEnd(i);
        const kind: SymbolKind = value[2] === 'const' || !value[3] ? 'const' : 'variable';
        symbols.push(this.symbol(value[4] ?? '', kind, i, end, lines, Boolean(value[1])));
        i = end;
        continue;
      }

      const mod = MOD_PATTERN.exec(trimmed);
      if (mod) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(mod[2] ?? '', 'module', i, end, lines, Boolean(mod[1])));
        i = end;
      }
    }

    return symbols;
  }

  /**
   * Functions one level inside an `impl` or `trait` block.
   */
  private extractMembers(
    container: string,
    start: number,
    end: number,
    lines: string[],
    code: string[],
    index: BraceIndex,
    implicitlyPublic: boolean,
    symbols: SymbolBoundary[]
  ): void {
    const depth = (index.depthBefore[start] ?? 0) + 1;
    for (let j = start + 1; j < end; j++) {
      if ((index.depthBefore[j] ?? 0) !== depth) continue;
      const fn = FN_PATTERN.exec((code[j] ?? '').trim());
      if (!fn) continue;
      const memberEnd = index.blockEnd(j);
      symbols.push(
        this.symbol(fn[2] ?? '', 'method', j, memberEnd, lines, implicitlyPublic || Boolean(fn[1]), container)
      );
      j = memberEnd;
    }
  }

  private symbol(
    name: string,
    kind: SymbolKind,
    start: number,
    end: number,
    lines: string[],
    exported: boolean,
    container?: string
  ): SymbolBoundary {
    const first = includeLeadingAttributes(lines, start, ATTRIBUTE_LINE);
    return {
      name,
      kind,
      lineSpan: { start: first + 1, end: end + 1 },
      exported,
      ...(container ? { container } : {}),
      signature: (lines[start] ?? '').trim().replace(/\s*[{;]\s*$/, '').slice(0, 200),
    };
  }

  /**
   * `use` declarations, expanded from their tree form. `pub use` also
   * re-exports.
   */
  private extractUses(code: string[]): { imports: ImportStatement[]; reexports: ExportRow[] } {
    const imports: ImportStatement[] = [];
    const reexports: ExportRow[] = [];

    for (let i = 0; i < code.length; i++) {
      const trimmed = (code[i] ?? '').trim();
      const head = USE_PATTERN.exec(trimmed);
      if (!head) continue;

      let statement = trimmed;
      let j = i;
      while (!statement.includes(';') && j + 1 < code.length) {
        j++;
        statement += ' ' + (code[j] ?? '').trim();
      }
      const tree = statement.slice(head[0].length, statement.indexOf(';') >= 0 ? statement.indexOf(';') : undefined);
      const isPublic = Boolean(head[1]);
      const line = i + 1;

      const grouped = new Map<string, ImportStatement>();
      for (const leaf of expandUseTree(tree.trim())) {
        const statementFor = (specifier: string): ImportStatement => {
          let existing = grouped.get(specifier);
          if (!existing) {
            existing = { specifier, line, names: [] };
            grouped.set(specifier, existing);
            imports.push(existing);
          }
          return existing;
        };

        if (leaf.glob) {
          const specifier = leaf.path.join('::');
          imports.push({ specifier, line, names: [], wildcard: true });
          if (isPublic) reexports.push({ name: '*', from: specifier, sourceName: '*' });
          continue;
        }

        const last = leaf.path[leaf.path.length - 1] ?? '';
        if (last === 'self' || leaf.path.length === 1) {
          // A module binding: `use a::b::{self}` or `use serde`
          const modulePath = last === 'self' ? leaf.path.slice(0, -1) : leaf.path;
          const alias = leaf.alias ?? modulePath[modulePath.length - 1] ?? '';
          imports.push({ specifier: modulePath.join('::'), line, names: [], namespaceAlias: alias });
          continue;
        }

        const specifier = leaf.path.slice(0, -1).join('::');
        const local = leaf.alias ?? last;
        statementFor(specifier).names.push({ name: last, local });
        if (isPublic && local !== '_') {
          reexports.push({ name: local, from: specifier, ...(local !== last ? { sourceName: last } : {}) });
        }
      }

      i = j;
    }

    return { imports, reexports };
  }

  private extractCalls(code: string[]): CallSite[] {
    const calls: CallSite[] = [];
    for (let i = 0; i < code.length; i++) {
      const masked = code[i] ?? '';
      const trimmed = masked.trim();
      if (FN_PATTERN.test(trimmed) || USE_PATTERN.test(trimmed) || ATTRIBUTE_LINE.test(trimmed)) continue;
      for (const callee of findCalls(masked, RUST_KEYWORDS)) {
        calls.push({ callee: callee.replace(/^Self\./, 'self.'), line: i + 1 });
      }
    }
    return calls;
  }
}

function itemKind(keyword: string): SymbolKind {
  switch (keyword) {
    case 'struct':
    case 'union':
      return 'struct';
    case 'enum':
      return 'enum';
    case 'trait':
      return 'trait';
    default:
      return 'type';
  }
}

/**
 * Expand `a::{b, c::{d as e, self}, f::*}` into one leaf per imported path.
 */
export function expandUseTree(tree: string, prefix: string[] = []): UseLeaf[] {
  const text = tree.trim().replace(/^::/, '');
  const braceAt = text.indexOf('{');

  if (braceAt < 0) {
    const aliasMatch = /^(.*?)\s+as\s+(\w+)$/.exec(text);
    const pathText = aliasMatch ? aliasMatch[1] ?? '' : text;
    const segments = pathText.split('::').map((s) => s.trim()).filter((s) => s.length > 0);
    if (segments[segments.length - 1] === '*') {
      return [{ path: [...prefix, ...segments.slice(0, -1)], glob: true }];
    }
    if (segments.length === 0) return [];
    return [{ path: [...prefix, ...segments], glob: false, ...(aliasMatch?.[2] ? { alias: aliasMatch[2] } : {}) }];
  }

  const base = text
    .slice(0, braceAt)
    .split('::')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  const closing = text.lastIndexOf('}');
  const inner = text.slice(braceAt + 1, closing >= 0 ? closing : undefined);
  return splitTopLevel(inner).flatMap((part) => expandUseTree(part, [...prefix, ...base]));
}

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '{') depth++;
    if (ch === '}') depth--;
    if (ch === ',' && depth === 0) {
      if (current.trim()) parts.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.trim()) parts.push(current.trim());
  return parts;
}

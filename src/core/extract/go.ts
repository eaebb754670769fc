/**
 * Go extractor using regex-based parsing over brace-masked lines.
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
import { BraceIndex, fileBoundary, findCalls, maskCode } from './text.js';

export const GO_EXTENSIONS = ['.go'];

const GO_KEYWORDS = new Set([
  'func', 'if', 'for', 'switch', 'return', 'go', 'defer', 'select', 'case', 'range',
  'make', 'new', 'len', 'cap', 'append', 'panic', 'recover', 'copy', 'delete', 'close',
  'print', 'println', 'map', 'chan', 'interface', 'struct',
]);

const METHOD_PATTERN = /^func\s*\(\s*(?:\w+\s+)?\*?\s*(\w+)(?:\[[^\]]*\])?\s*\)\s*(\w+)\s*[[(]/;
const FUNC_PATTERN = /^func\s+(\w+)\s*[[(]/;
const TYPE_PATTERN = /^type\s+(\w+)(?:\[[^\]]*\])?\s+(struct|interface)?/;
const VALUE_PATTERN = /^(const|var)\s+(\w+)/;
const GROUP_PATTERN = /^(const|var|type)\s*\(\s*$/;
const IMPORT_SPEC = /^(?:(\w+|\.)\s+)?"([^"]+)"/;

export class GoExtractor implements StructuralExtractor {
  readonly id = 'go';
  readonly extensions = GO_EXTENSIONS;
  readonly commentSyntax = C_STYLE_SYNTAX;

  extractStructure(text: string, _filePath: string): StructureResult {
    const lines = splitLines(text);
    const code = maskCode(lines, { backtickStrings: true, charLiterals: true });
    const index = new BraceIndex(code);

    const symbols = this.extractSymbols(lines, code, index);
    const exports: ExportRow[] = symbols
      .filter((symbol) => symbol.exported && symbol.kind !== 'method')
      .map((symbol) => ({ name: symbol.name, local: symbol.name }));

    return {
      file: fileBoundary(lines.length),
      symbols,
      imports: this.extractImports(lines, index),
      exports,
      calls: this.extractCalls(code, index),
    };
  }

  dispose(): void {
    // No resources to clean up for regex-based parsing
  }

  private extractSymbols(lines: string[], code: string[], index: BraceIndex): SymbolBoundary[] {
    const symbols: SymbolBoundary[] = [];

    for (let i = 0; i < code.length; i++) {
      if ((index.depthBefore[i] ?? 0) !== 0 || (index.parenBefore[i] ?? 0) !== 0) continue;
      const trimmed = (code[i] ?? '').trim();
      if (trimmed.length === 0) continue;

      const method = METHOD_PATTERN.exec(trimmed);
      if (method) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(method[2] ?? '', 'method', i, end, lines, method[1]));
        i = end;
        continue;
      }

      const func = FUNC_PATTERN.exec(trimmed);
      if (func) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(func[1] ?? '', 'function', i, end, lines));
        i = end;
        continue;
      }

      const group = GROUP_PATTERN.exec(trimmed);
      if (group) {
        const end = index.blockEnd(i);
        this.extractGroup(group[1] ?? '', i, end, lines, code, index, symbols);
        i = end;
        continue;
      }

      const type = TYPE_PATTERN.exec(trimmed);
      if (type) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(type[1] ?? '', typeKind(type[2]), i, end, lines));
        i = end;
        continue;
      }

      const value = VALUE_PATTERN.exec(trimmed);
      if (value) {
        const end = index.blockEnd(i);
        symbols.push(this.symbol(value[2] ?? '', value[1] === 'const' ? 'const' : 'variable', i, end, lines));
        i = end;
      }
    }

    return symbols;
  }

  /**
   * Members of `const (`, `var (` and `type (` groups.
   */
  private extractGroup(
    keyword: string,
    start: number,
    end: number,
    lines: string[],
    code: string[],
    index: BraceIndex,
    symbols: SymbolBoundary[]
  ): void {
    for (let j = start + 1; j < end; j++) {
      if ((index.depthBefore[j] ?? 0) !== 0 || (index.parenBefore[j] ?? 0) !== 1) continue;
      const trimmed = (code[j] ?? '').trim();
      const member = /^([A-Za-z_]\w*)\b(?:\s+(struct|interface))?/.exec(trimmed);
      if (!member) continue;
      const memberEnd = Math.min(index.blockEnd(j), end - 1);
      const kind: SymbolKind =
        keyword === 'type' ? typeKind(member[2]) : keyword === 'const' ? 'const' : 'variable';
      symbols.push(this.symbol(member[1] ?? '', kind, j, Math.max(j, memberEnd), lines));
      j = Math.max(j, memberEnd);
    }
  }

  private symbol(
    name: string,
    kind: SymbolKind,
    start: number,
    end: number,
    lines: string[],
    container?: string
  ): SymbolBoundary {
    return {
      name,
      kind,
      lineSpan: { start: start + 1, end: end + 1 },
      exported: /^[A-Z]/.test(name),
      ...(container ? { container } : {}),
      signature: (lines[start] ?? '').trim().replace(/\s*[{(]\s*$/, '').slice(0, 200),
    };
  }

  private extractImports(lines: string[], index: BraceIndex): ImportStatement[] {
    const imports: ImportStatement[] = [];

    for (let i = 0; i < lines.length; i++) {
      if ((index.depthBefore[i] ?? 0) !== 0) continue;
      const trimmed = (lines[i] ?? '').trim();

      // Single import: import "fmt" or import f "fmt"
      const single = /^import\s+(.+)$/.exec(trimmed);
      if (single && !/^import\s*\(/.test(trimmed)) {
        const spec = IMPORT_SPEC.exec((single[1] ?? '').trim());
        if (spec) imports.push(importStatement(spec[1], spec[2] ?? '', i + 1));
        continue;
      }

      // Block import: import ( ... )
      if (/^import\s*\(\s*$/.test(trimmed)) {
        let j = i + 1;
        while (j < lines.length) {
          const inner = (lines[j] ?? '').trim();
          if (inner.startsWith(')')) break;
          const spec = IMPORT_SPEC.exec(inner);
          if (spec) imports.push(importStatement(spec[1], spec[2] ?? '', j + 1));
          j++;
        }
        i = j;
      }
    }

    return imports;
  }

  private extractCalls(code: string[], index: BraceIndex): CallSite[] {
    const calls: CallSite[] = [];
    for (let i = 0; i < code.length; i++) {
      const masked = code[i] ?? '';
      if ((index.depthBefore[i] ?? 0) === 0 && /^\s*(func|import)\b/.test(masked)) continue;
      for (const callee of findCalls(masked, GO_KEYWORDS)) {
        calls.push({ callee, line: i + 1 });
      }
    }
    return calls;
  }
}

function typeKind(keyword: string | undefined): SymbolKind {
  return keyword === 'struct' ? 'struct' : keyword === 'interface' ? 'interface' : 'type';
}

/**
 * Dot imports merge the package scope; blank imports bind nothing.
 */
function importStatement(alias: string | undefined, specifier: string, line: number): ImportStatement {
  if (alias === '.') {
    return { specifier, line, names: [], wildcard: true };
  }
  if (alias === '_') {
    return { specifier, line, names: [] };
  }
  const packageName = specifier.split('/').pop() ?? specifier;
  return { specifier, line, names: [], namespaceAlias: alias ?? packageName };
}

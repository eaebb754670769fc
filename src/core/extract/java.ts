/**
 * Java extractor using regex-based parsing over brace-masked lines.
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

export const JAVA_EXTENSIONS = ['.java'];

const JAVA_KEYWORDS = new Set([
  'if', 'for', 'while', 'switch', 'catch', 'return', 'new', 'throw', 'synchronized',
  'super', 'this', 'try', 'assert', 'else', 'do',
]);

const MODIFIERS = String.raw`(?:(?:public|protected|private|static|final|abstract|sealed|non-sealed|strictfp|default|synchronized|native|transient|volatile)\s+)*`;
const TYPE_PATTERN = new RegExp(String.raw`^(${MODIFIERS})(class|interface|enum|record|@interface)\s+(\w+)`);
const METHOD_PATTERN = new RegExp(
  String.raw`^(${MODIFIERS})(?:<[^>]+>\s+)?([\w.$]+(?:<[^()]*>)?(?:\[\])*)\s+(\w+)\s*\(`
);
const CONSTRUCTOR_PATTERN = new RegExp(String.raw`^(${MODIFIERS})(?:<[^>]+>\s+)?(\w+)\s*\(`);
const FIELD_PATTERN = new RegExp(String.raw`^(${MODIFIERS})[\w.$<>,\s\[\]]+?\s+([A-Z][A-Z0-9_]*)\s*(?:=|;)`);
const IMPORT_PATTERN = /^import\s+(static\s+)?([\w.]+?)(\.\*)?\s*;/;
const ANNOTATION_LINE = /^@(?!interface\b)[\w.]+(?:\(.*\))?$/;
const ANNOTATION_PREFIX = /^(?:@(?!interface\b)[\w.]+(?:\([^)]*\))?\s+)+/;

export class JavaExtractor implements StructuralExtractor {
  readonly id = 'java';
  readonly extensions = JAVA_EXTENSIONS;
  readonly commentSyntax = C_STYLE_SYNTAX;

  extractStructure(text: string, _filePath: string): StructureResult {
    const lines = splitLines(text);
    const code = maskCode(lines, { charLiterals: true });
    const index = new BraceIndex(code);

    const symbols = this.extractSymbols(lines, code, index);
    const exports: ExportRow[] = [];
    for (const symbol of symbols) {
      if (!symbol.exported) continue;
      if (symbol.container === undefined) {
        exports.push({ name: symbol.name, local: symbol.name });
      } else if (/\bstatic\b/.test(symbol.signature ?? '')) {
        exports.push({ name: symbol.name, local: `${symbol.container}.${symbol.name}` });
      }
    }

    return {
      file: fileBoundary(lines.length),
      symbols,
      imports: this.extractImports(code),
      exports,
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
      const trimmed = stripAnnotations((code[i] ?? '').trim());
      const match = TYPE_PATTERN.exec(trimmed);
      if (!match) continue;

      const end = index.blockEnd(i);
      const keyword = match[2] ?? '';
      const name = match[3] ?? '';
      const kind: SymbolKind = keyword === 'interface' || keyword === '@interface' ? 'interface' : keyword === 'enum' ? 'enum' : 'class';
      symbols.push(this.symbol(name, kind, i, end, lines, /\bpublic\b/.test(match[1] ?? '')));
      this.extractMembers(name, kind === 'interface', i, end, lines, code, index, symbols);
      i = end;
    }

    return symbols;
  }

  private extractMembers(
    container: string,
    isInterface: boolean,
    start: number,
    end: number,
    lines: string[],
    code: string[],
    index: BraceIndex,
    symbols: SymbolBoundary[]
  ): void {
    const depth = (index.depthBefore[start] ?? 0) + 1;

    for (let j = start + 1; j < end; j++) {
      if ((index.depthBefore[j] ?? 0) !== depth || (index.parenBefore[j] ?? 0) !== 0) continue;
      const trimmed = stripAnnotations((code[j] ?? '').trim());
      if (trimmed.length === 0 || ANNOTATION_LINE.test(trimmed)) continue;

      const ctor = CONSTRUCTOR_PATTERN.exec(trimmed);
      if (ctor && ctor[2] === container) {
        const memberEnd = index.blockEnd(j);
        symbols.push(this.symbol(container, 'method', j, memberEnd, lines, isPublic(ctor[1], isInterface), container));
        j = memberEnd;
        continue;
      }

      const method = METHOD_PATTERN.exec(trimmed);
      if (method && !JAVA_KEYWORDS.has(method[3] ?? '') && method[2] !== 'new' && method[2] !== 'return') {
        const memberEnd = index.blockEnd(j);
        symbols.push(
          this.symbol(method[3] ?? '', 'method', j, memberEnd, lines, isPublic(method[1], isInterface), container)
        );
        j = memberEnd;
        continue;
      }

      const field = FIELD_PATTERN.exec(trimmed);
      const modifiers = field?.[1] ?? '';
      if (field && (isInterface || (/\bstatic\b/.test(modifiers) && /\bfinal\b/.test(modifiers)))) {
        const memberEnd = index.blockEnd(j);
        symbols.push(this.symbol(field[2] ?? '', 'const', j, memberEnd, lines, isPublic(modifiers, isInterface), container));
        j = memberEnd;
      }
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
    const first = includeLeadingAttributes(lines, start, ANNOTATION_LINE);
    return {
      name,
      kind,
      lineSpan: { start: first + 1, end: end + 1 },
      exported,
      ...(container ? { container } : {}),
      signature: stripAnnotations((lines[start] ?? '').trim()).replace(/\s*[{;]\s*$/, '').slice(0, 200),
    };
  }

  /**
   * `import a.b.C;` binds C from `a.b.C`; `import static a.b.C.m;` binds m
   * from `a.b.C`. Wildcards keep the package or class path.
   */
  private extractImports(code: string[]): ImportStatement[] {
    const imports: ImportStatement[] = [];
    for (let i = 0; i < code.length; i++) {
      const match = IMPORT_PATTERN.exec((code[i] ?? '').trim());
      if (!match) continue;
      const path = match[2] ?? '';
      const line = i + 1;

      if (match[3]) {
        imports.push({ specifier: path, line, names: [], wildcard: true });
        continue;
      }

      const dot = path.lastIndexOf('.');
      const last = path.slice(dot + 1);
      if (match[1]) {
        imports.push({ specifier: path.slice(0, dot), line, names: [{ name: last, local: last }] });
      } else {
        imports.push({ specifier: path, line, names: [{ name: last, local: last }] });
      }
    }
    return imports;
  }

  private extractCalls(code: string[]): CallSite[] {
    const calls: CallSite[] = [];
    for (let i = 0; i < code.length; i++) {
      const masked = code[i] ?? '';
      const trimmed = stripAnnotations(masked.trim());
      if (/^(package|import)\s/.test(trimmed)) continue;
      // Declaration headers are not calls; only what follows the parameter list is scanned
      const body = isDeclarationHeader(trimmed) ? afterParameters(trimmed) : masked;
      for (const callee of findCalls(body, JAVA_KEYWORDS)) {
        calls.push({ callee, line: i + 1 });
      }
    }
    return calls;
  }
}

function stripAnnotations(text: string): string {
  return text.replace(ANNOTATION_PREFIX, '');
}

function isPublic(modifiers: string | undefined, isInterface: boolean): boolean {
  const mods = modifiers ?? '';
  if (/\bpublic\b/.test(mods)) return true;
  return isInterface && !/\bprivate\b/.test(mods);
}

/**
 * A method or constructor header, as opposed to a statement that starts
 * with a call.
 */
function isDeclarationHeader(line: string): boolean {
  if (/^(return|throw|new|else|yield|case)\b/.test(line)) return false;
  if (METHOD_PATTERN.test(line)) return true;
  const ctor = CONSTRUCTOR_PATTERN.exec(line);
  if (!ctor || JAVA_KEYWORDS.has(ctor[2] ?? '')) return false;
  if ((ctor[1] ?? '').length > 0) return true;
  return /^[A-Z]/.test(ctor[2] ?? '') && /\)\s*(throws\s+[\w.,\s]+)?\{\s*$/.test(line);
}

function afterParameters(line: string): string {
  const close = line.indexOf(')');
  return close >= 0 ? line.slice(close + 1) : '';
}

/**
 * Python extractor using regex-based line-by-line parsing.
 * Block extents follow indentation.
 */
import * as path from 'node:path';
import { HASH_SYNTAX, splitLines } from '../annotations/comment-syntax.js';
import type {
  CallSite,
  ExportRow,
  ImportStatement,
  StructuralExtractor,
  StructureResult,
  SymbolBoundary,
} from './types.js';
import { fileBoundary, findCalls, includeLeadingAttributes } from './text.js';

export const PYTHON_EXTENSIONS = ['.py', '.pyi', '.pyw'];

const PYTHON_KEYWORDS = new Set([
  'if', 'elif', 'while', 'for', 'with', 'assert', 'except', 'return', 'yield',
  'del', 'not', 'and', 'or', 'in', 'is', 'lambda', 'await', 'raise', 'print',
]);

const DEF_PATTERN = /^(\s*)(?:async\s+)?def\s+(\w+)\s*\(/;
const CLASS_PATTERN = /^(\s*)class\s+(\w+)/;
const ASSIGN_PATTERN = /^([A-Za-z_]\w*)\s*(?::\s*[^=]+)?=(?!=)/;

interface Scope {
  kind: 'class' | 'def';
  name: string;
  indent: number;
}

export class PythonExtractor implements StructuralExtractor {
  readonly id = 'python';
  readonly extensions = PYTHON_EXTENSIONS;
  readonly commentSyntax = HASH_SYNTAX;

  extractStructure(text: string, filePath: string): StructureResult {
    const lines = splitLines(text);
    const code = maskPython(lines);

    const symbols = this.extractSymbols(lines, code);
    const imports = this.extractImports(code, lines);
    const allNames = this.extractDunderAll(code, lines);

    for (const symbol of symbols) {
      if (symbol.kind === 'method') continue;
      symbol.exported = allNames ? allNames.has(symbol.name) : !symbol.name.startsWith('_');
    }

    return {
      file: fileBoundary(lines.length),
      symbols,
      imports,
      exports: this.extractExports(symbols, imports, allNames, path.basename(filePath) === '__init__.py'),
      calls: this.extractCalls(code),
    };
  }

  dispose(): void {
    // No resources to clean up for regex-based parsing
  }

  private extractSymbols(lines: string[], code: string[]): SymbolBoundary[] {
    const symbols: SymbolBoundary[] = [];
    const scopes: Scope[] = [];

    for (let i = 0; i < code.length; i++) {
      const masked = code[i] ?? '';
      if (masked.trim().length === 0) continue;
      const indent = indentWidth(masked);

      while (scopes.length > 0 && (scopes[scopes.length - 1]?.indent ?? -1) >= indent) {
        scopes.pop();
      }
      const insideClassesOnly = scopes.every((scope) => scope.kind === 'class');
      const container = scopes[scopes.length - 1];

      const defMatch = DEF_PATTERN.exec(masked);
      if (defMatch) {
        const name = defMatch[2] ?? '';
        const headerEnd = findHeaderEnd(code, i);
        if (scopes.length === 0 || (insideClassesOnly && container?.kind === 'class' && scopes.length === 1)) {
          const start = includeLeadingAttributes(lines, i, /^@/);
          symbols.push({
            name,
            kind: container ? 'method' : 'function',
            lineSpan: { start: start + 1, end: findBlockEnd(code, headerEnd, indent) + 1 },
            exported: container ? !name.startsWith('_') || /^__\w+__$/.test(name) : true,
            ...(container ? { container: container.name } : {}),
            signature: headerSignature(lines, i, headerEnd),
          });
        }
        scopes.push({ kind: 'def', name, indent });
        i = headerEnd;
        continue;
      }

      const classMatch = CLASS_PATTERN.exec(masked);
      if (classMatch) {
        const name = classMatch[2] ?? '';
        const headerEnd = findHeaderEnd(code, i);
        if (scopes.length === 0) {
          const start = includeLeadingAttributes(lines, i, /^@/);
          symbols.push({
            name,
            kind: 'class',
            lineSpan: { start: start + 1, end: findBlockEnd(code, headerEnd, indent) + 1 },
            exported: true,
            signature: headerSignature(lines, i, headerEnd),
          });
        }
        scopes.push({ kind: 'class', name, indent });
        i = headerEnd;
        continue;
      }

      if (indent === 0) {
        const assign = ASSIGN_PATTERN.exec(masked);
        const name = assign?.[1];
        if (name && !/^__\w+__$/.test(name)) {
          const end = findBracketEnd(code, i);
          symbols.push({
            name,
            kind: /^[A-Z][A-Z0-9_]*$/.test(name) ? 'const' : 'variable',
            lineSpan: { start: i + 1, end: end + 1 },
            exported: true,
            signature: (lines[i] ?? '').trim().slice(0, 200),
          });
          i = end;
        }
      }
    }

    return symbols;
  }

  private extractImports(code: string[], lines: string[]): ImportStatement[] {
    const imports: ImportStatement[] = [];

    for (let i = 0; i < code.length; i++) {
      const trimmed = (code[i] ?? '').trim();
      const lineNum = i + 1;

      // import a.b, c as d
      const importMatch = /^import\s+(.+)$/.exec(trimmed);
      if (importMatch) {
        for (const part of (importMatch[1] ?? '').split(',')) {
          const [moduleName = '', alias] = part.trim().split(/\s+as\s+/);
          if (!moduleName) continue;
          imports.push({ specifier: moduleName, line: lineNum, names: [], namespaceAlias: alias ?? moduleName });
        }
        continue;
      }

      // from .relative import (name, other as alias)
      const fromMatch = /^from\s+(\.{0,3}[\w.]*)\s+import\s+(.+)$/.exec(trimmed);
      if (!fromMatch) continue;

      let namesStr = (fromMatch[2] ?? '').trim();
      if (namesStr.startsWith('(') && !namesStr.includes(')')) {
        let j = i + 1;
        while (j < code.length && !(code[j] ?? '').includes(')')) {
          namesStr += ' ' + (code[j] ?? '').trim();
          j++;
        }
        if (j < code.length) {
          namesStr += ' ' + (code[j] ?? '').trim();
        }
        i = j;
      } else {
        // Backslash continuations
        while (namesStr.endsWith('\\') && i + 1 < lines.length) {
          i++;
          namesStr = namesStr.slice(0, -1) + ' ' + (code[i] ?? '').trim();
        }
      }
      namesStr = namesStr.replace(/[()]/g, '').trim();

      const specifier = fromMatch[1] ?? '';
      if (namesStr === '*') {
        imports.push({ specifier, line: lineNum, names: [], wildcard: true });
        continue;
      }
      const names = namesStr
        .split(',')
        .map((n) => n.trim().split(/\s+as\s+/))
        .filter((parts) => (parts[0] ?? '').length > 0)
        .map(([name = '', alias]) => ({ name, local: alias ?? name }));
      imports.push({ specifier, line: lineNum, names });
    }

    return imports;
  }

  /**
   * Names listed in a module-level `__all__`, or null when there is none.
   */
  private extractDunderAll(code: string[], lines: string[]): Set<string> | null {
    for (let i = 0; i < code.length; i++) {
      if (!/^__all__\s*(?::[^=]+)?=/.test(code[i] ?? '')) continue;
      const end = findBracketEnd(code, i);
      const source = lines.slice(i, end + 1).join(' ');
      const names = new Set<string>();
      for (const match of source.matchAll(/["']([A-Za-z_]\w*)["']/g)) {
        if (match[1]) names.add(match[1]);
      }
      return names;
    }
    return null;
  }

  private extractExports(
    symbols: SymbolBoundary[],
    imports: ImportStatement[],
    allNames: Set<string> | null,
    isPackageInit: boolean
  ): ExportRow[] {
    const exports: ExportRow[] = [];
    const local = new Set<string>();

    for (const symbol of symbols) {
      if (symbol.kind === 'method' || !symbol.exported) continue;
      exports.push({ name: symbol.name, local: symbol.name });
      local.add(symbol.name);
    }

    // Imported names become part of the module's interface when listed in
    // __all__, or in a package __init__ without one.
    for (const statement of imports) {
      if (statement.wildcard && isPackageInit && !allNames) {
        exports.push({ name: '*', from: statement.specifier, sourceName: '*' });
        continue;
      }
      for (const imported of statement.names) {
        if (local.has(imported.local)) continue;
        const visible = allNames ? allNames.has(imported.local) : isPackageInit && !imported.local.startsWith('_');
        if (!visible) continue;
        exports.push({
          name: imported.local,
          from: statement.specifier,
          ...(imported.name !== imported.local ? { sourceName: imported.name } : {}),
        });
      }
    }

    return exports;
  }

  private extractCalls(code: string[]): CallSite[] {
    const calls: CallSite[] = [];
    for (let i = 0; i < code.length; i++) {
      const masked = code[i] ?? '';
      const trimmed = masked.trim();
      if (/^(?:async\s+)?def\s|^class\s|^import\s|^from\s/.test(trimmed)) continue;
      for (const callee of findCalls(masked, PYTHON_KEYWORDS)) {
        calls.push({ callee, line: i + 1 });
      }
    }
    return calls;
  }
}

function indentWidth(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].replace(/\t/g, '    ').length : 0;
}

/**
 * 0-based index of the line ending a `def`/`class` header (parentheses closed).
 */
function findHeaderEnd(code: string[], start: number): number {
  let depth = 0;
  for (let j = start; j < code.length; j++) {
    for (const ch of code[j] ?? '') {
      if (ch === '(' || ch === '[' || ch === '{') depth++;
      else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    }
    if (depth === 0 && !(code[j] ?? '').trimEnd().endsWith('\\')) return j;
  }
  return start;
}

/**
 * Last line of an indented block: the last non-blank line deeper than `indent`.
 */
function findBlockEnd(code: string[], headerEnd: number, indent: number): number {
  let end = headerEnd;
  for (let j = headerEnd + 1; j < code.length; j++) {
    const line = code[j] ?? '';
    if (line.trim().length === 0) continue;
    if (indentWidth(line) <= indent) break;
    end = j;
  }
  return end;
}

/**
 * Last line of a statement whose brackets may span lines.
 */
function findBracketEnd(code: string[], start: number): number {
  return findHeaderEnd(code, start);
}

function headerSignature(lines: string[], start: number, end: number): string {
  return lines
    .slice(start, end + 1)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/:\s*(#.*)?$/, '')
    .slice(0, 200);
}

/**
 * Blank out comments and string literals, including triple-quoted strings
 * that span lines.
 */
export function maskPython(lines: string[]): string[] {
  const masked: string[] = [];
  let openTriple: string | null = null;

  for (const line of lines) {
    let out = '';
    let i = 0;
    while (i < line.length) {
      const ch = line[i] ?? '';
      if (openTriple !== null) {
        if (line.startsWith(openTriple, i)) {
          out += openTriple;
          i += 3;
          openTriple = null;
        } else {
          out += ' ';
          i++;
        }
        continue;
      }
      if (ch === '#') break;
      if (line.startsWith('"""', i) || line.startsWith("'''", i)) {
        openTriple = line.slice(i, i + 3);
        out += openTriple;
        i += 3;
        continue;
      }
      if (ch === '"' || ch === "'") {
        let j = i + 1;
        while (j < line.length && line[j] !== ch) {
          j += line[j] === '\\' ? 2 : 1;
        }
        out += ch + ' '.repeat(Math.max(0, Math.min(j, line.length) - i - 1)) + (j < line.length ? ch : '');
        i = j + 1;
        continue;
      }
      out += ch;
      i++;
    }
    masked.push(out);
  }

  return masked;
}

/**
 * Line-oriented helpers shared by the regex-based adapters.
 */
import { splitLines } from '../annotations/comment-syntax.js';
import type { FileBoundary } from './types.js';

export function countLines(text: string): number {
  return splitLines(text).length;
}

export function fileBoundary(lines: number): FileBoundary {
  return { lineSpan: { start: 1, end: Math.max(1, lines) }, lines };
}

export interface MaskOptions {
  /** Go raw strings */
  backtickStrings?: boolean;
  /** `'x'` char literals; a lone `'` (Rust lifetime) stays code */
  charLiterals?: boolean;
  /** `#` starts a line comment */
  hashComments?: boolean;
}

/**
 * Blank out string literals and comments, keeping line lengths, so braces and
 * call patterns are only matched in code.
 */
export function maskCode(lines: string[], options: MaskOptions = {}): string[] {
  const masked: string[] = [];
  let inBlockComment = false;
  let openString: string | null = null;

  for (const line of lines) {
    let out = '';
    let i = 0;
    while (i < line.length) {
      const ch = line[i] ?? '';
      const next = line[i + 1] ?? '';

      if (inBlockComment) {
        if (ch === '*' && next === '/') {
          inBlockComment = false;
          out += '  ';
          i += 2;
        } else {
          out += ' ';
          i++;
        }
        continue;
      }

      if (openString !== null) {
        if (ch === '\\' && openString !== '`') {
          out += '  ';
          i += 2;
          continue;
        }
        if (ch === openString) {
          openString = null;
          out += ch;
        } else {
          out += ' ';
        }
        i++;
        continue;
      }

      if (ch === '/' && next === '/') break;
      if (options.hashComments && ch === '#') break;
      if (ch === '/' && next === '*') {
        inBlockComment = true;
        out += '  ';
        i += 2;
        continue;
      }
      if (ch === '"' || (options.backtickStrings && ch === '`')) {
        openString = ch;
        out += ch;
        i++;
        continue;
      }
      if (options.charLiterals && ch === "'") {
        const literal = /^'(\\.[^']*|[^\\'])'/.exec(line.slice(i));
        if (literal) {
          out += `'${' '.repeat(literal[0].length - 2)}'`;
          i += literal[0].length;
          continue;
        }
      }
      out += ch;
      i++;
    }
    // Plain strings do not span lines
    if (openString === '"' || openString === "'") openString = null;
    masked.push(out.padEnd(line.length));
  }

  return masked;
}

/**
 * Brace and parenthesis depth per line over masked code.
 */
export class BraceIndex {
  readonly depthBefore: number[] = [];
  readonly depthAfter: number[] = [];
  readonly parenBefore: number[] = [];
  readonly parenAfter: number[] = [];

  constructor(readonly code: string[]) {
    let depth = 0;
    let parens = 0;
    for (const line of code) {
      this.depthBefore.push(depth);
      this.parenBefore.push(parens);
      for (const ch of line) {
        if (ch === '{') depth++;
        else if (ch === '}') depth = Math.max(0, depth - 1);
        else if (ch === '(' || ch === '[') parens++;
        else if (ch === ')' || ch === ']') parens = Math.max(0, parens - 1);
      }
      this.depthAfter.push(depth);
      this.parenAfter.push(parens);
    }
  }

  /**
   * 0-based index of the last line of the declaration starting at `start`:
   * the line closing its brace block, or the line ending a body-less
   * declaration.
   */
  blockEnd(start: number): number {
    const base = this.depthBefore[start] ?? 0;
    const baseParens = this.parenBefore[start] ?? 0;
    let opened = false;

    for (let j = start; j < this.code.length; j++) {
      const line = this.code[j] ?? '';
      if (line.includes('{')) opened = true;
      const after = this.depthAfter[j] ?? 0;
      if (opened && after <= base) return j;
      if (opened) continue;

      const parensClosed = (this.parenAfter[j] ?? 0) <= baseParens;
      if (!parensClosed) continue;
      if (line.includes(';')) return j;
      const trimmed = line.trimEnd();
      if (/[,(=:+\-*|&<>]$/.test(trimmed)) continue;
      const nextLine = this.nextCodeLine(j);
      if (nextLine !== null && /^(\{|where\b|->|\.|:|throws\b|extends\b|implements\b)/.test(nextLine)) continue;
      return j;
    }
    return this.code.length - 1;
  }

  private nextCodeLine(index: number): string | null {
    for (let k = index + 1; k < this.code.length; k++) {
      const trimmed = (this.code[k] ?? '').trim();
      if (trimmed.length > 0) return trimmed;
    }
    return null;
  }
}

/**
 * Walk upwards over attribute or decorator lines so a symbol's span starts
 * at its first attribute. Returns a 0-based index.
 */
export function includeLeadingAttributes(lines: string[], index: number, pattern: RegExp): number {
  let start = index;
  while (start > 0 && pattern.test((lines[start - 1] ?? '').trim())) {
    start--;
  }
  return start;
}

/**
 * Find direct call expressions in a masked code line: `name(`,
 * `qualifier.name(` or `qualifier::name(`. Qualified calls are reported with
 * `.` as the separator; longer member chains are skipped.
 */
export function findCalls(code: string, keywords: ReadonlySet<string>): string[] {
  const found: string[] = [];
  const pattern = /(?<![\w.:$])((?:[A-Za-z_]\w*(?:\.|::))?[A-Za-z_]\w*)\s*\(/g;
  for (const match of code.matchAll(pattern)) {
    const raw = match[1] ?? '';
    const parts = raw.split(/\.|::/);
    if (parts.length === 1 && keywords.has(raw)) continue;
    found.push(parts.join('.'));
  }
  return found;
}

/**
 * Comment delimiters per language family, and line classification.
 */

export interface BlockDelimiter {
  open: string;
  close: string;
}

export interface CommentSyntax {
  /** Line comment markers; longer markers must precede their prefixes */
  line: string[];
  block: BlockDelimiter[];
}

export const C_STYLE_SYNTAX: CommentSyntax = {
  line: ['///', '//!', '//'],
  block: [{ open: '/**', close: '*/' }, { open: '/*', close: '*/' }],
};

export const HASH_SYNTAX: CommentSyntax = {
  line: ['#'],
  block: [],
};

/** Used for files no adapter claims. */
export const GENERIC_SYNTAX: CommentSyntax = {
  line: ['///', '//!', '//', '#', '--'],
  block: [{ open: '/**', close: '*/' }, { open: '/*', close: '*/' }],
};

export type LineKind = 'blank' | 'comment' | 'code';

export interface ClassifiedLine {
  /** 1-based */
  line: number;
  kind: LineKind;
  /** Comment text without delimiters; null for code and blank lines */
  body: string | null;
}

/**
 * Split text into lines the way line numbers are counted everywhere else:
 * `\n` separated, a trailing `\r` dropped, no phantom line after a final newline.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Classify each line as blank, comment or code.
 *
 * A block comment counts as comment lines from its opening line through its
 * closing line, provided it opens at the start of a line. Inside a block
 * comment a leading `*` is part of the delimiter.
 */
export function* classifyLines(text: string, syntax: CommentSyntax): Generator<ClassifiedLine> {
  const lines = splitLines(text);
  let openBlock: BlockDelimiter | null = null;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const trimmed = raw.trim();
    const line = i + 1;

    if (openBlock) {
      const closeAt = trimmed.indexOf(openBlock.close);
      let inner = closeAt >= 0 ? raw.slice(0, raw.indexOf(openBlock.close)) : raw;
      if (closeAt >= 0) openBlock = null;
      inner = stripLeadingStar(inner);
      yield { line, kind: 'comment', body: inner };
      continue;
    }

    if (trimmed.length === 0) {
      yield { line, kind: 'blank', body: null };
      continue;
    }

    const lineMarker = syntax.line.find((marker) => trimmed.startsWith(marker));
    const blockMarker = syntax.block.find((delimiter) => trimmed.startsWith(delimiter.open));

    // Prefer the longer marker when both match.
    if (blockMarker && (!lineMarker || blockMarker.open.length >= lineMarker.length)) {
      const afterOpen = trimmed.slice(blockMarker.open.length);
      const closeAt = afterOpen.indexOf(blockMarker.close);
      if (closeAt >= 0) {
        yield { line, kind: 'comment', body: afterOpen.slice(0, closeAt) };
      } else {
        openBlock = blockMarker;
        yield { line, kind: 'comment', body: afterOpen };
      }
      continue;
    }

    if (lineMarker) {
      yield { line, kind: 'comment', body: trimmed.slice(lineMarker.length) };
      continue;
    }

    yield { line, kind: 'code', body: null };
  }
}

function stripLeadingStar(text: string): string {
  const match = /^\s*\*(?!\/)/.exec(text);
  return match ? text.slice(match[0].length) : text;
}

/**
 * Width of the leading whitespace of a comment body.
 */
export function indentOf(body: string): number {
  const match = /^[ \t]*/.exec(body);
  return match ? match[0].replace(/\t/g, '    ').length : 0;
}

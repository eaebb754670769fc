/**
 * Tests for comment classification.
 */
import { describe, it, expect } from 'vitest';
import {
  C_STYLE_SYNTAX,
  HASH_SYNTAX,
  classifyLines,
  indentOf,
  splitLines,
} from '../../../../src/core/annotations/comment-syntax.js';

describe('splitLines', () => {
  it('should not count a phantom line after the final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('should drop carriage returns', () => {
    expect(splitLines('a\r\nb')).toEqual(['a', 'b']);
  });

  it('should return no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('classifyLines', () => {
  it('should classify line comments, code and blanks', () => {
    const lines = [...classifyLines('// note\nconst a = 1;\n\n/// doc\n', C_STYLE_SYNTAX)];

    expect(lines).toEqual([
      { line: 1, kind: 'comment', body: ' note' },
      { line: 2, kind: 'code', body: null },
      { line: 3, kind: 'blank', body: null },
      { line: 4, kind: 'comment', body: ' doc' },
    ]);
  });

  it('should strip block comment stars', () => {
    const lines = [...classifyLines('/**\n * @acp:lock frozen\n */\nfoo();', C_STYLE_SYNTAX)];

    expect(lines.map((line) => [line.kind, line.body])).toEqual([
      ['comment', ''],
      ['comment', ' @acp:lock frozen'],
      ['comment', ' '],
      ['code', null],
    ]);
  });

  it('should read single-line block comments', () => {
    const [line] = [...classifyLines('/* @acp:todo - later */', C_STYLE_SYNTAX)];

    expect(line).toEqual({ line: 1, kind: 'comment', body: ' @acp:todo - later ' });
  });

  it('should treat trailing comments as code', () => {
    const [line] = [...classifyLines('x = 1  # @acp:todo - later', HASH_SYNTAX)];

    expect(line?.kind).toBe('code');
  });
});

describe('indentOf', () => {
  it('should count tabs as four spaces', () => {
    expect(indentOf('\t  x')).toBe(6);
  });
});

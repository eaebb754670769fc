/**
 * Tests for the Go extractor.
 */
import { describe, it, expect } from 'vitest';
import { GoExtractor } from '../../../../src/core/extract/go.js';

const extractor = new GoExtractor();

const SOURCE = [
  'package store',
  '',
  'import (',
  '\t"fmt"',
  '\tdb "example.com/app/db"',
  ')',
  '',
  'const MaxItems = 10',
  '',
  'type Store struct {',
  '\titems []string',
  '}',
  '',
  'func New() *Store {',
  '\treturn &Store{}',
  '}',
  '',
  'func (s *Store) Add(item string) {',
  '\tfmt.Println(item)',
  '\tdb.Save(item)',
  '}',
  '',
  'func helper() {}',
  '',
].join('\n');

describe('GoExtractor', () => {
  const result = extractor.extractStructure(SOURCE, 'store/store.go');

  it('should claim .go files', () => {
    expect(extractor.extensions).toEqual(['.go']);
  });

  it('should report the file boundary', () => {
    expect(result.file).toEqual({ lineSpan: { start: 1, end: 23 }, lines: 23 });
  });

  it('should find top-level declarations with their spans', () => {
    expect(result.symbols.map((s) => [s.name, s.kind, s.lineSpan.start, s.lineSpan.end])).toEqual([
      ['MaxItems', 'const', 8, 8],
      ['Store', 'struct', 10, 12],
      ['New', 'function', 14, 16],
      ['Add', 'method', 18, 21],
      ['helper', 'function', 23, 23],
    ]);
  });

  it('should attach receiver types as containers', () => {
    const add = result.symbols.find((s) => s.name === 'Add');
    expect(add?.container).toBe('Store');
    expect(add?.signature).toBe('func (s *Store) Add(item string)');
  });

  it('should export capitalized names only', () => {
    expect(result.symbols.filter((s) => s.exported).map((s) => s.name)).toEqual(['MaxItems', 'Store', 'New', 'Add']);
    expect(result.exports).toEqual([
      { name: 'MaxItems', local: 'MaxItems' },
      { name: 'Store', local: 'Store' },
      { name: 'New', local: 'New' },
    ]);
  });

  it('should bind imports to their package name or alias', () => {
    expect(result.imports).toEqual([
      { specifier: 'fmt', line: 4, names: [], namespaceAlias: 'fmt' },
      { specifier: 'example.com/app/db', line: 5, names: [], namespaceAlias: 'db' },
    ]);
  });

  it('should record qualified calls inside bodies', () => {
    expect(result.calls).toEqual([
      { callee: 'fmt.Println', line: 19 },
      { callee: 'db.Save', line: 20 },
    ]);
  });

  it('should treat dot imports as wildcards and blank imports as bindings to nothing', () => {
    const imports = extractor.extractStructure(
      ['package main', '', 'import . "math"', 'import _ "embed"', ''].join('\n'),
      'main.go'
    ).imports;

    expect(imports).toEqual([
      { specifier: 'math', line: 3, names: [], wildcard: true },
      { specifier: 'embed', line: 4, names: [] },
    ]);
  });

  it('should split const groups into members', () => {
    const symbols = extractor.extractStructure(
      ['package x', 'const (', '\tAlpha = 1', '\tbeta = 2', ')', ''].join('\n'),
      'x.go'
    ).symbols;

    expect(symbols.map((s) => [s.name, s.kind, s.lineSpan.start, s.exported])).toEqual([
      ['Alpha', 'const', 3, true],
      ['beta', 'const', 4, false],
    ]);
  });

  it('should ignore braces inside string literals', () => {
    const symbols = extractor.extractStructure(
      ['package x', '', 'func Open() {', '\tlog("{")', '}', '', 'func Close() {}', ''].join('\n'),
      'x.go'
    ).symbols;

    expect(symbols.map((s) => [s.name, s.lineSpan.start, s.lineSpan.end])).toEqual([
      ['Open', 3, 5],
      ['Close', 7, 7],
    ]);
  });
});

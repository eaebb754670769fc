/**
 * Tests for the TypeScript extractor.
 */
import { describe, it, expect, afterAll } from 'vitest';
import { TypeScriptExtractor } from '../../../../src/core/extract/typescript.js';

const extractor = new TypeScriptExtractor();

afterAll(() => {
  extractor.dispose();
});

const SOURCE = [
  "import { helper, format as fmt } from './util';",
  "import * as ns from './ns';",
  "import def from './def';",
  '',
  'export function validate(input: string): boolean {',
  '  return helper(input) && ns.check(input);',
  '}',
  '',
  'export class Service {',
  '  run(): void {',
  '    this.step();',
  '  }',
  '  private step(): void {}',
  '}',
  '',
  'export const LIMIT = 10;',
  'let counter = 0;',
  "export * from './reexported';",
  'export { validate as check };',
  '',
].join('\n');

describe('TypeScriptExtractor', () => {
  const result = extractor.extractStructure(SOURCE, 'src/service.ts');

  it('should report the file boundary', () => {
    expect(result.file).toEqual({ lineSpan: { start: 1, end: 19 }, lines: 19 });
  });

  it('should find declarations in statement order', () => {
    expect(result.symbols.map((s) => [s.name, s.kind, s.lineSpan.start, s.lineSpan.end])).toEqual([
      ['validate', 'function', 5, 7],
      ['Service', 'class', 9, 14],
      ['run', 'method', 10, 12],
      ['step', 'method', 13, 13],
      ['LIMIT', 'const', 16, 16],
      ['counter', 'variable', 17, 17],
    ]);
  });

  it('should mark private members and unexported bindings', () => {
    expect(result.symbols.map((s) => [s.name, s.exported])).toEqual([
      ['validate', true],
      ['Service', true],
      ['run', true],
      ['step', false],
      ['LIMIT', true],
      ['counter', false],
    ]);
    expect(result.symbols.find((s) => s.name === 'run')?.container).toBe('Service');
  });

  it('should cut signatures before the body', () => {
    const signatures = Object.fromEntries(result.symbols.map((s) => [s.name, s.signature]));

    expect(signatures['validate']).toBe('export function validate(input: string): boolean');
    expect(signatures['Service']).toBe('export class Service');
    expect(signatures['run']).toBe('run(): void');
    expect(signatures['LIMIT']).toBe('const LIMIT = 10');
    expect(signatures['counter']).toBe('let counter = 0');
  });

  it('should build the export table with re-exports and aliases', () => {
    expect(result.exports).toEqual([
      { name: 'validate', local: 'validate' },
      { name: 'Service', local: 'Service' },
      { name: 'LIMIT', local: 'LIMIT' },
      { name: '*', from: './reexported', sourceName: '*' },
      { name: 'check', local: 'validate' },
    ]);
  });

  it('should record named, namespace and default imports', () => {
    expect(result.imports).toEqual([
      {
        specifier: './util',
        line: 1,
        names: [
          { name: 'helper', local: 'helper' },
          { name: 'format', local: 'fmt' },
        ],
      },
      { specifier: './ns', line: 2, names: [], namespaceAlias: 'ns' },
      { specifier: './def', line: 3, names: [{ name: 'default', local: 'def' }] },
      { specifier: './reexported', line: 18, names: [] },
    ]);
  });

  it('should record direct, namespaced and this calls', () => {
    expect(result.calls).toEqual([
      { callee: 'helper', line: 6 },
      { callee: 'ns.check', line: 6 },
      { callee: 'this.step', line: 11 },
    ]);
  });

  it('should read require bindings and dynamic imports', () => {
    const source = [
      "const fs = require('fs');",
      "const { join, resolve: res } = require('path');",
      'async function load() {',
      "  return import('./lazy');",
      '}',
      '',
    ].join('\n');
    const loader = extractor.extractStructure(source, 'src/loader.ts');

    expect(loader.imports).toEqual([
      { specifier: 'fs', line: 1, names: [], namespaceAlias: 'fs' },
      {
        specifier: 'path',
        line: 2,
        names: [
          { name: 'join', local: 'join' },
          { name: 'resolve', local: 'res' },
        ],
      },
      { specifier: './lazy', line: 4, names: [] },
    ]);
    expect(loader.symbols.map((s) => s.name)).toEqual(['load']);
    expect(loader.calls).toEqual([]);
  });

  it('should export default declarations as default', () => {
    const widget = extractor.extractStructure('export default class Widget {}\n', 'src/widget.ts');

    expect(widget.exports).toEqual([{ name: 'default', local: 'Widget' }]);
  });

  it('should record constructor calls', () => {
    const calls = extractor.extractStructure('const s = new Service();\n', 'src/main.ts').calls;

    expect(calls).toEqual([{ callee: 'Service', line: 1 }]);
  });
});

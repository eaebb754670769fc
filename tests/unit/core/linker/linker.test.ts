/**
 * Tests for cross-file linking.
 */
import { describe, it, expect, afterAll } from 'vitest';
import { indexFile, type FileIndexOptions, type IndexedFile } from '../../../../src/core/indexer/file-indexer.js';
import { createDefaultRegistry } from '../../../../src/core/extract/register.js';
import { assembleRoot, toLinkUnit } from '../../../../src/core/cache/builder.js';
import { LinkTables } from '../../../../src/core/linker/tables.js';
import { linkUnit } from '../../../../src/core/linker/linker.js';

const registry = createDefaultRegistry();
const options: FileIndexOptions = { registry, mode: 'permissive', reviewThreshold: 0.8, customNamespaces: new Set() };

afterAll(() => {
  registry.disposeAll();
});

function index(files: Record<string, string>): IndexedFile[] {
  return Object.entries(files).map(([path, text]) => indexFile(path, text, options));
}

const UTIL = [
  'export function helper() {}',
  'export class Box {',
  '  open() {}',
  '  run() {',
  '    this.open();',
  '  }',
  '}',
  '',
].join('\n');

const BARREL = ["export * from './util';", "export { helper as assist } from './util';", ''].join('\n');

const MAIN = [
  "import { helper, Box } from './util';",
  "import * as idx from './index';",
  "import { readFile } from 'node:fs';",
  '',
  'export function main() {',
  '  helper();',
  '  idx.assist();',
  '  readFile();',
  '  local();',
  '  const b = new Box();',
  '}',
  '',
  'function local() {}',
  '',
].join('\n');

describe('LinkTables', () => {
  const tables = new LinkTables(
    index({ 'src/util.ts': UTIL, 'src/index.ts': BARREL, 'src/main.ts': MAIN }).map(toLinkUnit)
  );

  it('should resolve local exports to qualified names', () => {
    expect(tables.resolveExport('src/util.ts', 'helper')).toBe('src/util.ts:helper');
  });

  it('should follow star and renamed re-exports', () => {
    expect(tables.resolveExport('src/index.ts', 'Box')).toBe('src/util.ts:Box');
    expect(tables.resolveExport('src/index.ts', 'assist')).toBe('src/util.ts:helper');
  });

  it('should return null for names that are not exported', () => {
    expect(tables.resolveExport('src/index.ts', 'missing')).toBeNull();
    expect(tables.resolveExport('src/main.ts', 'local')).toBeNull();
  });

  it('should stop on re-export cycles', () => {
    const cyclic = new LinkTables(
      index({ 'src/a.ts': "export * from './b';\n", 'src/b.ts': "export * from './a';\n" }).map(toLinkUnit)
    );

    expect(cyclic.resolveExport('src/a.ts', 'anything')).toBeNull();
  });
});

describe('linkUnit', () => {
  const indexed = index({ 'src/util.ts': UTIL, 'src/index.ts': BARREL, 'src/main.ts': MAIN });
  const tables = new LinkTables(indexed.map(toLinkUnit));
  const main = indexed.find((file) => file.path === 'src/main.ts');
  const util = indexed.find((file) => file.path === 'src/util.ts');

  it('should resolve import statements to targets and symbols', () => {
    if (!main) throw new Error('main not indexed');
    const linked = linkUnit(toLinkUnit(main), tables);

    expect(linked.imports).toEqual([
      {
        specifier: './util',
        line: 1,
        target: 'src/util.ts',
        names: [
          { name: 'helper', local: 'helper', symbol: 'src/util.ts:helper' },
          { name: 'Box', local: 'Box', symbol: 'src/util.ts:Box' },
        ],
      },
      { specifier: './index', line: 2, namespaceAlias: 'idx', target: 'src/index.ts', names: [] },
      {
        specifier: 'node:fs',
        line: 3,
        target: 'external',
        names: [{ name: 'readFile', local: 'readFile', symbol: 'external' }],
      },
    ]);
  });

  it('should resolve calls through imports, namespaces and local scope', () => {
    if (!main) throw new Error('main not indexed');
    const linked = linkUnit(toLinkUnit(main), tables);

    expect(linked.callees.get('src/main.ts:main')).toEqual([
      'external',
      'src/main.ts:local',
      'src/util.ts:Box',
      'src/util.ts:helper',
    ]);
  });

  it('should resolve this-calls to members of the same class', () => {
    if (!util) throw new Error('util not indexed');
    const linked = linkUnit(toLinkUnit(util), tables);

    expect(linked.callees.get('src/util.ts:Box.run')).toEqual(['src/util.ts:Box.open']);
  });
});

describe('reverse edges', () => {
  const root = assembleRoot(index({ 'src/util.ts': UTIL, 'src/index.ts': BARREL, 'src/main.ts': MAIN }), () => true);

  it('should derive importedBy from resolved imports', () => {
    expect(root.files['src/util.ts']?.importedBy).toEqual(['src/index.ts', 'src/main.ts']);
    expect(root.files['src/index.ts']?.importedBy).toEqual(['src/main.ts']);
    expect(root.files['src/main.ts']?.importedBy).toEqual([]);
  });

  it('should derive callers from callees, skipping external', () => {
    expect(root.symbols['src/util.ts:helper']?.callers).toEqual(['src/main.ts:main']);
    expect(root.symbols['src/util.ts:Box.open']?.callers).toEqual(['src/util.ts:Box.run']);
    expect(root.symbols['src/main.ts:main']?.callers).toEqual([]);
  });
});

/**
 * Tests for the extractor registry and language detection.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { ExtractorRegistry } from '../../../../src/core/extract/registry.js';
import { createDefaultRegistry } from '../../../../src/core/extract/register.js';
import { detectLanguage } from '../../../../src/core/extract/languages.js';
import { GoExtractor } from '../../../../src/core/extract/go.js';

describe('ExtractorRegistry', () => {
  const registry = createDefaultRegistry();

  afterEach(() => {
    registry.disposeAll();
  });

  it('should register the built-in adapters', () => {
    expect(['a.ts', 'a.py', 'a.go', 'a.rs', 'A.java'].map((file) => registry.getForFile(file)?.id)).toEqual([
      'typescript',
      'python',
      'go',
      'rust',
      'java',
    ]);
  });

  it('should resolve adapters by file extension, ignoring case', () => {
    expect(registry.getForFile('src/a.tsx')?.id).toBe('typescript');
    expect(registry.getForFile('lib/util.PY')?.id).toBe('python');
    expect(registry.getForFile('cmd/main.go')?.id).toBe('go');
    expect(registry.getForFile('README.md')).toBeNull();
  });

  it('should create each adapter once', () => {
    expect(registry.getForFile('src/a.rs')).toBe(registry.getForFile('src/b.rs'));
  });

  it('should build adapters lazily', () => {
    const local = new ExtractorRegistry();
    let created = 0;
    local.register(
      'go',
      () => {
        created++;
        return new GoExtractor();
      },
      ['.go']
    );

    expect(created).toBe(0);
    local.getForExtension('.go');
    local.getForExtension('.GO');
    expect(created).toBe(1);
  });

  it('should create fresh adapters after disposal', () => {
    const local = createDefaultRegistry();
    const first = local.getForFile('main.go');
    local.disposeAll();

    const second = local.getForFile('main.go');

    expect(second).not.toBeNull();
    expect(second).not.toBe(first);
    local.disposeAll();
  });
});

describe('detectLanguage', () => {
  it('should map extensions to language names', () => {
    expect(detectLanguage('src/index.ts')).toBe('typescript');
    expect(detectLanguage('src/app.mjs')).toBe('javascript');
    expect(detectLanguage('pkg/mod.pyi')).toBe('python');
    expect(detectLanguage('Main.KT')).toBe('kotlin');
    expect(detectLanguage('Makefile')).toBe('unknown');
  });
});

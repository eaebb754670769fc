/**
 * Tests for import specifier resolution.
 */
import { describe, it, expect } from 'vitest';
import { FileSet, resolveModule } from '../../../../src/core/linker/resolve-module.js';

describe('resolveModule', () => {
  describe('typescript', () => {
    const files = new FileSet(['src/a.ts', 'src/util.ts', 'src/lib/index.ts', 'src/view.tsx']);
    const resolve = (specifier: string, from = 'src/a.ts') => resolveModule({ specifier }, from, 'typescript', files);

    it('should try extensions and index files', () => {
      expect(resolve('./util')).toEqual(['src/util.ts']);
      expect(resolve('./lib')).toEqual(['src/lib/index.ts']);
      expect(resolve('./view')).toEqual(['src/view.tsx']);
    });

    it('should map emitted .js specifiers back to sources', () => {
      expect(resolve('./util.js')).toEqual(['src/util.ts']);
    });

    it('should resolve parent-relative specifiers', () => {
      expect(resolve('../util', 'src/lib/index.ts')).toEqual(['src/util.ts']);
    });

    it('should leave packages and paths outside the project unresolved', () => {
      expect(resolve('lodash')).toEqual([]);
      expect(resolve('../../outside')).toEqual([]);
      expect(resolve('./missing')).toEqual([]);
    });
  });

  describe('python', () => {
    const files = new FileSet(['pkg/__init__.py', 'pkg/models.py', 'pkg/sub/service.py', 'src/app/core.py']);
    const resolve = (specifier: string, from: string) => resolveModule({ specifier }, from, 'python', files);

    it('should resolve relative imports against the importing package', () => {
      expect(resolve('.models', 'pkg/service.py')).toEqual(['pkg/models.py']);
      expect(resolve('..models', 'pkg/sub/service.py')).toEqual(['pkg/models.py']);
    });

    it('should resolve absolute imports from the root or src/', () => {
      expect(resolve('pkg', 'main.py')).toEqual(['pkg/__init__.py']);
      expect(resolve('app.core', 'main.py')).toEqual(['src/app/core.py']);
      expect(resolve('os', 'main.py')).toEqual([]);
    });
  });

  describe('rust', () => {
    const files = new FileSet(['src/lib.rs', 'src/db/mod.rs', 'src/db/pool.rs', 'src/model.rs']);
    const resolve = (specifier: string) => resolveModule({ specifier }, 'src/db/pool.rs', 'rust', files);

    it('should resolve crate paths, falling back to the enclosing module file', () => {
      expect(resolve('crate::model')).toEqual(['src/model.rs']);
      expect(resolve('crate::model::User')).toEqual(['src/model.rs']);
    });

    it('should resolve super paths', () => {
      expect(resolve('super::Thing')).toEqual(['src/db/mod.rs']);
    });

    it('should leave external crates unresolved', () => {
      expect(resolve('std::collections')).toEqual([]);
    });
  });

  describe('java', () => {
    const files = new FileSet([
      'src/main/java/com/example/db/Repo.java',
      'src/main/java/com/example/db/Pool.java',
      'src/main/java/com/example/app/App.java',
    ]);
    const resolve = (specifier: string, wildcard = false) =>
      resolveModule({ specifier, wildcard }, 'src/main/java/com/example/app/App.java', 'java', files);

    it('should match class files by package path suffix', () => {
      expect(resolve('com.example.db.Repo')).toEqual(['src/main/java/com/example/db/Repo.java']);
      expect(resolve('com.example.db.Repo.Inner')).toEqual(['src/main/java/com/example/db/Repo.java']);
    });

    it('should expand wildcard imports to every file of the package', () => {
      expect(resolve('com.example.db', true)).toEqual([
        'src/main/java/com/example/db/Pool.java',
        'src/main/java/com/example/db/Repo.java',
      ]);
    });

    it('should leave library classes unresolved', () => {
      expect(resolve('java.util.List')).toEqual([]);
    });
  });

  describe('go', () => {
    const files = new FileSet(['cmd/main.go', 'internal/db/db.go', 'internal/db/query.go', 'internal/db/README.md']);

    it('should resolve a package to all of its Go files', () => {
      expect(resolveModule({ specifier: 'example.com/app/internal/db' }, 'cmd/main.go', 'go', files)).toEqual([
        'internal/db/db.go',
        'internal/db/query.go',
      ]);
    });

    it('should leave the standard library unresolved', () => {
      expect(resolveModule({ specifier: 'fmt' }, 'cmd/main.go', 'go', files)).toEqual([]);
    });
  });

  it('should resolve nothing for languages without an adapter', () => {
    expect(resolveModule({ specifier: './a' }, 'x.rb', 'ruby', new FileSet(['a.rb']))).toEqual([]);
  });
});

/**
 * Import specifier resolution against the set of indexed project files.
 * Paths are project-relative with `/` separators.
 */
import { posix } from 'node:path';
import { compareStrings } from '../../utils/collections.js';

const SCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

/** Emitted extension -> source extensions it may have been compiled from */
const SOURCE_FOR_EMITTED: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

/**
 * Indexed project paths with a directory index.
 */
export class FileSet {
  private readonly paths: Set<string>;
  private readonly byDirectory = new Map<string, string[]>();

  constructor(paths: Iterable<string>) {
    this.paths = new Set(paths);
    for (const file of this.paths) {
      const dir = posix.dirname(file);
      const list = this.byDirectory.get(dir);
      if (list) list.push(file);
      else this.byDirectory.set(dir, [file]);
    }
    for (const list of this.byDirectory.values()) list.sort(compareStrings);
  }

  has(file: string): boolean {
    return this.paths.has(file);
  }

  inDirectory(dir: string): string[] {
    return this.byDirectory.get(dir) ?? [];
  }

  directories(): string[] {
    return [...this.byDirectory.keys()].sort(compareStrings);
  }
}

export interface ModuleRequest {
  specifier: string;
  wildcard?: boolean;
}

/**
 * Project files an import refers to; empty when it points outside the
 * project.
 */
export function resolveModule(request: ModuleRequest, fromPath: string, language: string, files: FileSet): string[] {
  switch (language) {
    case 'typescript':
    case 'javascript':
      return resolveScript(request.specifier, fromPath, files);
    case 'python':
      return resolvePython(request.specifier, fromPath, files);
    case 'rust':
      return resolveRust(request.specifier, fromPath, files);
    case 'java':
      return resolveJava(request.specifier, Boolean(request.wildcard), files);
    case 'go':
      return resolveGo(request.specifier, files);
    default:
      return [];
  }
}

function firstExisting(candidates: string[], files: FileSet): string[] {
  const found = candidates.find((candidate) => files.has(candidate));
  return found ? [found] : [];
}

/**
 * Relative specifiers only; bare specifiers are packages.
 */
function resolveScript(specifier: string, fromPath: string, files: FileSet): string[] {
  if (!/^\.\.?(\/|$)/.test(specifier)) return [];
  const base = posix.normalize(posix.join(posix.dirname(fromPath), specifier));
  if (base.startsWith('../')) return [];

  const candidates = [base];
  const ext = posix.extname(base);
  const sources = SOURCE_FOR_EMITTED[ext];
  if (sources) {
    const stem = base.slice(0, -ext.length);
    candidates.push(...sources.map((source) => stem + source));
  }
  candidates.push(...SCRIPT_EXTENSIONS.map((extension) => base + extension));
  candidates.push(...SCRIPT_EXTENSIONS.map((extension) => posix.join(base, `index${extension}`)));
  return firstExisting(candidates, files);
}

/**
 * `.mod`, `..pkg.mod` relative to the importing package; `a.b` from the
 * project root or `src/`.
 */
function resolvePython(specifier: string, fromPath: string, files: FileSet): string[] {
  const dots = /^\.*/.exec(specifier)?.[0].length ?? 0;
  const rest = specifier.slice(dots);
  const segments = rest ? rest.split('.') : [];

  let bases: string[];
  if (dots > 0) {
    let dir = posix.dirname(fromPath);
    for (let i = 1; i < dots; i++) dir = posix.dirname(dir);
    bases = [dir];
  } else {
    bases = ['.', 'src'];
  }

  const candidates: string[] = [];
  for (const base of bases) {
    const modulePath = posix.join(base, ...segments);
    if (segments.length > 0) {
      candidates.push(`${modulePath}.py`, `${modulePath}.pyi`);
    }
    candidates.push(posix.join(modulePath, '__init__.py'), posix.join(modulePath, '__init__.pyi'));
  }
  return firstExisting(candidates, files);
}

function rustCrateRoot(fromPath: string, files: FileSet): string {
  let dir = posix.dirname(fromPath);
  for (;;) {
    if (files.has(posix.join(dir, 'lib.rs')) || files.has(posix.join(dir, 'main.rs'))) return dir;
    if (dir === '.') return posix.dirname(fromPath);
    dir = posix.dirname(dir);
  }
}

function rustModulePath(file: string, crateRoot: string): string[] {
  const segments = posix.relative(crateRoot, file).replace(/\.rs$/, '').split('/');
  const last = segments.pop() ?? '';
  if (last === 'mod') return segments;
  if (segments.length === 0 && (last === 'lib' || last === 'main')) return [];
  return [...segments, last];
}

function rustModuleFile(crateRoot: string, segments: string[], files: FileSet): string | null {
  const candidates =
    segments.length === 0
      ? [posix.join(crateRoot, 'lib.rs'), posix.join(crateRoot, 'main.rs')]
      : [`${posix.join(crateRoot, ...segments)}.rs`, posix.join(crateRoot, ...segments, 'mod.rs')];
  return candidates.find((candidate) => files.has(candidate)) ?? null;
}

/**
 * `crate::`, `self::` and `super::` paths, and paths starting with a
 * submodule of the current module. The longest prefix that names a module
 * file wins, so items of inline modules land on the enclosing file.
 */
function resolveRust(specifier: string, fromPath: string, files: FileSet): string[] {
  const segments = specifier.split('::').filter((segment) => segment.length > 0);
  const crateRoot = rustCrateRoot(fromPath, files);
  const current = rustModulePath(fromPath, crateRoot);
  const first = segments[0];

  let absolute: string[];
  if (first === 'crate') {
    absolute = segments.slice(1);
  } else if (first === 'self') {
    absolute = [...current, ...segments.slice(1)];
  } else if (first === 'super') {
    let ups = 0;
    while (segments[ups] === 'super') ups++;
    if (ups > current.length) return [];
    absolute = [...current.slice(0, current.length - ups), ...segments.slice(ups)];
  } else if (first !== undefined && rustModuleFile(crateRoot, [...current, first], files)) {
    absolute = [...current, ...segments];
  } else {
    return [];
  }

  for (let n = absolute.length; n >= 0; n--) {
    const file = rustModuleFile(crateRoot, absolute.slice(0, n), files);
    if (file) return [file];
  }
  return [];
}

/**
 * `a.b.C` matches a file ending in `a/b/C.java`; nested classes fall back to
 * their outer class file. Wildcards name a package directory.
 */
function resolveJava(specifier: string, wildcard: boolean, files: FileSet): string[] {
  const relative = specifier.replace(/\./g, '/');
  if (wildcard) {
    const packageFiles = files
      .directories()
      .filter((dir) => dir === relative || dir.endsWith(`/${relative}`))
      .flatMap((dir) => files.inDirectory(dir).filter((file) => file.endsWith('.java')));
    if (packageFiles.length > 0) return packageFiles;
  }

  const segments = relative.split('/');
  for (let n = segments.length; n > 0; n--) {
    const suffix = `${segments.slice(0, n).join('/')}.java`;
    const match = files
      .directories()
      .flatMap((dir) => files.inDirectory(dir))
      .find((file) => file === suffix || file.endsWith(`/${suffix}`));
    if (match) return [match];
  }
  return [];
}

/**
 * The package directory whose path is the longest suffix of the import
 * path; every Go file in it.
 */
function resolveGo(specifier: string, files: FileSet): string[] {
  let best: string | null = null;
  for (const dir of files.directories()) {
    if (dir === '.') continue;
    if (specifier !== dir && !specifier.endsWith(`/${dir}`)) continue;
    if (!files.inDirectory(dir).some((file) => file.endsWith('.go'))) continue;
    if (best === null || dir.length > best.length) best = dir;
  }
  return best === null ? [] : files.inDirectory(best).filter((file) => file.endsWith('.go'));
}

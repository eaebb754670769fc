/**
 * Pass 1 of linking: global symbol lookup and export tables.
 */
import { posix } from 'node:path';
import type { ExportRow, ImportStatement } from '../extract/types.js';
import { EXTERNAL, type CallRecord, type SymbolEntry } from '../cache/types.js';
import { displayName } from '../indexer/file-indexer.js';
import { FileSet, resolveModule, type ModuleRequest } from './resolve-module.js';

/** Everything the linker needs to know about one file. */
export interface LinkUnit {
  path: string;
  language: string;
  symbols: SymbolEntry[];
  exports: ExportRow[];
  imports: ImportStatement[];
  calls: CallRecord[];
}

interface Lookup {
  value: string | null;
  /** False when a re-export cycle cut the search short */
  complete: boolean;
}

/** Languages where files of one directory share a namespace */
const PACKAGE_SCOPED = new Set(['go', 'java']);

export class LinkTables {
  readonly files: FileSet;
  private readonly units = new Map<string, LinkUnit>();
  private readonly symbols = new Map<string, SymbolEntry>();
  private readonly byDisplayName = new Map<string, Map<string, string>>();
  private readonly moduleCache = new Map<string, string[]>();
  private readonly exportCache = new Map<string, string | null>();

  constructor(units: Iterable<LinkUnit>) {
    for (const unit of units) {
      this.units.set(unit.path, unit);
      const names = new Map<string, string>();
      for (const symbol of unit.symbols) {
        this.symbols.set(symbol.qualifiedName, symbol);
        const display = displayName(symbol);
        if (!names.has(display)) names.set(display, symbol.qualifiedName);
      }
      this.byDisplayName.set(unit.path, names);
    }
    this.files = new FileSet(this.units.keys());
  }

  unit(path: string): LinkUnit | undefined {
    return this.units.get(path);
  }

  symbol(qualifiedName: string): SymbolEntry | undefined {
    return this.symbols.get(qualifiedName);
  }

  /**
   * Qualified name of the first symbol of a file with this display name
   * (`name` or `Container.name`).
   */
  symbolNamed(path: string, name: string): string | undefined {
    return this.byDisplayName.get(path)?.get(name);
  }

  /**
   * Top-level symbols of the other files in the same package directory.
   */
  packageSymbol(unit: LinkUnit, name: string): string | undefined {
    if (!PACKAGE_SCOPED.has(unit.language)) return undefined;
    for (const sibling of this.files.inDirectory(posix.dirname(unit.path))) {
      if (sibling === unit.path || this.units.get(sibling)?.language !== unit.language) continue;
      const found = this.symbolNamed(sibling, name);
      if (found) return found;
    }
    return undefined;
  }

  resolveModule(request: ModuleRequest, fromPath: string): string[] {
    const key = `${fromPath}\0${request.specifier}\0${request.wildcard ? '*' : ''}`;
    const cached = this.moduleCache.get(key);
    if (cached) return cached;
    const language = this.units.get(fromPath)?.language ?? '';
    const resolved = resolveModule(request, fromPath, language, this.files).filter((file) => file !== fromPath);
    this.moduleCache.set(key, resolved);
    return resolved;
  }

  /**
   * Resolve an exported name of a file to a qualified name, following
   * re-export chains. `external` when a chain leaves the project; null when
   * the name is not exported.
   */
  resolveExport(path: string, name: string): string | null {
    return this.lookupExport(path, name, new Set()).value;
  }

  /**
   * Resolve a name bound by an import statement of a file.
   */
  resolveImportedName(path: string, statement: ImportStatement, name: string): string | null {
    return this.lookupImported(path, statement, name, new Set()).value;
  }

  private lookupImported(path: string, statement: ImportStatement, name: string, visiting: Set<string>): Lookup {
    const targets = this.resolveModule(statement, path);
    if (targets.length === 0) return { value: EXTERNAL, complete: true };
    let complete = true;
    for (const target of targets) {
      const found = this.lookupExport(target, name, visiting);
      complete &&= found.complete;
      if (found.value !== null) return { value: found.value, complete };
    }
    return { value: null, complete };
  }

  private lookupExport(path: string, name: string, visiting: Set<string>): Lookup {
    const key = `${path}\0${name}`;
    if (this.exportCache.has(key)) return { value: this.exportCache.get(key) ?? null, complete: true };
    if (visiting.has(key)) return { value: null, complete: false };

    visiting.add(key);
    const result = this.computeExport(path, name, visiting);
    visiting.delete(key);
    if (result.complete) this.exportCache.set(key, result.value);
    return result;
  }

  private computeExport(path: string, name: string, visiting: Set<string>): Lookup {
    const unit = this.units.get(path);
    if (!unit) return { value: null, complete: true };
    let complete = true;

    for (const row of unit.exports) {
      if (row.name !== name) continue;

      if (row.from === undefined) {
        const local = row.local ?? row.name;
        const symbol = this.symbolNamed(path, local);
        if (symbol) return { value: symbol, complete };
        const binding = findBinding(unit, local);
        if (binding) {
          const found = this.lookupImported(path, binding.statement, binding.name, visiting);
          complete &&= found.complete;
          if (found.value !== null) return { value: found.value, complete };
        }
        continue;
      }

      // `export * as ns from` binds a module, not a symbol
      if (row.sourceName === '*') continue;
      const found = this.lookupImported(path, { specifier: row.from, line: 0, names: [] }, row.sourceName ?? row.name, visiting);
      complete &&= found.complete;
      if (found.value !== null) return { value: found.value, complete };
    }

    if (name !== 'default') {
      for (const row of unit.exports) {
        if (row.name !== '*' || row.from === undefined) continue;
        for (const target of this.resolveModule({ specifier: row.from }, path)) {
          const found = this.lookupExport(target, name, visiting);
          complete &&= found.complete;
          if (found.value !== null && found.value !== EXTERNAL) return { value: found.value, complete };
        }
      }
    }

    return { value: null, complete };
  }
}

export interface ImportBinding {
  statement: ImportStatement;
  /** Name in the imported module */
  name: string;
}

/**
 * The import that binds a local name in a file, if any.
 */
export function findBinding(unit: LinkUnit, local: string): ImportBinding | undefined {
  for (const statement of unit.imports) {
    const imported = statement.names.find((entry) => entry.local === local);
    if (imported) return { statement, name: imported.name };
  }
  return undefined;
}

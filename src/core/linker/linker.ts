/**
 * Pass 2 of linking: resolved imports and call edges per file, and the
 * reverse reductions over the whole project.
 */
import { EXTERNAL, type FileEntry, type ImportEntry, type SymbolEntry } from '../cache/types.js';
import { sortedUnique } from '../../utils/collections.js';
import { findBinding, type LinkTables, type LinkUnit } from './tables.js';

export interface LinkedFile {
  imports: ImportEntry[];
  /** caller qualified name -> sorted callees */
  callees: Map<string, string[]>;
}

/**
 * Resolve the imports and outgoing call edges of one file. Reads the
 * global tables only.
 */
export function linkUnit(unit: LinkUnit, tables: LinkTables): LinkedFile {
  const imports: ImportEntry[] = [];

  for (const statement of unit.imports) {
    const targets = tables.resolveModule(statement, unit.path);
    const base = {
      specifier: statement.specifier,
      line: statement.line,
      ...(statement.namespaceAlias !== undefined ? { namespaceAlias: statement.namespaceAlias } : {}),
      ...(statement.wildcard ? { wildcard: true } : {}),
    };
    if (targets.length === 0) {
      imports.push({
        ...base,
        target: EXTERNAL,
        names: statement.names.map((name) => ({ ...name, symbol: EXTERNAL })),
      });
      continue;
    }
    for (const target of targets) {
      imports.push({
        ...base,
        target,
        names: statement.names.map((name) => ({
          ...name,
          symbol: tables.resolveExport(target, name.name) ?? EXTERNAL,
        })),
      });
    }
  }

  const edges = new Map<string, string[]>();
  for (const call of unit.calls) {
    if (!call.caller) continue;
    const caller = tables.symbol(call.caller);
    if (!caller) continue;
    const callee = resolveCall(call.callee, unit, caller, tables);
    if (callee === undefined) continue;
    const list = edges.get(call.caller);
    if (list) list.push(callee);
    else edges.set(call.caller, [callee]);
  }

  const callees = new Map<string, string[]>();
  for (const [caller, list] of edges) callees.set(caller, sortedUnique(list));
  return { imports, callees };
}

/**
 * Resolve a raw callee to a qualified name or `external`; undefined when
 * the call cannot be attributed.
 */
export function resolveCall(
  callee: string,
  unit: LinkUnit,
  caller: SymbolEntry,
  tables: LinkTables
): string | undefined {
  const dot = callee.indexOf('.');
  if (dot < 0) return resolveBareCall(callee, unit, tables);

  const qualifier = callee.slice(0, dot);
  const member = callee.slice(dot + 1);

  if (qualifier === 'this' || qualifier === 'self') {
    return caller.container ? tables.symbolNamed(unit.path, `${caller.container}.${member}`) : undefined;
  }

  // Namespace or package alias
  for (const statement of unit.imports) {
    if (statement.namespaceAlias !== qualifier) continue;
    const targets = tables.resolveModule(statement, unit.path);
    if (targets.length === 0) return EXTERNAL;
    for (const target of targets) {
      const found = tables.resolveExport(target, member);
      if (found !== null) return found;
    }
    return undefined;
  }

  // Member of an imported class or type
  const binding = findBinding(unit, qualifier);
  if (binding) {
    const owner = tables.resolveImportedName(unit.path, binding.statement, binding.name);
    if (owner === null) return undefined;
    if (owner === EXTERNAL) return EXTERNAL;
    return memberOf(owner, member, tables);
  }

  const local = tables.symbolNamed(unit.path, qualifier);
  if (local) return memberOf(local, member, tables);

  const sibling = tables.packageSymbol(unit, qualifier);
  return sibling ? memberOf(sibling, member, tables) : undefined;
}

function resolveBareCall(name: string, unit: LinkUnit, tables: LinkTables): string | undefined {
  const binding = findBinding(unit, name);
  if (binding) {
    return tables.resolveImportedName(unit.path, binding.statement, binding.name) ?? EXTERNAL;
  }

  const local = tables.symbolNamed(unit.path, name);
  if (local && tables.symbol(local)?.container === undefined) return local;

  for (const statement of unit.imports) {
    if (!statement.wildcard) continue;
    for (const target of tables.resolveModule(statement, unit.path)) {
      const found = tables.resolveExport(target, name);
      if (found !== null && found !== EXTERNAL) return found;
    }
  }

  return tables.packageSymbol(unit, name);
}

function memberOf(ownerQualifiedName: string, member: string, tables: LinkTables): string | undefined {
  const owner = tables.symbol(ownerQualifiedName);
  if (!owner) return undefined;
  return tables.symbolNamed(owner.file, `${owner.name}.${member}`);
}

/**
 * Rebuild `importedBy` and `callers` from the forward edges. Lists are
 * sorted and de-duplicated.
 */
export function reduceReverseEdges(files: Record<string, FileEntry>, symbols: Record<string, SymbolEntry>): void {
  const importedBy = new Map<string, string[]>();
  for (const file of Object.values(files)) {
    for (const entry of file.imports) {
      if (entry.target === EXTERNAL || !files[entry.target]) continue;
      const list = importedBy.get(entry.target);
      if (list) list.push(file.path);
      else importedBy.set(entry.target, [file.path]);
    }
  }
  for (const file of Object.values(files)) {
    file.importedBy = sortedUnique(importedBy.get(file.path) ?? []);
  }

  const callers = new Map<string, string[]>();
  for (const symbol of Object.values(symbols)) {
    for (const callee of symbol.callees) {
      if (callee === EXTERNAL || !symbols[callee]) continue;
      const list = callers.get(callee);
      if (list) list.push(symbol.qualifiedName);
      else callers.set(callee, [symbol.qualifiedName]);
    }
  }
  for (const symbol of Object.values(symbols)) {
    symbol.callers = sortedUnique(callers.get(symbol.qualifiedName) ?? []);
  }
}

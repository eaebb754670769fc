/**
 * Whole-project reductions recomputed on every build and update.
 */
import {
  LOCK_LEVELS,
  type AnnotationMap,
  type AnnotationRecord,
  type LockLevel,
  type ProvenanceOrigin,
} from '../annotations/types.js';
import { compareStrings, sortedUnique } from '../../utils/collections.js';
import type { DomainEntry, FileEntry, LowConfidenceEntry, ProvenanceStats, SymbolEntry } from './types.js';

interface DomainBuilder {
  description?: string;
  files: string[];
  symbols: string[];
}

function domainRecords(annotations: AnnotationMap): Array<{ name: string; directive: string }> {
  return (annotations.domain ?? []).flatMap((record) =>
    record.payload.kind === 'name' ? [{ name: record.payload.name, directive: record.directive }] : []
  );
}

/**
 * Domains from `@acp:domain` on files and symbols. The description is the
 * first directive found in path order.
 */
export function buildDomains(
  files: Record<string, FileEntry>,
  symbols: Record<string, SymbolEntry>
): Record<string, DomainEntry> {
  const builders = new Map<string, DomainBuilder>();
  const builderFor = (name: string): DomainBuilder => {
    let builder = builders.get(name);
    if (!builder) {
      builder = { files: [], symbols: [] };
      builders.set(name, builder);
    }
    return builder;
  };
  const describe = (builder: DomainBuilder, directive: string): void => {
    if (builder.description === undefined && directive) builder.description = directive;
  };

  for (const path of Object.keys(files).sort(compareStrings)) {
    const file = files[path];
    if (!file) continue;
    for (const { name, directive } of domainRecords(file.annotations)) {
      const builder = builderFor(name);
      builder.files.push(path);
      describe(builder, directive);
    }
    for (const qualifiedName of file.symbols) {
      const symbol = symbols[qualifiedName];
      if (!symbol) continue;
      for (const { name, directive } of domainRecords(symbol.annotations)) {
        const builder = builderFor(name);
        builder.files.push(path);
        builder.symbols.push(qualifiedName);
        describe(builder, directive);
      }
    }
  }

  const domains: Record<string, DomainEntry> = {};
  for (const name of [...builders.keys()].sort(compareStrings)) {
    const builder = builderFor(name);
    domains[name] = {
      name,
      ...(builder.description !== undefined ? { description: builder.description } : {}),
      files: sortedUnique(builder.files),
      symbols: sortedUnique(builder.symbols),
    };
  }
  return domains;
}

/**
 * level -> sorted file paths by file-level constraint. Every level is present.
 */
export function buildConstraintsIndex(files: Record<string, FileEntry>): Record<LockLevel, string[]> {
  const result: Record<LockLevel, string[]> = {
    frozen: [],
    restricted: [],
    'approval-required': [],
    'tests-required': [],
    'docs-required': [],
    normal: [],
  };
  for (const file of Object.values(files)) {
    result[file.constraint.level].push(file.path);
  }
  for (const level of LOCK_LEVELS) result[level].sort(compareStrings);
  return result;
}

function emptyOriginCounts(): Record<ProvenanceOrigin, number> {
  return { explicit: 0, converted: 0, heuristic: 0, refined: 0, inferred: 0 };
}

function recordsOf(annotations: AnnotationMap): AnnotationRecord[] {
  return Object.values(annotations).flat();
}

export function buildProvenanceStats(
  files: Record<string, FileEntry>,
  symbols: Record<string, SymbolEntry>
): ProvenanceStats {
  const stats: ProvenanceStats = { byOrigin: emptyOriginCounts(), needsReview: 0, reviewed: 0, lowConfidence: [] };

  const visit = (file: string, record: AnnotationRecord): void => {
    const { provenance } = record;
    stats.byOrigin[provenance.origin]++;
    if (provenance.reviewed) stats.reviewed++;
    if (!provenance.needsReview) return;
    stats.needsReview++;
    const entry: LowConfidenceEntry = {
      file,
      line: record.lineSpan.start,
      namespace: record.namespace,
      origin: provenance.origin,
      ...(provenance.confidence !== undefined ? { confidence: provenance.confidence } : {}),
    };
    stats.lowConfidence.push(entry);
  };

  for (const file of Object.values(files)) {
    for (const record of recordsOf(file.annotations)) visit(file.path, record);
  }
  for (const symbol of Object.values(symbols)) {
    for (const record of recordsOf(symbol.annotations)) visit(symbol.file, record);
  }

  stats.lowConfidence.sort(
    (a, b) => compareStrings(a.file, b.file) || a.line - b.line || compareStrings(a.namespace, b.namespace)
  );
  return stats;
}

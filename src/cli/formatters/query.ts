/**
 * Human-readable rendering of query results.
 */
import chalk from 'chalk';
import type { Constraint, ConstraintSource } from '../../core/constraints/resolver.js';
import type { ProjectStats, QueryResult, SearchResult, SymbolView } from '../../core/query/types.js';
import type { UpdateResult } from '../../core/cache/incremental.js';
import type { CacheRoot, DomainEntry, FileEntry } from '../../core/cache/types.js';

function list(label: string, values: string[]): string[] {
  if (values.length === 0) return [`  ${label}: ${chalk.dim('(none)')}`];
  return [`  ${label}:`, ...values.map((value) => `    ${value}`)];
}

function formatConstraint(constraint: Constraint, source?: ConstraintSource): string {
  const level = constraint.level === 'normal' ? chalk.green(constraint.level) : chalk.yellow(constraint.level);
  const from = source ? chalk.dim(` (${source})`) : '';
  return `${level}${from} - ${constraint.directive}`;
}

export function formatSymbol(symbol: SymbolView): string {
  const lines = [
    `${chalk.bold(symbol.qualifiedName)} ${chalk.dim(symbol.kind)}`,
    `  file: ${symbol.file}:${symbol.lineSpan.start}-${symbol.lineSpan.end}`,
    `  constraint: ${formatConstraint(symbol.effectiveConstraint.constraint, symbol.effectiveConstraint.source)}`,
  ];
  if (symbol.signature) lines.push(`  signature: ${symbol.signature}`);
  if (symbol.purpose) lines.push(`  purpose: ${symbol.purpose}`);
  lines.push(`  exported: ${symbol.exported ? 'yes' : 'no'}`);
  lines.push(`  callers: ${symbol.callers.length}, callees: ${symbol.callees.length}`);
  return lines.join('\n');
}

export function formatFile(file: FileEntry): string {
  const lines = [`${chalk.bold(file.path)} ${chalk.dim(`${file.language}, ${file.lines} lines`)}`];
  if (file.module) lines.push(`  module: ${file.module}`);
  if (file.purpose ?? file.summary) lines.push(`  purpose: ${file.purpose ?? file.summary}`);
  if (file.owner) lines.push(`  owner: ${file.owner}`);
  if (file.layer) lines.push(`  layer: ${file.layer}`);
  lines.push(`  constraint: ${formatConstraint(file.constraint)}`);
  if (file.domains.length > 0) lines.push(`  domains: ${file.domains.join(', ')}`);
  lines.push(...list('symbols', file.symbols));
  lines.push(...list('imported by', file.importedBy));
  for (const diagnostic of file.diagnostics ?? []) {
    lines.push(chalk.yellow(`  ${diagnostic.kind} line ${diagnostic.location.line ?? '-'}: ${diagnostic.message}`));
  }
  return lines.join('\n');
}

export function formatDomain(domain: DomainEntry): string {
  const lines = [chalk.bold(domain.name)];
  if (domain.description) lines.push(`  ${domain.description}`);
  lines.push(...list('files', domain.files), ...list('symbols', domain.symbols));
  return lines.join('\n');
}

export function formatNames(names: string[]): string {
  return names.length === 0 ? chalk.dim('(none)') : names.join('\n');
}

export function formatSearch(result: SearchResult): string {
  const lines = result.matches.map((match) =>
    match.kind === 'symbol'
      ? `${chalk.cyan('symbol')} ${match.qualifiedName}${match.purpose ? chalk.dim(` - ${match.purpose}`) : ''}`
      : `${chalk.magenta('file')}   ${match.path}${match.purpose ? chalk.dim(` - ${match.purpose}`) : ''}`
  );
  const footer = `${result.matches.length} of ${result.total} match(es)${result.truncated ? ' (truncated)' : ''}`;
  return [...lines, chalk.dim(footer)].join('\n');
}

export function formatStats(stats: ProjectStats): string {
  const lines = [
    `files: ${stats.fileCount}`,
    `symbols: ${stats.symbolCount}`,
    `lines: ${stats.lineCount}`,
    `domains: ${stats.domainCount}`,
    'constraints:',
    ...Object.entries(stats.constraintCounts).map(([level, count]) => `  ${level}: ${count}`),
    'languages:',
    ...Object.entries(stats.languageBreakdown).map(([language, count]) => `  ${language}: ${count}`),
  ];
  return lines.join('\n');
}

/** Message for a non-ok result. */
export function formatQueryFailure<T>(result: Exclude<QueryResult<T>, { status: 'ok' }>): string {
  switch (result.status) {
    case 'not_found':
      return chalk.yellow(`Not found: ${result.name}`);
    case 'ambiguous':
      return [chalk.yellow(`Ambiguous: ${result.name} matches`), ...result.candidates.map((name) => `  ${name}`)].join('\n');
    case 'stale':
      return [
        chalk.red('Cache is stale; run `acp index` or pass --best-effort'),
        ...result.staleFiles.map((path) => `  ${path}`),
      ].join('\n');
  }
}

export function formatIndexSummary(root: CacheRoot): string {
  const files = Object.values(root.files);
  const diagnostics = files.reduce((count, file) => count + (file.diagnostics?.length ?? 0), 0);
  return [
    `${chalk.green('✓')} Indexed ${files.length} file(s), ${Object.keys(root.symbols).length} symbol(s)`,
    `  domains: ${Object.keys(root.domains).length}, needs review: ${root.provenanceStats.needsReview}`,
    diagnostics > 0 ? chalk.yellow(`  diagnostics: ${diagnostics}`) : chalk.dim('  diagnostics: 0'),
  ].join('\n');
}

export function formatUpdateSummary(result: UpdateResult): string {
  return [
    `${chalk.green('✓')} Reindexed ${result.reindexed.length}, deleted ${result.deleted.length}, relinked ${result.relinked.length}`,
    ...result.reindexed.map((path) => chalk.dim(`  ~ ${path}`)),
    ...result.deleted.map((path) => chalk.dim(`  - ${path}`)),
  ].join('\n');
}

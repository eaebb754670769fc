/**
 * Attaches parsed annotation blocks to symbols or to the file.
 */
import { isFileOnly, isInline, isMultiValued } from '../annotations/namespaces.js';
import type { LineKind } from '../annotations/comment-syntax.js';
import type { AnnotationBlock, AnnotationMap, AnnotationRecord } from '../annotations/types.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics/types.js';
import type { SymbolBoundary } from './types.js';

export interface AssociationInput {
  file: string;
  blocks: AnnotationBlock[];
  symbols: SymbolBoundary[];
  /** Kind of each line, index 0 is line 1 */
  lineKinds: LineKind[];
}

export interface InlineRecord {
  record: AnnotationRecord;
  /** Index into the symbol list, or null for file scope */
  symbolIndex: number | null;
}

export interface AssociationResult {
  fileAnnotations: AnnotationRecord[];
  /** Parallel to the input symbols */
  symbolAnnotations: AnnotationRecord[][];
  inline: InlineRecord[];
  diagnostics: Diagnostic[];
}

type Target =
  | { kind: 'file' }
  | { kind: 'symbol'; index: number; distance: number }
  | { kind: 'body'; index: number };

export function associateAnnotations(input: AssociationInput): AssociationResult {
  const { blocks, symbols, lineKinds } = input;
  const fileAnnotations: AnnotationRecord[] = [];
  const symbolAnnotations: AnnotationRecord[][] = symbols.map(() => []);
  const inline: InlineRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  const targets = blocks.map((block) => targetOf(block, symbols, lineKinds));

  // Closest block per symbol; ties go to the earlier block.
  const winners = new Map<number, number>();
  targets.forEach((target, blockIndex) => {
    if (target.kind !== 'symbol') return;
    const current = winners.get(target.index);
    if (current === undefined) {
      winners.set(target.index, blockIndex);
      return;
    }
    const currentTarget = targets[current];
    const currentDistance = currentTarget?.kind === 'symbol' ? currentTarget.distance : Infinity;
    if (target.distance < currentDistance) winners.set(target.index, blockIndex);
  });

  blocks.forEach((block, blockIndex) => {
    const target = targets[blockIndex] ?? { kind: 'file' };

    if (target.kind === 'symbol') {
      const winner = winners.get(target.index);
      if (winner !== blockIndex) {
        const winning = winner === undefined ? undefined : blocks[winner];
        const symbol = symbols[target.index];
        diagnostics.push(
          createDiagnostic(
            'DuplicateAnnotation',
            { file: input.file, line: block.lineSpan.start, endLine: block.lineSpan.end },
            `Annotation block competes with the block at line ${winning?.lineSpan.start ?? '?'} for symbol ${symbol?.name ?? '?'}; the closer block is kept`
          )
        );
        return;
      }
      for (const record of block.annotations) {
        if (isInline(record.namespace)) inline.push({ record, symbolIndex: target.index });
        if (isFileOnly(record.namespace)) fileAnnotations.push(record);
        else symbolAnnotations[target.index]?.push(record);
      }
      return;
    }

    if (target.kind === 'body') {
      for (const record of block.annotations) {
        if (isInline(record.namespace)) inline.push({ record, symbolIndex: target.index });
        else fileAnnotations.push(record);
      }
      return;
    }

    for (const record of block.annotations) {
      if (isInline(record.namespace)) inline.push({ record, symbolIndex: null });
      fileAnnotations.push(record);
    }
  });

  return { fileAnnotations, symbolAnnotations, inline, diagnostics };
}

function targetOf(block: AnnotationBlock, symbols: SymbolBoundary[], lineKinds: LineKind[]): Target {
  const end = block.lineSpan.end;
  let next = -1;
  let blankBetween = false;
  for (let line = end + 1; line <= lineKinds.length; line++) {
    const kind = lineKinds[line - 1];
    if (kind === 'code') {
      next = line;
      break;
    }
    if (kind === 'blank') blankBetween = true;
  }

  if (next > 0) {
    const index = symbols.findIndex((symbol) => symbol.lineSpan.start === next);
    if (index >= 0) {
      // A block with no code above it and a blank line below it is the file
      // header. It attaches to the file even when a symbol starts right after
      // the blank line, so this check takes precedence over next-symbol attachment.
      const isHeader = blankBetween && !lineKinds.slice(0, block.lineSpan.start - 1).includes('code');
      if (!isHeader) return { kind: 'symbol', index, distance: next - end };
    }
  }

  const enclosing = innermostEnclosing(symbols, block.lineSpan.start);
  return enclosing >= 0 ? { kind: 'body', index: enclosing } : { kind: 'file' };
}

function innermostEnclosing(symbols: SymbolBoundary[], line: number): number {
  let best = -1;
  let bestSize = Infinity;
  symbols.forEach((symbol, index) => {
    const { start, end } = symbol.lineSpan;
    if (start <= line && line <= end && end - start < bestSize) {
      best = index;
      bestSize = end - start;
    }
  });
  return best;
}

/**
 * Fold records into a namespace map. Multi-valued namespaces keep every
 * record in source order; single-valued namespaces keep the last one.
 */
export function buildAnnotationMap(records: AnnotationRecord[]): AnnotationMap {
  const ordered = [...records].sort((a, b) => a.lineSpan.start - b.lineSpan.start);
  const map: AnnotationMap = {};
  for (const record of ordered) {
    const existing = map[record.namespace];
    if (existing && isMultiValued(record.namespace)) {
      existing.push(record);
    } else {
      map[record.namespace] = [record];
    }
  }
  return map;
}

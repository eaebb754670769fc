/**
 * Tests for attaching annotation blocks to symbols and files.
 */
import { describe, it, expect } from 'vitest';
import { associateAnnotations, buildAnnotationMap } from '../../../../src/core/extract/association.js';
import type { LineKind } from '../../../../src/core/annotations/comment-syntax.js';
import type { AnnotationBlock, AnnotationRecord } from '../../../../src/core/annotations/types.js';
import type { SymbolBoundary } from '../../../../src/core/extract/types.js';

function record(namespace: string, line: number, text = namespace): AnnotationRecord {
  return {
    namespace,
    parameters: [text],
    value: text,
    directive: `${namespace} directive`,
    lineSpan: { start: line, end: line },
    provenance: { origin: 'explicit', reviewed: true, needsReview: false },
    payload: { kind: 'text', text },
  };
}

function block(start: number, end: number, ...annotations: AnnotationRecord[]): AnnotationBlock {
  return { lineSpan: { start, end }, annotations };
}

function symbol(name: string, start: number, end: number): SymbolBoundary {
  return { name, kind: 'function', lineSpan: { start, end }, exported: true };
}

function kinds(layout: string): LineKind[] {
  const byChar: Record<string, LineKind> = { b: 'blank', c: 'comment', x: 'code' };
  return [...layout].map((ch) => byChar[ch] ?? 'code');
}

describe('associateAnnotations', () => {
  it('should attach a block directly above a symbol to that symbol', () => {
    const summary = record('summary', 2);
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(2, 2, summary)],
      symbols: [symbol('run', 3, 5)],
      lineKinds: kinds('xcxxx'),
    });

    expect(result.symbolAnnotations).toEqual([[summary]]);
    expect(result.fileAnnotations).toEqual([]);
    expect(result.diagnostics).toEqual([]);
  });

  it('should treat a leading block followed by a blank line as the file header', () => {
    const purpose = record('purpose', 1);
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(1, 1, purpose)],
      symbols: [symbol('run', 3, 4)],
      lineKinds: kinds('cbxx'),
    });

    expect(result.fileAnnotations).toEqual([purpose]);
    expect(result.symbolAnnotations).toEqual([[]]);
  });

  it('should route file-only namespaces to the file even above a symbol', () => {
    const moduleName = record('module', 1);
    const summary = record('summary', 2);
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(1, 2, moduleName, summary)],
      symbols: [symbol('run', 3, 3)],
      lineKinds: kinds('ccx'),
    });

    expect(result.fileAnnotations).toEqual([moduleName]);
    expect(result.symbolAnnotations).toEqual([[summary]]);
  });

  it('should keep the closest of two competing blocks and report the other', () => {
    const far = record('summary', 2, 'far');
    const near = record('summary', 4, 'near');
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(2, 2, far), block(4, 4, near)],
      symbols: [symbol('run', 5, 6)],
      lineKinds: kinds('xcbcxx'),
    });

    expect(result.symbolAnnotations).toEqual([[near]]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      kind: 'DuplicateAnnotation',
      severity: 'warning',
      code: 'A002',
      location: { file: 'a.ts', line: 2, endLine: 2 },
    });
  });

  it('should keep inline records inside a body out of the file annotations', () => {
    const hack = record('hack', 3);
    const todo = record('todo', 4);
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(3, 4, hack, todo)],
      symbols: [symbol('run', 1, 6)],
      lineKinds: kinds('xxccxx'),
    });

    expect(result.inline).toEqual([
      { record: hack, symbolIndex: 0 },
      { record: todo, symbolIndex: 0 },
    ]);
    expect(result.fileAnnotations).toEqual([]);
    expect(result.symbolAnnotations).toEqual([[]]);
  });

  it('should give a trailing block to the file', () => {
    const hack = record('hack', 3);
    const result = associateAnnotations({
      file: 'a.ts',
      blocks: [block(3, 3, hack)],
      symbols: [symbol('run', 1, 1)],
      lineKinds: kinds('xbc'),
    });

    expect(result.fileAnnotations).toEqual([hack]);
    expect(result.inline).toEqual([{ record: hack, symbolIndex: null }]);
  });
});

describe('buildAnnotationMap', () => {
  it('should keep the last record of a single-valued namespace', () => {
    const first = record('summary', 1, 'first');
    const second = record('summary', 5, 'second');

    expect(buildAnnotationMap([second, first])).toEqual({ summary: [second] });
  });

  it('should accumulate multi-valued namespaces in line order', () => {
    const a = record('domain', 1, 'auth');
    const b = record('domain', 2, 'billing');
    const custom = record('x-team', 3);

    expect(buildAnnotationMap([b, custom, a])).toEqual({ domain: [a, b], 'x-team': [custom] });
  });
});

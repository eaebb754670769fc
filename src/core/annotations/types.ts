/**
 * Type definitions for parsed @acp annotations.
 */

export const LOCK_LEVELS = [
  'frozen',
  'restricted',
  'approval-required',
  'tests-required',
  'docs-required',
  'normal',
] as const;

export type LockLevel = (typeof LOCK_LEVELS)[number];

export const PROVENANCE_ORIGINS = ['explicit', 'converted', 'heuristic', 'refined', 'inferred'] as const;

export type ProvenanceOrigin = (typeof PROVENANCE_ORIGINS)[number];

export const STABILITY_LEVELS = ['stable', 'experimental', 'deprecated'] as const;

export type StabilityLevel = (typeof STABILITY_LEVELS)[number];

/** 1-based, inclusive. */
export interface LineSpan {
  start: number;
  end: number;
}

export interface Provenance {
  origin: ProvenanceOrigin;
  confidence?: number;
  reviewed: boolean;
  generationId?: string;
  generatedAt?: string;
  reviewedAt?: string;
  needsReview: boolean;
}

/**
 * Typed parameters of an annotation. Well-known namespaces get a precise
 * shape; anything else is carried as `custom`.
 */
export type AnnotationPayload =
  | { kind: 'lock'; level: LockLevel }
  | { kind: 'ref'; url: string }
  | { kind: 'hack'; expires?: string; ticket?: string; reason?: string }
  | { kind: 'deprecated'; replacement?: string }
  | { kind: 'note'; note?: string }
  | { kind: 'name'; name: string }
  | { kind: 'text'; text: string }
  | { kind: 'stability'; level: StabilityLevel }
  | { kind: 'list'; names: string[] }
  | { kind: 'custom'; rawParameters: string };

export type PayloadKind = AnnotationPayload['kind'];

export interface AnnotationRecord {
  namespace: string;
  subNamespace?: string;
  parameters: string[];
  /** Parameter text with surrounding quotes removed */
  value: string;
  directive: string;
  lineSpan: LineSpan;
  provenance: Provenance;
  payload: AnnotationPayload;
  /** Set when the directive was filled in from the namespace default */
  autoGenerated?: true;
}

/** namespace -> records in source order. Single-valued namespaces hold one record. */
export type AnnotationMap = Record<string, AnnotationRecord[]>;

/**
 * A candidate annotation block as found by the lexer, before directive parsing.
 */
export interface RawBlock {
  lineSpan: LineSpan;
  rawText: string;
  lines: BlockLine[];
}

export interface BlockLine {
  line: number;
  /** Comment body with the comment delimiter removed */
  body: string;
  indent: number;
  isDirective: boolean;
}

/**
 * A parsed block: its annotations with provenance applied.
 */
export interface AnnotationBlock {
  lineSpan: LineSpan;
  annotations: AnnotationRecord[];
}

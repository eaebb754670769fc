/**
 * Turns `@acp:source*` groups into finalized Provenance values.
 */
import { PROVENANCE_ORIGINS, type Provenance, type ProvenanceOrigin } from '../annotations/types.js';
import type { ValidationMode } from '../config/schema.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics/types.js';
import { AnnotationError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_REVIEW_THRESHOLD = 0.8;

/** One `@acp:source*` line. */
export interface ProvenanceLine {
  namespace: string;
  parameters: string[];
  value: string;
  line: number;
}

export interface ProvenanceContext {
  file: string;
  mode: ValidationMode;
  reviewThreshold: number;
}

export interface ProvenanceResult {
  provenance: Provenance;
  diagnostics: Diagnostic[];
}

export function isProvenanceOrigin(value: string): value is ProvenanceOrigin {
  return PROVENANCE_ORIGINS.some((origin) => origin === value);
}

/**
 * needsReview holds iff the annotation is generated, not reviewed, and its
 * confidence is missing or below the threshold.
 */
export function computeNeedsReview(
  origin: ProvenanceOrigin,
  confidence: number | undefined,
  reviewed: boolean,
  reviewThreshold: number = DEFAULT_REVIEW_THRESHOLD
): boolean {
  if (origin === 'explicit' || reviewed) return false;
  return confidence === undefined || confidence < reviewThreshold;
}

/**
 * Provenance of an annotation with no source group.
 */
export function explicitProvenance(): Provenance {
  return { origin: 'explicit', reviewed: false, needsReview: false };
}

/**
 * Resolve a provenance group. Later lines of the same namespace override earlier ones.
 */
export function resolveProvenance(group: ProvenanceLine[], context: ProvenanceContext): ProvenanceResult {
  const diagnostics: Diagnostic[] = [];
  let origin: ProvenanceOrigin = 'explicit';
  let confidence: number | undefined;
  let reviewed = false;
  let reviewedAt: string | undefined;
  let generationId: string | undefined;
  let generatedAt: string | undefined;

  const report = (line: number, message: string): void => {
    diagnostics.push(createDiagnostic('InvalidProvenance', { file: context.file, line }, message));
  };

  for (const entry of group) {
    const first = entry.parameters[0] ?? '';
    switch (entry.namespace) {
      case 'source':
        if (isProvenanceOrigin(first)) {
          origin = first;
        } else {
          origin = 'heuristic';
          report(entry.line, `Unknown provenance origin "${first}", treating as heuristic`);
        }
        break;

      case 'source-confidence':
        confidence = resolveConfidence(entry, context, report);
        break;

      case 'source-reviewed':
        if (first === 'true') {
          reviewed = true;
        } else if (first === 'false') {
          reviewed = false;
        } else if (isIsoDate(first)) {
          reviewed = true;
          reviewedAt = first;
        } else {
          report(entry.line, `Invalid review marker "${first}", expected true, false or an ISO date`);
        }
        break;

      case 'source-id':
        if (entry.value) generationId = entry.value;
        break;

      case 'source-at':
        if (isIsoDate(first)) {
          generatedAt = first;
        } else {
          report(entry.line, `Invalid generation timestamp "${first}"`);
        }
        break;
    }
  }

  const provenance: Provenance = {
    origin,
    ...(confidence !== undefined ? { confidence } : {}),
    reviewed,
    ...(generationId !== undefined ? { generationId } : {}),
    ...(generatedAt !== undefined ? { generatedAt } : {}),
    ...(reviewedAt !== undefined ? { reviewedAt } : {}),
    needsReview: computeNeedsReview(origin, confidence, reviewed, context.reviewThreshold),
  };

  return { provenance, diagnostics };
}

function resolveConfidence(
  entry: ProvenanceLine,
  context: ProvenanceContext,
  report: (line: number, message: string) => void
): number | undefined {
  const raw = entry.parameters[0] ?? '';
  const parsed = /^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(raw) ? Number(raw) : Number.NaN;
  const inRange = parsed >= 0 && parsed <= 1;

  if (inRange) return parsed;

  const message = Number.isNaN(parsed)
    ? `Confidence "${raw}" is not a number`
    : `Confidence ${raw} is outside [0, 1]`;

  if (context.mode === 'strict') {
    throw new AnnotationError(ErrorCodes.MALFORMED_ANNOTATION, message, {
      file: context.file,
      line: entry.line,
      endLine: entry.line,
    });
  }

  if (Number.isNaN(parsed)) {
    report(entry.line, `${message}, ignoring it`);
    return undefined;
  }
  const clamped = Math.min(1, Math.max(0, parsed));
  report(entry.line, `${message}, clamped to ${clamped}`);
  return clamped;
}

function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:?\d{2})?)?$/.test(value) && !Number.isNaN(Date.parse(value));
}

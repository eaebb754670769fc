import { ErrorCodes, type ErrorCode } from '../../utils/errors.js';
import { compareStrings } from '../../utils/collections.js';

export const DIAGNOSTIC_KINDS = [
  'MalformedAnnotation',
  'DuplicateAnnotation',
  'InvalidProvenance',
  'UnsupportedLanguage',
  'UnparsableFile',
  'IncompatibleCache',
  'StaleCache',
  'Ambiguous',
  'NotFound',
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export const DIAGNOSTIC_SEVERITIES = ['error', 'warning', 'info'] as const;

export type DiagnosticSeverity = (typeof DIAGNOSTIC_SEVERITIES)[number];

export interface DiagnosticLocation {
  file: string;
  line?: number;
  endLine?: number;
}

/**
 * A structured parse, link, cache or query condition.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  code: ErrorCode;
  location: DiagnosticLocation;
  message: string;
}

export const DIAGNOSTIC_CODES: Record<DiagnosticKind, ErrorCode> = {
  MalformedAnnotation: ErrorCodes.MALFORMED_ANNOTATION,
  DuplicateAnnotation: ErrorCodes.DUPLICATE_ANNOTATION,
  InvalidProvenance: ErrorCodes.INVALID_PROVENANCE,
  UnsupportedLanguage: ErrorCodes.UNSUPPORTED_LANGUAGE,
  UnparsableFile: ErrorCodes.UNPARSABLE_FILE,
  IncompatibleCache: ErrorCodes.INCOMPATIBLE_CACHE,
  StaleCache: ErrorCodes.STALE_CACHE,
  Ambiguous: ErrorCodes.AMBIGUOUS,
  NotFound: ErrorCodes.NOT_FOUND,
};

const DEFAULT_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  MalformedAnnotation: 'warning',
  DuplicateAnnotation: 'warning',
  InvalidProvenance: 'warning',
  UnsupportedLanguage: 'info',
  UnparsableFile: 'warning',
  IncompatibleCache: 'error',
  StaleCache: 'error',
  Ambiguous: 'warning',
  NotFound: 'info',
};

export function createDiagnostic(
  kind: DiagnosticKind,
  location: DiagnosticLocation,
  message: string,
  severity: DiagnosticSeverity = DEFAULT_SEVERITY[kind]
): Diagnostic {
  return { kind, severity, code: DIAGNOSTIC_CODES[kind], location, message };
}

/**
 * Order diagnostics by file, then line, then kind.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareStrings(a.location.file, b.location.file) ||
    (a.location.line ?? 0) - (b.location.line ?? 0) ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.message, b.message)
  );
}


/**
 * Reduces lock annotations at one scope into a single Constraint.
 */
import type { AnnotationRecord, LockLevel } from '../annotations/types.js';
import { defaultLockDirective } from '../annotations/namespaces.js';

export interface Constraint {
  level: LockLevel;
  directive: string;
  /** Lock annotations and other directive-bearing annotations, in source order */
  contributing: AnnotationRecord[];
}

/** Where an effective constraint came from. */
export type ConstraintSource = 'symbol' | 'file';

export interface EffectiveConstraint {
  constraint: Constraint;
  source: ConstraintSource;
}

function compareSourceOrder(a: AnnotationRecord, b: AnnotationRecord): number {
  return a.lineSpan.start - b.lineSpan.start;
}

function lockLevelOf(record: AnnotationRecord): LockLevel | null {
  return record.payload.kind === 'lock' ? record.payload.level : null;
}

/**
 * Resolve the constraint of a scope from all annotations attached to it.
 * Returns null when the scope has no lock annotation.
 *
 * The last lock in source order wins; two locks at one scope are not an error.
 */
export function resolveOwnConstraint(annotations: AnnotationRecord[]): Constraint | null {
  const ordered = [...annotations].sort(compareSourceOrder);
  let winner: { level: LockLevel; directive: string } | null = null;

  for (const record of ordered) {
    const level = lockLevelOf(record);
    if (level !== null) {
      winner = { level, directive: record.directive || defaultLockDirective(level) };
    }
  }
  if (!winner) return null;

  return {
    level: winner.level,
    directive: winner.directive,
    contributing: ordered.filter((record) => lockLevelOf(record) !== null || record.directive.length > 0),
  };
}

/**
 * File constraints always exist: no lock resolves to `normal`.
 */
export function resolveFileConstraint(annotations: AnnotationRecord[]): Constraint {
  return (
    resolveOwnConstraint(annotations) ?? {
      level: 'normal',
      directive: defaultLockDirective('normal'),
      contributing: [...annotations]
        .sort(compareSourceOrder)
        .filter((record) => record.directive.length > 0),
    }
  );
}

/**
 * Query-time inheritance: a symbol without its own constraint uses the file's,
 * returned by reference.
 */
export function effectiveConstraint(own: Constraint | null, file: Constraint): EffectiveConstraint {
  return own ? { constraint: own, source: 'symbol' } : { constraint: file, source: 'file' };
}

/**
 * Registry of well-known annotation namespaces.
 *
 * Each namespace declares its parameter shape, where it may attach, whether it
 * keeps every occurrence and whether it needs directive text. Unknown
 * namespaces are accepted only as custom (`x-` prefix or configured).
 */
import {
  LOCK_LEVELS,
  STABILITY_LEVELS,
  type AnnotationPayload,
  type LockLevel,
  type StabilityLevel,
} from './types.js';

export type PayloadResult =
  | { ok: true; payload: AnnotationPayload }
  | { ok: false; message: string };

export interface NamespaceSpec {
  /** `file` namespaces are routed to the file even inside a symbol's block */
  scope: 'any' | 'file';
  multiValued: boolean;
  requiresDirective: boolean;
  /** Reported in the file's inline marker list */
  inline: boolean;
  parse(parameters: string[], value: string, directive: string): PayloadResult;
  defaultDirective?(payload: AnnotationPayload): string | undefined;
}

export const PROVENANCE_NAMESPACES = new Set([
  'source',
  'source-confidence',
  'source-reviewed',
  'source-id',
  'source-at',
]);

const LOCK_DIRECTIVES: Record<LockLevel, string> = {
  frozen: 'MUST NOT modify this code under any circumstances',
  restricted: 'Explain proposed changes and wait for explicit approval',
  'approval-required': 'Propose changes and request confirmation before applying',
  'tests-required': 'All changes must include corresponding tests',
  'docs-required': 'All changes must update documentation',
  normal: 'Safe to modify following project conventions',
};

export function isLockLevel(value: string): value is LockLevel {
  return LOCK_LEVELS.some((level) => level === value);
}

export function isStabilityLevel(value: string): value is StabilityLevel {
  return STABILITY_LEVELS.some((level) => level === value);
}

export function defaultLockDirective(level: LockLevel): string {
  return LOCK_DIRECTIVES[level];
}

function ok(payload: AnnotationPayload): PayloadResult {
  return { ok: true, payload };
}

function fail(message: string): PayloadResult {
  return { ok: false, message };
}

function nameParser(label: string) {
  return (_parameters: string[], value: string): PayloadResult =>
    value ? ok({ kind: 'name', name: value }) : fail(`${label} requires a name`);
}

function noteParser(_parameters: string[], value: string): PayloadResult {
  return ok(value ? { kind: 'note', note: value } : { kind: 'note' });
}

function listParser(_parameters: string[], value: string): PayloadResult {
  const names = value
    .split(',')
    .map((part) => part.trim().replace(/^"|"$/g, ''))
    .filter((part) => part.length > 0);
  return names.length > 0 ? ok({ kind: 'list', names }) : fail('expected a comma-separated list of names');
}

function textParser(_parameters: string[], value: string, directive: string): PayloadResult {
  const text = value || directive;
  return text ? ok({ kind: 'text', text }) : fail('expected text');
}

/**
 * `expires=<date> ticket=<id> "reason"`; unkeyed words also form the reason.
 */
function parseHack(parameters: string[]): PayloadResult {
  let expires: string | undefined;
  let ticket: string | undefined;
  const reason: string[] = [];
  for (const param of parameters) {
    if (param.startsWith('expires=')) {
      expires = param.slice('expires='.length);
    } else if (param.startsWith('ticket=')) {
      ticket = param.slice('ticket='.length);
    } else {
      reason.push(param);
    }
  }
  if (expires !== undefined && !/^\d{4}-\d{2}-\d{2}/.test(expires)) {
    return fail(`invalid expiry date "${expires}"`);
  }
  return ok({
    kind: 'hack',
    ...(expires !== undefined ? { expires } : {}),
    ...(ticket !== undefined ? { ticket } : {}),
    ...(reason.length > 0 ? { reason: reason.join(' ') } : {}),
  });
}

function fixed(directive: string) {
  return (): string => directive;
}

function noteSpec(defaultDirective?: string): NamespaceSpec {
  return {
    scope: 'any',
    multiValued: true,
    requiresDirective: defaultDirective !== undefined,
    inline: true,
    parse: noteParser,
    ...(defaultDirective !== undefined ? { defaultDirective: fixed(defaultDirective) } : {}),
  };
}

function hintSpec(): NamespaceSpec {
  return { scope: 'any', multiValued: false, requiresDirective: false, inline: false, parse: noteParser };
}

function symbolSpec(): NamespaceSpec {
  return {
    scope: 'any',
    multiValued: false,
    requiresDirective: false,
    inline: false,
    parse: nameParser('symbol annotation'),
  };
}

function listSpec(): NamespaceSpec {
  return { scope: 'any', multiValued: true, requiresDirective: false, inline: false, parse: listParser };
}

export const KNOWN_NAMESPACES: Readonly<Record<string, NamespaceSpec>> = {
  lock: {
    scope: 'any',
    multiValued: false,
    requiresDirective: true,
    inline: false,
    parse(parameters) {
      const level = parameters[0];
      if (level === undefined) return fail('lock requires a level');
      if (!isLockLevel(level)) {
        return fail(`unknown lock level "${level}" (expected one of ${LOCK_LEVELS.join(', ')})`);
      }
      return ok({ kind: 'lock', level });
    },
    defaultDirective: (payload) => (payload.kind === 'lock' ? defaultLockDirective(payload.level) : undefined),
  },
  ref: {
    scope: 'any',
    multiValued: true,
    requiresDirective: true,
    inline: false,
    parse(parameters) {
      const url = parameters[0];
      return url ? ok({ kind: 'ref', url }) : fail('ref requires a target');
    },
    defaultDirective: (payload) =>
      payload.kind === 'ref' ? `Consult ${payload.url} before making changes` : undefined,
  },
  hack: {
    scope: 'any',
    multiValued: true,
    requiresDirective: true,
    inline: true,
    parse: parseHack,
    defaultDirective: fixed('Temporary workaround - check expiry before modifying'),
  },
  deprecated: {
    scope: 'any',
    multiValued: false,
    requiresDirective: true,
    inline: false,
    parse: (_parameters, value) => ok(value ? { kind: 'deprecated', replacement: value } : { kind: 'deprecated' }),
    defaultDirective: fixed('Do not use or extend - see replacement annotation'),
  },
  todo: noteSpec('Pending work item - address before release'),
  fixme: noteSpec('Known issue requiring fix - prioritize resolution'),
  critical: noteSpec('Critical section - changes require extra review'),
  perf: noteSpec('Performance-sensitive code - benchmark any changes'),
  'ai-careful': hintSpec(),
  'ai-readonly': hintSpec(),
  'ai-avoid': hintSpec(),
  'ai-no-modify': hintSpec(),
  module: {
    scope: 'file',
    multiValued: false,
    requiresDirective: false,
    inline: false,
    parse: nameParser('module'),
  },
  owner: {
    scope: 'file',
    multiValued: false,
    requiresDirective: false,
    inline: false,
    parse: nameParser('owner'),
  },
  layer: {
    scope: 'file',
    multiValued: false,
    requiresDirective: false,
    inline: false,
    parse: nameParser('layer'),
  },
  domain: {
    scope: 'any',
    multiValued: true,
    requiresDirective: false,
    inline: false,
    parse: nameParser('domain'),
  },
  summary: { scope: 'any', multiValued: false, requiresDirective: false, inline: false, parse: textParser },
  purpose: { scope: 'any', multiValued: false, requiresDirective: false, inline: false, parse: textParser },
  stability: {
    scope: 'any',
    multiValued: false,
    requiresDirective: false,
    inline: false,
    parse(parameters) {
      const level = parameters[0];
      if (level === undefined || !isStabilityLevel(level)) {
        return fail(`stability requires one of ${STABILITY_LEVELS.join(', ')}`);
      }
      return ok({ kind: 'stability', level });
    },
  },
  fn: symbolSpec(),
  function: symbolSpec(),
  class: symbolSpec(),
  method: symbolSpec(),
  symbol: symbolSpec(),
  calls: listSpec(),
  imports: listSpec(),
  depends: listSpec(),
};

/** Applied to custom namespaces. */
export const CUSTOM_NAMESPACE: NamespaceSpec = {
  scope: 'any',
  multiValued: true,
  requiresDirective: false,
  inline: false,
  parse: (_parameters, value) => ok({ kind: 'custom', rawParameters: value }),
};

export function isCustomNamespace(namespace: string, customNamespaces: ReadonlySet<string>): boolean {
  return namespace.startsWith('x-') || customNamespaces.has(namespace);
}

/**
 * Find the definition of a namespace, or null when it is neither known nor custom.
 */
export function lookupNamespace(
  namespace: string,
  customNamespaces: ReadonlySet<string>
): NamespaceSpec | null {
  if (Object.hasOwn(KNOWN_NAMESPACES, namespace)) {
    return KNOWN_NAMESPACES[namespace] ?? null;
  }
  return isCustomNamespace(namespace, customNamespaces) ? CUSTOM_NAMESPACE : null;
}

/**
 * Whether records of this namespace accumulate rather than replace each other.
 */
export function isMultiValued(namespace: string): boolean {
  const spec = Object.hasOwn(KNOWN_NAMESPACES, namespace) ? KNOWN_NAMESPACES[namespace] : undefined;
  return spec ? spec.multiValued : CUSTOM_NAMESPACE.multiValued;
}

export function isFileOnly(namespace: string): boolean {
  const spec = Object.hasOwn(KNOWN_NAMESPACES, namespace) ? KNOWN_NAMESPACES[namespace] : undefined;
  return spec?.scope === 'file';
}

export function isInline(namespace: string): boolean {
  const spec = Object.hasOwn(KNOWN_NAMESPACES, namespace) ? KNOWN_NAMESPACES[namespace] : undefined;
  return spec?.inline ?? false;
}

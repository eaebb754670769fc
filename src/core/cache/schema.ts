/**
 * Zod schema of the cache document, used to validate loaded caches.
 */
import { z } from 'zod';
import { LOCK_LEVELS, PROVENANCE_ORIGINS, STABILITY_LEVELS } from '../annotations/types.js';
import { DIAGNOSTIC_KINDS, DIAGNOSTIC_SEVERITIES } from '../diagnostics/types.js';
import { SYMBOL_KINDS } from '../extract/types.js';
import { ErrorCodes } from '../../utils/errors.js';

const LineSpanSchema = z.object({
  start: z.number().int(),
  end: z.number().int(),
});

const ProvenanceSchema = z.object({
  origin: z.enum(PROVENANCE_ORIGINS),
  confidence: z.number().min(0).max(1).optional(),
  reviewed: z.boolean(),
  generationId: z.string().optional(),
  generatedAt: z.string().optional(),
  reviewedAt: z.string().optional(),
  needsReview: z.boolean(),
});

const PayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lock'), level: z.enum(LOCK_LEVELS) }),
  z.object({ kind: z.literal('ref'), url: z.string() }),
  z.object({
    kind: z.literal('hack'),
    expires: z.string().optional(),
    ticket: z.string().optional(),
    reason: z.string().optional(),
  }),
  z.object({ kind: z.literal('deprecated'), replacement: z.string().optional() }),
  z.object({ kind: z.literal('note'), note: z.string().optional() }),
  z.object({ kind: z.literal('name'), name: z.string() }),
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('stability'), level: z.enum(STABILITY_LEVELS) }),
  z.object({ kind: z.literal('list'), names: z.array(z.string()) }),
  z.object({ kind: z.literal('custom'), rawParameters: z.string() }),
]);

const AnnotationRecordSchema = z.object({
  namespace: z.string(),
  subNamespace: z.string().optional(),
  parameters: z.array(z.string()),
  value: z.string(),
  directive: z.string(),
  lineSpan: LineSpanSchema,
  provenance: ProvenanceSchema,
  payload: PayloadSchema,
  autoGenerated: z.literal(true).optional(),
});

const AnnotationMapSchema = z.record(z.array(AnnotationRecordSchema));

const ConstraintSchema = z.object({
  level: z.enum(LOCK_LEVELS),
  directive: z.string(),
  contributing: z.array(AnnotationRecordSchema),
});

const DiagnosticSchema = z.object({
  kind: z.enum(DIAGNOSTIC_KINDS),
  severity: z.enum(DIAGNOSTIC_SEVERITIES),
  code: z.nativeEnum(ErrorCodes),
  location: z.object({
    file: z.string(),
    line: z.number().int().optional(),
    endLine: z.number().int().optional(),
  }),
  message: z.string(),
});

const SymbolEntrySchema = z.object({
  qualifiedName: z.string(),
  name: z.string(),
  kind: z.enum(SYMBOL_KINDS),
  file: z.string(),
  lineSpan: LineSpanSchema,
  exported: z.boolean(),
  container: z.string().optional(),
  signature: z.string().optional(),
  purpose: z.string().optional(),
  constraint: ConstraintSchema.nullable(),
  annotations: AnnotationMapSchema,
  callers: z.array(z.string()),
  callees: z.array(z.string()),
});

const FileEntrySchema = z.object({
  path: z.string(),
  language: z.string(),
  lines: z.number().int().min(0),
  module: z.string().optional(),
  summary: z.string().optional(),
  purpose: z.string().optional(),
  owner: z.string().optional(),
  layer: z.string().optional(),
  domains: z.array(z.string()),
  constraint: ConstraintSchema,
  annotations: AnnotationMapSchema,
  symbols: z.array(z.string()),
  inline: z.array(
    z.object({
      namespace: z.string(),
      line: z.number().int(),
      directive: z.string(),
      value: z.string().optional(),
      symbol: z.string().optional(),
    })
  ),
  exports: z.array(
    z.object({
      name: z.string(),
      local: z.string().optional(),
      from: z.string().optional(),
      sourceName: z.string().optional(),
    })
  ),
  imports: z.array(
    z.object({
      specifier: z.string(),
      line: z.number().int(),
      target: z.string(),
      names: z.array(z.object({ name: z.string(), local: z.string(), symbol: z.string() })),
      namespaceAlias: z.string().optional(),
      wildcard: z.boolean().optional(),
    })
  ),
  importedBy: z.array(z.string()),
  calls: z.array(
    z.object({
      callee: z.string(),
      line: z.number().int(),
      caller: z.string().optional(),
    })
  ),
  diagnostics: z.array(DiagnosticSchema).optional(),
});

const DomainEntrySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  files: z.array(z.string()),
  symbols: z.array(z.string()),
});

const PathList = z.array(z.string());

export const CacheRootSchema = z.object({
  schemaVersion: z.string(),
  files: z.record(FileEntrySchema),
  symbols: z.record(SymbolEntrySchema),
  domains: z.record(DomainEntrySchema),
  constraintsIndex: z.object({
    frozen: PathList,
    restricted: PathList,
    'approval-required': PathList,
    'tests-required': PathList,
    'docs-required': PathList,
    normal: PathList,
  }),
  provenanceStats: z.object({
    byOrigin: z.object({
      explicit: z.number().int(),
      converted: z.number().int(),
      heuristic: z.number().int(),
      refined: z.number().int(),
      inferred: z.number().int(),
    }),
    needsReview: z.number().int(),
    reviewed: z.number().int(),
    lowConfidence: z.array(
      z.object({
        file: z.string(),
        line: z.number().int(),
        namespace: z.string(),
        origin: z.enum(PROVENANCE_ORIGINS),
        confidence: z.number().optional(),
      })
    ),
  }),
  contentHashes: z.record(z.string()),
});

import { z } from 'zod';

/**
 * Make an object-valued field optional and apply the inner schema's defaults
 * when it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_INCLUDE = [
  '**/*.ts',
  '**/*.tsx',
  '**/*.mts',
  '**/*.cts',
  '**/*.js',
  '**/*.jsx',
  '**/*.mjs',
  '**/*.cjs',
  '**/*.py',
  '**/*.pyi',
  '**/*.go',
  '**/*.rs',
  '**/*.java',
];

export const DEFAULT_EXCLUDE = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/target/**',
  '**/.git/**',
  '**/vendor/**',
  '**/__pycache__/**',
  '**/*.d.ts',
];

/** How the lexer treats malformed annotations. */
export const ValidationModeSchema = z.enum(['permissive', 'strict']);

export const AnnotationSettingsSchema = z.object({
  mode: ValidationModeSchema.default('permissive'),
  /** Confidence below which generated annotations need review */
  review_threshold: z.number().min(0).max(1).default(0.8),
  /** Namespaces accepted as custom in addition to the x- prefix */
  custom_namespaces: z.array(z.string().regex(/^[\w-]+$/)).default([]),
});

export const IndexingSettingsSchema = z.object({
  /** Files indexed concurrently (default: available parallelism) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

export const CacheSettingsSchema = z.object({
  path: z.string().min(1).default('.acp.cache.json'),
});

export const QuerySettingsSchema = z.object({
  /** Serve stale results flagged as stale instead of failing */
  best_effort: z.boolean().default(false),
  case_sensitive: z.boolean().default(true),
  default_limit: z.number().int().min(1).default(20),
});

export const ConfigSchema = z.object({
  include: z.array(z.string()).default(DEFAULT_INCLUDE),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  annotations: withDefaults(AnnotationSettingsSchema),
  indexing: withDefaults(IndexingSettingsSchema),
  cache: withDefaults(CacheSettingsSchema),
  query: withDefaults(QuerySettingsSchema),
});

export type ValidationMode = z.infer<typeof ValidationModeSchema>;
export type AnnotationSettings = z.infer<typeof AnnotationSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

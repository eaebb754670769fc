/**
 * Byte-stable JSON encoding of the cache document.
 */
import { CacheRootSchema } from './schema.js';
import { CACHE_SCHEMA_VERSION, type CacheRoot } from './types.js';
import { CacheError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { compareStrings } from '../../utils/collections.js';
import { formatZodError } from '../../utils/yaml.js';

/**
 * JSON with object keys in sorted order at every depth. Undefined
 * properties are omitted; arrays keep their order.
 */
export function stableStringify(value: unknown, indent = 2): string {
  const write = (current: unknown, depth: number): string => {
    if (current === null || typeof current !== 'object') {
      return JSON.stringify(current) ?? 'null';
    }
    const inner = ' '.repeat(indent * (depth + 1));
    const outer = ' '.repeat(indent * depth);
    const newline = indent > 0 ? '\n' : '';
    const separator = indent > 0 ? ': ' : ':';

    if (Array.isArray(current)) {
      if (current.length === 0) return '[]';
      const items = current.map((item: unknown) => inner + write(item, depth + 1));
      return `[${newline}${items.join(`,${newline}`)}${newline}${outer}]`;
    }

    const entries: Array<[string, unknown]> = Object.entries(current);
    const fields = entries
      .filter(([, field]) => field !== undefined)
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([key, field]) => `${inner}${JSON.stringify(key)}${separator}${write(field, depth + 1)}`);
    if (fields.length === 0) return '{}';
    return `{${newline}${fields.join(`,${newline}`)}${newline}${outer}}`;
  };
  return write(value, 0);
}

export function serializeCache(root: CacheRoot): string {
  return `${stableStringify(root)}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate a cache document. Anything other than a valid
 * document of the current schema version fails with IncompatibleCache.
 */
export function deserializeCache(text: string): CacheRoot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CacheError(ErrorCodes.INCOMPATIBLE_CACHE, `Cache is not valid JSON: ${errorMessage(error)}`);
  }

  if (!isRecord(parsed) || parsed.schemaVersion !== CACHE_SCHEMA_VERSION) {
    const found = isRecord(parsed) ? parsed.schemaVersion : undefined;
    throw new CacheError(
      ErrorCodes.INCOMPATIBLE_CACHE,
      `Unsupported cache schema version ${JSON.stringify(found ?? null)} (expected "${CACHE_SCHEMA_VERSION}")`,
      { found: found ?? null, expected: CACHE_SCHEMA_VERSION }
    );
  }

  const result = CacheRootSchema.safeParse(parsed);
  if (!result.success) {
    throw new CacheError(
      ErrorCodes.INCOMPATIBLE_CACHE,
      `Cache failed validation: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

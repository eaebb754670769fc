/**
 * JSON-shaped request handling for protocol servers and the CLI.
 */
import { z } from 'zod';
import type { QueryEngine } from './engine.js';
import type { QueryResult } from './types.js';
import { ErrorCodes, errorMessage, type ErrorCode } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

export const QUERY_OPERATIONS = ['symbol', 'file', 'domain', 'callers', 'callees', 'search', 'stats'] as const;

export type QueryOperation = (typeof QUERY_OPERATIONS)[number];

export const QueryOperationSchema = z.enum(QUERY_OPERATIONS);

export const QueryRequestSchema = z
  .object({
    type: QueryOperationSchema.optional(),
    operation: QueryOperationSchema.optional(),
    name: z.string().optional(),
    pattern: z.string().optional(),
    limit: z.number().int().min(0).optional(),
  })
  .refine((request) => request.type !== undefined || request.operation !== undefined, {
    message: 'Either "type" or "operation" is required',
  });

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export interface QueryErrorBody {
  code: ErrorCode;
  message: string;
  candidates?: string[];
  staleFiles?: string[];
}

export type QueryResponse =
  | { ok: true; result: unknown; stale?: true; staleFiles?: string[] }
  | { ok: false; error: QueryErrorBody };

function failure(code: ErrorCode, message: string, extra: Omit<QueryErrorBody, 'code' | 'message'> = {}): QueryResponse {
  return { ok: false, error: { code, message, ...extra } };
}

/**
 * Protocol shape of a typed query result.
 */
export function toQueryResponse<T>(result: QueryResult<T>): QueryResponse {
  switch (result.status) {
    case 'ok':
      return {
        ok: true,
        result: result.value,
        ...(result.stale ? { stale: true, staleFiles: result.staleFiles ?? [] } : {}),
      };
    case 'not_found':
      return failure(ErrorCodes.NOT_FOUND, `Not found: ${result.name}`);
    case 'ambiguous':
      return failure(ErrorCodes.AMBIGUOUS, `Ambiguous name "${result.name}" matches ${result.candidates.length} symbols`, {
        candidates: result.candidates,
      });
    case 'stale':
      return failure(ErrorCodes.STALE_CACHE, `Cache is stale for ${result.staleFiles.length} file(s); reindex first`, {
        staleFiles: result.staleFiles,
      });
  }
}

/**
 * Validate a request and run it. Never throws.
 */
export async function handleQueryRequest(engine: QueryEngine, request: unknown): Promise<QueryResponse> {
  const parsed = QueryRequestSchema.safeParse(request);
  if (!parsed.success) {
    return failure(ErrorCodes.INVALID_REQUEST, `Invalid query request:\n${formatZodError(parsed.error)}`);
  }
  const { type, operation, name, pattern, limit } = parsed.data;
  const op = type ?? operation;
  const target = name ?? pattern;

  const named = async <T>(run: (value: string) => Promise<QueryResult<T>>): Promise<QueryResponse> =>
    target === undefined
      ? failure(ErrorCodes.INVALID_REQUEST, `${op ?? 'query'} requires "name" or "pattern"`)
      : toQueryResponse(await run(target));

  try {
    switch (op) {
      case 'stats':
        return toQueryResponse(await engine.stats());
      case 'search':
        return await named((value) => engine.search(value, limit));
      case 'symbol':
        return await named((value) => engine.symbol(value));
      case 'file':
        return await named((value) => engine.file(value));
      case 'domain':
        return await named((value) => engine.domain(value));
      case 'callers':
        return await named((value) => engine.callers(value));
      case 'callees':
        return await named((value) => engine.callees(value));
      case undefined:
        return failure(ErrorCodes.INVALID_REQUEST, 'Either "type" or "operation" is required');
    }
  } catch (error) {
    return failure(ErrorCodes.INTERNAL, errorMessage(error));
  }
}

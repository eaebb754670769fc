/**
 * Query module exports.
 */
export * from './types.js';
export { QueryEngine, queryOptionsFromConfig } from './engine.js';
export {
  handleQueryRequest,
  toQueryResponse,
  QueryOperationSchema,
  QueryRequestSchema,
  QUERY_OPERATIONS,
  type QueryOperation,
  type QueryRequest,
  type QueryResponse,
  type QueryErrorBody,
} from './dispatch.js';

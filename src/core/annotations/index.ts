export * from './types.js';
export * from './namespaces.js';
export * from './comment-syntax.js';
export * from './lexer.js';

/**
 * Structural extraction exports.
 */
export * from './types.js';
export { ExtractorRegistry } from './registry.js';
export { createDefaultRegistry, registerBuiltinExtractors } from './register.js';
export { detectLanguage } from './languages.js';
export { associateAnnotations, buildAnnotationMap, type AssociationResult } from './association.js';
export { TypeScriptExtractor, TYPESCRIPT_EXTENSIONS } from './typescript.js';
export { PythonExtractor, PYTHON_EXTENSIONS } from './python.js';
export { GoExtractor, GO_EXTENSIONS } from './go.js';
export { RustExtractor, RUST_EXTENSIONS } from './rust.js';
export { JavaExtractor, JAVA_EXTENSIONS } from './java.js';

/**
 * Registers the built-in language adapters.
 */
import { ExtractorRegistry } from './registry.js';
import { TypeScriptExtractor, TYPESCRIPT_EXTENSIONS } from './typescript.js';
import { PythonExtractor, PYTHON_EXTENSIONS } from './python.js';
import { GoExtractor, GO_EXTENSIONS } from './go.js';
import { RustExtractor, RUST_EXTENSIONS } from './rust.js';
import { JavaExtractor, JAVA_EXTENSIONS } from './java.js';

export function registerBuiltinExtractors(registry: ExtractorRegistry): ExtractorRegistry {
  registry.register('typescript', () => new TypeScriptExtractor(), TYPESCRIPT_EXTENSIONS);
  registry.register('python', () => new PythonExtractor(), PYTHON_EXTENSIONS);
  registry.register('go', () => new GoExtractor(), GO_EXTENSIONS);
  registry.register('rust', () => new RustExtractor(), RUST_EXTENSIONS);
  registry.register('java', () => new JavaExtractor(), JAVA_EXTENSIONS);
  return registry;
}

export function createDefaultRegistry(): ExtractorRegistry {
  return registerBuiltinExtractors(new ExtractorRegistry());
}

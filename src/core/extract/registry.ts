/**
 * Registry of structural extractors keyed by file extension.
 * Adapters are created lazily on first use.
 */
import * as path from 'node:path';
import type { ExtractorFactory, StructuralExtractor } from './types.js';

interface ExtractorRegistration {
  factory: ExtractorFactory;
  extensions: string[];
  instance?: StructuralExtractor;
}

export class ExtractorRegistry {
  private registrations = new Map<string, ExtractorRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register an extractor.
   *
   * @param id Unique identifier (e.g. 'typescript', 'python')
   * @param extensions File extensions, with the leading dot
   */
  register(id: string, factory: ExtractorFactory, extensions: string[]): void {
    this.registrations.set(id, { factory, extensions });
    for (const ext of extensions) {
      this.extensionMap.set(ext.toLowerCase(), id);
    }
  }

  /**
   * Get the extractor for a file path, or null when no adapter claims it.
   */
  getForFile(filePath: string): StructuralExtractor | null {
    return this.getForExtension(path.extname(filePath));
  }

  getForExtension(extension: string): StructuralExtractor | null {
    const id = this.extensionMap.get(extension.toLowerCase());
    return id ? this.getById(id) : null;
  }

  private getById(id: string): StructuralExtractor | null {
    const registration = this.registrations.get(id);
    if (!registration) {
      return null;
    }
    if (!registration.instance) {
      registration.instance = registration.factory();
    }
    return registration.instance;
  }

  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }
}

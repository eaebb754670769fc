/**
 * .acpignore file support - gitignore-style pattern matching for excluding files.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { readFileIfExists } from './file-system.js';

export const ACPIGNORE_FILENAME = '.acpignore';

/**
 * AcpIgnore instance for filtering files.
 */
export interface AcpIgnore {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter an array of file paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .acpignore from project root.
 * Returns an empty filter if no .acpignore file exists.
 */
export async function loadAcpIgnore(projectRoot: string): Promise<AcpIgnore> {
  const content = await readFileIfExists(join(projectRoot, ACPIGNORE_FILENAME));
  return createAcpIgnore(content === null ? [] : parseAcpIgnore(content));
}

/**
 * Create an AcpIgnore instance from patterns.
 */
export function createAcpIgnore(patterns: string[]): AcpIgnore {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/');
      return ig.ignores(normalizedPath);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter(fp => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse .acpignore file content.
 * Follows gitignore syntax:
 * - Lines starting with # are comments
 * - Empty lines are ignored
 * - Patterns starting with ! are negations
 */
export function parseAcpIgnore(content: string): string[] {
  const patterns: string[] = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    patterns.push(trimmed);
  }

  return patterns;
}

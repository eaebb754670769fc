/**
 * Project file discovery: config include/exclude globs plus `.acpignore`.
 */
import { minimatch } from 'minimatch';
import type { Config } from '../config/schema.js';
import { loadAcpIgnore, type AcpIgnore } from '../../utils/acpignore.js';
import { globFiles } from '../../utils/file-system.js';
import { compareStrings } from '../../utils/collections.js';

/**
 * Decides whether a project path belongs to the index.
 */
export interface ProjectFilter {
  matches(projectPath: string): boolean;
}

export function createProjectFilter(config: Config, ignore: AcpIgnore, cachePath: string): ProjectFilter {
  const options = { dot: true };
  return {
    matches(projectPath: string): boolean {
      if (projectPath === cachePath) return false;
      if (!config.include.some((pattern) => minimatch(projectPath, pattern, options))) return false;
      if (config.exclude.some((pattern) => minimatch(projectPath, pattern, options))) return false;
      return !ignore.ignores(projectPath);
    },
  };
}

export async function loadProjectFilter(projectRoot: string, config: Config): Promise<ProjectFilter> {
  return createProjectFilter(config, await loadAcpIgnore(projectRoot), config.cache.path);
}

/**
 * Indexable files of a project, project-relative and sorted.
 */
export async function scanProject(projectRoot: string, config: Config): Promise<string[]> {
  const ignore = await loadAcpIgnore(projectRoot);
  const found = await globFiles(config.include, {
    cwd: projectRoot,
    ignore: config.exclude,
    dot: true,
  });
  return ignore
    .filter(found.map((file) => file.replace(/\\/g, '/')))
    .filter((file) => file !== config.cache.path)
    .sort(compareStrings);
}

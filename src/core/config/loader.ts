import * as path from 'node:path';
import { ConfigSchema, type Config, type ConfigInput } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/** Candidate config files, first match wins. JSON is read by the YAML parser. */
export const CONFIG_FILENAMES = ['.acp.config.yaml', '.acp.config.yml', '.acp.config.json'];

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a project.
 * Falls back to defaults if no config file exists.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : await findConfigFile(projectRoot);

  if (!fullPath) {
    return getDefaultConfig();
  }
  if (configPath && !(await fileExists(fullPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Config file not found: ${fullPath}`,
      { path: fullPath }
    );
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: ConfigInput): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, 'Invalid configuration', {
      errors: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Find the config file of a project, or null when it has none.
 */
export async function findConfigFile(projectRoot: string): Promise<string | null> {
  for (const name of CONFIG_FILENAMES) {
    const candidate = path.resolve(projectRoot, name);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

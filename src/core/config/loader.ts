import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_CONFIG_PATH = '.bracecheck.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const log = logger.child('config');
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    // An explicitly requested config must exist
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    log.debug(`No config at ${fullPath}, using defaults`);
    return getDefaultConfig();
  }

  try {
    const config = await loadYamlWithSchema(fullPath, ConfigSchema);
    log.debug(`Loaded config from ${fullPath}`);
    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Check if a config file exists in the project.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot));
}

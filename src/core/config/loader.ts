/**
 * @arch fmtkit.core.domain
 */
import * as path from 'node:path';
import {
  ConfigSchema,
  FormatterOptionsFileSchema,
  type Config,
} from './schema.js';
import { loadYamlWithSchema, fileExists, logger } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.fmtkit/config.yaml';

/** Opaque key/value options handed to a formatter engine. */
export type FormatterOptions = Record<string, string>;

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
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_NOT_FOUND,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, cause: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Record<string, unknown>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Resolve the configured text encoding.
 * Unset falls back to utf-8 with a warning, an unknown name is fatal.
 */
export function resolveEncoding(encoding: string | undefined): BufferEncoding {
  if (encoding === undefined || encoding.trim() === '') {
    logger.warn('File encoding has not been set, using utf-8 to format source files');
    return 'utf8';
  }

  const name = encoding.trim().toLowerCase();
  if (!Buffer.isEncoding(name)) {
    throw new ConfigError(
      ErrorCodes.UNSUPPORTED_ENCODING,
      `Encoding '${encoding}' is not supported`,
      { encoding }
    );
  }
  logger.debug(`Using '${name}' encoding to format source files`);
  return name;
}

/**
 * Load a formatter option file.
 * Returns null when the file cannot be found, which leaves that language's
 * formatter uninitialized.
 */
export async function loadFormatterOptions(
  projectRoot: string,
  configFile: string
): Promise<FormatterOptions | null> {
  const fullPath = path.resolve(projectRoot, configFile);

  if (!(await fileExists(fullPath))) {
    logger.debug(`Config file [${configFile}] cannot be found`);
    return null;
  }

  try {
    const raw = await loadYamlWithSchema(fullPath, FormatterOptionsFileSchema);
    const options: FormatterOptions = {};
    for (const [key, value] of Object.entries(raw)) {
      options[key] = String(value);
    }
    return options;
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Cannot parse config file [${configFile}]: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { path: fullPath }
    );
  }
}

import { isAbsolute, join, resolve } from 'path';
import type { BaseImageEntry, CrateBuildConfig, OsDeclaration } from '../types/index.js';
import { DEFAULT_ECOSYSTEM_PREFIXES, DEFAULT_OS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { parseJsonc } from '../utils/jsonc.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { parseVersionRange } from '../utils/version-range.js';
import { loadBuiltInCatalog, mergeBaseImages, parseBaseImageEntries } from './plan/base-images.js';

/**
 * Configuration for the cratebuild CLI.
 * Supports both JSON and JSONC formats; the pipeline itself only ever sees
 * the resolved values passed in as options.
 */

export interface ResolvedConfig {
  defaultOs: OsDeclaration;
  baseImages: BaseImageEntry[];
  ecosystemPrefixes: string[];
  /** File the config was read from, if any */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDefaultOs(value: unknown, source: string): OsDeclaration {
  const fields: Record<string, unknown> = isRecord(value) ? value : {};
  const { name, version } = fields;
  if (typeof name !== 'string' || !name.trim() || typeof version !== 'string') {
    throw new ConfigError(`${source}: defaultOs needs string name and version`);
  }
  try {
    parseVersionRange(version);
  } catch {
    throw new ConfigError(`${source}: defaultOs.version '${version}' is not a version constraint`);
  }
  return { name, version };
}

/**
 * Validate a parsed config document
 *
 * @throws ConfigError on unknown keys or mistyped values
 */
export function parseConfig(value: unknown, source: string): CrateBuildConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: config must be a JSON object`);
  }

  const config: CrateBuildConfig = {};
  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case 'defaultOs':
        config.defaultOs = parseDefaultOs(entry, source);
        break;
      case 'baseImages':
        config.baseImages = parseBaseImageEntries(entry, source);
        break;
      case 'ecosystemPrefixes':
        if (!Array.isArray(entry) || !entry.every((prefix): prefix is string => typeof prefix === 'string')) {
          throw new ConfigError(`${source}: ecosystemPrefixes must be an array of strings`);
        }
        config.ecosystemPrefixes = entry.map(prefix => prefix.trim().toLowerCase().replace(/:+$/, ''));
        break;
      case '$schema':
        break;
      default:
        throw new ConfigError(`${source}: unknown config key '${key}'`);
    }
  }
  return config;
}

/**
 * Combine a config with the built-in defaults
 */
export function resolveConfig(config: CrateBuildConfig, configPath?: string): ResolvedConfig {
  const resolved: ResolvedConfig = {
    defaultOs: config.defaultOs ?? DEFAULT_OS,
    baseImages: mergeBaseImages(loadBuiltInCatalog(), config.baseImages ?? []),
    ecosystemPrefixes: Array.from(new Set([...DEFAULT_ECOSYSTEM_PREFIXES, ...(config.ecosystemPrefixes ?? [])]))
  };
  if (configPath) resolved.configPath = configPath;
  return resolved;
}

/**
 * Find the existing config file in a directory (supports both .jsonc and .json)
 */
export async function findConfigFile(dir: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(dir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist */
  configPath?: string;
}

/**
 * Load configuration from an explicit path or the working directory,
 * falling back to built-in defaults when neither has a config file
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null;
  if (options.configPath) {
    configPath = isAbsolute(options.configPath) ? options.configPath : resolve(cwd, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    }
  } else {
    configPath = await findConfigFile(cwd);
  }

  if (!configPath) {
    logger.debug('No config file found, using defaults');
    return resolveConfig({});
  }

  logger.debug(`Loading config from: ${configPath}`);
  let document: unknown;
  try {
    document = parseJsonc(await readTextFile(configPath), configPath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Failed to parse config file: ${configPath}`, { path: configPath, cause: String(error) });
  }
  return resolveConfig(parseConfig(document, configPath), configPath);
}

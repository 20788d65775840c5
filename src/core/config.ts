import { join, resolve } from 'path';
import type { BundleCustomization } from '../types/index.js';
import { FILE_PATTERNS, PUBLISH_DEFAULTS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { parseBundleFields } from '../utils/validation/bundle.js';
import { isPlainObject } from './collect/file-entry.js';

/**
 * Configuration for assetpack, read from assetpack.jsonc or assetpack.json
 */

export interface AssetPackConfig {
  /** Directory relative paths resolve against */
  rootDir: string;
  /** Bundle manifest (YAML), relative to rootDir or alias-prefixed */
  manifest: string | null;
  /** Default output root for bundles that declare none */
  basePath: string | null;
  /** URL of the default output root */
  baseUrl: string | null;
  aliases: Record<string, string>;
  /** Asset path suffix -> replacement URL */
  assetMap: Record<string, string>;
  /** When non-empty, only these bundles (and their dependencies) can be registered */
  allowedBundleNames: string[];
  customizedBundles: Record<string, BundleCustomization>;
  forceCopy: boolean;
  linkAssets: boolean;
  dirMode: number;
  fileMode: number;
}

export type AssetPackConfigInput = Partial<AssetPackConfig>;

const DEFAULT_CONFIG: Omit<AssetPackConfig, 'rootDir'> = {
  manifest: FILE_PATTERNS.MANIFEST_FILE,
  basePath: null,
  baseUrl: null,
  aliases: {},
  assetMap: {},
  allowedBundleNames: [],
  customizedBundles: {},
  forceCopy: false,
  linkAssets: false,
  dirMode: PUBLISH_DEFAULTS.DIR_MODE,
  fileMode: PUBLISH_DEFAULTS.FILE_MODE
};

/**
 * Fill in defaults for a programmatic configuration
 */
export function resolveConfig(input: AssetPackConfigInput = {}): AssetPackConfig {
  return {
    rootDir: resolve(input.rootDir ?? process.cwd()),
    manifest: input.manifest !== undefined ? input.manifest : DEFAULT_CONFIG.manifest,
    basePath: input.basePath ?? DEFAULT_CONFIG.basePath,
    baseUrl: input.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    aliases: { ...DEFAULT_CONFIG.aliases, ...(input.aliases ?? {}) },
    assetMap: { ...DEFAULT_CONFIG.assetMap, ...(input.assetMap ?? {}) },
    allowedBundleNames: [...(input.allowedBundleNames ?? DEFAULT_CONFIG.allowedBundleNames)],
    customizedBundles: { ...DEFAULT_CONFIG.customizedBundles, ...(input.customizedBundles ?? {}) },
    forceCopy: input.forceCopy ?? DEFAULT_CONFIG.forceCopy,
    linkAssets: input.linkAssets ?? DEFAULT_CONFIG.linkAssets,
    dirMode: input.dirMode ?? DEFAULT_CONFIG.dirMode,
    fileMode: input.fileMode ?? DEFAULT_CONFIG.fileMode
  };
}

/**
 * Find the config file in a directory, preferring JSONC
 */
export async function findConfigFile(rootDir: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(rootDir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load configuration from `rootDir`, falling back to defaults when no file exists
 */
export async function loadConfig(rootDir: string = process.cwd()): Promise<AssetPackConfig> {
  const configPath = await findConfigFile(rootDir);
  if (!configPath) {
    logger.debug('Config file not found, using defaults');
    return resolveConfig({ rootDir });
  }

  logger.debug(`Loading config from: ${configPath}`);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(configPath);
  } catch (error) {
    logger.error('Failed to load configuration', { error });
    throw new ConfigError(`Failed to load configuration: ${error}`, { configPath });
  }

  return resolveConfig({ ...parseConfig(raw, configPath), rootDir });
}

function fail(configPath: string, message: string): never {
  throw new ConfigError(`Invalid configuration in ${configPath}: ${message}`, { configPath });
}

function stringOrNull(configPath: string, field: string, value: unknown): string | null {
  if (value === null) return null;
  if (typeof value !== 'string') fail(configPath, `'${field}' must be a string`);
  return value;
}

function stringMap(configPath: string, field: string, value: unknown): Record<string, string> {
  if (!isPlainObject(value)) fail(configPath, `'${field}' must be an object`);
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') fail(configPath, `'${field}.${key}' must be a string`);
    result[key] = item;
  }
  return result;
}

function nameList(configPath: string, field: string, value: unknown): string[] {
  if (!Array.isArray(value)) fail(configPath, `'${field}' must be a list of names`);
  const names: string[] = [];
  for (const name of value) {
    if (typeof name !== 'string' || name.length === 0) fail(configPath, `'${field}' must be a list of names`);
    names.push(name);
  }
  return names;
}

function booleanField(configPath: string, field: string, value: unknown): boolean {
  if (typeof value !== 'boolean') fail(configPath, `'${field}' must be a boolean`);
  return value;
}

function modeField(configPath: string, field: string, value: unknown): number {
  // modes may be written as octal strings ("0775") since JSON has no octal literals
  if (typeof value === 'string' && /^0?[0-7]{3,4}$/.test(value)) {
    return parseInt(value, 8);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    fail(configPath, `'${field}' must be a file mode`);
  }
  return value;
}

/**
 * Validate the parsed config file content
 */
export function parseConfig(raw: unknown, configPath: string): AssetPackConfigInput {
  if (!isPlainObject(raw)) {
    fail(configPath, 'the configuration must be an object');
  }

  const config: AssetPackConfigInput = {};

  for (const [field, value] of Object.entries(raw)) {
    switch (field) {
      case 'manifest':
        config.manifest = stringOrNull(configPath, field, value);
        break;
      case 'basePath':
        config.basePath = stringOrNull(configPath, field, value);
        break;
      case 'baseUrl':
        config.baseUrl = stringOrNull(configPath, field, value);
        break;
      case 'aliases':
        config.aliases = stringMap(configPath, field, value);
        break;
      case 'assetMap':
        config.assetMap = stringMap(configPath, field, value);
        break;
      case 'allowedBundleNames':
        config.allowedBundleNames = nameList(configPath, field, value);
        break;
      case 'customizedBundles':
        config.customizedBundles = parseCustomizedBundles(configPath, value);
        break;
      case 'forceCopy':
        config.forceCopy = booleanField(configPath, field, value);
        break;
      case 'linkAssets':
        config.linkAssets = booleanField(configPath, field, value);
        break;
      case 'dirMode':
        config.dirMode = modeField(configPath, field, value);
        break;
      case 'fileMode':
        config.fileMode = modeField(configPath, field, value);
        break;
      default:
        logger.warn(`Ignoring unknown configuration key '${field}' in ${configPath}`);
    }
  }

  return config;
}

function parseCustomizedBundles(configPath: string, value: unknown): Record<string, BundleCustomization> {
  if (!isPlainObject(value)) fail(configPath, `'customizedBundles' must be an object`);
  const result: Record<string, BundleCustomization> = {};
  for (const [name, customization] of Object.entries(value)) {
    if (customization === false) {
      result[name] = false;
    } else {
      try {
        result[name] = parseBundleFields(name, customization);
      } catch (error) {
        fail(configPath, `customizedBundles.${name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
  return result;
}

/**
 * Shared constants for assetpack
 */

export const FILE_PATTERNS = {
  CONFIG_FILES: ['assetpack.jsonc', 'assetpack.json'],
  MANIFEST_FILE: 'assets.yml'
} as const;

export const PUBLISH_DEFAULTS = {
  /** Permission for directories created while publishing */
  DIR_MODE: 0o775,
  /** Permission for copied files */
  FILE_MODE: 0o755,
  /** Hex characters kept from the published directory hash */
  HASH_LENGTH: 8
} as const;

export const ALIAS_PREFIX = '@';

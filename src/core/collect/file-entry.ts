/**
 * Normalization of raw script/style entries and option maps.
 */

import type { FileOptions, FileEntryObject } from '../../types/index.js';
import { InvalidFileEntryError } from '../../utils/errors.js';

export interface NormalizedFileEntry {
  url: string;
  key: string | null;
  position: number | null;
  options: FileOptions;
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function requireUrl(bundleName: string, url: unknown): string {
  if (typeof url !== 'string' || url.length === 0) {
    throw new InvalidFileEntryError(bundleName, 'the URL must be a non-empty string', { url });
  }
  return url;
}

function requireOptions(bundleName: string, options: unknown): FileOptions {
  if (options === undefined) {
    return {};
  }
  if (!isPlainObject(options)) {
    throw new InvalidFileEntryError(bundleName, 'entry options must be an object', { options });
  }
  return { ...options };
}

function requirePosition(bundleName: string, position: unknown): number | null {
  if (position === undefined || position === null) {
    return null;
  }
  if (typeof position !== 'number' || !Number.isInteger(position)) {
    throw new InvalidFileEntryError(bundleName, 'an entry position must be an integer', { position });
  }
  return position;
}

/**
 * Turn a string, `[url, options?]` tuple or `{ url, key?, position?, options? }` object into a normalized entry
 */
export function normalizeFileEntry(bundleName: string, raw: unknown): NormalizedFileEntry {
  if (typeof raw === 'string') {
    return { url: requireUrl(bundleName, raw), key: null, position: null, options: {} };
  }

  if (Array.isArray(raw)) {
    if (raw.length < 1 || raw.length > 2) {
      throw new InvalidFileEntryError(bundleName, 'a tuple entry must be [url] or [url, options]', { entry: raw });
    }
    const [url, options]: unknown[] = raw;
    return {
      url: requireUrl(bundleName, url),
      key: null,
      position: null,
      options: requireOptions(bundleName, options)
    };
  }

  if (isPlainObject(raw)) {
    const { url, key, position, options } = raw;
    let entryKey: string | null = null;
    if (key !== undefined) {
      if (typeof key !== 'string' || key.length === 0) {
        throw new InvalidFileEntryError(bundleName, 'an entry key must be a non-empty string', { key });
      }
      entryKey = key;
    }
    return {
      url: requireUrl(bundleName, url),
      key: entryKey,
      position: requirePosition(bundleName, position),
      options: requireOptions(bundleName, options)
    };
  }

  throw new InvalidFileEntryError(bundleName, `unsupported entry type '${raw === null ? 'null' : typeof raw}'`, {
    entry: raw
  });
}

/**
 * Object form of a normalized entry, as stored on a definition built from a manifest
 */
export function toFileEntryObject(entry: NormalizedFileEntry): FileEntryObject {
  return {
    url: entry.url,
    ...(entry.key !== null ? { key: entry.key } : {}),
    ...(entry.position !== null ? { position: entry.position } : {}),
    ...(Object.keys(entry.options).length > 0 ? { options: entry.options } : {})
  };
}

/**
 * Bundle-level default options must be a map of named keys
 */
export function validateDefaultOptions(bundleName: string, options: unknown): FileOptions {
  if (!isPlainObject(options)) {
    throw new InvalidFileEntryError(bundleName, 'default options must be a map of named options', { options });
  }
  const integerKey = Object.keys(options).find((key) => INTEGER_KEY.test(key));
  if (integerKey !== undefined) {
    throw new InvalidFileEntryError(bundleName, `default options must use named keys, found '${integerKey}'`, {
      options
    });
  }
  return options;
}

/**
 * Fill the keys missing from the entry options with the bundle defaults
 */
export function mergeOptions(defaults: FileOptions, own: FileOptions): FileOptions {
  return { ...defaults, ...own };
}

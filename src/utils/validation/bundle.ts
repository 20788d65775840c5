import type { BundleDefinition, PublishOptions, RawFileEntry } from '../../types/index.js';
import { InvalidBundleError } from '../errors.js';
import {
  isPlainObject,
  normalizeFileEntry,
  toFileEntryObject,
  validateDefaultOptions
} from '../../core/collect/file-entry.js';

/** Writable subset of a definition's fields, assignable to BundleInit */
export type BundleFields = {
  -readonly [K in Exclude<keyof BundleDefinition, 'name'>]?: BundleDefinition[K];
};

const KNOWN_FIELDS = new Set([
  'dependencies',
  'scripts',
  'styles',
  'scriptOptions',
  'styleOptions',
  'sourcePath',
  'basePath',
  'baseUrl',
  'cdn',
  'scriptPosition',
  'stylePosition',
  'publishOptions'
]);

function optionalString(
  name: string,
  field: string,
  value: unknown,
  allowEmpty = false
): string | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value !== 'string' || (value.length === 0 && !allowEmpty)) {
    throw new InvalidBundleError(name, `'${field}' must be a ${allowEmpty ? '' : 'non-empty '}string`);
  }
  return value;
}

function optionalInteger(name: string, field: string, value: unknown): number | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidBundleError(name, `'${field}' must be an integer`);
  }
  return value;
}

function stringList(name: string, field: string, value: unknown): string[] {
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string' || item.length === 0)) {
    throw new InvalidBundleError(name, `'${field}' must be a list of non-empty strings`);
  }
  return value.map(String);
}

function fileEntries(name: string, field: string, value: unknown): RawFileEntry[] {
  if (!Array.isArray(value)) {
    throw new InvalidBundleError(name, `'${field}' must be a list`);
  }
  return value.map((entry) => toFileEntryObject(normalizeFileEntry(name, entry)));
}

function publishOptions(name: string, value: unknown): PublishOptions {
  if (!isPlainObject(value)) {
    throw new InvalidBundleError(name, `'publishOptions' must be an object`);
  }
  const result: PublishOptions = {};
  if (value.forceCopy !== undefined) {
    if (typeof value.forceCopy !== 'boolean') {
      throw new InvalidBundleError(name, `'publishOptions.forceCopy' must be a boolean`);
    }
    result.forceCopy = value.forceCopy;
  }
  if (value.only !== undefined) {
    result.only = stringList(name, 'publishOptions.only', value.only);
  }
  if (value.except !== undefined) {
    result.except = stringList(name, 'publishOptions.except', value.except);
  }
  return result;
}

/**
 * Validate an untyped bundle declaration (from YAML or JSON) into bundle fields.
 * Only the fields present in the declaration are returned.
 */
export function parseBundleFields(name: string, raw: unknown): BundleFields {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new InvalidBundleError(name, 'a bundle declaration must be a map');
  }

  const unknownField = Object.keys(raw).find((key) => !KNOWN_FIELDS.has(key));
  if (unknownField !== undefined) {
    throw new InvalidBundleError(name, `unknown field '${unknownField}'`);
  }

  const fields: BundleFields = {};

  if (raw.dependencies !== undefined) fields.dependencies = stringList(name, 'dependencies', raw.dependencies);
  if (raw.scripts !== undefined) fields.scripts = fileEntries(name, 'scripts', raw.scripts);
  if (raw.styles !== undefined) fields.styles = fileEntries(name, 'styles', raw.styles);
  if (raw.scriptOptions !== undefined) fields.scriptOptions = validateDefaultOptions(name, raw.scriptOptions);
  if (raw.styleOptions !== undefined) fields.styleOptions = validateDefaultOptions(name, raw.styleOptions);

  const sourcePath = optionalString(name, 'sourcePath', raw.sourcePath);
  if (sourcePath !== undefined) fields.sourcePath = sourcePath;
  const basePath = optionalString(name, 'basePath', raw.basePath);
  if (basePath !== undefined) fields.basePath = basePath;
  // only null leaves baseUrl unset
  const baseUrl = optionalString(name, 'baseUrl', raw.baseUrl, true);
  if (baseUrl !== undefined) fields.baseUrl = baseUrl;

  if (raw.cdn !== undefined) {
    if (typeof raw.cdn !== 'boolean') {
      throw new InvalidBundleError(name, `'cdn' must be a boolean`);
    }
    fields.cdn = raw.cdn;
  }

  const scriptPosition = optionalInteger(name, 'scriptPosition', raw.scriptPosition);
  if (scriptPosition !== undefined) fields.scriptPosition = scriptPosition;
  const stylePosition = optionalInteger(name, 'stylePosition', raw.stylePosition);
  if (stylePosition !== undefined) fields.stylePosition = stylePosition;

  if (raw.publishOptions !== undefined) fields.publishOptions = publishOptions(name, raw.publishOptions);

  return fields;
}

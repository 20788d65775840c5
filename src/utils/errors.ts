import { AssetPackError, ErrorCodes, AssetAxis } from '../types/index.js';

/**
 * Error classes raised by bundle loading, registration, collection and publishing
 */

export class BundleNotFoundError extends AssetPackError {
  constructor(bundleName: string) {
    super(`Asset bundle '${bundleName}' not found`, ErrorCodes.BUNDLE_NOT_FOUND, { bundleName });
    this.name = 'BundleNotFoundError';
  }
}

export class InvalidBundleError extends AssetPackError {
  constructor(bundleName: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid asset bundle '${bundleName}': ${reason}`, ErrorCodes.INVALID_BUNDLE, { bundleName, ...details });
    this.name = 'InvalidBundleError';
  }
}

export class DisallowedBundleError extends AssetPackError {
  constructor(bundleName: string, allowed: readonly string[]) {
    super(
      `Asset bundle '${bundleName}' is not allowed. Allowed bundles: ${allowed.join(', ')}`,
      ErrorCodes.DISALLOWED_BUNDLE,
      { bundleName, allowed: [...allowed] }
    );
    this.name = 'DisallowedBundleError';
  }
}

export class CircularDependencyError extends AssetPackError {
  constructor(bundleName: string, path: readonly string[] = []) {
    const cycle = path.length > 0 ? `: ${[...path, bundleName].join(' → ')}` : '';
    super(
      `A circular dependency is detected for bundle '${bundleName}'${cycle}`,
      ErrorCodes.CIRCULAR_DEPENDENCY,
      { bundleName, path: [...path] }
    );
    this.name = 'CircularDependencyError';
  }
}

export class PositionConflictError extends AssetPackError {
  constructor(bundleName: string, axis: AssetAxis, current: number, required: number) {
    super(
      `An asset bundle that depends on '${bundleName}' requires ${axis} position ${required}, ` +
        `but '${bundleName}' is already at ${current}`,
      ErrorCodes.POSITION_CONFLICT,
      { bundleName, axis, current, required }
    );
    this.name = 'PositionConflictError';
  }
}

export class MissingConfigurationError extends AssetPackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.MISSING_CONFIGURATION, details);
    this.name = 'MissingConfigurationError';
  }
}

export class InvalidFileEntryError extends AssetPackError {
  constructor(bundleName: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid file entry in bundle '${bundleName}': ${reason}`, ErrorCodes.INVALID_FILE_ENTRY, {
      bundleName,
      ...details
    });
    this.name = 'InvalidFileEntryError';
  }
}

export class FileNotFoundError extends AssetPackError {
  constructor(path: string, details?: Record<string, unknown>) {
    super(`File not found: ${path}`, ErrorCodes.FILE_NOT_FOUND, { path, ...details });
    this.name = 'FileNotFoundError';
  }
}

export class PublishIOError extends AssetPackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Publish failed: ${message}`, ErrorCodes.PUBLISH_IO_ERROR, details);
    this.name = 'PublishIOError';
  }
}

export class FileSystemError extends AssetPackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends AssetPackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

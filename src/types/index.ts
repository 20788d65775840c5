// Core types for assetpack

export * from './bundle.js';

// Error types
export class AssetPackError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AssetPackError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  BUNDLE_NOT_FOUND = 'BUNDLE_NOT_FOUND',
  INVALID_BUNDLE = 'INVALID_BUNDLE',
  DISALLOWED_BUNDLE = 'DISALLOWED_BUNDLE',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  POSITION_CONFLICT = 'POSITION_CONFLICT',
  MISSING_CONFIGURATION = 'MISSING_CONFIGURATION',
  INVALID_FILE_ENTRY = 'INVALID_FILE_ENTRY',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PUBLISH_IO_ERROR = 'PUBLISH_IO_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

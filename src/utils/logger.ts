import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

/**
 * Pick the log level from the environment.
 * ASSETPACK_LOG_LEVEL wins; ASSETPACK_VERBOSE=1 means debug; development builds log info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.ASSETPACK_LOG_LEVEL?.toLowerCase();
  const named = LEVEL_ORDER.find((level) => level === requested);
  if (named) {
    return named;
  }
  if (env.ASSETPACK_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

/**
 * Render one log line; object metadata is appended as indented JSON
 */
export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  meta?: unknown,
  timestamp: string = new Date().toISOString()
): string {
  let formatted = `${timestamp} ${PREFIXES[level]} [${scope}] ${message}`;

  if (meta && typeof meta === 'object') {
    formatted += `\n${JSON.stringify(meta, errorReplacer, 2)}`;
  } else if (meta !== undefined && meta !== null && meta !== '') {
    formatted += ` ${String(meta)}`;
  }

  return formatted;
}

// JSON.stringify(new Error()) is {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { ...value, name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Console logger filtered by level
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly scope: string = 'assetpack'
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(formatLogLine(LogLevel.DEBUG, this.scope, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(formatLogLine(LogLevel.INFO, this.scope, message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(formatLogLine(LogLevel.WARN, this.scope, message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(formatLogLine(LogLevel.ERROR, this.scope, message, meta));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export const logger = new ConsoleLogger(resolveLogLevel());

/**
 * DebugLogger - Centralized logging for the activities service
 *
 * All output goes to stderr so stdout stays clean for CLI output.
 *
 * Features:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Timestamp formatting
 * - Environment-based filtering (ACTIVITIES_LOG_LEVEL)
 * - Module/context tagging
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4,
};

// Set from config at startup; takes precedence over the environment
let levelOverride: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Override the level for every logger, or pass null to go back to ACTIVITIES_LOG_LEVEL
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export class DebugLogger {
  private context: string;

  constructor(context = 'activities') {
    this.context = context;
  }

  private _getLogLevel(): number {
    if (levelOverride) {
      return LOG_LEVELS[levelOverride];
    }
    const env = (process.env.ACTIVITIES_LOG_LEVEL || 'ERROR').toUpperCase();
    return isLogLevel(env) ? LOG_LEVELS[env] : LOG_LEVELS.ERROR;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this._getLogLevel();
  }

  private _formatMessage(level: LogLevel, ...args: unknown[]): unknown[] {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${this.context}] [${level}]`;
    return [prefix, ...args];
  }

  debug(...args: unknown[]): void {
    if (!this._shouldLog('DEBUG')) {
      return;
    }
    console.error(...this._formatMessage('DEBUG', ...args));
  }

  info(...args: unknown[]): void {
    if (!this._shouldLog('INFO')) {
      return;
    }
    console.error(...this._formatMessage('INFO', ...args));
  }

  warn(...args: unknown[]): void {
    if (!this._shouldLog('WARN')) {
      return;
    }
    console.warn(...this._formatMessage('WARN', ...args));
  }

  error(...args: unknown[]): void {
    if (!this._shouldLog('ERROR')) {
      return;
    }
    console.error(...this._formatMessage('ERROR', ...args));
  }
}

const logger = new DebugLogger('activities');

export const debug = (...args: unknown[]): void => logger.debug(...args);
export const info = (...args: unknown[]): void => logger.info(...args);
export const warn = (...args: unknown[]): void => logger.warn(...args);
export const error = (...args: unknown[]): void => logger.error(...args);

export default logger;

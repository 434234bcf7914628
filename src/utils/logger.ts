import { Logger, LogLevel, PackageModelError } from '../types/index.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO] ',
  [LogLevel.WARN]: '[WARN] ',
  [LogLevel.ERROR]: '[ERROR]'
};

/**
 * Console logger for the package model.
 *
 * Lines carry no timestamp except at debug level, where the timing of
 * source-control queries and directory scans is of interest. Package model
 * errors passed as metadata are reduced to their code and details.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.INFO) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const head = this.level === LogLevel.DEBUG
      ? `${new Date().toISOString()} ${LEVEL_PREFIX[level]}`
      : LEVEL_PREFIX[level];
    let formatted = `${head} ${message}`;

    if (meta instanceof PackageModelError) {
      formatted += ` [${meta.code}]`;
      if (meta.details && Object.keys(meta.details).length > 0) {
        formatted += ` ${JSON.stringify(meta.details)}`;
      }
    } else if (meta instanceof Error) {
      // JSON.stringify(new Error()) is {}
      formatted += `\n${meta.stack ?? `${meta.name}: ${meta.message}`}`;
    } else if (meta && typeof meta === 'object') {
      formatted += `\n${JSON.stringify(meta, null, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(LogLevel.INFO, message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, meta));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Pick the default level from the environment the process was started with
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.DRECIPE_VERBOSE === '1') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'development') return LogLevel.INFO;
  return LogLevel.WARN;
}

export const logger = new ConsoleLogger(logLevelFromEnv(process.env));

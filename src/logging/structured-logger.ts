/**
 * Structured Logger — JSON-formatted logging with levels, timestamps, and context
 *
 * Every settlement component logs through this instead of console.log:
 * - Machine-parseable JSON lines in production
 * - Log levels (debug, info, warn, error), MARKET_LOG_LEVEL overrides
 * - Context injection via child() (chainId, marketplace address, ...)
 *
 * Amounts and asset ids are bigint; they are written as decimal strings.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const levelMap: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
  };
  return value === undefined ? undefined : levelMap[value.trim().toLowerCase()];
}

/**
 * JSON.stringify replacer for bigints and Buffers. Buffer.toJSON runs
 * before the replacer, so the raw value is read from the holder.
 */
export function jsonReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown = typeof this === 'object' && this !== null ? Reflect.get(this, key) : value;
  if (typeof raw === 'bigint') return raw.toString();
  if (Buffer.isBuffer(raw)) return `0x${raw.toString('hex')}`;
  return value;
}

export function stringifyLogData(data: unknown): string {
  return JSON.stringify(data, jsonReplacer);
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogData;
  private useJson: boolean;

  constructor(opts?: {
    minLevel?: LogLevel;
    context?: LogData;
    json?: boolean;
  }) {
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.MARKET_LOG_LEVEL) ?? LogLevel.INFO;
    this.defaultContext = opts?.context ?? {};
    // Default to JSON in production, pretty in development
    this.useJson = opts?.json ?? (process.env.NODE_ENV === 'production');
  }

  child(context: LogData): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      context: { ...this.defaultContext, ...context },
      json: this.useJson,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogData): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogData): void {
    if (level < this.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.useJson) {
      const output = stringifyLogData(entry);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
    } else {
      const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
      const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
      const context = { ...this.defaultContext, ...data };
      const extra = Object.keys(context).length > 0 ? ' ' + stringifyLogData(context) : '';
      const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
      if (level >= LogLevel.ERROR) {
        console.error(line);
      } else if (level >= LogLevel.WARN) {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
  }
}

// Singleton logger instance
export const logger = new StructuredLogger();

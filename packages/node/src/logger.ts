import { appendFile } from 'node:fs/promises';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  file?: string | null;
  /** Tag printed after the level, e.g. `[api]`. */
  scope?: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function formatLogLine(level: LogLevel, scope: string | undefined, message: string): string {
  const timestamp = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : '';
  return `[${timestamp}] [${level.toUpperCase()}]${tag} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel: LogLevel = options.level ?? 'info';
  const minValue = LEVEL_ORDER[minLevel] ?? LEVEL_ORDER.info;
  const filePath = options.file ?? undefined;

  const log = (level: LogLevel, ...args: unknown[]): void => {
    if (LEVEL_ORDER[level] < minValue) {
      return;
    }
    const line = formatLogLine(level, options.scope, format(...args));
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
    if (filePath) {
      appendFile(filePath, `${line}\n`, 'utf8').catch((error: unknown) => {
        process.stderr.write(`log file write failed: ${String(error)}\n`);
      });
    }
  };

  return {
    debug: (...args: unknown[]) => log('debug', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    error: (...args: unknown[]) => log('error', ...args),
    child: (scope: string) =>
      createLogger({
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

/**
 * Scoped logger.
 *
 * Human-readable coloured lines by default, JSON lines when the format is set
 * to "json" (LOG_FORMAT=json).
 *
 * Usage:
 *   import { log } from './logger';
 *   log.info('scraper', 'Album extracted', { albumId, assets: 42 });
 *   log.error('immich', 'Request failed', { operation }, error);
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info';
let currentFormat: LogFormat = process.env.LOG_FORMAT === 'json' ? 'json' : 'text';

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function parseLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const lowered = value.toLowerCase();
  if (lowered === 'warning') return 'warn';
  return isLogLevel(lowered) ? lowered : null;
}

export function configureLogger(options: { level?: LogLevel; format?: LogFormat }) {
  if (options.level) currentLevel = options.level;
  if (options.format) currentFormat = options.format;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatError(err: unknown): { message: string; stack?: string } {
  if (err instanceof Error) {
    return { message: err.message, ...(err.stack ? { stack: err.stack } : {}) };
  }
  return { message: String(err) };
}

function emit(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  err?: unknown
) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

  const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (currentFormat === 'json') {
    fn(JSON.stringify({
      level,
      scope,
      message,
      ...(context ? { context } : {}),
      ...(err !== undefined ? { error: formatError(err) } : {}),
      ts: new Date().toISOString(),
    }));
    return;
  }

  const time = chalk.green(new Date().toTimeString().slice(0, 8));
  const tag = chalk.dim(`[${scope}]`);
  const text =
    level === 'error' ? chalk.red(message)
    : level === 'warn' ? chalk.yellow(message)
    : level === 'debug' ? chalk.dim(message)
    : message;
  const extra = context && Object.keys(context).length > 0 ? chalk.dim(` ${JSON.stringify(context)}`) : '';
  const errLine = err !== undefined ? `\n  → ${formatError(err).message}` : '';

  fn(`${time} ${level.toUpperCase().padEnd(5)} ${tag} ${text}${extra}${errLine}`);
}

export const log = {
  debug: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('debug', scope, message, context),

  info: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('info', scope, message, context),

  warn: (scope: string, message: string, context?: Record<string, unknown>, err?: unknown) =>
    emit('warn', scope, message, context, err),

  error: (scope: string, message: string, context?: Record<string, unknown>, err?: unknown) =>
    emit('error', scope, message, context, err),
};

/**
 * Console logger with a level threshold.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] Discovery:warn - message [key="value"]`.
 * The threshold is read from LOG_LEVEL and can be changed with setLogLevel().
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) return '';

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') return `${key}="${value}"`;
      if (value === undefined || value === null) return `${key}=${value}`;
      if (typeof value === 'object') return `${key}=${JSON.stringify(value)}`;
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

export function log(level: LogLevel, component: string, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[threshold]) return;

  const timestamp = new Date().toISOString();
  const formatted = `[${timestamp}] ${component}:${level} - ${message}${context ? formatContext(context) : ''}`;

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
      break;
  }
}

export const logger = {
  error: (component: string, message: string, context?: LogContext) => log('error', component, message, context),
  warn: (component: string, message: string, context?: LogContext) => log('warn', component, message, context),
  info: (component: string, message: string, context?: LogContext) => log('info', component, message, context),
  debug: (component: string, message: string, context?: LogContext) => log('debug', component, message, context),
};

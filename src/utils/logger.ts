import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

// Errors serialize to {} by default.
function replacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

export function formatLine(
  level: LogLevel,
  scope: string,
  message: string,
  meta: LogMeta | undefined,
  format: 'text' | 'json',
  ts: string,
): string {
  if (format === 'json') {
    return JSON.stringify({ timestamp: ts, level, scope, message, ...meta }, replacer);
  }
  const head = `[${ts}] [${level.toUpperCase()}] [${scope}] ${message}`;
  return meta ? `${head} ${JSON.stringify(meta, replacer)}` : head;
}

function log(level: LogLevel, scope: string, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const out = formatLine(level, scope, message, meta, env.LOG_FORMAT, new Date().toISOString());
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, meta) => log('debug', scope, msg, meta),
    info:  (msg, meta) => log('info',  scope, msg, meta),
    warn:  (msg, meta) => log('warn',  scope, msg, meta),
    error: (msg, meta) => log('error', scope, msg, meta),
  };
}

export const logger = createLogger('scene-validator');

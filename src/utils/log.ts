// Leveled logger - all output goes to stderr to keep JSON stdout clean

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function getLogLevel(): LogLevel {
  const env = process.env.DOCNAV_LOG_LEVEL?.toLowerCase();
  if (env && isLogLevel(env)) return env;
  return 'info';
}

export function formatMessage(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  let line = `[${ts}] [${level.toUpperCase()}] [${context}] ${message}`;
  if (extra && Object.keys(extra).length > 0) {
    line += ' ' + JSON.stringify(extra);
  }
  return line;
}

function write(level: Exclude<LogLevel, 'silent'>, context: string, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogLevel()]) return;
  process.stderr.write(formatMessage(level, context, message, extra) + '\n');
}

export function logDebug(context: string, message: string, extra?: Record<string, unknown>): void {
  write('debug', context, message, extra);
}

export function logInfo(context: string, message: string, extra?: Record<string, unknown>): void {
  write('info', context, message, extra);
}

export function logWarn(context: string, message: string, extra?: Record<string, unknown>): void {
  write('warn', context, message, extra);
}

export function logError(context: string, message: string, extra?: Record<string, unknown>): void {
  write('error', context, message, extra);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

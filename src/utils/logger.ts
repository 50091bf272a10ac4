/**
 * Leveled logger. Everything goes to stderr: in stdio mode stdout carries the
 * MCP protocol.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, args: unknown[]): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
  debug: (...args: unknown[]) => write('debug', args),
  info: (...args: unknown[]) => write('info', args),
  warn: (...args: unknown[]) => write('warn', args),
  error: (...args: unknown[]) => write('error', args),
};

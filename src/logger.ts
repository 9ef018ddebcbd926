import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(x: string): x is LogLevel {
  return LOG_LEVELS.some((level) => level === x);
}

/**
 * The CLI logs to stderr so that command output on stdout stays parseable;
 * the server logs to stdout like Fastify does by default.
 */
export function createLogger(opts: { level?: LogLevel; stream?: 'stdout' | 'stderr'; name?: string } = {}): Logger {
  const fd = opts.stream === 'stderr' ? 2 : 1;
  return pino({ name: opts.name ?? 'todo', level: opts.level ?? 'info' }, pino.destination(fd));
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

import { pino, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({ level, base: { service: 'hex-strategy-engine' } });
}

/**
 * Logger that drops everything, for tests and embedded use.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

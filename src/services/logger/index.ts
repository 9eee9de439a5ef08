import pino from 'pino';

/**
 * Named module logger. The level is read from LOG_LEVEL directly so that
 * modules can log without pulling in the validated config (and its
 * DATABASE_URL requirement) at import time.
 */
export function createLogger(name: string): pino.Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}

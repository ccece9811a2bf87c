import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Root logger. Components take a child (`logger.child({ component })`)
 * so every line carries its origin.
 */
export function createLogger(level: string = 'info'): Logger {
  return pino({
    level,
    base: { service: 'discharge-clearance' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', '*.apiKey', 'authorization', '*.authorization', 'password', '*.password'],
      censor: '[REDACTED]',
    },
  });
}

/** Logger that drops everything; used by tests and embedded callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

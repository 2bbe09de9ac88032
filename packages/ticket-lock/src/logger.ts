import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Static bindings merged into every line */
  base?: Record<string, unknown>;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Structured logger using pino
 *
 * - JSON lines with the level label (not the number)
 * - ISO timestamps
 * - `service: turnstile` on every line unless overridden
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    base: { service: 'turnstile', ...options.base },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }, options.destination);
}

/** Logger that discards everything; the default for library classes */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

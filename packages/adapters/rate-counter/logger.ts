import { pino, type Logger, type LevelWithSilent } from 'pino';

/**
 * Structured logger using pino
 *
 * - `level` controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps
 * - JSON lines with the level as a label rather than a number
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    name: 'rate-counter',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

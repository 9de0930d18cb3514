/**
 * Structured logger using Pino.
 *
 * Engine modules take a child logger bound to their module name:
 *   const log = createLogger('round');
 *   log.info({ round: 3, winner: 'attackers' }, 'Round ended');
 *
 * LOG_LEVEL overrides the level. Under Vitest the default is silent.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const defaultLevel = process.env['VITEST'] !== undefined ? 'silent' : 'info';

export const logger: Logger = pino({
  level: process.env['LOG_LEVEL'] ?? defaultLevel,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  base: {
    service: 'round-sim',
    pid: process.pid,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the module it belongs to. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

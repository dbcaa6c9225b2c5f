/**
 * @sshkit/keys - Logging
 *
 * Package logger. Records carry curve names and failure reasons only,
 * never key or signature bytes.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import { config } from './config';

/**
 * Create a logger for this package.
 *
 * @param level - Minimum level to emit
 */
export function createLogger(level: LevelWithSilent = config.logLevel): Logger {
  return pino({ name: 'sshkit:keys', level });
}

export const logger: Logger = createLogger();

/**
 * Loggable reason for a caught value.
 */
export function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

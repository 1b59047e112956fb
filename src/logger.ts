/**
 * Structured logging for the sync engine.
 *
 * Usage:
 *   const log = createLogger('registry');
 *   log.info({ type: 'Person', fields: ['nickname'] }, 'extending schema');
 */

import pino, { type LevelWithSilent, type Logger } from 'pino';

/**
 * Create a namespaced logger.
 *
 * @param namespace - e.g. 'registry', 'storage'
 * @param level - defaults to 'info'
 */
export function createLogger(namespace: string, level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'json-sync', level }).child({ namespace });
}

export type { Logger, LevelWithSilent } from 'pino';

/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging to stderr, so stdout stays free for remote command output.
 * Components prefix messages with `[component]` and put attempt counters and causes
 * in the bound object, never in the message text.
 */

import pino from 'pino';

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
);

export type Logger = typeof logger;

/**
 * Change the level of the shared logger at runtime (CLI --log-level)
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

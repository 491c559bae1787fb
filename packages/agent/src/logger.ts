import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Process-wide logger. JSON lines go to stderr so that snapshot output on
 * stdout stays machine-readable.
 */
export const logger = pino(
  {
    name: 'hostsnap',
    level: process.env.HOSTSNAP_LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);

import pino from 'pino';

function isTestRuntime(): boolean {
  return process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
}

const level = isTestRuntime()
  ? 'silent'
  : (process.env.LOG_LEVEL ?? 'info');

/**
 * Root logger. Components derive their own with `logger.child({ module })`.
 *
 * Writes to stderr so stdout stays free for hosts that speak a protocol over it.
 */
export const logger = pino(
  {
    level,
    base: { service: 'whatsapp-bridge-core' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export type { Logger } from 'pino';

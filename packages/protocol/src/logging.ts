import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const REDACT_PATHS = [
  'privateKey',
  'userKey',
  '*.privateKey',
  '*.issuerPrivateKey',
  '*.userKey',
  '*.secret',
];

export const logger = pino({
  name: 'voucher-protocol',
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
});

/**
 * Child logger tagged with the emitting service
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

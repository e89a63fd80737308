/**
 * Redaction for pino. Stored values never reach the logs; only sizes and
 * paths do, but a caller-supplied binding may still carry one.
 */
export const REDACTION_CONFIG: { paths: string[]; censor: string } = {
  paths: ['value', '*.value', 'bytes', '*.bytes', 'payload', '*.payload', 'err.value'],
  censor: '[REDACTED]',
};

import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Keep the last four digits of a phone-number identity */
export function maskIdentity(identity: string): string {
  if (identity.length <= 4) return '****';
  return `${'*'.repeat(identity.length - 4)}${identity.slice(-4)}`;
}

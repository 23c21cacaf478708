import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production' && process.env['VITEST'] === undefined
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'authorization', '*.api_key', '*.apiKey'],
    censor: '***REDACTED***',
  },
});

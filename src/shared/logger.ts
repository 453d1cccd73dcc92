import pino from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: [
      'api_key',
      'apiKey',
      'bearer_token',
      'bot_token',
      'password',
      'smtp_pass',
      'secret',
      '*.api_key',
      '*.bearer_token',
      '*.bot_token',
      '*.password',
      '*.smtp_pass',
    ],
    censor: '***REDACTED***',
  },
});

export type Logger = typeof logger;

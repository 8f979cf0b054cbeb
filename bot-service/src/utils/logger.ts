/**
 * Root logger for the bot service.
 */

import pino from 'pino';

const env = process.env;

export const logger = pino({
  name: 'petal-bot',
  level: env['LOG_LEVEL'] || 'info',
  transport:
    env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

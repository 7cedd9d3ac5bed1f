import pino from 'pino';

export const logger = pino({
  // Use any specified log level, or warn in production, info otherwise
  level: process.env.LOG_LEVEL
    ? process.env.LOG_LEVEL
    : process.env.NODE_ENV === 'production'
      ? 'warn'
      : 'info',

  browser: { disabled: true }, // See https://getpino.io/#/docs/browser
});

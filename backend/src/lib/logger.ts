import pino from 'pino';

export const loggerOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Credential material must never reach a log line
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'token',
      'bearerToken',
      'csrfToken',
      'cookie',
      'cookies',
      'cookieJar',
      'credentials',
      '*.bearerToken',
      '*.csrfToken',
      '*.cookieJar',
      '*.credentials',
      'headers.authorization',
      'headers.cookie',
      'headers["x-csrf-token"]',
      'headers["x-upstream-cookie"]',
    ],
    censor: '[REDACTED]',
  },
};

// Create logger instance
export const logger = pino(loggerOptions);

export type Logger = typeof logger;

// Create child logger with request context
export function createRequestLogger(requestId: string, userId?: string, base: Logger = logger): Logger {
  return base.child({
    requestId,
    ...(userId && { userId }),
  });
}

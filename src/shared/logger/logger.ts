/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the process, stamped with service + env.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withRequestContext(req)` when logging inside request handlers.
 * - Pass `{ err }` rather than a bare Error so stack/message survive serialization.
 *
 * RULES:
 * - LOG_LEVEL=silent mutes every transport (quiet test runs).
 * - Captcha text is never a log field; scopes and request ids are.
 */

import winston from 'winston';

export type LoggerOptions = {
  service: string;
  env: string;
  level: string;
};

export function createLogger(opts: LoggerOptions) {
  const silent = opts.level === 'silent';

  return winston.createLogger({
    level: silent ? 'error' : opts.level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: opts.service, env: opts.env },
    transports: [new winston.transports.Console()],
  });
}

export const logger = createLogger({
  service: process.env.SERVICE_NAME ?? 'shiro-biz',
  env: process.env.NODE_ENV ?? 'development',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type Logger = typeof logger;

/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - SHIRO_* variables are bound onto SecurityProperties (see
 *   modules/security/bind-security-properties.ts).
 *
 * TYPING:
 * - nodeEnv and cacheDriver are unions so invalid values ('prod', 'memcached')
 *   fail at startup instead of silently falling through in di.ts.
 */

import 'dotenv/config';
import { z } from 'zod';
import { bindSecurityProperties } from '../modules/security/bind-security-properties';
import type { SecurityProperties } from '../modules/security/security.properties';
import {
  DEFAULT_CAPTCHA_IMAGE_OPTIONS,
  DEFAULT_CAPTCHA_TEXT_OPTIONS,
} from '../modules/captcha/captcha-challenge';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const CacheDriverSchema = z.enum(['redis', 'memory']).default('redis');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['silent', 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('shiro-biz'),

    // Cache backing the captcha records
    CACHE_DRIVER: CacheDriverSchema,
    REDIS_URL: z.string().min(1).optional(),

    // Captcha rendering
    CAPTCHA_LENGTH: z.coerce
      .number()
      .int()
      .min(1)
      .max(16)
      .default(DEFAULT_CAPTCHA_TEXT_OPTIONS.length),
    CAPTCHA_CHARS: z.string().min(2).default(DEFAULT_CAPTCHA_TEXT_OPTIONS.chars),
    CAPTCHA_WIDTH: z.coerce
      .number()
      .int()
      .min(40)
      .max(1000)
      .default(DEFAULT_CAPTCHA_IMAGE_OPTIONS.width),
    CAPTCHA_HEIGHT: z.coerce
      .number()
      .int()
      .min(20)
      .max(400)
      .default(DEFAULT_CAPTCHA_IMAGE_OPTIONS.height),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_DRIVER === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when CACHE_DRIVER=redis',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type CacheDriver = z.infer<typeof CacheDriverSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  cacheDriver: CacheDriver;
  redisUrl: string | null;

  security: SecurityProperties;

  captcha: {
    length: number;
    chars: string;
    width: number;
    height: number;
  };
};

export function buildConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    cacheDriver: parsed.CACHE_DRIVER,
    redisUrl: parsed.REDIS_URL ?? null,

    security: bindSecurityProperties(env),

    captcha: {
      length: parsed.CAPTCHA_LENGTH,
      chars: parsed.CAPTCHA_CHARS,
      width: parsed.CAPTCHA_WIDTH,
      height: parsed.CAPTCHA_HEIGHT,
    },
  };
}

import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_ALLOWED_UPLOAD_EXTENSIONS,
  DEFAULT_MAX_UPLOAD_SIZE,
} from '@medclaims/shared/constants/claim.constants.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  UPLOAD_DIRECTORY: z.string().min(1).default('./uploads'),
  MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_UPLOAD_SIZE),
  ALLOWED_UPLOAD_EXTENSIONS: z
    .string()
    .default(DEFAULT_ALLOWED_UPLOAD_EXTENSIONS.join(','))
    .transform((v) =>
      v
        .split(',')
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0)
        .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)),
    ),

  EMAIL_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM_ADDRESS: z.string().email().default('noreply@medclaims.local'),
  EMAIL_FROM_NAME: z.string().default('Medical Claims'),
  EMAIL_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(10),
  ENABLE_EMAIL_NOTIFICATIONS: booleanFlag.default('true'),
  ENABLE_IN_APP_NOTIFICATIONS: booleanFlag.default('true'),

  SESSION_ABSOLUTE_TTL_HOURS: z.coerce.number().positive().default(24),
  SESSION_IDLE_TTL_MINUTES: z.coerce.number().positive().default(60),

  ARGON2_MEMORY: z.coerce.number().int().positive().default(19456),
  ARGON2_ITERATIONS: z.coerce.number().int().positive().default(2),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  databaseUrl: string;
  nodeEnv: Env['NODE_ENV'];
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: Env['LOG_LEVEL'];
  uploads: {
    directory: string;
    maxSize: number;
    allowedExtensions: readonly string[];
  };
  email: {
    apiKey: string | undefined;
    timeoutSeconds: number;
    fromAddress: string;
    fromName: string;
    enabled: boolean;
  };
  notifications: {
    inAppEnabled: boolean;
  };
  session: {
    absoluteTtlHours: number;
    idleTtlMinutes: number;
  };
  argon2: {
    memoryCost: number;
    timeCost: number;
  };
}

export class ConfigError extends Error {
  constructor(public fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid environment variables: ${Object.keys(fieldErrors).join(', ')}`);
  }
}

/**
 * Parse configuration once from an environment-shaped source.
 * Email is only enabled when the feature flag is on and an API key is set.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): Readonly<AppConfig> {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(result.error.flatten().fieldErrors);
  }
  const env = result.data;

  return Object.freeze({
    databaseUrl: env.DATABASE_URL,
    nodeEnv: env.NODE_ENV,
    port: env.API_PORT,
    host: env.API_HOST,
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
    uploads: Object.freeze({
      directory: env.UPLOAD_DIRECTORY,
      maxSize: env.MAX_UPLOAD_SIZE,
      allowedExtensions: Object.freeze([...env.ALLOWED_UPLOAD_EXTENSIONS]),
    }),
    email: Object.freeze({
      apiKey: env.EMAIL_API_KEY,
      timeoutSeconds: env.EMAIL_TIMEOUT_SECONDS,
      fromAddress: env.EMAIL_FROM_ADDRESS,
      fromName: env.EMAIL_FROM_NAME,
      enabled: env.ENABLE_EMAIL_NOTIFICATIONS && env.EMAIL_API_KEY !== undefined,
    }),
    notifications: Object.freeze({
      inAppEnabled: env.ENABLE_IN_APP_NOTIFICATIONS,
    }),
    session: Object.freeze({
      absoluteTtlHours: env.SESSION_ABSOLUTE_TTL_HOURS,
      idleTtlMinutes: env.SESSION_IDLE_TTL_MINUTES,
    }),
    argon2: Object.freeze({
      memoryCost: env.ARGON2_MEMORY,
      timeCost: env.ARGON2_ITERATIONS,
    }),
  });
}

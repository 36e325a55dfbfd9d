import { z } from 'zod';

export const DEV_INSECURE_SECRET = 'dev-insecure-secret';
export const MIN_UPSTREAM_TIMEOUT_MS = 10_000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.string().default('production'),
  JWT_SECRET: z.string().optional(),
  ORDER_SERVICE_URL: z.string().url().default('http://localhost:8002'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  // Below undici's 10s connect timeout a hung connect would surface as a non-retryable abort
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(MIN_UPSTREAM_TIMEOUT_MS).default(30_000),
  UPSTREAM_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  UPSTREAM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ALLOWED_ORIGINS: z.string().default(''),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GatewayConfig {
  nodeEnv: string;
  jwtSecret: string;
  /** True when the secret is the development fallback. */
  insecureSecret: boolean;
  orderServiceUrl: string;
  host: string;
  port: number;
  accessTokenExpireMinutes: number;
  upstream: {
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  logLevel: LogLevel;
  allowedOrigins: string[];
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads gateway settings from the environment.
 * JWT_SECRET is mandatory unless NODE_ENV is exactly "development".
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  // Empty strings in .env count as unset
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const isDevelopment = values.NODE_ENV === 'development';

  let jwtSecret = values.JWT_SECRET;
  let insecureSecret = false;
  if (!jwtSecret) {
    if (!isDevelopment) {
      throw new ConfigError(['JWT_SECRET: required outside development mode']);
    }
    jwtSecret = DEV_INSECURE_SECRET;
    insecureSecret = true;
  }

  return {
    nodeEnv: values.NODE_ENV,
    jwtSecret,
    insecureSecret,
    orderServiceUrl: values.ORDER_SERVICE_URL.replace(/\/+$/, ''),
    host: values.HOST,
    port: values.PORT,
    accessTokenExpireMinutes: values.ACCESS_TOKEN_EXPIRE_MINUTES,
    upstream: {
      timeoutMs: values.UPSTREAM_TIMEOUT_MS,
      maxAttempts: values.UPSTREAM_MAX_ATTEMPTS,
      retryDelayMs: values.UPSTREAM_RETRY_DELAY_MS,
    },
    logLevel: values.LOG_LEVEL,
    allowedOrigins: values.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}

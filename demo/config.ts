import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { z } from 'zod';
import { DEFAULT_POLICY_PATH, DEFAULT_SKIP_PATHS, PolicyGatewayModuleOptions } from '../lib';
import { IdentityConfig } from './identity/identity.config';

const milliseconds = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const flag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8080),
    POLICY_ENGINE_URL: z.string().url().default('http://localhost:8181'),
    POLICY_PATH: z.string().startsWith('/').default(DEFAULT_POLICY_PATH),
    POLICY_ENGINE_TOKEN: z.string().min(1).optional(),
    POLICY_ALLOW_INSECURE: flag('true'),
    POLICY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    POLICY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    POLICY_RETRY_DELAY_MS: milliseconds(1000),
    POLICY_RETRY_BACKOFF: z.enum(['fixed', 'exponential']).default('fixed'),
    POLICY_CB_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
    POLICY_CB_OPEN_DURATION_MS: milliseconds(30000),
    POLICY_CB_HALF_OPEN_MAX_WAIT_MS: milliseconds(0),
    POLICY_SKIP_PATHS: z.string().optional(),
    POLICY_HEALTH_INTERVAL_MS: milliseconds(0),
    CORRELATION_HEADER: z.string().min(1).default('X-Request-ID'),
    CORS_ENABLED: flag('false'),
    CORS_ALLOWED_ORIGINS: z.string().optional(),
    JWT_SECRET: z.string().min(1).optional(),
    JWT_JWKS_URI: z.string().url().optional(),
    JWT_ISSUER: z.string().min(1).optional(),
    JWT_AUDIENCE: z.string().min(1).optional(),
  })
  .refine((env) => env.JWT_SECRET !== undefined || env.JWT_JWKS_URI !== undefined, {
    message: 'Either JWT_SECRET or JWT_JWKS_URI must be set',
    path: ['JWT_SECRET'],
  });

const LOCALHOST_ORIGIN = /^http:\/\/localhost(:\d+)?$/;
const CORS_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'];

export interface CorsConfig {
  enabled: boolean;
  /** Empty means any `http://localhost` port. */
  allowedOrigins: string[];
}

export interface AppConfig {
  port: number;
  gateway: PolicyGatewayModuleOptions;
  identity: IdentityConfig;
  cors: CorsConfig;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    gateway: {
      baseUrl: e.POLICY_ENGINE_URL,
      policyPath: e.POLICY_PATH,
      token: e.POLICY_ENGINE_TOKEN,
      allowInsecureConnections: e.POLICY_ALLOW_INSECURE,
      timeoutMs: e.POLICY_TIMEOUT_MS,
      maxRetries: e.POLICY_MAX_RETRIES,
      retryDelayMs: e.POLICY_RETRY_DELAY_MS,
      retryBackoff: e.POLICY_RETRY_BACKOFF,
      circuitBreaker: {
        failureThreshold: e.POLICY_CB_FAILURE_THRESHOLD,
        waitDurationInOpenStateMs: e.POLICY_CB_OPEN_DURATION_MS,
        maxWaitDurationInHalfOpenStateMs: e.POLICY_CB_HALF_OPEN_MAX_WAIT_MS,
      },
      skipPaths: e.POLICY_SKIP_PATHS !== undefined ? splitList(e.POLICY_SKIP_PATHS) : [...DEFAULT_SKIP_PATHS],
      healthCheckIntervalMs: e.POLICY_HEALTH_INTERVAL_MS,
      correlationHeader: e.CORRELATION_HEADER,
    },
    identity: {
      secret: e.JWT_SECRET,
      jwksUri: e.JWT_JWKS_URI,
      issuer: e.JWT_ISSUER,
      audience: e.JWT_AUDIENCE,
    },
    cors: {
      enabled: e.CORS_ENABLED,
      allowedOrigins: e.CORS_ALLOWED_ORIGINS !== undefined ? splitList(e.CORS_ALLOWED_ORIGINS) : [],
    },
  };
}

/** Application CORS options, or `undefined` to leave CORS off. */
export function corsOptionsFor(cors: CorsConfig): CorsOptions | undefined {
  if (!cors.enabled) {
    return undefined;
  }
  return {
    origin: cors.allowedOrigins.length > 0 ? cors.allowedOrigins : LOCALHOST_ORIGIN,
    methods: CORS_METHODS,
    credentials: true,
  };
}

/**
 * Runtime configuration, read once from the environment and validated.
 */

import { z } from 'zod';
import { ConfigError } from '../errors';
import type { RetryPolicy } from '../utils/retry';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const ownerIdsSchema = z
  .string({ required_error: 'OWNER_IDS is required' })
  .transform((raw) => raw.split(',').map((id) => id.trim()).filter((id) => id.length > 0))
  .refine((ids) => ids.length === 2, 'OWNER_IDS must list exactly two owners')
  .refine((ids) => ids[0] !== ids[1], 'OWNER_IDS must be two distinct owners');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),

  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: intFromEnv(5432, 1, 65535),
  DB_NAME: z.string().default('storefront'),
  DB_USER: z.string().default('storefront'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MAX: intFromEnv(10, 1, 200),

  OWNER_IDS: ownerIdsSchema,
  ADMIN_API_TOKEN: z.string().min(8, 'ADMIN_API_TOKEN must be at least 8 characters'),
  WEBHOOK_SECRET: z.string().min(8, 'WEBHOOK_SECRET must be at least 8 characters'),
  TRANSPORT_URL: z.string().url(),
  TRANSPORT_TIMEOUT_MS: intFromEnv(10000, 100, 120000),

  BLOB_DIR: z.string().default('./data/blobs'),
  PAYMENT_CODE_REF: z.string().default('payment-code'),

  BROADCAST_CONCURRENCY: intFromEnv(4, 1, 32),
  BROADCAST_MAX_ATTEMPTS: intFromEnv(3, 1, 10),
  FULFILLMENT_MAX_ATTEMPTS: intFromEnv(5, 1, 20),
  RETRY_BASE_DELAY_MS: intFromEnv(1000, 0, 60000),
  RETRY_MAX_DELAY_MS: intFromEnv(30000, 0, 600000),

  EVIDENCE_TIMEOUT_MINUTES: intFromEnv(60, 1, 60 * 24 * 30),
  MAX_EVIDENCE_BYTES: intFromEnv(10 * 1024 * 1024, 1024, 50 * 1024 * 1024),

  CORE_API_PORT: intFromEnv(4010, 1, 65535),
  CORE_API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TIMEOUT_POLL_MS: intFromEnv(60000, 1000, 3600000),
});

export interface StorefrontConfig {
  env: 'development' | 'production' | 'test';
  storeDriver: 'postgres' | 'memory';
  database: {
    connectionString?: string;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    poolMax: number;
  };
  ownerIds: [string, string];
  adminApiToken: string;
  webhookSecret: string;
  transport: { url: string; timeoutMs: number };
  blobDir: string;
  paymentCodeRef: string;
  broadcast: { concurrency: number; retry: RetryPolicy };
  fulfillment: { retry: RetryPolicy };
  notificationRetry: RetryPolicy;
  evidenceTimeoutMinutes: number;
  maxEvidenceBytes: number;
  server: { port: number; host: string; corsOrigin: string; logLevel: string };
  timeoutPollMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StorefrontConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const [firstOwner, secondOwner] = e.OWNER_IDS;
  const backoff = {
    baseDelayMs: e.RETRY_BASE_DELAY_MS,
    maxDelayMs: Math.max(e.RETRY_BASE_DELAY_MS, e.RETRY_MAX_DELAY_MS),
  };

  return {
    env: e.NODE_ENV,
    storeDriver: e.STORE_DRIVER,
    database: {
      connectionString: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      poolMax: e.DB_POOL_MAX,
    },
    ownerIds: [firstOwner, secondOwner],
    adminApiToken: e.ADMIN_API_TOKEN,
    webhookSecret: e.WEBHOOK_SECRET,
    transport: { url: e.TRANSPORT_URL, timeoutMs: e.TRANSPORT_TIMEOUT_MS },
    blobDir: e.BLOB_DIR,
    paymentCodeRef: e.PAYMENT_CODE_REF,
    broadcast: {
      concurrency: e.BROADCAST_CONCURRENCY,
      retry: { maxAttempts: e.BROADCAST_MAX_ATTEMPTS, ...backoff },
    },
    fulfillment: {
      retry: { maxAttempts: e.FULFILLMENT_MAX_ATTEMPTS, ...backoff },
    },
    notificationRetry: { maxAttempts: 3, ...backoff },
    evidenceTimeoutMinutes: e.EVIDENCE_TIMEOUT_MINUTES,
    maxEvidenceBytes: e.MAX_EVIDENCE_BYTES,
    server: {
      port: e.CORE_API_PORT,
      host: e.CORE_API_HOST,
      corsOrigin: e.CORS_ORIGIN,
      logLevel: e.LOG_LEVEL,
    },
    timeoutPollMs: e.TIMEOUT_POLL_MS,
  };
}

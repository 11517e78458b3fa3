/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Intake policy numbers (TTLs, recovery quota, per-IP throttles, pace clamp, retry budget) are
 *   configuration: product decisions change, code should not have to.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('intake-core-backend'),

    // Session lifetime
    SESSION_INITIAL_TTL_SECONDS: z.coerce.number().int().min(300).max(2_592_000).default(86_400),
    SESSION_ACTIVITY_WINDOW_SECONDS: z.coerce.number().int().min(60).max(604_800).default(3600),
    CREDENTIAL_TTL_SECONDS: z.coerce.number().int().min(60).max(604_800).default(3600),

    // Recovery
    RECOVERY_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(86_400).default(900),
    RECOVERY_RATE_LIMIT: z.coerce.number().int().min(1).max(100).default(3),
    RECOVERY_RATE_WINDOW_SECONDS: z.coerce.number().int().min(60).max(86_400).default(3600),
    RECOVERY_LINK_BASE_URL: z.string().url().default('http://localhost:5173'),

    // Per-IP throttles on the two unauthenticated entry points
    CREATE_SESSION_IP_LIMIT: z.coerce.number().int().min(1).max(10_000).default(30),
    CREATE_SESSION_IP_WINDOW_SECONDS: z.coerce.number().int().min(60).max(86_400).default(3600),
    REDEEM_TOKEN_IP_LIMIT: z.coerce.number().int().min(1).max(10_000).default(10),
    REDEEM_TOKEN_IP_WINDOW_SECONDS: z.coerce.number().int().min(60).max(86_400).default(900),

    // Progress estimate
    PACE_MULTIPLIER_MIN: z.coerce.number().positive().default(0.5),
    PACE_MULTIPLIER_MAX: z.coerce.number().positive().default(2.0),

    // Optimistic-concurrency retry
    CONFLICT_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    CONFLICT_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(5000).default(25),

    // PHI at rest (base64 of 32 bytes)
    FIELD_ENCRYPTION_KEY_BASE64: z.string().min(1),
  })
  .refine((env) => env.PACE_MULTIPLIER_MIN <= env.PACE_MULTIPLIER_MAX, {
    message: 'PACE_MULTIPLIER_MIN must not exceed PACE_MULTIPLIER_MAX',
    path: ['PACE_MULTIPLIER_MIN'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  session: {
    initialTtlSeconds: number;
    activityWindowSeconds: number;
    credentialTtlSeconds: number;
  };

  recovery: {
    tokenTtlSeconds: number;
    rateLimit: number;
    rateWindowSeconds: number;
    linkBaseUrl: string;
  };

  ipLimits: {
    createSession: { limit: number; windowSeconds: number };
    redeemToken: { limit: number; windowSeconds: number };
  };

  progress: {
    paceMultiplierMin: number;
    paceMultiplierMax: number;
  };

  conflictRetry: {
    attempts: number;
    backoffMs: number;
  };

  fieldEncryptionKeyBase64: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    session: {
      initialTtlSeconds: parsed.SESSION_INITIAL_TTL_SECONDS,
      activityWindowSeconds: parsed.SESSION_ACTIVITY_WINDOW_SECONDS,
      credentialTtlSeconds: parsed.CREDENTIAL_TTL_SECONDS,
    },

    recovery: {
      tokenTtlSeconds: parsed.RECOVERY_TOKEN_TTL_SECONDS,
      rateLimit: parsed.RECOVERY_RATE_LIMIT,
      rateWindowSeconds: parsed.RECOVERY_RATE_WINDOW_SECONDS,
      linkBaseUrl: parsed.RECOVERY_LINK_BASE_URL,
    },

    ipLimits: {
      createSession: {
        limit: parsed.CREATE_SESSION_IP_LIMIT,
        windowSeconds: parsed.CREATE_SESSION_IP_WINDOW_SECONDS,
      },
      redeemToken: {
        limit: parsed.REDEEM_TOKEN_IP_LIMIT,
        windowSeconds: parsed.REDEEM_TOKEN_IP_WINDOW_SECONDS,
      },
    },

    progress: {
      paceMultiplierMin: parsed.PACE_MULTIPLIER_MIN,
      paceMultiplierMax: parsed.PACE_MULTIPLIER_MAX,
    },

    conflictRetry: {
      attempts: parsed.CONFLICT_RETRY_ATTEMPTS,
      backoffMs: parsed.CONFLICT_RETRY_BACKOFF_MS,
    },

    fieldEncryptionKeyBase64: parsed.FIELD_ENCRYPTION_KEY_BASE64,
  };
}

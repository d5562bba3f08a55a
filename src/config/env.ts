// src/config/env.ts
import { z } from 'zod';
import { StorageType } from '../types/paste.types';
import { DEFAULT_ROUNDS, MIN_ROUNDS } from '../utils/feistel';
import { DEFAULT_LAYOUT } from '../utils/snowflake';
import { PASTE_LIMITS } from './limits';

// Only ever used outside production, where OBFUSCATION_KEY is mandatory.
const DEVELOPMENT_OBFUSCATION_KEY = 'development-only-obfuscation-key';

const int = (min: number, max: number, def: number) =>
  z.coerce.number().int().min(min).max(max).default(def);

const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: int(0, 65535, 5000),

    STORAGE_TYPE: z.enum(['memory', 'sql', 'mongo']).default('memory'),
    SQLITE_PATH: z.string().min(1).default('pastes.db'),
    MONGODB_URI: z.string().min(1).optional(),
    REDIS_URL: z.string().min(1).optional(),

    MAX_CONTENT_BYTES: int(1, 64 * 1024 * 1024, PASTE_LIMITS.maxContentBytes),
    MIN_TTL_SECONDS: int(1, Number.MAX_SAFE_INTEGER, PASTE_LIMITS.minTtlSeconds),
    MAX_TTL_SECONDS: int(1, Number.MAX_SAFE_INTEGER, PASTE_LIMITS.maxTtlSeconds),
    DEFAULT_TTL_SECONDS: int(1, Number.MAX_SAFE_INTEGER, PASTE_LIMITS.defaultTtlSeconds),

    WORKER_ID: int(0, 2 ** DEFAULT_LAYOUT.workerBits - 1, 0),
    OBFUSCATION_KEY: z.string().min(16).optional(),
    OBFUSCATION_ROUNDS: int(MIN_ROUNDS, 64, DEFAULT_ROUNDS),

    RATE_LIMIT_PER_MINUTE: int(1, 1_000_000, 60),
    CACHE_TTL_SECONDS: int(0, 86_400, 30),
    CACHE_TIMEOUT_MS: int(1, 60_000, 100),
    STORAGE_TIMEOUT_MS: int(1, 300_000, 5000),
    PURGE_INTERVAL_SECONDS: int(0, 86_400, 300),

    ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
    TRUST_PROXY: flag,
  })
  .superRefine((env, ctx) => {
    if (env.MIN_TTL_SECONDS > env.MAX_TTL_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_TTL_SECONDS'],
        message: 'must not exceed MAX_TTL_SECONDS',
      });
    }
    if (env.DEFAULT_TTL_SECONDS < env.MIN_TTL_SECONDS || env.DEFAULT_TTL_SECONDS > env.MAX_TTL_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEFAULT_TTL_SECONDS'],
        message: 'must lie between MIN_TTL_SECONDS and MAX_TTL_SECONDS',
      });
    }
    if (env.STORAGE_TYPE === 'mongo' && !env.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGODB_URI'],
        message: 'is required when STORAGE_TYPE is mongo',
      });
    }
    if (env.NODE_ENV === 'production' && !env.OBFUSCATION_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OBFUSCATION_KEY'],
        message: 'is required in production',
      });
    }
  });

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  storageType: StorageType;
  sqlitePath: string;
  mongoUri?: string;
  redisUrl?: string;
  maxContentBytes: number;
  minTtlSeconds: number;
  maxTtlSeconds: number;
  defaultTtlSeconds: number;
  workerId: number;
  obfuscationKey: string;
  obfuscationRounds: number;
  rateLimitPerMinute: number;
  cacheTtlSeconds: number;
  cacheTimeoutMs: number;
  storageTimeoutMs: number;
  purgeIntervalSeconds: number;
  allowedOrigins: string[];
  trustProxy: boolean;
}

/**
 * Validates the environment (load .env with dotenv first). Throws one error
 * naming every invalid variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    storageType: parsed.STORAGE_TYPE,
    sqlitePath: parsed.SQLITE_PATH,
    mongoUri: parsed.MONGODB_URI,
    redisUrl: parsed.REDIS_URL,
    maxContentBytes: parsed.MAX_CONTENT_BYTES,
    minTtlSeconds: parsed.MIN_TTL_SECONDS,
    maxTtlSeconds: parsed.MAX_TTL_SECONDS,
    defaultTtlSeconds: parsed.DEFAULT_TTL_SECONDS,
    workerId: parsed.WORKER_ID,
    obfuscationKey: parsed.OBFUSCATION_KEY ?? DEVELOPMENT_OBFUSCATION_KEY,
    obfuscationRounds: parsed.OBFUSCATION_ROUNDS,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    cacheTtlSeconds: parsed.CACHE_TTL_SECONDS,
    cacheTimeoutMs: parsed.CACHE_TIMEOUT_MS,
    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    purgeIntervalSeconds: parsed.PURGE_INTERVAL_SECONDS,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    trustProxy: parsed.TRUST_PROXY,
  };
};

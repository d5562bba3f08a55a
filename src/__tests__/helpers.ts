// src/__tests__/helpers.ts
import { AppConfig } from '../config/env';
import { DEFAULT_EPOCH_MS } from '../utils/snowflake';

/** A clock the test moves by hand. */
export const createManualClock = (start: number = DEFAULT_EPOCH_MS + 1_000_000) => {
  let now = start;
  const clock = () => now;
  return {
    clock,
    now: () => now,
    set: (value: number) => {
      now = value;
    },
    advance: (ms: number) => {
      now += ms;
    }
  };
};

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  nodeEnv: 'test',
  port: 0,
  storageType: 'memory',
  sqlitePath: ':memory:',
  maxContentBytes: 65536,
  minTtlSeconds: 60,
  maxTtlSeconds: 604800,
  defaultTtlSeconds: 86400,
  workerId: 1,
  obfuscationKey: 'test-secret-key-0001',
  obfuscationRounds: 4,
  rateLimitPerMinute: 60,
  cacheTtlSeconds: 30,
  cacheTimeoutMs: 100,
  storageTimeoutMs: 5000,
  purgeIntervalSeconds: 0,
  allowedOrigins: ['http://localhost:3000'],
  trustProxy: false,
  ...overrides
});

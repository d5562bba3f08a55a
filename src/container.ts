// src/container.ts
import { CacheStore } from './cache/cache.types';
import { MemoryCacheStore } from './cache/memory.store';
import { RedisCacheStore } from './cache/redis.store';
import { AppConfig } from './config/env';
import { createRepository, PasteRepository } from './repositories';
import { PasteCache } from './services/cache.service';
import { PasteService } from './services/paste.service';
import { FixedWindowRateLimiter } from './services/rateLimiter.service';
import { TokenIssuer } from './services/token.service';
import { Clock, systemClock } from './utils/clock';
import { FeistelObfuscator } from './utils/feistel';
import { SnowflakeGenerator } from './utils/snowflake';

const RATE_LIMIT_WINDOW_MS = 60_000;

export interface ServiceOverrides {
  repository?: PasteRepository;
  cacheStore?: CacheStore;
  clock?: Clock;
}

// An unreachable Redis leaves reads going straight to the repository
const openCacheStore = async (config: AppConfig, clock: Clock): Promise<CacheStore | null> => {
  if (!config.redisUrl) return new MemoryCacheStore({ clock });
  try {
    return await RedisCacheStore.connect(config.redisUrl);
  } catch (err) {
    console.warn('⚠️  Redis unavailable, running without a cache:', err instanceof Error ? err.message : err);
    return null;
  }
};

/**
 * Wires the paste core from configuration. Overrides let tests and scripts
 * swap the backend, cache store or clock.
 */
export const buildPasteService = async (
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<PasteService> => {
  const clock = overrides.clock ?? systemClock;
  const repository = overrides.repository ?? (await createRepository(config));

  const generator = new SnowflakeGenerator({ workerId: config.workerId, clock });
  const obfuscator = new FeistelObfuscator(config.obfuscationKey, config.obfuscationRounds);

  let cache: PasteCache | null = null;
  const store = config.cacheTtlSeconds > 0 ? overrides.cacheStore ?? (await openCacheStore(config, clock)) : null;
  if (store) {
    cache = new PasteCache(store, {
      defaultTtlMs: config.cacheTtlSeconds * 1000,
      timeoutMs: config.cacheTimeoutMs,
      clock,
    });
  }

  return new PasteService({
    repository,
    issuer: new TokenIssuer(generator, obfuscator),
    rateLimiter: new FixedWindowRateLimiter({
      limit: config.rateLimitPerMinute,
      windowMs: RATE_LIMIT_WINDOW_MS,
      clock,
    }),
    cache,
    policy: {
      maxContentBytes: config.maxContentBytes,
      minTtlSeconds: config.minTtlSeconds,
      maxTtlSeconds: config.maxTtlSeconds,
      defaultTtlSeconds: config.defaultTtlSeconds,
    },
    storageTimeoutMs: config.storageTimeoutMs,
    clock,
  });
};

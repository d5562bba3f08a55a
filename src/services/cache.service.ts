// src/services/cache.service.ts
import { z } from 'zod';
import { CacheStore } from '../cache/cache.types';
import { Paste } from '../types/paste.types';
import { Clock, systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';

export interface PasteCacheOptions {
  /** Upper bound for an entry's lifetime. */
  defaultTtlMs: number;
  /** A store call slower than this counts as a miss. */
  timeoutMs: number;
  clock?: Clock;
}

const cachedPasteSchema = z.object({
  token: z.string(),
  ordinalId: z.string().regex(/^\d+$/),
  content: z.string(),
  contentType: z.string(),
  sizeBytes: z.number().int(),
  contentHash: z.string(),
  createdAt: z.number(),
  expiresAt: z.number(),
});

type CachedPaste = z.infer<typeof cachedPasteSchema>;

const serialize = (paste: Paste): string => {
  const cached: CachedPaste = {
    token: paste.token,
    ordinalId: paste.ordinalId.toString(),
    content: paste.content.toString('base64'),
    contentType: paste.contentType,
    sizeBytes: paste.sizeBytes,
    contentHash: paste.contentHash,
    createdAt: paste.createdAt.getTime(),
    expiresAt: paste.expiresAt.getTime(),
  };
  return JSON.stringify(cached);
};

const deserialize = (raw: string): Paste | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = cachedPasteSchema.safeParse(json);
  if (!result.success) return null;

  const cached = result.data;
  return {
    token: cached.token,
    ordinalId: BigInt(cached.ordinalId),
    content: Buffer.from(cached.content, 'base64'),
    contentType: cached.contentType,
    sizeBytes: cached.sizeBytes,
    contentHash: cached.contentHash,
    createdAt: new Date(cached.createdAt),
    expiresAt: new Date(cached.expiresAt),
  };
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

class CacheTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`Cache ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

/**
 * Read-through cache in front of the repository. It is never the authority on
 * liveness: entries never outlive the paste, hits are re-checked against
 * `expiresAt`, and every store failure degrades to a miss.
 */
export class PasteCache {
  private readonly defaultTtlMs: number;
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(private readonly store: CacheStore, options: PasteCacheOptions) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  async get(token: string): Promise<Paste | null> {
    let raw: string | null;
    try {
      raw = await withTimeout(
        this.store.get(token),
        this.timeoutMs,
        () => new CacheTimeoutError('get', this.timeoutMs)
      );
    } catch (error) {
      console.warn(`Cache read failed for ${token}, falling back to storage:`, errorMessage(error));
      return null;
    }
    if (raw === null) return null;

    const paste = deserialize(raw);
    if (!paste || paste.token !== token) {
      console.warn(`Discarding unreadable cache entry for ${token}`);
      return null;
    }
    return this.clock() < paste.expiresAt.getTime() ? paste : null;
  }

  /** Caches `paste` for min(defaultTtl, time left before expiry); skips it if that is not positive. */
  async remember(paste: Paste, now: Date): Promise<void> {
    const ttlMs = this.entryTtlMs(paste, now);
    if (ttlMs <= 0) return;

    try {
      await withTimeout(
        this.store.set(paste.token, serialize(paste), ttlMs),
        this.timeoutMs,
        () => new CacheTimeoutError('set', this.timeoutMs)
      );
    } catch (error) {
      console.warn(`Cache write failed for ${paste.token}:`, errorMessage(error));
    }
  }

  entryTtlMs(paste: Paste, now: Date): number {
    return Math.min(this.defaultTtlMs, paste.expiresAt.getTime() - now.getTime());
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

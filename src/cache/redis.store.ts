// src/cache/redis.store.ts
import { createClient } from 'redis';
import { withTimeout } from '../utils/timeout';
import { CacheStore } from './cache.types';

const CONNECT_TIMEOUT_MS = 5000;

export type RedisClient = ReturnType<typeof createClient>;

export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly client: RedisClient,
    private readonly prefix = 'paste:'
  ) {}

  /**
   * Connects within `timeoutMs`. node-redis keeps retrying a refused
   * connection, so on failure the client is shut down before rethrowing.
   */
  static async connect(url: string, timeoutMs: number = CONNECT_TIMEOUT_MS): Promise<RedisCacheStore> {
    const client = createClient({
      url,
      socket: {
        connectTimeout: timeoutMs
      }
    });
    client.on('error', (err: unknown) => {
      console.error('Redis client error:', err);
    });

    try {
      await withTimeout(
        client.connect(),
        timeoutMs,
        () => new Error(`Redis connection timed out after ${timeoutMs}ms`)
      );
    } catch (err) {
      if (client.isOpen) {
        await client.disconnect().catch((disconnectErr: unknown) => {
          console.error('Redis disconnect failed:', disconnectErr);
        });
      }
      throw err;
    }

    console.log('Redis Connected');
    return new RedisCacheStore(client);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.prefix + key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.client.set(this.prefix + key, value, { PX: ttlMs });
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefix + key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

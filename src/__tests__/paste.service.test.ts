import crypto from 'crypto';
import { CacheStore } from '../cache/cache.types';
import { MemoryCacheStore } from '../cache/memory.store';
import { MemoryPasteRepository } from '../repositories/memory.repository';
import { PasteRepository } from '../repositories/paste.repository';
import { PasteCache } from '../services/cache.service';
import { PasteService } from '../services/paste.service';
import { FixedWindowRateLimiter } from '../services/rateLimiter.service';
import { TokenIssuer } from '../services/token.service';
import { Paste } from '../types/paste.types';
import { encodeToken, TOKEN_ALPHABET } from '../utils/base62';
import {
  ClockSkewError,
  InvalidContentError,
  InvalidTTLError,
  MalformedTokenError,
  NotFoundError,
  RateLimitedError,
  StorageTimeoutError
} from '../utils/errors';
import { FeistelObfuscator } from '../utils/feistel';
import { SnowflakeGenerator } from '../utils/snowflake';
import { createManualClock } from './helpers';

interface Harness {
  service: PasteService;
  repository: MemoryPasteRepository;
  clock: ReturnType<typeof createManualClock>;
  generator: SnowflakeGenerator;
  cacheStore: MemoryCacheStore;
}

const build = (
  options: { rateLimit?: number; withCache?: boolean; repository?: PasteRepository; storageTimeoutMs?: number } = {}
): Harness => {
  const clock = createManualClock();
  const repository = new MemoryPasteRepository();
  const generator = new SnowflakeGenerator({ workerId: 2, clock: clock.clock });
  const cacheStore = new MemoryCacheStore({ clock: clock.clock });
  const service = new PasteService({
    repository: options.repository ?? repository,
    issuer: new TokenIssuer(generator, new FeistelObfuscator('test-secret-key-0001')),
    rateLimiter: new FixedWindowRateLimiter({ limit: options.rateLimit ?? 100, windowMs: 60_000, clock: clock.clock }),
    cache:
      options.withCache === false
        ? null
        : new PasteCache(cacheStore, { defaultTtlMs: 30_000, timeoutMs: 100, clock: clock.clock }),
    policy: { maxContentBytes: 65536, minTtlSeconds: 60, maxTtlSeconds: 604800, defaultTtlSeconds: 86400 },
    storageTimeoutMs: options.storageTimeoutMs ?? 5000,
    clock: clock.clock
  });
  return { service, repository, clock, generator, cacheStore };
};

const tokenPattern = new RegExp(`^[${TOKEN_ALPHABET}]{11}$`);

describe('PasteService', () => {
  describe('createPaste', () => {
    it('should create "hello" for an hour and read it straight back', async () => {
      const { service, clock } = build();
      const created = await service.createPaste({ content: 'hello', ttlSeconds: 3600, clientId: 'client-a' });

      expect(created.token).toMatch(tokenPattern);
      expect(created.expiresAt.getTime()).toBe(clock.now() + 3_600_000);
      expect(created.sizeBytes).toBe(5);
      expect(created.contentType).toBe('text/plain; charset=utf-8');
      expect(created.contentHash).toBe(crypto.createHash('sha256').update('hello').digest('hex'));

      const read = await service.getPasteContent(created.token);
      expect(read.content.equals(Buffer.from('hello'))).toBe(true);
      expect(read.contentType).toBe('text/plain; charset=utf-8');
    });

    it('should return byte-identical content and the requested content type', async () => {
      const { service } = build();
      const content = Buffer.from([0xe2, 0x82, 0xac, 0x20, 0xf0, 0x9f, 0x98, 0x80]);
      const created = await service.createPaste({
        content,
        ttlSeconds: 600,
        contentType: 'text/markdown; charset=utf-8',
        clientId: 'client-a'
      });

      const read = await service.getPasteContent(created.token);
      expect(read.content.equals(content)).toBe(true);
      expect(read.contentType).toBe('text/markdown; charset=utf-8');
      expect(created.sizeBytes).toBe(8);
    });

    it('should reject content types that are not safe to serve back', async () => {
      const { service, repository } = build();
      for (const contentType of ['text/html', 'image/svg+xml', 'text/plain; x=\u2603', 'text/plain;\r\nX-Evil: 1']) {
        await expect(
          service.createPaste({ content: 'x', ttlSeconds: 60, contentType, clientId: 'client-a' })
        ).rejects.toMatchObject({ code: 'INVALID_CONTENT', reason: 'unsupported_content_type' });
      }
      expect(repository.size).toBe(0);
    });

    it('should accept allowed content types regardless of case and keep them as sent', async () => {
      const { service } = build();
      const created = await service.createPaste({
        content: '{"a":1}',
        ttlSeconds: 60,
        contentType: ' Application/JSON ',
        clientId: 'client-a'
      });

      expect(created.contentType).toBe('Application/JSON');
      expect((await service.getPasteContent(created.token)).contentType).toBe('Application/JSON');
    });

    it('should apply the default ttl when none is given', async () => {
      const { service, clock } = build();
      const created = await service.createPaste({ content: 'x', clientId: 'client-a' });

      expect(created.expiresAt.getTime()).toBe(clock.now() + 86_400_000);
    });

    it('should store the ordinal id behind the token', async () => {
      const { service, repository, clock, generator } = build();
      const created = await service.createPaste({ content: 'audit', ttlSeconds: 60, clientId: 'client-a' });

      const stored = await repository.getIfLive(created.token, new Date(clock.now()));
      expect(stored).not.toBeNull();
      expect(generator.decompose(stored?.ordinalId ?? -1n)).toEqual({
        timestamp: clock.now(),
        workerId: 2,
        sequence: 0
      });
    });

    it('should accept exactly max_content_bytes and reject one more', async () => {
      const { service } = build();

      await expect(
        service.createPaste({ content: Buffer.alloc(65536, 0x61), ttlSeconds: 60, clientId: 'client-a' })
      ).resolves.toMatchObject({ sizeBytes: 65536 });

      const tooLarge = service.createPaste({ content: Buffer.alloc(65537, 0x61), ttlSeconds: 60, clientId: 'client-a' });
      await expect(tooLarge).rejects.toThrow(InvalidContentError);
      await expect(tooLarge).rejects.toMatchObject({ reason: 'too_large' });
    });

    it('should measure the limit in UTF-8 bytes, not characters', async () => {
      const { service } = build();
      // 21846 three-byte characters = 65538 bytes
      await expect(
        service.createPaste({ content: '€'.repeat(21846), ttlSeconds: 60, clientId: 'client-a' })
      ).rejects.toMatchObject({ reason: 'too_large' });
    });

    it('should reject empty content', async () => {
      const { service } = build();
      await expect(service.createPaste({ content: '', ttlSeconds: 60, clientId: 'client-a' })).rejects.toMatchObject({
        code: 'INVALID_CONTENT',
        reason: 'empty'
      });
    });

    it('should reject ttls outside [60, 604800]', async () => {
      const { service } = build();
      for (const ttlSeconds of [59, 604801, 0, -60, 90.5]) {
        await expect(service.createPaste({ content: 'x', ttlSeconds, clientId: 'client-a' })).rejects.toThrow(
          InvalidTTLError
        );
      }
      await expect(service.createPaste({ content: 'x', ttlSeconds: 60, clientId: 'client-a' })).resolves.toBeDefined();
      await expect(
        service.createPaste({ content: 'x', ttlSeconds: 604800, clientId: 'client-a' })
      ).resolves.toBeDefined();
    });

    it('should issue distinct tokens for every paste', async () => {
      const { service } = build({ rateLimit: 1000 });
      const tokens = new Set<string>();
      for (let i = 0; i < 200; i++) {
        tokens.add((await service.createPaste({ content: `n${i}`, ttlSeconds: 60, clientId: 'client-a' })).token);
      }
      expect(tokens.size).toBe(200);
    });
  });

  describe('rate limiting', () => {
    it('should admit N creations per window and reject the next one', async () => {
      const { service } = build({ rateLimit: 3 });
      for (let i = 0; i < 3; i++) {
        await service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' });
      }

      await expect(service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' })).rejects.toThrow(
        RateLimitedError
      );
      await expect(
        service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.10' })
      ).resolves.toBeDefined();
    });

    it('should reset once the window elapses', async () => {
      const { service, clock } = build({ rateLimit: 1 });
      await service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' });
      await expect(service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' })).rejects.toThrow(
        RateLimitedError
      );

      clock.advance(60_000);

      await expect(
        service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' })
      ).resolves.toBeDefined();
    });

    it('should not consume an id when throttled', async () => {
      const { service, generator } = build({ rateLimit: 1 });
      const nextId = jest.spyOn(generator, 'nextId');
      await service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' });

      await expect(service.createPaste({ content: 'ok', ttlSeconds: 60, clientId: '10.0.0.9' })).rejects.toThrow(
        RateLimitedError
      );
      expect(nextId).toHaveBeenCalledTimes(1);
      nextId.mockRestore();
    });
  });

  describe('expiry', () => {
    it('should serve a 60 second paste at +59s and hide it at +61s', async () => {
      const { service, clock } = build();
      const created = await service.createPaste({ content: 'brief', ttlSeconds: 60, clientId: 'client-a' });

      clock.advance(59_000);
      await expect(service.getPasteContent(created.token)).resolves.toMatchObject({ contentType: 'text/plain; charset=utf-8' });

      clock.advance(2_000);
      await expect(service.getPasteContent(created.token)).rejects.toThrow(NotFoundError);
    });

    it('should not let a cached copy outlive the paste', async () => {
      const { service, clock, cacheStore } = build();
      const created = await service.createPaste({ content: 'brief', ttlSeconds: 60, clientId: 'client-a' });

      clock.advance(50_000);
      await service.getPasteMetadata(created.token); // populates the cache with 10s left
      expect(cacheStore.size).toBe(1);

      clock.advance(10_000);
      await expect(service.getPasteMetadata(created.token)).rejects.toThrow(NotFoundError);
    });

    it('should answer never-issued and expired tokens with the same error', async () => {
      const { service, clock } = build();
      const created = await service.createPaste({ content: 'gone soon', ttlSeconds: 60, clientId: 'client-a' });
      clock.advance(61_000);

      const expired = await service.getPasteMetadata(created.token).catch((error: unknown) => error);
      const unknown = await service.getPasteMetadata(encodeToken(123n)).catch((error: unknown) => error);

      expect(expired).toBeInstanceOf(NotFoundError);
      expect(unknown).toBeInstanceOf(NotFoundError);
      expect(expired).toEqual(unknown);
      expect(expired instanceof NotFoundError && expired.message).toBe(
        unknown instanceof NotFoundError && unknown.message
      );
    });
  });

  describe('reads', () => {
    it('should reject malformed tokens before any lookup', async () => {
      const getIfLive = jest.fn(async (): Promise<Paste | null> => null);
      const repository: PasteRepository = {
        kind: 'memory',
        put: async () => undefined,
        getIfLive,
        purgeExpired: async () => 0,
        close: async () => undefined
      };
      const { service } = build({ repository });

      await expect(service.getPasteMetadata('abc')).rejects.toThrow(MalformedTokenError);
      await expect(service.getPasteContent('abc$efghijk')).rejects.toThrow(MalformedTokenError);
      expect(getIfLive).not.toHaveBeenCalled();
    });

    it('should return metadata and content from a single lookup', async () => {
      const { service, repository, clock } = build({ withCache: false });
      const created = await service.createPaste({ content: 'both', ttlSeconds: 120, clientId: 'client-a' });
      const getIfLive = jest.spyOn(repository, 'getIfLive');

      const paste = await service.getPaste(created.token);

      expect(paste).toEqual({
        token: created.token,
        contentType: 'text/plain; charset=utf-8',
        sizeBytes: 4,
        contentHash: created.contentHash,
        createdAt: new Date(clock.now()),
        expiresAt: created.expiresAt,
        content: Buffer.from('both')
      });
      expect(getIfLive).toHaveBeenCalledTimes(1);
      getIfLive.mockRestore();
    });

    it('should return metadata without content', async () => {
      const { service, clock } = build();
      const created = await service.createPaste({ content: 'meta', ttlSeconds: 120, clientId: 'client-a' });

      expect(await service.getPasteMetadata(created.token)).toEqual({
        token: created.token,
        contentType: 'text/plain; charset=utf-8',
        sizeBytes: 4,
        contentHash: created.contentHash,
        createdAt: new Date(clock.now()),
        expiresAt: created.expiresAt
      });
    });

    it('should serve repeat reads from the cache', async () => {
      const { service, repository } = build();
      const created = await service.createPaste({ content: 'hot', ttlSeconds: 600, clientId: 'client-a' });
      const getIfLive = jest.spyOn(repository, 'getIfLive');

      await service.getPasteContent(created.token);
      await service.getPasteContent(created.token);
      await service.getPasteMetadata(created.token);

      expect(getIfLive).toHaveBeenCalledTimes(1);
      getIfLive.mockRestore();
    });

    it('should fall back to storage when the cache is unavailable', async () => {
      const brokenStore: CacheStore = {
        get: async () => {
          throw new Error('cache down');
        },
        set: async () => {
          throw new Error('cache down');
        },
        delete: async () => undefined,
        close: async () => undefined
      };
      const clock = createManualClock();
      const service = new PasteService({
        repository: new MemoryPasteRepository(),
        issuer: new TokenIssuer(
          new SnowflakeGenerator({ workerId: 0, clock: clock.clock }),
          new FeistelObfuscator('test-secret-key-0001')
        ),
        rateLimiter: new FixedWindowRateLimiter({ limit: 10, windowMs: 60_000, clock: clock.clock }),
        cache: new PasteCache(brokenStore, { defaultTtlMs: 30_000, timeoutMs: 100, clock: clock.clock }),
        policy: { maxContentBytes: 100, minTtlSeconds: 60, maxTtlSeconds: 3600, defaultTtlSeconds: 600 },
        storageTimeoutMs: 1000,
        clock: clock.clock
      });

      const created = await service.createPaste({ content: 'still here', clientId: 'client-a' });
      const read = await service.getPasteContent(created.token);

      expect(read.content.toString('utf8')).toBe('still here');
    });

    it('should work without a cache', async () => {
      const { service } = build({ withCache: false });
      const created = await service.createPaste({ content: 'plain', ttlSeconds: 60, clientId: 'client-a' });

      expect((await service.getPasteContent(created.token)).content.toString('utf8')).toBe('plain');
    });
  });

  describe('failure handling', () => {
    it('should propagate clock skew as a hard failure of creation', async () => {
      const { service, clock } = build();
      await service.createPaste({ content: 'first', ttlSeconds: 60, clientId: 'client-a' });

      clock.advance(-5);

      await expect(service.createPaste({ content: 'second', ttlSeconds: 60, clientId: 'client-a' })).rejects.toThrow(
        ClockSkewError
      );
    });

    it('should not write when the request was aborted', async () => {
      const { service, repository } = build();
      const abort = new AbortController();
      abort.abort();

      await expect(
        service.createPaste({ content: 'never', ttlSeconds: 60, clientId: 'client-a', signal: abort.signal })
      ).rejects.toThrow();
      expect(repository.size).toBe(0);
    });

    it('should draw a fresh id when a write is retried', async () => {
      const failOnce = new MemoryPasteRepository();
      const put = jest.spyOn(failOnce, 'put').mockRejectedValueOnce(new Error('connection reset'));
      const { service } = build({ repository: failOnce });

      await expect(service.createPaste({ content: 'retry', ttlSeconds: 60, clientId: 'client-a' })).rejects.toThrow(
        'connection reset'
      );
      const created = await service.createPaste({ content: 'retry', ttlSeconds: 60, clientId: 'client-a' });

      const firstToken = put.mock.calls[0][0].token;
      expect(created.token).not.toBe(firstToken);
      expect(failOnce.size).toBe(1);
    });

    it('should time out a stalled write', async () => {
      const stalled: PasteRepository = {
        kind: 'memory',
        put: () => new Promise<void>(() => undefined),
        getIfLive: async () => null,
        purgeExpired: async () => 0,
        close: async () => undefined
      };
      const { service } = build({ repository: stalled, storageTimeoutMs: 20 });

      await expect(service.createPaste({ content: 'slow', ttlSeconds: 60, clientId: 'client-a' })).rejects.toThrow(
        StorageTimeoutError
      );
    });
  });

  describe('purgeExpired', () => {
    it('should remove expired pastes only', async () => {
      const { service, repository, clock } = build();
      await service.createPaste({ content: 'short', ttlSeconds: 60, clientId: 'client-a' });
      await service.createPaste({ content: 'long', ttlSeconds: 3600, clientId: 'client-a' });

      clock.advance(120_000);

      expect(await service.purgeExpired()).toBe(1);
      expect(repository.size).toBe(1);
    });
  });
});

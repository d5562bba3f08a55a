// src/services/paste.service.ts
import crypto from 'crypto';
import { ALLOWED_CONTENT_TYPES, PASTE_LIMITS, PastePolicy } from '../config/limits';
import { PasteRepository } from '../repositories/paste.repository';
import {
  CreatedPaste,
  CreatePasteInput,
  DEFAULT_CONTENT_TYPE,
  Paste,
  PasteContent,
  PasteMetadata,
  PasteWithContent,
} from '../types/paste.types';
import { parseToken } from '../utils/base62';
import { Clock, systemClock } from '../utils/clock';
import {
  InvalidContentError,
  InvalidTTLError,
  NotFoundError,
  StorageTimeoutError,
} from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { PasteCache } from './cache.service';
import { FixedWindowRateLimiter } from './rateLimiter.service';
import { TokenIssuer } from './token.service';

export interface PasteServiceDeps {
  repository: PasteRepository;
  issuer: TokenIssuer;
  rateLimiter: FixedWindowRateLimiter;
  /** Optional; reads go straight to the repository without it. */
  cache?: PasteCache | null;
  policy: PastePolicy;
  storageTimeoutMs: number;
  clock?: Clock;
}

const HEADER_SAFE = /^[\x20-\x7e]+$/;

const sha256 = (content: Buffer): string => crypto.createHash('sha256').update(content).digest('hex');

const toMetadata = (paste: Paste): PasteMetadata => ({
  token: paste.token,
  contentType: paste.contentType,
  sizeBytes: paste.sizeBytes,
  contentHash: paste.contentHash,
  createdAt: paste.createdAt,
  expiresAt: paste.expiresAt,
});

/**
 * Create and read pastes.
 *
 * Creation order: rate limiter, then id issuance, then a single insert. A
 * throttled request never consumes an id. Reads validate the token shape,
 * consult the cache, then fall through to `getIfLive`.
 */
export class PasteService {
  private readonly repository: PasteRepository;
  private readonly issuer: TokenIssuer;
  private readonly rateLimiter: FixedWindowRateLimiter;
  private readonly cache: PasteCache | null;
  private readonly policy: PastePolicy;
  private readonly storageTimeoutMs: number;
  private readonly clock: Clock;

  constructor(deps: PasteServiceDeps) {
    this.repository = deps.repository;
    this.issuer = deps.issuer;
    this.rateLimiter = deps.rateLimiter;
    this.cache = deps.cache ?? null;
    this.policy = deps.policy;
    this.storageTimeoutMs = deps.storageTimeoutMs;
    this.clock = deps.clock ?? systemClock;
  }

  get storageType() {
    return this.repository.kind;
  }

  async createPaste(input: CreatePasteInput): Promise<CreatedPaste> {
    input.signal?.throwIfAborted();

    this.rateLimiter.consume(input.clientId);

    const content = typeof input.content === 'string' ? Buffer.from(input.content, 'utf8') : Buffer.from(input.content);
    this.assertContent(content);
    const ttlSeconds = this.resolveTtl(input.ttlSeconds);
    const contentType = this.resolveContentType(input.contentType);

    const { token, ordinalId } = this.issuer.issue();
    const now = this.clock();
    const paste: Paste = {
      token,
      ordinalId,
      content,
      contentType,
      sizeBytes: content.length,
      contentHash: sha256(content),
      createdAt: new Date(now),
      expiresAt: new Date(now + ttlSeconds * 1000),
    };

    // Aborting here wastes the issued id; a retry draws a fresh one.
    input.signal?.throwIfAborted();
    await this.withStorageTimeout('put', this.repository.put(paste));

    console.info(`Paste ${token} created (${paste.sizeBytes} bytes, expires ${paste.expiresAt.toISOString()})`);
    return {
      token,
      contentType,
      sizeBytes: paste.sizeBytes,
      contentHash: paste.contentHash,
      expiresAt: paste.expiresAt,
    };
  }

  async getPasteMetadata(token: string): Promise<PasteMetadata> {
    return toMetadata(await this.findLive(token));
  }

  async getPaste(token: string): Promise<PasteWithContent> {
    const paste = await this.findLive(token);
    return { ...toMetadata(paste), content: paste.content };
  }

  async getPasteContent(token: string): Promise<PasteContent> {
    const paste = await this.findLive(token);
    return {
      content: paste.content,
      contentType: paste.contentType,
      contentHash: paste.contentHash,
    };
  }

  /** Housekeeping; reads never rely on it. */
  async purgeExpired(): Promise<number> {
    const removed = await this.withStorageTimeout('purge', this.repository.purgeExpired(new Date(this.clock())));
    const swept = this.rateLimiter.sweep();
    if (removed > 0 || swept > 0) {
      console.log(`Purged ${removed} expired paste(s), dropped ${swept} idle rate-limit window(s)`);
    }
    return removed;
  }

  async close(): Promise<void> {
    await this.cache?.close();
    await this.repository.close();
  }

  // One lookup path for unknown and expired tokens alike
  private async findLive(token: string): Promise<Paste> {
    parseToken(token);

    const cached = await this.cache?.get(token);
    if (cached) return cached;

    const now = new Date(this.clock());
    const paste = await this.withStorageTimeout('get', this.repository.getIfLive(token, now));
    if (!paste) {
      throw new NotFoundError();
    }

    await this.cache?.remember(paste, now);
    return paste;
  }

  private assertContent(content: Buffer): void {
    if (content.length === 0) {
      throw new InvalidContentError('empty', this.policy.maxContentBytes);
    }
    if (content.length > this.policy.maxContentBytes) {
      throw new InvalidContentError('too_large', this.policy.maxContentBytes);
    }
  }

  private resolveTtl(ttlSeconds: number | undefined): number {
    const ttl = ttlSeconds ?? this.policy.defaultTtlSeconds;
    if (!Number.isInteger(ttl) || ttl < this.policy.minTtlSeconds || ttl > this.policy.maxTtlSeconds) {
      throw new InvalidTTLError(this.policy.minTtlSeconds, this.policy.maxTtlSeconds);
    }
    return ttl;
  }

  // The stored value is echoed back as a response header, so it must be
  // printable ASCII and name an allowed media type.
  private resolveContentType(contentType: string | undefined): string {
    const trimmed = contentType?.trim();
    if (!trimmed) return DEFAULT_CONTENT_TYPE;

    const essence = trimmed.split(';')[0].trim().toLowerCase();
    if (
      trimmed.length > PASTE_LIMITS.maxContentTypeLength ||
      !HEADER_SAFE.test(trimmed) ||
      !ALLOWED_CONTENT_TYPES.has(essence)
    ) {
      throw new InvalidContentError('unsupported_content_type', this.policy.maxContentBytes);
    }
    return trimmed;
  }

  private withStorageTimeout<T>(operation: string, promise: Promise<T>): Promise<T> {
    return withTimeout(promise, this.storageTimeoutMs, () => new StorageTimeoutError(operation, this.storageTimeoutMs));
  }
}

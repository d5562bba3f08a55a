// src/repositories/mongo.repository.ts
import { Model } from 'mongoose';
import { disconnectDB } from '../config/db';
import PasteModel, { IPaste, PasteDocument } from '../models/Paste';
import { Paste } from '../types/paste.types';
import { isWellFormedToken } from '../utils/base62';
import { DuplicateTokenError } from '../utils/errors';
import { assertStorableToken, PasteRepository } from './paste.repository';

const DUPLICATE_KEY = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === DUPLICATE_KEY;

export const toDocument = (paste: Paste): IPaste => ({
  token: paste.token,
  ordinalId: paste.ordinalId.toString(),
  content: paste.content,
  contentType: paste.contentType,
  sizeBytes: paste.sizeBytes,
  contentHash: paste.contentHash,
  createdAt: paste.createdAt,
  expiresAt: paste.expiresAt,
});

export const fromDocument = (doc: PasteDocument): Paste => ({
  token: doc.token,
  ordinalId: BigInt(doc.ordinalId),
  content: Buffer.from(doc.content),
  contentType: doc.contentType,
  sizeBytes: doc.sizeBytes,
  contentHash: doc.contentHash,
  createdAt: doc.createdAt,
  expiresAt: doc.expiresAt,
});

/** Document backend on the shared mongoose connection (see config/db.ts). */
export class MongoPasteRepository implements PasteRepository {
  readonly kind = 'mongo' as const;

  constructor(private readonly model: Model<IPaste> = PasteModel) {}

  async put(paste: Paste): Promise<void> {
    assertStorableToken(paste.token);
    try {
      await this.model.create(toDocument(paste));
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateTokenError(paste.token);
      }
      throw error;
    }
  }

  async getIfLive(token: string, now: Date): Promise<Paste | null> {
    if (!isWellFormedToken(token)) return null;
    const doc = await this.model.findOne({ token, expiresAt: { $gt: now } }).exec();
    return doc ? fromDocument(doc) : null;
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.model.deleteMany({ expiresAt: { $lte: now } }).exec();
    return result.deletedCount;
  }

  async close(): Promise<void> {
    await disconnectDB();
  }
}

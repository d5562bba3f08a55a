// src/repositories/sql.repository.ts
import { and, eq, gt, lte } from 'drizzle-orm';
import { PasteDatabase, SqliteConnection } from '../config/sqlite';
import { NewPasteRow, PasteRow, pastes } from '../db/schema';
import { Paste } from '../types/paste.types';
import { isWellFormedToken } from '../utils/base62';
import { DuplicateTokenError } from '../utils/errors';
import { assertStorableToken, PasteRepository } from './paste.repository';

const UNIQUE_VIOLATIONS = new Set(['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE']);

// drizzle may wrap the driver error, so look through `cause` as well
export const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string' && UNIQUE_VIOLATIONS.has(error.code)) {
    return true;
  }
  return isUniqueViolation(error.cause);
};

const toRow = (paste: Paste): NewPasteRow => ({
  token: paste.token,
  ordinalId: paste.ordinalId.toString(),
  content: paste.content,
  contentType: paste.contentType,
  sizeBytes: paste.sizeBytes,
  contentHash: paste.contentHash,
  createdAt: paste.createdAt,
  expiresAt: paste.expiresAt,
});

const fromRow = (row: PasteRow): Paste => ({
  token: row.token,
  ordinalId: BigInt(row.ordinalId),
  content: Buffer.from(row.content),
  contentType: row.contentType,
  sizeBytes: row.sizeBytes,
  contentHash: row.contentHash,
  createdAt: row.createdAt,
  expiresAt: row.expiresAt,
});

/** Relational backend: drizzle-orm over better-sqlite3. */
export class SqlPasteRepository implements PasteRepository {
  readonly kind = 'sql' as const;

  private readonly db: PasteDatabase;
  private readonly closeConnection: () => void;

  constructor(connection: SqliteConnection) {
    this.db = connection.db;
    this.closeConnection = connection.close;
  }

  async put(paste: Paste): Promise<void> {
    assertStorableToken(paste.token);
    try {
      this.db.insert(pastes).values(toRow(paste)).run();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateTokenError(paste.token);
      }
      throw error;
    }
  }

  async getIfLive(token: string, now: Date): Promise<Paste | null> {
    if (!isWellFormedToken(token)) return null;
    const row = this.db
      .select()
      .from(pastes)
      .where(and(eq(pastes.token, token), gt(pastes.expiresAt, now)))
      .get();
    return row ? fromRow(row) : null;
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = this.db.delete(pastes).where(lte(pastes.expiresAt, now)).run();
    return result.changes;
  }

  async close(): Promise<void> {
    this.closeConnection();
  }
}

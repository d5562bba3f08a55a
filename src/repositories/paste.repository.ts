// src/repositories/paste.repository.ts
import { Paste, StorageType } from '../types/paste.types';
import { isWellFormedToken } from '../utils/base62';
import { MalformedTokenError } from '../utils/errors';

/**
 * Persistence contract shared by every backend.
 *
 * - `put` never overwrites: an existing token or ordinal id fails with
 *   DuplicateTokenError.
 * - `getIfLive` answers null for unknown and expired tokens alike, from a
 *   single lookup that applies the `now < expiresAt` filter.
 * - `purgeExpired` is housekeeping; reads never depend on it.
 */
export interface PasteRepository {
  readonly kind: StorageType;
  put(paste: Paste): Promise<void>;
  getIfLive(token: string, now: Date): Promise<Paste | null>;
  purgeExpired(now: Date): Promise<number>;
  close(): Promise<void>;
}

export const assertStorableToken = (token: string): void => {
  if (!isWellFormedToken(token)) {
    throw new MalformedTokenError();
  }
};

// src/repositories/memory.repository.ts
import { Paste } from '../types/paste.types';
import { isWellFormedToken } from '../utils/base62';
import { DuplicateTokenError } from '../utils/errors';
import { assertStorableToken, PasteRepository } from './paste.repository';

const copyPaste = (paste: Paste): Paste => ({ ...paste, content: Buffer.from(paste.content) });

/** Process-local backend. Everything is lost on restart. */
export class MemoryPasteRepository implements PasteRepository {
  readonly kind = 'memory' as const;

  private readonly pastes = new Map<string, Paste>();
  private readonly ordinalIds = new Set<bigint>();

  async put(paste: Paste): Promise<void> {
    assertStorableToken(paste.token);
    if (this.pastes.has(paste.token) || this.ordinalIds.has(paste.ordinalId)) {
      throw new DuplicateTokenError(paste.token);
    }
    this.pastes.set(paste.token, copyPaste(paste));
    this.ordinalIds.add(paste.ordinalId);
  }

  async getIfLive(token: string, now: Date): Promise<Paste | null> {
    const paste = isWellFormedToken(token) ? this.pastes.get(token) : undefined;
    return paste && now < paste.expiresAt ? copyPaste(paste) : null;
  }

  async purgeExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [token, paste] of this.pastes) {
      if (now >= paste.expiresAt) {
        this.pastes.delete(token);
        this.ordinalIds.delete(paste.ordinalId);
        removed++;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    this.pastes.clear();
    this.ordinalIds.clear();
  }

  get size(): number {
    return this.pastes.size;
  }
}

// src/utils/feistel.ts
import crypto from 'crypto';

const MASK_32 = 0xffffffffn;
export const MAX_UINT64 = (1n << 64n) - 1n;

export const MIN_ROUNDS = 3;
export const DEFAULT_ROUNDS = 4;

const assertUint64 = (value: bigint): void => {
  if (value < 0n || value > MAX_UINT64) {
    throw new RangeError('Value must be an unsigned 64-bit integer');
  }
};

/**
 * Keyed balanced Feistel permutation over the 64-bit space. It hides the
 * ordering baked into ordinal ids from anyone holding only the token.
 *
 * This is obfuscation, not encryption: it keeps creation order from being read
 * off a token at a glance and nothing more.
 */
export class FeistelObfuscator {
  readonly rounds: number;
  private readonly roundKeys: Uint32Array;

  constructor(key: string | Buffer, rounds: number = DEFAULT_ROUNDS) {
    if (key.length === 0) {
      throw new RangeError('Obfuscation key must not be empty');
    }
    if (!Number.isInteger(rounds) || rounds < MIN_ROUNDS) {
      throw new RangeError(`Feistel round count must be an integer of at least ${MIN_ROUNDS}`);
    }

    this.rounds = rounds;
    this.roundKeys = new Uint32Array(rounds);
    for (let round = 0; round < rounds; round++) {
      this.roundKeys[round] = crypto
        .createHmac('sha256', key)
        .update(`feistel-round:${round}`)
        .digest()
        .readUInt32BE(0);
    }
  }

  obfuscate(value: bigint): bigint {
    assertUint64(value);
    let left = Number(value >> 32n);
    let right = Number(value & MASK_32);

    for (let round = 0; round < this.rounds; round++) {
      [left, right] = [right, (left ^ this.mix(round, right)) >>> 0];
    }

    return (BigInt(left) << 32n) | BigInt(right);
  }

  deobfuscate(value: bigint): bigint {
    assertUint64(value);
    let left = Number(value >> 32n);
    let right = Number(value & MASK_32);

    for (let round = this.rounds - 1; round >= 0; round--) {
      [left, right] = [(right ^ this.mix(round, left)) >>> 0, left];
    }

    return (BigInt(left) << 32n) | BigInt(right);
  }

  // 32-bit avalanche mix of one half with the round key
  private mix(round: number, half: number): number {
    let x = (half ^ this.roundKeys[round]) >>> 0;
    x = Math.imul(x ^ (x >>> 16), 0x7feb352d);
    x = Math.imul(x ^ (x >>> 15), 0x846ca68b);
    x ^= x >>> 16;
    return x >>> 0;
  }
}

// src/utils/base62.ts
import { MalformedTokenError } from './errors';
import { MAX_UINT64 } from './feistel';

export const TOKEN_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

// 62^10 < 2^64 <= 62^11, so every 64-bit value fits in eleven digits
export const TOKEN_LENGTH = 11;

const BASE = BigInt(TOKEN_ALPHABET.length);
const DIGITS = new Map<string, bigint>(
  Array.from(TOKEN_ALPHABET, (char, index) => [char, BigInt(index)])
);

/**
 * Renders an unsigned 64-bit integer as a fixed-width, zero-padded base62 token.
 */
export const encodeToken = (value: bigint): string => {
  if (value < 0n || value > MAX_UINT64) {
    throw new RangeError('Token value must be an unsigned 64-bit integer');
  }

  let remaining = value;
  let token = '';
  do {
    token = TOKEN_ALPHABET[Number(remaining % BASE)] + token;
    remaining /= BASE;
  } while (remaining > 0n);

  return token.padStart(TOKEN_LENGTH, TOKEN_ALPHABET[0]);
};

/**
 * Parses a token back to its integer. Rejects wrong lengths, characters outside
 * the alphabet and eleven-digit strings beyond the 64-bit range.
 */
export const parseToken = (token: string): bigint => {
  if (token.length !== TOKEN_LENGTH) {
    throw new MalformedTokenError();
  }

  let value = 0n;
  for (const char of token) {
    const digit = DIGITS.get(char);
    if (digit === undefined) {
      throw new MalformedTokenError();
    }
    value = value * BASE + digit;
  }

  if (value > MAX_UINT64) {
    throw new MalformedTokenError();
  }
  return value;
};

export const isWellFormedToken = (token: unknown): token is string => {
  if (typeof token !== 'string') return false;
  try {
    parseToken(token);
    return true;
  } catch (error) {
    if (error instanceof MalformedTokenError) return false;
    throw error;
  }
};

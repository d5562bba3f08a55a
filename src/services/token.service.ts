// src/services/token.service.ts
import { encodeToken, parseToken } from '../utils/base62';
import { FeistelObfuscator } from '../utils/feistel';
import { SnowflakeGenerator } from '../utils/snowflake';

export interface IssuedToken {
  token: string;
  ordinalId: bigint;
}

/**
 * Ordinal id -> Feistel permutation -> base62. Every call draws a fresh
 * ordinal id; an id whose paste never gets written is simply skipped.
 */
export class TokenIssuer {
  constructor(
    private readonly generator: SnowflakeGenerator,
    private readonly obfuscator: FeistelObfuscator
  ) {}

  issue(): IssuedToken {
    const ordinalId = this.generator.nextId();
    return {
      ordinalId,
      token: encodeToken(this.obfuscator.obfuscate(ordinalId)),
    };
  }

  /**
   * Audit tooling only; requires the key the token was issued under. The read
   * path never calls this.
   */
  recoverOrdinal(token: string): bigint {
    return this.obfuscator.deobfuscate(parseToken(token));
  }
}

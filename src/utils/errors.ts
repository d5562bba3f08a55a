// src/utils/errors.ts

export type PasteErrorCode =
  | 'INVALID_CONTENT'
  | 'INVALID_TTL'
  | 'RATE_LIMITED'
  | 'DUPLICATE_TOKEN'
  | 'CLOCK_SKEW'
  | 'ID_SPACE_EXHAUSTED'
  | 'MALFORMED_TOKEN'
  | 'NOT_FOUND'
  | 'STORAGE_TIMEOUT';

/**
 * Base class for every failure the paste core reports. The HTTP layer maps
 * `code` to a status; the core never decides one.
 */
export class PasteError extends Error {
  readonly code: PasteErrorCode;

  constructor(code: PasteErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type InvalidContentReason = 'empty' | 'too_large' | 'unsupported_content_type';

const invalidContentMessage = (reason: InvalidContentReason, maxBytes: number): string => {
  switch (reason) {
    case 'empty':
      return 'Paste content must not be empty';
    case 'too_large':
      return `Paste content exceeds the limit of ${maxBytes} bytes`;
    case 'unsupported_content_type':
      return 'content_type must be one of text/plain, text/markdown, text/csv or application/json';
  }
};

export class InvalidContentError extends PasteError {
  readonly reason: InvalidContentReason;
  readonly maxBytes: number;

  constructor(reason: InvalidContentReason, maxBytes: number) {
    super('INVALID_CONTENT', invalidContentMessage(reason, maxBytes));
    this.reason = reason;
    this.maxBytes = maxBytes;
  }
}

export class InvalidTTLError extends PasteError {
  constructor(readonly minSeconds: number, readonly maxSeconds: number) {
    super('INVALID_TTL', `expires_in_seconds must be an integer between ${minSeconds} and ${maxSeconds}`);
  }
}

export class RateLimitedError extends PasteError {
  constructor(readonly retryAfterMs: number) {
    super('RATE_LIMITED', 'Too many pastes created, try again later');
  }
}

/** Internal only: a uniqueness constraint fired on insert. */
export class DuplicateTokenError extends PasteError {
  constructor(readonly token: string) {
    super('DUPLICATE_TOKEN', `A paste with token ${token} already exists`);
  }
}

/** Fatal for the issuing worker: the wall clock went backwards. */
export class ClockSkewError extends PasteError {
  constructor(readonly lastTimestamp: number, readonly observedTimestamp: number) {
    super(
      'CLOCK_SKEW',
      `Clock moved backwards by ${lastTimestamp - observedTimestamp}ms; refusing to issue ids`
    );
  }
}

export class IdSpaceExhaustedError extends PasteError {
  constructor(readonly maxTimestamp: number) {
    super('ID_SPACE_EXHAUSTED', `Timestamp exceeds the ${maxTimestamp}ms horizon of the id layout`);
  }
}

export class MalformedTokenError extends PasteError {
  constructor() {
    super('MALFORMED_TOKEN', 'Token is malformed');
  }
}

/** Used for unknown and expired tokens alike. */
export class NotFoundError extends PasteError {
  constructor() {
    super('NOT_FOUND', 'Paste not found or expired');
  }
}

export class StorageTimeoutError extends PasteError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super('STORAGE_TIMEOUT', `Storage operation "${operation}" timed out after ${timeoutMs}ms`);
  }
}

// src/types/paste.types.ts

export const DEFAULT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface PasteMetadata {
  token: string;
  contentType: string;
  sizeBytes: number;
  /** Hex-encoded SHA-256 of the content. */
  contentHash: string;
  createdAt: Date;
  expiresAt: Date;
}

/** The stored entity. `ordinalId` never leaves the service. */
export interface Paste extends PasteMetadata {
  ordinalId: bigint;
  content: Buffer;
}

export interface CreatePasteInput {
  content: Buffer | string;
  ttlSeconds?: number;
  contentType?: string;
  /** Rate-limit key, e.g. the source address. */
  clientId: string;
  signal?: AbortSignal;
}

export interface CreatedPaste {
  token: string;
  contentType: string;
  sizeBytes: number;
  contentHash: string;
  expiresAt: Date;
}

export interface PasteContent {
  content: Buffer;
  contentType: string;
  contentHash: string;
}

/** Metadata plus the body, as returned by the token lookup route. */
export interface PasteWithContent extends PasteMetadata {
  content: Buffer;
}

export type StorageType = 'memory' | 'sql' | 'mongo';

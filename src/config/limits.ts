// src/config/limits.ts
// Single source of truth for paste size and lifetime defaults.
// Every value can be overridden from the environment (see config/env.ts).

export const PASTE_LIMITS = {
  maxContentBytes: 65536,      // 64 KiB
  minTtlSeconds: 60,           // 1 minute
  maxTtlSeconds: 604800,       // 7 days
  defaultTtlSeconds: 86400,    // 1 day
  maxContentTypeLength: 255,
} as const;

// Media types a paste may be served as. Anything a browser would render as
// active content (HTML, SVG, XML) stays out.
export const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'text/plain',
  'text/markdown',
  'text/csv',
  'application/json',
]);

export type PastePolicy = {
  maxContentBytes: number;
  minTtlSeconds: number;
  maxTtlSeconds: number;
  defaultTtlSeconds: number;
};

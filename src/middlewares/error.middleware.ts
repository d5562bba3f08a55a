// src/middlewares/error.middleware.ts
import { ErrorRequestHandler } from 'express';
import {
  InvalidContentError,
  PasteError,
  PasteErrorCode,
  RateLimitedError
} from '../utils/errors';

const STATUS_BY_CODE: Record<PasteErrorCode, number> = {
  INVALID_CONTENT: 400,
  INVALID_TTL: 400,
  MALFORMED_TOKEN: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,
  CLOCK_SKEW: 503,
  ID_SPACE_EXHAUSTED: 503,
  STORAGE_TIMEOUT: 503,
  DUPLICATE_TOKEN: 500
};

const statusFor = (err: PasteError): number =>
  err instanceof InvalidContentError && err.reason === 'too_large' ? 413 : STATUS_BY_CODE[err.code];

// body-parser tags its failures with `type` and `status`
const bodyParserStatus = (err: unknown): number | null => {
  if (typeof err !== 'object' || err === null || !('type' in err)) return null;
  if (err.type === 'entity.too.large') return 413;
  if (err.type === 'entity.parse.failed') return 400;
  return null;
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof PasteError) {
    const status = statusFor(err);
    if (err instanceof RateLimitedError) {
      res.set('Retry-After', String(Math.ceil(err.retryAfterMs / 1000)));
    }
    if (status >= 500) {
      console.error(`${req.method} ${req.originalUrl} failed:`, err);
    }
    // Internal-only failures do not describe themselves to the client
    if (status === 500) {
      return res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Server Error' } });
    }
    return res.status(status).json({ error: { code: err.code, message: err.message } });
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== null) {
    return res.status(parserStatus).json({
      error: {
        code: parserStatus === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_JSON',
        message: parserStatus === 413 ? 'Request body too large' : 'Request body is not valid JSON'
      }
    });
  }

  console.error(err instanceof Error ? err.stack : err);
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Server Error' } });
};

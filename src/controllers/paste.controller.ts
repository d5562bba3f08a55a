// src/controllers/paste.controller.ts
import { NextFunction, Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { PasteService } from '../services/paste.service';

interface CreatePasteBody {
  content: string;
  expires_in_seconds?: number;
  content_type?: string;
}

export const buildPasteController = (pastes: PasteService) => ({
  /**
   * @desc    Create a paste
   * @route   POST /api/v1/pastes
   * @access  Public (rate limited per client address)
   */
  createPaste: async (req: Request, res: Response, next: NextFunction) => {
    // Abort the write if the client goes away before we answer
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) abort.abort();
    });

    try {
      const body = matchedData<CreatePasteBody>(req, { locations: ['body'] });
      const created = await pastes.createPaste({
        content: body.content,
        ttlSeconds: body.expires_in_seconds,
        contentType: body.content_type,
        clientId: req.ip ?? req.socket.remoteAddress ?? 'unknown',
        signal: abort.signal
      });

      res.status(201).json({
        token: created.token,
        expires_at: created.expiresAt.toISOString(),
        size_bytes: created.sizeBytes,
        content_type: created.contentType,
        sha256: created.contentHash
      });
    } catch (error) {
      next(error);
    }
  },

  /**
   * @desc    Paste metadata with its content as UTF-8 text
   * @route   GET /api/v1/pastes/:token
   * @access  Public
   */
  getPaste: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const paste = await pastes.getPaste(req.params.token);
      res.set('Cache-Control', 'no-store');
      res.json({
        token: paste.token,
        created_at: paste.createdAt.toISOString(),
        expires_at: paste.expiresAt.toISOString(),
        size_bytes: paste.sizeBytes,
        content_type: paste.contentType,
        sha256: paste.contentHash,
        content: paste.content.toString('utf8')
      });
    } catch (error) {
      next(error);
    }
  },

  /**
   * @desc    Raw paste content
   * @route   GET /api/v1/pastes/:token/content
   * @access  Public
   */
  getPasteContent: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const paste = await pastes.getPasteContent(req.params.token);
      res.set({
        'Content-Type': paste.contentType,
        'Cache-Control': 'no-store',
        'X-Content-Type-Options': 'nosniff',
        ETag: `"${paste.contentHash}"`
      });
      res.status(200).send(paste.content);
    } catch (error) {
      next(error);
    }
  }
});

// src/routes/paste.routes.ts
import express, { Router } from 'express';
import { buildPasteController } from '../controllers/paste.controller';
import { validatePasteCreation } from '../middlewares/validation.middleware';
import { PasteService } from '../services/paste.service';

const pasteRoutes = (pastes: PasteService): Router => {
  const router = express.Router();
  const pasteController = buildPasteController(pastes);

  router.post('/', validatePasteCreation, pasteController.createPaste);
  router.get('/:token', pasteController.getPaste);
  router.get('/:token/content', pasteController.getPasteContent);

  return router;
};

export default pasteRoutes;

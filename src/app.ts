//  src/app.ts
import express, { Express } from 'express';
import cors from 'cors';
import { AppConfig } from './config/env';
import { errorHandler } from './middlewares/error.middleware';
import pasteRoutes from './routes/paste.routes';
import { PasteService } from './services/paste.service';

export type AppOptions = Pick<AppConfig, 'allowedOrigins' | 'trustProxy' | 'nodeEnv' | 'maxContentBytes'>;

// JSON escaping can turn one content byte into six (\u00XX)
const jsonBodyLimit = (maxContentBytes: number): number => maxContentBytes * 6 + 4096;

export const createApp = (pastes: PasteService, options: AppOptions): Express => {
  const app = express();

  if (options.trustProxy) {
    app.set('trust proxy', 1);
  }

  const corsOptions: cors.CorsOptions = {
    origin: options.allowedOrigins,
    exposedHeaders: ['ETag', 'Retry-After']
  };
  app.options('*', cors(corsOptions));
  app.use(cors(corsOptions));

  // Request logging outside production; bodies are never logged
  if (options.nodeEnv === 'development') {
    app.use((req, res, next) => {
      if (req.path.startsWith('/api')) {
        console.log(`📍 ${req.method} ${req.path}`);
      }
      next();
    });
  }

  app.use(express.json({ limit: jsonBodyLimit(options.maxContentBytes) }));

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', storage: pastes.storageType, timestamp: new Date().toISOString() });
  });

  // --- API ROUTES ---
  app.use('/api/v1/pastes', pasteRoutes(pastes));

  // --- 404 and Error Handlers ---
  app.use('*', (req, res) => {
    res.status(404).json({
      error: { code: 'ROUTE_NOT_FOUND', message: 'Route not found', details: { path: req.originalUrl } }
    });
  });

  app.use(errorHandler);

  return app;
};

export default createApp;

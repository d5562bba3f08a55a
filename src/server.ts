// src/server.ts
import http from 'http';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { buildPasteService } from './container';
import { startPurgeJob } from './jobs/purge.job';

dotenv.config();

const start = async (): Promise<void> => {
  const config = loadConfig();
  if (config.nodeEnv !== 'production' && !process.env.OBFUSCATION_KEY) {
    console.warn('⚠️  OBFUSCATION_KEY is not set; using the development key');
  }

  const pastes = await buildPasteService(config);
  const server = http.createServer(createApp(pastes, config));
  const stopPurge = startPurgeJob(pastes, config.purgeIntervalSeconds * 1000);

  server.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📍 Environment: ${config.nodeEnv}`);
    console.log(`📍 Storage: ${config.storageType}, worker ${config.workerId}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    stopPurge();
    server.close(() => {
      pastes.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Error during shutdown:', err);
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}

export default start;

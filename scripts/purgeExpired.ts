// scripts/purgeExpired.ts
import path from 'path';
import dotenv from 'dotenv';
import { loadConfig } from '../src/config/env';
import { createRepository } from '../src/repositories';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(__dirname, '../.env') });

async function purgeExpiredPastes() {
  const config = loadConfig();

  if (config.storageType === 'memory') {
    console.log('STORAGE_TYPE is memory; nothing persistent to purge');
    return;
  }

  console.log(`Purging expired pastes from ${config.storageType} storage...`);
  const repository = await createRepository(config);
  try {
    const removed = await repository.purgeExpired(new Date());
    console.log(`Removed ${removed} expired paste(s)`);
  } finally {
    await repository.close();
  }
}

purgeExpiredPastes().catch((error: unknown) => {
  console.error('Purge failed:', error);
  process.exit(1);
});

// src/repositories/index.ts
import connectDB from '../config/db';
import openSqlite from '../config/sqlite';
import { AppConfig } from '../config/env';
import { MemoryPasteRepository } from './memory.repository';
import { MongoPasteRepository } from './mongo.repository';
import { PasteRepository } from './paste.repository';
import { SqlPasteRepository } from './sql.repository';

export type { PasteRepository } from './paste.repository';

/** Picks the backend named by STORAGE_TYPE. */
export const createRepository = async (
  config: Pick<AppConfig, 'storageType' | 'sqlitePath' | 'mongoUri'>
): Promise<PasteRepository> => {
  switch (config.storageType) {
    case 'memory':
      return new MemoryPasteRepository();
    case 'sql':
      return new SqlPasteRepository(openSqlite(config.sqlitePath));
    case 'mongo':
      await connectDB(config.mongoUri);
      return new MongoPasteRepository();
  }
};

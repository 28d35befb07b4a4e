import type { AppConfig } from '../config/appConfig';
import { createDatabase } from '../db';
import { DrizzleGraphStorage } from './drizzleStorage';
import { MemoryGraphStorage } from './memoryStorage';
import type { IGraphStorage } from './types';

export interface StorageHandle {
  storage: IGraphStorage;
  close(): Promise<void>;
}

/** Opens the storage backend selected by GRAPH_STORE. */
export function openStorage(config: Pick<AppConfig, 'storage'>): StorageHandle {
  if (config.storage.driver === 'postgres') {
    const database = createDatabase(config.storage.url, { ssl: config.storage.ssl });
    return { storage: new DrizzleGraphStorage(database.db), close: database.close };
  }
  return { storage: new MemoryGraphStorage(), close: async () => {} };
}

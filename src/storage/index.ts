import { config, type CatalogStoreDriver } from '../config.js';
import type { CatalogStore } from './catalogStore.js';
import { SqliteCatalogStore } from './db.js';
import { SupabaseCatalogStore } from './supabaseStore.js';

export type { CatalogStore } from './catalogStore.js';

export function createCatalogStore(driver: CatalogStoreDriver = config.catalogStore): CatalogStore {
  if (driver === 'supabase') {
    return new SupabaseCatalogStore();
  }
  return new SqliteCatalogStore(config.dbPath);
}

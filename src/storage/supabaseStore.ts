import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { config, requireEnv } from '../config.js';
import { logger } from '../logger.js';
import type { CatalogItem } from '../types.js';
import { toCatalogItem, type CatalogStore } from './catalogStore.js';

export interface SupabaseStoreOptions {
  table: string;
  pageSize: number;
}

export function createSupabase(): SupabaseClient {
  const url = requireEnv(config.supabaseUrl, 'SUPABASE_URL');
  const key = requireEnv(config.supabaseKey, 'SUPABASE_KEY');
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

/** The hosted `invoice_master` table (`item_no, item, category, unit, price`). */
export class SupabaseCatalogStore implements CatalogStore {
  private readonly options: SupabaseStoreOptions;

  constructor(
    private readonly client: SupabaseClient = createSupabase(),
    options: Partial<SupabaseStoreOptions> = {},
  ) {
    this.options = {
      table: options.table ?? config.supabaseTable,
      pageSize: options.pageSize ?? config.supabasePageSize,
    };
  }

  async listItems(limit?: number): Promise<CatalogItem[]> {
    if (limit !== undefined) {
      return this.fetchRange(0, limit - 1);
    }

    const all: CatalogItem[] = [];
    const { pageSize } = this.options;
    let from = 0;
    while (true) {
      const batch = await this.fetchRange(from, from + pageSize - 1);
      all.push(...batch);
      if (batch.length < pageSize) {
        break;
      }
      from += pageSize;
    }

    logger.debug({ table: this.options.table, count: all.length }, 'Catalog items fetched');
    return all;
  }

  async upsertItems(items: CatalogItem[]): Promise<number> {
    if (!items.length) {
      return 0;
    }
    const { error } = await this.client.from(this.options.table).upsert(items, { onConflict: 'item_no' });
    if (error) {
      throw new Error(`Supabase upsert into ${this.options.table} failed: ${error.message}`);
    }
    return items.length;
  }

  async close(): Promise<void> {
    // supabase-js holds no connection to release
  }

  private async fetchRange(from: number, to: number): Promise<CatalogItem[]> {
    const { data, error } = await this.client
      .from(this.options.table)
      .select('*')
      .order('item_no', { ascending: true, nullsFirst: false })
      .order('item', { ascending: true })
      .range(from, to);
    if (error) {
      throw new Error(`Supabase query on ${this.options.table} failed: ${error.message}`);
    }
    const rows: Array<Record<string, unknown>> = data ?? [];
    return rows.map(toCatalogItem);
  }
}

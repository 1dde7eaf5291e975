import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

const cwd = process.cwd();

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value == null) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

export type CatalogStoreDriver = 'sqlite' | 'supabase';

function asStoreDriver(value: string | undefined): CatalogStoreDriver {
  return value?.trim().toLowerCase() === 'supabase' ? 'supabase' : 'sqlite';
}

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  outputDir: process.env.OUTPUT_DIR ?? path.join(cwd, 'out'),

  catalogUrl: process.env.CATALOG_URL ?? 'https://se.ahlsell.se/katalog/emv-el/?page=1',
  catalogTimeoutMs: asNumber(process.env.CATALOG_TIMEOUT_MS, 30000),
  catalogOutputName: process.env.CATALOG_OUTPUT_NAME ?? 'ahlsell_emv_el',
  catalogSheetName: process.env.CATALOG_SHEET_NAME ?? 'EMV-EL Katalog',
  catalogXlsx: asBool(process.env.CATALOG_XLSX, true),

  catalogStore: asStoreDriver(process.env.CATALOG_STORE),
  dbPath: process.env.DB_PATH ?? path.join(cwd, 'data', 'catalog.db'),
  supabaseUrl: process.env.SUPABASE_URL ?? '',
  supabaseKey: process.env.SUPABASE_KEY ?? '',
  supabaseTable: process.env.SUPABASE_TABLE ?? 'invoice_master',
  supabasePageSize: asNumber(process.env.SUPABASE_PAGE_SIZE, 1000),

  searchDefaultLimit: asNumber(process.env.SEARCH_DEFAULT_LIMIT, 50),
  vatRate: asNumber(process.env.VAT_RATE, 0.25),
  rotRate: asNumber(process.env.ROT_RATE, 0.3),
  rotCategory: process.env.ROT_CATEGORY ?? 'ARBETE',
  serverPort: asNumber(process.env.SERVER_PORT, 3000),
};

export function requireEnv(value: string, name: string): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

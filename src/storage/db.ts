import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { CatalogItem } from '../types.js';
import { toCatalogItem, type CatalogStore } from './catalogStore.js';

/** Rows without an item number (labor, fees) are keyed on their text. */
export function itemKey(item: CatalogItem): string {
  return item.item_no ?? `item:${item.item}`;
}

/** Local copy of the `invoice_master` table for offline use. */
export class SqliteCatalogStore implements CatalogStore {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS invoice_master (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        item_key TEXT NOT NULL UNIQUE,
        item_no TEXT,
        item TEXT NOT NULL,
        category TEXT NOT NULL DEFAULT '',
        unit TEXT NOT NULL DEFAULT '',
        price REAL,
        updatedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_invoice_master_category ON invoice_master(category);
    `);
  }

  async listItems(limit?: number): Promise<CatalogItem[]> {
    const rows =
      limit === undefined
        ? this.db.prepare('SELECT item_no, item, category, unit, price FROM invoice_master ORDER BY id ASC').all()
        : this.db
            .prepare('SELECT item_no, item, category, unit, price FROM invoice_master ORDER BY id ASC LIMIT ?')
            .all(limit);
    return (rows as Record<string, unknown>[]).map(toCatalogItem);
  }

  async upsertItems(items: CatalogItem[]): Promise<number> {
    const stmt = this.db.prepare(`
      INSERT INTO invoice_master (item_key, item_no, item, category, unit, price)
      VALUES (@item_key, @item_no, @item, @category, @unit, @price)
      ON CONFLICT(item_key) DO UPDATE SET
        item=excluded.item,
        category=excluded.category,
        unit=excluded.unit,
        price=excluded.price,
        updatedAt=CURRENT_TIMESTAMP
    `);

    const trx = this.db.transaction((rows: CatalogItem[]) => {
      for (const row of rows) {
        stmt.run({
          item_key: itemKey(row),
          item_no: row.item_no,
          item: row.item,
          category: row.category,
          unit: row.unit,
          price: row.price,
        });
      }
    });

    trx(items);
    return items.length;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

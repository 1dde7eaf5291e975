import fs from 'node:fs';
import csv from 'csv-parser';
import { toCatalogItem } from '../storage/catalogStore.js';
import type { CatalogItem } from '../types.js';

/** Reads catalog rows from a CSV file with `item_no,item,category,unit,price` headers. */
export function readCatalogCsv(file: string): Promise<CatalogItem[]> {
  return new Promise((resolve, reject) => {
    const items: CatalogItem[] = [];
    fs.createReadStream(file)
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: Record<string, string>) => {
        const item = toCatalogItem(row);
        if (item.item) {
          items.push(item);
        }
      })
      .on('end', () => resolve(items))
      .on('error', reject);
  });
}

import type { CatalogItem } from '../types.js';

export interface CatalogStore {
  /** All items in insertion order, or the first `limit` of them. */
  listItems(limit?: number): Promise<CatalogItem[]>;
  upsertItems(items: CatalogItem[]): Promise<number>;
  close(): Promise<void>;
}

function toStringOrNull(value: unknown): string | null {
  if (value == null) {
    return null;
  }
  const text = String(value).trim();
  return text ? text : null;
}

function toNumberOrNull(value: unknown): number | null {
  if (value == null || value === '') {
    return null;
  }
  const parsed = Number(typeof value === 'string' ? value.replace(',', '.') : value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toCatalogItem(raw: Record<string, unknown>): CatalogItem {
  return {
    item_no: toStringOrNull(raw.item_no),
    item: String(raw.item ?? '').trim(),
    category: String(raw.category ?? '').trim(),
    unit: String(raw.unit ?? '').trim(),
    price: toNumberOrNull(raw.price),
  };
}

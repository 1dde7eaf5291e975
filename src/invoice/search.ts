import { config } from '../config.js';
import type { CatalogStore } from '../storage/catalogStore.js';
import type { CatalogItem } from '../types.js';
import { includesIgnoreCase } from '../utils/text.js';

export function filterCatalogItems(items: readonly CatalogItem[], query: string): CatalogItem[] {
  const needle = query.trim();
  return items.filter(
    (item) =>
      includesIgnoreCase(item.item, needle) ||
      includesIgnoreCase(item.item_no, needle) ||
      includesIgnoreCase(item.category, needle),
  );
}

/**
 * Blank query lists the first `defaultLimit` items; anything else loads the
 * whole table and filters it locally on item text, item number and category.
 */
export async function searchCatalog(
  store: CatalogStore,
  query: string,
  defaultLimit: number = config.searchDefaultLimit,
): Promise<CatalogItem[]> {
  if (!query.trim()) {
    return store.listItems(defaultLimit);
  }
  return filterCatalogItems(await store.listItems(), query);
}

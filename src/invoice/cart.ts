import type { CatalogItem, InvoiceLine, InvoiceRates, InvoiceTotals } from '../types.js';
import { computeInvoiceTotals } from './renderer.js';

export const MIN_QUANTITY = 0.1;

export function toInvoiceLine(item: CatalogItem, quantity: number): InvoiceLine {
  const unitPrice = item.price ?? 0;
  return {
    itemNo: item.item_no,
    description: item.item,
    category: item.category,
    quantity,
    unit: item.unit,
    unitPrice,
    amount: quantity * unitPrice,
  };
}

export class InvoiceCart {
  private items: InvoiceLine[] = [];

  get lines(): readonly InvoiceLine[] {
    return this.items;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  add(item: CatalogItem, quantity: number): InvoiceLine {
    if (!Number.isFinite(quantity) || quantity < MIN_QUANTITY) {
      throw new Error(`Quantity must be at least ${MIN_QUANTITY}, got ${quantity}`);
    }
    const line = toInvoiceLine(item, quantity);
    this.items = [...this.items, line];
    return line;
  }

  remove(index: number): InvoiceLine | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return null;
    }
    const removed = this.items[index];
    this.items = this.items.filter((_, i) => i !== index);
    return removed;
  }

  clear(): void {
    this.items = [];
  }

  totals(rates: InvoiceRates): InvoiceTotals {
    return computeInvoiceTotals(this.items, rates);
  }
}

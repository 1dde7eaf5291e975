import { describe, expect, it } from 'vitest';
import { InvoiceCart } from '../../src/invoice/cart.js';
import { computeInvoiceTotals, invoiceFileName, renderInvoiceText } from '../../src/invoice/renderer.js';
import { filterCatalogItems } from '../../src/invoice/search.js';
import type { CatalogItem, InvoiceRates } from '../../src/types.js';

const rates: InvoiceRates = { vatRate: 0.25, rotRate: 0.3, rotCategory: 'ARBETE' };

const socket: CatalogItem = {
  item_no: '2405276',
  item: 'Grenuttag 3-vägs med jordfelsbrytare',
  category: 'MATERIAL',
  unit: 'st',
  price: 100,
};

const labour: CatalogItem = {
  item_no: null,
  item: 'Arbetstid montör',
  category: 'ARBETE',
  unit: 'tim',
  price: 500,
};

describe('InvoiceCart', () => {
  it('adds lines with amount = quantity * price', () => {
    const cart = new InvoiceCart();
    const line = cart.add(socket, 2);
    expect(line).toEqual({
      itemNo: '2405276',
      description: 'Grenuttag 3-vägs med jordfelsbrytare',
      category: 'MATERIAL',
      quantity: 2,
      unit: 'st',
      unitPrice: 100,
      amount: 200,
    });
  });

  it('treats a missing price as zero', () => {
    const cart = new InvoiceCart();
    expect(cart.add({ ...socket, price: null }, 3).amount).toBe(0);
  });

  it('rejects quantities below 0.1', () => {
    const cart = new InvoiceCart();
    expect(() => cart.add(socket, 0)).toThrow('Quantity must be at least 0.1, got 0');
    expect(cart.isEmpty).toBe(true);
  });

  it('removes by index and clears', () => {
    const cart = new InvoiceCart();
    cart.add(socket, 1);
    cart.add(labour, 1);
    expect(cart.remove(5)).toBeNull();
    expect(cart.remove(0)?.itemNo).toBe('2405276');
    expect(cart.lines.map((l) => l.description)).toEqual(['Arbetstid montör']);
    cart.clear();
    expect(cart.lines).toEqual([]);
  });
});

describe('computeInvoiceTotals', () => {
  it('applies VAT to every line and ROT to labour lines only', () => {
    const cart = new InvoiceCart();
    cart.add(socket, 2);
    cart.add(labour, 1.5);
    expect(computeInvoiceTotals(cart.lines, rates)).toEqual({
      totalExclVat: 950,
      totalInclVat: 1187.5,
      laborInclVat: 937.5,
      rotDeduction: 281.25,
      amountDue: 906.25,
    });
  });
});

describe('renderInvoiceText', () => {
  const header = { customerName: 'Andersson Bygg AB', projectNumber: 'P2024-001', date: new Date(2024, 4, 17) };

  it('renders the fixed-width invoice with ROT deduction', () => {
    const cart = new InvoiceCart();
    cart.add(socket, 2);
    cart.add(labour, 1.5);

    expect(renderInvoiceText(cart.lines, header, rates).split('\n')).toEqual([
      'FAKTURA',
      '='.repeat(80),
      'Kund: Andersson Bygg AB',
      'Projekt: P2024-001',
      'Datum: 2024-05-17',
      '',
      'Pos  Art.nr       Beskrivning                Antal Enhet        A-pris       Belopp    Inkl moms',
      '-'.repeat(100),
      '1    2405276      Grenuttag 3-vägs med jord   2.00 st           100.00       200.00       250.00',
      '2                 Arbetstid montör            1.50 tim          500.00       750.00       937.50',
      '-'.repeat(100),
      '                                                      TOTAL EXKL MOMS:       950.00 kr',
      '                                                TOTAL INKL MOMS (25%):      1187.50 kr',
      '',
      '                          ROT-AVDRAG (30% av arbetskostnad inkl moms):      -281.25 kr',
      '                                                        FAKTURA TOTAL:       906.25 kr',
    ]);
  });

  it('omits the ROT line without labour', () => {
    const cart = new InvoiceCart();
    cart.add(socket, 2);
    const lines = renderInvoiceText(cart.lines, header, rates).split('\n');
    expect(lines.slice(-2)).toEqual(['', '                                                        FAKTURA TOTAL:       250.00 kr']);
  });

  it('names the download after project and date', () => {
    expect(invoiceFileName('P2024-001', header.date)).toBe('faktura_P2024-001_2024-05-17.txt');
  });
});

describe('filterCatalogItems', () => {
  it('matches item, item number or category case-insensitively', () => {
    const items = [socket, labour];
    expect(filterCatalogItems(items, 'GRENUTTAG')).toEqual([socket]);
    expect(filterCatalogItems(items, '24052')).toEqual([socket]);
    expect(filterCatalogItems(items, 'arbete')).toEqual([labour]);
    expect(filterCatalogItems(items, 'kabel')).toEqual([]);
  });
});

import type { InvoiceHeader, InvoiceLine, InvoiceRates, InvoiceTotals } from '../types.js';

const LABEL_WIDTH = 70;
const AMOUNT_WIDTH = 12;
const RULE_WIDTH = 100;
const TITLE_RULE_WIDTH = 80;
const DESCRIPTION_WIDTH = 25;

export function computeInvoiceTotals(lines: readonly InvoiceLine[], rates: InvoiceRates): InvoiceTotals {
  let totalExclVat = 0;
  let totalInclVat = 0;
  let laborInclVat = 0;

  for (const line of lines) {
    const inclVat = line.amount * (1 + rates.vatRate);
    totalExclVat += line.amount;
    totalInclVat += inclVat;
    if (line.category === rates.rotCategory) {
      laborInclVat += inclVat;
    }
  }

  const rotDeduction = laborInclVat * rates.rotRate;
  return {
    totalExclVat,
    totalInclVat,
    laborInclVat,
    rotDeduction,
    amountDue: totalInclVat - rotDeduction,
  };
}

export function formatDate(date: Date): string {
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function percent(rate: number): string {
  return String(Math.round(rate * 100));
}

function money(value: number, width: number): string {
  return value.toFixed(2).padStart(width);
}

function totalLine(label: string, value: number): string {
  return `${label.padStart(LABEL_WIDTH)} ${money(value, AMOUNT_WIDTH)} kr`;
}

function columnHeader(): string {
  return [
    'Pos'.padEnd(4),
    'Art.nr'.padEnd(12),
    'Beskrivning'.padEnd(DESCRIPTION_WIDTH),
    'Antal'.padStart(6),
    'Enhet'.padEnd(8),
    'A-pris'.padStart(10),
    'Belopp'.padStart(12),
    'Inkl moms'.padStart(12),
  ].join(' ');
}

function itemLine(pos: number, line: InvoiceLine, vatRate: number): string {
  return [
    String(pos).padEnd(4),
    (line.itemNo ?? '').padEnd(12),
    line.description.slice(0, DESCRIPTION_WIDTH).padEnd(DESCRIPTION_WIDTH),
    money(line.quantity, 6),
    line.unit.padEnd(8),
    money(line.unitPrice, 10),
    money(line.amount, 12),
    money(line.amount * (1 + vatRate), 12),
  ].join(' ');
}

/** Fixed-width plain-text invoice, one line per cart entry plus VAT and ROT totals. */
export function renderInvoiceText(lines: readonly InvoiceLine[], header: InvoiceHeader, rates: InvoiceRates): string {
  const totals = computeInvoiceTotals(lines, rates);
  const out = [
    'FAKTURA',
    '='.repeat(TITLE_RULE_WIDTH),
    `Kund: ${header.customerName}`,
    `Projekt: ${header.projectNumber}`,
    `Datum: ${formatDate(header.date)}`,
    '',
    columnHeader(),
    '-'.repeat(RULE_WIDTH),
    ...lines.map((line, i) => itemLine(i + 1, line, rates.vatRate)),
    '-'.repeat(RULE_WIDTH),
    totalLine('TOTAL EXKL MOMS:', totals.totalExclVat),
    totalLine(`TOTAL INKL MOMS (${percent(rates.vatRate)}%):`, totals.totalInclVat),
    '',
  ];

  if (totals.laborInclVat > 0) {
    out.push(totalLine(`ROT-AVDRAG (${percent(rates.rotRate)}% av arbetskostnad inkl moms):`, -totals.rotDeduction));
  }
  out.push(totalLine('FAKTURA TOTAL:', totals.amountDue));

  return out.join('\n');
}

export function invoiceFileName(projectNumber: string, date: Date): string {
  return `faktura_${projectNumber}_${formatDate(date)}.txt`;
}

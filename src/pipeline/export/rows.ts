import type { ProductRow } from '../../types.js';
import { truncate } from '../../utils/text.js';

export const CSV_COLUMNS = ['artikelnummer', 'benamning', 'kolumnrubriker', 'specifikationer'] as const;
export const XLSX_HEADERS = ['artikelnummer', 'benämning', 'kolumnrubriker', 'specifikationer'] as const;

export function dedupeRows(rows: readonly ProductRow[]): ProductRow[] {
  const seen = new Set<string>();
  const out: ProductRow[] = [];
  for (const row of rows) {
    if (seen.has(row.articleNumber)) {
      continue;
    }
    seen.add(row.articleNumber);
    out.push(row);
  }
  return out;
}

export function toRecord(row: ProductRow): [string, string, string, string] {
  return [row.articleNumber, row.name, row.columnHeaders, row.specText];
}

export function formatSampleRow(row: ProductRow): string {
  return [
    row.articleNumber,
    truncate(row.name, 40),
    truncate(row.columnHeaders, 30),
    truncate(row.specText, 30),
  ].join('  |  ');
}

export function formatSampleRows(rows: readonly ProductRow[], head = 5, tail = 3): string[] {
  return [
    ...rows.slice(0, head).map((row) => `  ${formatSampleRow(row)}`),
    '  ...',
    ...rows.slice(-tail).map((row) => `  ${formatSampleRow(row)}`),
  ];
}

import fs from 'node:fs';
import path from 'node:path';
import type { ProductRow } from '../../types.js';
import { CSV_COLUMNS, toRecord } from './rows.js';

const CSV_EOL = '\r\n';

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(rows: readonly ProductRow[]): string {
  const lines = [CSV_COLUMNS.join(','), ...rows.map((row) => toRecord(row).map(escapeCsvField).join(','))];
  return lines.map((line) => `${line}${CSV_EOL}`).join('');
}

export function exportRowsToCsv(rows: readonly ProductRow[], outputPath: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, toCsv(rows), 'utf8');
}

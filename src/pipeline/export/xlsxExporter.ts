import fs from 'node:fs';
import path from 'node:path';
import type { Workbook } from 'exceljs';
import { config } from '../../config.js';
import { logger } from '../../logger.js';
import type { ProductRow } from '../../types.js';
import { XLSX_HEADERS, toRecord } from './rows.js';

export interface ExcelModule {
  Workbook: new () => Workbook;
}

export type ExcelLoader = () => Promise<ExcelModule>;

const COLUMN_WIDTHS = [16, 60, 40, 50];

export const loadExcelJs: ExcelLoader = async () => (await import('exceljs')).default;

/**
 * Writes the rows to an .xlsx file. exceljs is an optional dependency: when it
 * cannot be loaded the export is skipped and `false` is returned.
 */
export async function exportRowsToXlsx(
  rows: readonly ProductRow[],
  outputPath: string,
  options: { sheetName?: string; loadLibrary?: ExcelLoader } = {},
): Promise<boolean> {
  let excel: ExcelModule;
  try {
    excel = await (options.loadLibrary ?? loadExcelJs)();
  } catch (error) {
    logger.warn({ err: error }, 'exceljs not installed, skipping Excel export');
    return false;
  }

  const workbook = new excel.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName ?? config.catalogSheetName);

  sheet.addRow([...XLSX_HEADERS]);
  sheet.getRow(1).font = { bold: true };
  for (const row of rows) {
    sheet.addRow(toRecord(row));
  }

  COLUMN_WIDTHS.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  await workbook.xlsx.writeFile(outputPath);
  return true;
}

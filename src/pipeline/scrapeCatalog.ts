import path from 'node:path';
import { CatalogPageFetcher } from '../catalog/pageFetcher.js';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { ProductRow } from '../types.js';
import { exportRowsToCsv } from './export/csvExporter.js';
import { dedupeRows } from './export/rows.js';
import { exportRowsToXlsx, type ExcelLoader } from './export/xlsxExporter.js';
import { parseCatalog } from './parse/sectionParser.js';

export interface ScrapeOptions {
  url: string;
  outputDir: string;
  baseName: string;
  xlsx: boolean;
  sheetName?: string;
  loadExcel?: ExcelLoader;
}

export interface ScrapeResult {
  pages: number;
  extracted: number;
  unique: number;
  csvPath: string;
  xlsxPath: string | null;
  rows: ProductRow[];
}

export class CatalogScrapeService {
  constructor(private readonly fetcher: CatalogPageFetcher = new CatalogPageFetcher()) {}

  async run(options: ScrapeOptions): Promise<ScrapeResult> {
    const start = Date.now();
    const pages = await this.fetcher.fetchPageTexts(options.url);

    const extracted = parseCatalog(pages);
    const rows = dedupeRows(extracted);
    logger.info({ pages: pages.length, extracted: extracted.length, unique: rows.length }, 'Catalog parsed');

    const csvPath = path.join(options.outputDir, `${options.baseName}.csv`);
    exportRowsToCsv(rows, csvPath);
    logger.info({ csvPath }, 'CSV saved');

    let xlsxPath: string | null = null;
    if (options.xlsx) {
      const target = path.join(options.outputDir, `${options.baseName}.xlsx`);
      const written = await exportRowsToXlsx(rows, target, {
        sheetName: options.sheetName,
        loadLibrary: options.loadExcel,
      });
      if (written) {
        xlsxPath = target;
        logger.info({ xlsxPath }, 'Excel saved');
      }
    }

    logger.info({ totalMs: Date.now() - start }, 'Catalog scrape completed');
    return {
      pages: pages.length,
      extracted: extracted.length,
      unique: rows.length,
      csvPath,
      xlsxPath,
      rows,
    };
  }
}

export function defaultScrapeOptions(): ScrapeOptions {
  return {
    url: config.catalogUrl,
    outputDir: config.outputDir,
    baseName: config.catalogOutputName,
    xlsx: config.catalogXlsx,
    sheetName: config.catalogSheetName,
  };
}

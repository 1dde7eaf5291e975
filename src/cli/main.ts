#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { CatalogScrapeService, defaultScrapeOptions } from '../pipeline/scrapeCatalog.js';
import { formatSampleRows } from '../pipeline/export/rows.js';
import { readCatalogCsv } from '../invoice/importCsv.js';
import { searchCatalog } from '../invoice/search.js';
import { createCatalogStore } from '../storage/index.js';
import { createServer, listen } from '../server/httpServer.js';

const program = new Command();
program
  .name('vvs-catalog-tools')
  .description('Catalog scraper (CSV/XLSX export) and invoice form over a catalog table')
  .version('0.1.0');

program
  .command('catalog:scrape')
  .description('Fetch the flipbook catalog, parse article rows and export CSV/XLSX')
  .option('--url <url>', 'catalog page URL', config.catalogUrl)
  .option('--out-dir <dir>', 'output directory', config.outputDir)
  .option('--name <name>', 'output file base name', config.catalogOutputName)
  .option('--no-xlsx', 'skip the Excel export')
  .action(async (opts: { url: string; outDir: string; name: string; xlsx: boolean }) => {
    const service = new CatalogScrapeService();
    const result = await service.run({
      ...defaultScrapeOptions(),
      url: opts.url,
      outputDir: path.resolve(opts.outDir),
      baseName: opts.name,
      xlsx: opts.xlsx && config.catalogXlsx,
    });

    logger.info(
      { pages: result.pages, extracted: result.extracted, unique: result.unique, csv: result.csvPath, xlsx: result.xlsxPath },
      'Scrape done',
    );
    console.log('\nSample rows:');
    for (const line of formatSampleRows(result.rows)) {
      console.log(line);
    }
  });

program
  .command('items:search')
  .description('Search the invoice catalog by item text, item number or category')
  .argument('[query]', 'search text; empty lists the first items', '')
  .action(async (query: string) => {
    const store = createCatalogStore();
    try {
      const items = await searchCatalog(store, query);
      logger.info({ query, count: items.length }, 'Catalog search done');
      for (const item of items) {
        console.log(`${item.item_no ?? 'N/A'}\t${item.item}\t${item.category}\t${item.price ?? 0} kr/${item.unit}`);
      }
    } finally {
      await store.close();
    }
  });

program
  .command('items:import')
  .description('Upsert catalog items from a CSV file (item_no,item,category,unit,price)')
  .requiredOption('--csv <file>', 'CSV file path')
  .action(async (opts: { csv: string }) => {
    const store = createCatalogStore();
    try {
      const items = await readCatalogCsv(path.resolve(opts.csv));
      const stored = await store.upsertItems(items);
      logger.info({ file: opts.csv, stored, driver: config.catalogStore }, 'Catalog import done');
    } finally {
      await store.close();
    }
  });

program
  .command('invoice:serve')
  .description('Serve the invoice form')
  .option('--port <port>', 'listen port', String(config.serverPort))
  .action(async (opts: { port: string }) => {
    const store = createCatalogStore();
    const server = createServer({ store });
    const port = Number(opts.port);

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutdown signal received');
      server.close(() => {
        store.close().catch((error) => logger.error({ err: error }, 'Catalog store close failed'));
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await listen(server, port);
    logger.info({ port, store: config.catalogStore }, 'Invoice form listening');
  });

program.parseAsync().catch((error) => {
  logger.error({ err: error }, 'CLI failed');
  process.exitCode = 1;
});

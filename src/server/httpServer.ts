import http from 'node:http';
import { config } from '../config.js';
import { InvoiceCart, MIN_QUANTITY } from '../invoice/cart.js';
import { invoiceFileName, percent, renderInvoiceText } from '../invoice/renderer.js';
import { searchCatalog } from '../invoice/search.js';
import { logger } from '../logger.js';
import { toCatalogItem, type CatalogStore } from '../storage/catalogStore.js';
import type { InvoiceRates } from '../types.js';
import { renderIndexPage, renderInvoicePage } from './views.js';

export interface InvoiceServerOptions {
  store: CatalogStore;
  cart?: InvoiceCart;
  rates?: InvoiceRates;
  now?: () => Date;
}

export function defaultRates(): InvoiceRates {
  return {
    vatRate: config.vatRate,
    rotRate: config.rotRate,
    rotCategory: config.rotCategory,
  };
}

const MAX_BODY_BYTES = 64 * 1024;

async function readForm(req: http.IncomingMessage): Promise<URLSearchParams> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new Error('Request body too large');
    }
    chunks.push(buffer);
  }
  return new URLSearchParams(Buffer.concat(chunks).toString('utf8'));
}

function redirect(res: http.ServerResponse, location: string): void {
  res.writeHead(303, { location }).end();
}

function html(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'content-type': 'text/html; charset=utf-8' }).end(body);
}

/** Resolves once bound; bind errors such as EADDRINUSE reject. */
export function listen(server: http.Server, port: number, host?: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

/** Single-user invoice form: one cart per server process. */
export function createServer(options: InvoiceServerOptions): http.Server {
  const { store } = options;
  const cart = options.cart ?? new InvoiceCart();
  const rates = options.rates ?? defaultRates();
  const now = options.now ?? (() => new Date());
  const customer = { name: '', project: '' };

  async function renderIndex(res: http.ServerResponse, url: URL, status = 200, message?: string): Promise<void> {
    const query = url.searchParams.get('q') ?? '';
    const showAll = url.searchParams.get('all') === '1';
    const results = query.trim() || showAll ? await searchCatalog(store, query) : [];
    html(
      res,
      status,
      renderIndexPage({
        query,
        showAll,
        results,
        lines: cart.lines,
        totals: cart.totals(rates),
        rotPercent: percent(rates.rotRate),
        customerName: customer.name,
        projectNumber: customer.project,
        message,
      }),
    );
  }

  return http.createServer(async (req, res) => {
    try {
      if (!req.url || !req.method) {
        res.writeHead(400).end('Bad request');
        return;
      }

      const url = new URL(req.url, 'http://localhost');

      if (req.method === 'GET' && url.pathname === '/') {
        await renderIndex(res, url);
        return;
      }

      if (req.method === 'POST' && url.pathname === '/cart/add') {
        const form = await readForm(req);
        const item = toCatalogItem(Object.fromEntries(form));
        const quantity = Number((form.get('quantity') ?? '1').replace(',', '.'));
        if (!Number.isFinite(quantity) || quantity < MIN_QUANTITY) {
          await renderIndex(res, url, 400, `Antal måste vara minst ${MIN_QUANTITY}`);
          return;
        }
        cart.add(item, quantity);
        logger.info({ itemNo: item.item_no, quantity }, 'Invoice line added');
        const q = form.get('q') ?? '';
        redirect(res, q ? `/?${new URLSearchParams({ q }).toString()}` : '/');
        return;
      }

      if (req.method === 'POST' && url.pathname === '/cart/remove') {
        const form = await readForm(req);
        cart.remove(Number(form.get('index')));
        redirect(res, '/');
        return;
      }

      if (req.method === 'POST' && url.pathname === '/cart/clear') {
        cart.clear();
        redirect(res, '/');
        return;
      }

      if (req.method === 'POST' && url.pathname === '/invoice') {
        const form = await readForm(req);
        customer.name = (form.get('customer') ?? '').trim();
        customer.project = (form.get('project') ?? '').trim();
        if (cart.isEmpty) {
          await renderIndex(res, url, 400, 'Lägg till artiklar innan fakturan genereras');
          return;
        }
        if (!customer.name || !customer.project) {
          await renderIndex(res, url, 400, 'Fyll i kundnamn och projektnummer för att generera faktura');
          return;
        }
        const text = renderInvoiceText(
          cart.lines,
          { customerName: customer.name, projectNumber: customer.project, date: now() },
          rates,
        );
        html(res, 200, renderInvoicePage(text, customer.name, customer.project));
        return;
      }

      if (req.method === 'GET' && url.pathname === '/invoice.txt') {
        const customerName = url.searchParams.get('customer')?.trim() ?? '';
        const projectNumber = url.searchParams.get('project')?.trim() ?? '';
        if (!customerName || !projectNumber) {
          res.writeHead(400).end('customer and project are required');
          return;
        }
        const date = now();
        const text = renderInvoiceText(cart.lines, { customerName, projectNumber, date }, rates);
        res
          .writeHead(200, {
            'content-type': 'text/plain; charset=utf-8',
            'content-disposition': `attachment; filename="${encodeURIComponent(invoiceFileName(projectNumber, date))}"`,
          })
          .end(text);
        return;
      }

      res.writeHead(404).end('Not found');
    } catch (error) {
      logger.error({ err: error, url: req.url }, 'Invoice request failed');
      res.writeHead(500).end(String(error));
    }
  });
}

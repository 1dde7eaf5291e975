import type http from 'node:http';
import { load } from 'cheerio';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { InvoiceCart } from '../../src/invoice/cart.js';
import { createServer, listen } from '../../src/server/httpServer.js';
import { SqliteCatalogStore } from '../../src/storage/db.js';

describe('invoice form server', () => {
  const store = new SqliteCatalogStore(':memory:');
  const cart = new InvoiceCart();
  let server: http.Server;
  let baseUrl = '';

  beforeAll(async () => {
    await store.upsertItems([
      { item_no: '2405276', item: 'Grenuttag 3-vägs', category: 'MATERIAL', unit: 'st', price: 100 },
      { item_no: 'A-1', item: 'Arbetstid montör', category: 'ARBETE', unit: 'tim', price: 500 },
    ]);
    server = createServer({
      store,
      cart,
      rates: { vatRate: 0.25, rotRate: 0.3, rotCategory: 'ARBETE' },
      now: () => new Date(2024, 4, 17),
    });
    await listen(server, 0, '127.0.0.1');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server did not bind to a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.close();
  });

  it('searches the catalog', async () => {
    const res = await fetch(`${baseUrl}/?q=grenuttag`);
    expect(res.status).toBe(200);
    const $ = load(await res.text());
    expect($('#search .item h3').toArray().map((el) => $(el).text())).toEqual(['Grenuttag 3-vägs']);
  });

  it('lists all items on request', async () => {
    const $ = load(await (await fetch(`${baseUrl}/?all=1`)).text());
    expect($('#search .item').length).toBe(2);
  });

  it('refuses to generate an invoice for an empty cart', async () => {
    const res = await fetch(`${baseUrl}/invoice`, {
      method: 'POST',
      body: new URLSearchParams({ customer: 'Andersson Bygg AB', project: 'P1' }),
    });
    expect(res.status).toBe(400);
    expect(load(await res.text())('#message').text()).toBe('Lägg till artiklar innan fakturan genereras');
  });

  it('adds, totals, renders and removes invoice lines', async () => {
    const add = (itemNo: string, item: string, category: string, unit: string, price: string, quantity: string) =>
      fetch(`${baseUrl}/cart/add`, {
        method: 'POST',
        body: new URLSearchParams({ item_no: itemNo, item, category, unit, price, quantity, q: 'grenuttag' }),
        redirect: 'manual',
      });

    const added = await add('2405276', 'Grenuttag 3-vägs', 'MATERIAL', 'st', '100', '2');
    expect(added.status).toBe(303);
    expect(added.headers.get('location')).toBe('/?q=grenuttag');
    await add('A-1', 'Arbetstid montör', 'ARBETE', 'tim', '500', '1,5');
    expect(cart.lines.map((l) => l.amount)).toEqual([200, 750]);

    const $ = load(await (await fetch(`${baseUrl}/`)).text());
    expect($('[data-total="due"]').text()).toBe('906.25 kr');
    expect($('[data-total="rot"]').text()).toBe('281.25 kr');

    const missing = await fetch(`${baseUrl}/invoice`, {
      method: 'POST',
      body: new URLSearchParams({ customer: 'Andersson Bygg AB', project: '' }),
    });
    expect(missing.status).toBe(400);

    const preview = await fetch(`${baseUrl}/invoice`, {
      method: 'POST',
      body: new URLSearchParams({ customer: 'Andersson Bygg AB', project: 'P1' }),
    });
    expect(preview.status).toBe(200);
    const text = load(await preview.text())('pre').text();
    expect(text.split('\n').slice(0, 5)).toEqual([
      'FAKTURA',
      '='.repeat(80),
      'Kund: Andersson Bygg AB',
      'Projekt: P1',
      'Datum: 2024-05-17',
    ]);

    const download = await fetch(`${baseUrl}/invoice.txt?customer=Andersson&project=P1`);
    expect(download.headers.get('content-disposition')).toBe('attachment; filename="faktura_P1_2024-05-17.txt"');
    expect((await download.text()).split('\n').at(-1)).toBe(
      '                                                        FAKTURA TOTAL:       906.25 kr',
    );

    const removed = await fetch(`${baseUrl}/cart/remove`, {
      method: 'POST',
      body: new URLSearchParams({ index: '0' }),
      redirect: 'manual',
    });
    expect(removed.status).toBe(303);
    expect(cart.lines.map((l) => l.itemNo)).toEqual(['A-1']);
  });

  it('rejects a quantity below the minimum', async () => {
    const res = await fetch(`${baseUrl}/cart/add`, {
      method: 'POST',
      body: new URLSearchParams({ item: 'Grenuttag 3-vägs', quantity: '0' }),
      redirect: 'manual',
    });
    expect(res.status).toBe(400);
    expect(load(await res.text())('#message').text()).toBe('Antal måste vara minst 0.1');
  });

  it('answers unknown routes with 404', async () => {
    expect((await fetch(`${baseUrl}/nope`)).status).toBe(404);
  });

  it('rejects binding to a port that is already in use', async () => {
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server did not bind to a port');
    }
    const second = createServer({ store, cart: new InvoiceCart() });
    await expect(listen(second, address.port, '127.0.0.1')).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});

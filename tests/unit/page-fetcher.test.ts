import { afterEach, describe, expect, it, vi } from 'vitest';
import { CatalogPageFetcher, extractPageTexts } from '../../src/catalog/pageFetcher.js';

const catalogHtml = `<!doctype html>
<html><head>
<script>window.staticSettings = {"pageTexts": ["Omslag", "Sida 2 Artikel Nr"], "pageCount": 2};</script>
</head><body></body></html>`;

describe('extractPageTexts', () => {
  it('reads the embedded pageTexts array from a script', () => {
    expect(extractPageTexts(catalogHtml)).toEqual(['Omslag', 'Sida 2 Artikel Nr']);
  });

  it('fails when the array is missing', () => {
    expect(() => extractPageTexts('<html><script>var x = 1;</script></html>')).toThrow(
      'Could not find pageTexts in catalog HTML',
    );
  });

  it('fails when the array holds something other than strings', () => {
    expect(() => extractPageTexts('<script>{"pageTexts": [1, 2]}</script>')).toThrow(
      'pageTexts is not an array of strings',
    );
  });
});

describe('CatalogPageFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the catalog once and returns its pages', async () => {
    const fetchMock = vi.fn(async () => new Response(catalogHtml, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const pages = await new CatalogPageFetcher(1000).fetchPageTexts('https://catalog.test/emv-el/?page=1');

    expect(pages).toEqual(['Omslag', 'Sida 2 Artikel Nr']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry a failed request', async () => {
    const fetchMock = vi.fn(async () => new Response('gone', { status: 503 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(new CatalogPageFetcher(1000).fetchPageTexts('https://catalog.test/')).rejects.toThrow(
      'Catalog request failed 503 for https://catalog.test/',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

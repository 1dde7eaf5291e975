import { load } from 'cheerio';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { PageText } from '../types.js';

const PAGE_TEXTS_PATTERN = /"pageTexts"\s*:\s*(\[.*?\])\s*[,}]/s;

function findPageTextsLiteral(html: string): string | null {
  const $ = load(html);
  for (const script of $('script').toArray()) {
    const match = PAGE_TEXTS_PATTERN.exec($(script).text());
    if (match) {
      return match[1];
    }
  }
  return PAGE_TEXTS_PATTERN.exec(html)?.[1] ?? null;
}

/**
 * Pulls the page text array a flipbook viewer embeds in its HTML
 * (`staticSettings.pageTexts`).
 */
export function extractPageTexts(html: string): PageText {
  const literal = findPageTextsLiteral(html);
  if (!literal) {
    throw new Error('Could not find pageTexts in catalog HTML');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(literal);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`pageTexts is not valid JSON: ${reason}`);
  }

  if (!Array.isArray(parsed) || !parsed.every((page): page is string => typeof page === 'string')) {
    throw new Error('pageTexts is not an array of strings');
  }
  return parsed;
}

export class CatalogPageFetcher {
  constructor(private readonly timeoutMs: number = config.catalogTimeoutMs) {}

  async fetchHtml(url: string): Promise<string> {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        Accept: 'text/html,application/xhtml+xml',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Catalog request failed ${response.status} for ${url}`);
    }
    return response.text();
  }

  async fetchPageTexts(url: string): Promise<PageText> {
    const html = await this.fetchHtml(url);
    const pages = extractPageTexts(html);
    logger.info({ url, pages: pages.length }, 'Catalog page texts fetched');
    return pages;
  }
}

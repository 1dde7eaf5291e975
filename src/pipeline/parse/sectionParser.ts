import type { PageText, ProductRow } from '../../types.js';
import { WORD_END, WORD_START, collapseWhitespace } from '../../utils/text.js';
import { cleanProductName } from './nameCleaner.js';

export const SECTION_MARKER = 'Artikel Nr';

const ARTICLE_NUMBER_SOURCE = `${WORD_START}(\\d{7})[A-Z]?${WORD_END}`;
const SPEC_FILLER = /\d*\s*Läs mer om produkterna på ahlsell\.se.*/u;
const NEXT_PRODUCT_WORD = new RegExp(`${WORD_START}([A-ZÅÄÖ][a-zåäö]{4,})${WORD_END}`, 'u');

const MIN_NAME_LENGTH = 3;
const TRAILING_SPEC_THRESHOLD = 30;

export interface ArticleMatch {
  articleNumber: string;
  start: number;
  end: number;
}

export interface SectionParseState {
  rows: ProductRow[];
  lastGoodName: string;
}

export function findArticleNumbers(text: string): ArticleMatch[] {
  const pattern = new RegExp(ARTICLE_NUMBER_SOURCE, 'gu');
  return Array.from(text.matchAll(pattern), (match) => ({
    articleNumber: match[1],
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/** Cover and back pages are laid out differently and never hold product tables. */
export function contentText(pages: PageText): string {
  const content = pages.length > 2 ? pages.slice(1, -1) : pages;
  return content.join(' ');
}

export function extractColumnHeaders(dataSection: string, firstArticle: ArticleMatch): string {
  return collapseWhitespace(dataSection.slice(0, firstArticle.start));
}

/**
 * The last row of a table tends to swallow the next product's heading and
 * description; cut at the first long capitalized word.
 */
export function trimTrailingProductText(specText: string): string {
  if (specText.length <= TRAILING_SPEC_THRESHOLD) {
    return specText;
  }
  const match = NEXT_PRODUCT_WORD.exec(specText);
  if (!match) {
    return specText;
  }
  const candidate = specText.slice(0, match.index).trim();
  return candidate.length >= 2 ? candidate : specText;
}

export function extractSpecText(dataSection: string, articles: ArticleMatch[], index: number): string {
  const current = articles[index];
  const next = index + 1 < articles.length ? articles[index + 1] : undefined;
  const raw = dataSection.slice(current.end, next ? next.start : dataSection.length);
  const specText = collapseWhitespace(raw).replace(SPEC_FILLER, '').trim();
  return next ? specText : trimTrailingProductText(specText);
}

export function nameSource(section: string): string {
  const articles = findArticleNumbers(section);
  const last = articles.at(-1);
  return last ? section.slice(last.end) : section;
}

/**
 * Parses one (name section, data section) pair. The running name comes in
 * with `state` and goes out with the returned state.
 */
export function parseSectionPair(nameSection: string, dataSection: string, state: SectionParseState): SectionParseState {
  const articles = findArticleNumbers(dataSection);
  if (!articles.length) {
    return state;
  }

  const cleaned = cleanProductName(nameSource(nameSection));
  const name = cleaned.length < MIN_NAME_LENGTH ? state.lastGoodName : cleaned;
  const columnHeaders = extractColumnHeaders(dataSection, articles[0]);

  const rows = articles.map((article, index) => ({
    articleNumber: article.articleNumber,
    name,
    columnHeaders,
    specText: extractSpecText(dataSection, articles, index),
  }));

  return {
    rows: [...state.rows, ...rows],
    lastGoodName: name,
  };
}

export function parseSections(text: string): ProductRow[] {
  const sections = text.split(SECTION_MARKER);
  let state: SectionParseState = { rows: [], lastGoodName: '' };

  for (let i = 0; i < sections.length - 1; i += 1) {
    state = parseSectionPair(sections[i], sections[i + 1], state);
  }

  return state.rows;
}

export function parseCatalog(pages: PageText): ProductRow[] {
  return parseSections(contentText(pages));
}

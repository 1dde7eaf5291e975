import { WORD_END, truncateAtWord } from '../../utils/text.js';

/** Packaging, colour and material words that leak into the name from the previous product's table. */
export const RESIDUAL_WORDS = [
  'trumma',
  'bobin',
  'box',
  'kartong',
  'kapad',
  'svart',
  'grön',
  'gul',
  'vit',
  'röd',
  'antracit',
  'grå',
  'platt',
  'plan',
  'nej',
  'ja',
  'stål',
  'plast',
  'metall',
  'rörelsesensor',
] as const;

const RESIDUAL_SET: ReadonlySet<string> = new Set(RESIDUAL_WORDS);

export const FILLER_PHRASE = /Läs mer om produkterna på ahlsell\.se\s*/g;

export const MAX_CLEAN_ITERATIONS = 50;
export const MAX_NAME_LENGTH = 150;

/**
 * One noise-stripping step. `apply` returns the shortened text, or null when
 * the rule does not match.
 */
export interface CleaningRule {
  name: string;
  apply(text: string): string | null;
}

function stripPrefix(name: string, pattern: RegExp): CleaningRule {
  return {
    name,
    apply(text) {
      const match = pattern.exec(text);
      return match ? text.slice(match[0].length) : null;
    },
  };
}

const UNIT_PREFIX = /^(?:mm²|mm|cm|lm|kg|kN|kW|mAh?)\s+/u;
const DIMENSION_PREFIX = new RegExp(
  '^[\\d\\s,.\\/xGX×:+\\-]+' +
    `(?:mm²|mm|cm|m${WORD_END}|kW|kN|W${WORD_END}|V${WORD_END}|A${WORD_END}|°C|lm|kg|mAh|mA|K${WORD_END})` +
    '(?:[\\d\\s,.²\\/]|[xX×](?=\\d))*',
  'u',
);
const RATING_PREFIX = /^(?:IP\d{2}|DC|AC)\s+/u;
const LAMP_PREFIX = /^E\d{1,2}\s+[\d,.]+\s*W\s+\d+\s*K\s+/u;
const PAGE_NUMBER_PREFIX = /^\d{1,4}\s+/u;
const INITIAL_PREFIX = /^[A-Z]\s+/u;
const MODEL_CODE_PREFIX = new RegExp(
  '^[A-Za-z0-9][A-Za-z0-9\\/_.\\-]{0,20}' +
    '(?:\\s*\\([^)]*\\))?' +
    `(?:\\s+[\\d,.]+\\s*(?:V|A|W|mm²?|m)${WORD_END})*` +
    '\\s+',
  'u',
);
const PRODUCT_WORD = /^([A-ZÅÄÖ][a-zåäö]{3,})/u;
const PUNCTUATION = '.!,;:';

export const CLEANING_RULES: readonly CleaningRule[] = [
  {
    name: 'filler',
    apply(text) {
      const stripped = text.replace(FILLER_PHRASE, '');
      return stripped === text ? null : stripped;
    },
  },
  stripPrefix('unit', UNIT_PREFIX),
  stripPrefix('dimension', DIMENSION_PREFIX),
  stripPrefix('rating', RATING_PREFIX),
  stripPrefix('lamp', LAMP_PREFIX),
  stripPrefix('pageNumber', PAGE_NUMBER_PREFIX),
  {
    name: 'punctuation',
    apply(text) {
      return PUNCTUATION.includes(text[0]) ? text.slice(1).trimStart() : null;
    },
  },
  stripPrefix('initial', INITIAL_PREFIX),
  {
    name: 'residualWord',
    apply(text) {
      const lower = text.toLowerCase();
      const word = RESIDUAL_WORDS.find((w) => lower.startsWith(`${w} `) || lower.startsWith(`${w}/`));
      return word ? text.slice(word.length).replace(/^[ /]+/, '') : null;
    },
  },
  {
    // Last on purpose: it only runs once nothing above matched.
    name: 'modelCode',
    apply(text) {
      const match = MODEL_CODE_PREFIX.exec(text);
      if (!match) {
        return null;
      }
      const rest = text.slice(match[0].length).trim();
      const firstWord = PRODUCT_WORD.exec(rest);
      if (!firstWord || RESIDUAL_SET.has(firstWord[1].toLowerCase())) {
        return null;
      }
      return rest;
    },
  },
];

function applyFirstRule(text: string, rules: readonly CleaningRule[]): string | null {
  for (const rule of rules) {
    const next = rule.apply(text);
    if (next !== null) {
      return next;
    }
  }
  return null;
}

/**
 * Reduces a raw text span (leftovers of the previous table plus the product
 * heading and description) to a short product name.
 */
export function cleanProductName(raw: string, rules: readonly CleaningRule[] = CLEANING_RULES): string {
  let text = raw.trim();
  if (!text) {
    return '';
  }

  for (let iteration = 0; iteration < MAX_CLEAN_ITERATIONS; iteration += 1) {
    text = text.trim();
    if (!text) {
      break;
    }
    const next = applyFirstRule(text, rules);
    if (next === null) {
      break;
    }
    text = next;
  }

  const periodIdx = text.indexOf('.');
  if (periodIdx > 5) {
    text = text.slice(0, periodIdx).trim();
  }

  return truncateAtWord(text, MAX_NAME_LENGTH).trim();
}

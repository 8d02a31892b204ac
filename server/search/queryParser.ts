/**
 * Query Parser - Extracts keywords and a price range from a free-text listing search
 *
 *   "pottery under 500"                    → keywords ["pottery"], maxPrice 500
 *   "#handmade jewelry between 100 and 300" → keywords ["handmade", "jewelry"], 100..300
 *
 * Never throws. A price phrase that doesn't end in a number sets no bound and
 * its words fall through to the keyword pass.
 */

export interface ParsedFilter {
  keywords: string[];
  minPrice: number | null;
  maxPrice: number | null;
}

interface PricePhrase {
  minPrice?: number;
  maxPrice?: number;
  end: number;
}

const MAX_TRIGGERS = new Set(['under', 'below']);
const MIN_TRIGGERS = new Set(['over', 'above']);
// "less than" / "more than"
const COMPARATIVE_TRIGGERS = new Map<string, 'min' | 'max'>([
  ['less', 'max'],
  ['more', 'min']
]);
const RANGE_OPENERS = new Set(['between', 'from']);
const RANGE_JOINERS = new Set(['and', 'to']);

const CURRENCY_WORDS = new Set([
  'rs', 'inr', 'rupee', 'rupees',
  'usd', 'dollar', 'dollars',
  'eur', 'euro', 'euros',
  'gbp', 'pound', 'pounds'
]);

// Articles, prepositions, pronouns and conjunctions
const STOP_WORDS = new Set([
  'a', 'an', 'the',
  'and', 'or', 'nor', 'but',
  'of', 'in', 'on', 'at', 'to', 'for', 'with', 'by', 'from', 'into', 'about',
  'under', 'below', 'over', 'above', 'between', 'than',
  'i', 'me', 'my', 'we', 'us', 'our', 'you', 'your',
  'he', 'him', 'his', 'she', 'her', 'it', 'its',
  'they', 'them', 'their', 'this', 'that', 'these', 'those'
]);

const THOUSANDS_SEPARATOR = /(\d),(?=\d{3}\b)/g;
// Alphanumeric runs, joined across inner dots so decimals survive
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:\.[\p{L}\p{N}]+)*/gu;
const NUMERIC_TOKEN = /^\d+(?:\.\d+)?$/;

// "18k" and "5mm" stay whole words; only a token that is entirely a number can be a price
export function tokenize(text: string): string[] {
  const normalized = text.toLowerCase().replace(THOUSANDS_SEPARATOR, '$1');
  const runs = normalized.match(TOKEN_PATTERN) ?? [];
  return runs.flatMap(run => (NUMERIC_TOKEN.test(run) ? [run] : run.split('.')));
}

function tokenAt(tokens: string[], index: number): string | undefined {
  return index < tokens.length ? tokens[index] : undefined;
}

function toPrice(token: string | undefined): number | null {
  if (!token || !NUMERIC_TOKEN.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

// Reads "[currency] <number> [currency]" starting at `start`
function readAmount(tokens: string[], start: number): { value: number; end: number } | null {
  let i = start;
  if (CURRENCY_WORDS.has(tokenAt(tokens, i) ?? '')) i++;

  const value = toPrice(tokenAt(tokens, i));
  if (value === null) return null;
  i++;

  if (CURRENCY_WORDS.has(tokenAt(tokens, i) ?? '')) i++;
  return { value, end: i };
}

function matchPricePhrase(tokens: string[], start: number): PricePhrase | null {
  const word = tokens[start];

  if (MAX_TRIGGERS.has(word)) {
    const amount = readAmount(tokens, start + 1);
    return amount ? { maxPrice: amount.value, end: amount.end } : null;
  }

  if (MIN_TRIGGERS.has(word)) {
    const amount = readAmount(tokens, start + 1);
    return amount ? { minPrice: amount.value, end: amount.end } : null;
  }

  const comparative = COMPARATIVE_TRIGGERS.get(word);
  if (comparative && tokenAt(tokens, start + 1) === 'than') {
    const amount = readAmount(tokens, start + 2);
    if (!amount) return null;
    return comparative === 'max'
      ? { maxPrice: amount.value, end: amount.end }
      : { minPrice: amount.value, end: amount.end };
  }

  if (RANGE_OPENERS.has(word)) {
    const first = readAmount(tokens, start + 1);
    if (!first || !RANGE_JOINERS.has(tokenAt(tokens, first.end) ?? '')) return null;

    const second = readAmount(tokens, first.end + 1);
    if (!second) return null;

    return {
      minPrice: Math.min(first.value, second.value),
      maxPrice: Math.max(first.value, second.value),
      end: second.end
    };
  }

  return null;
}

/**
 * Parse a listing search into keywords and price bounds.
 *
 * When several phrases set the same bound the last one wins; if the final
 * bounds are inverted ("over 1000 and under 500") they are swapped.
 */
export function parseSearchQuery(text: string): ParsedFilter {
  const tokens = tokenize(text);
  const consumed = new Set<number>();
  let minPrice: number | null = null;
  let maxPrice: number | null = null;

  let i = 0;
  while (i < tokens.length) {
    const phrase = matchPricePhrase(tokens, i);
    if (!phrase) {
      i++;
      continue;
    }

    if (phrase.minPrice !== undefined) minPrice = phrase.minPrice;
    if (phrase.maxPrice !== undefined) maxPrice = phrase.maxPrice;
    for (let k = i; k < phrase.end; k++) consumed.add(k);
    i = phrase.end;
  }

  if (minPrice !== null && maxPrice !== null && minPrice > maxPrice) {
    [minPrice, maxPrice] = [maxPrice, minPrice];
  }

  const words = tokens.filter((token, index) => !consumed.has(index) && !STOP_WORDS.has(token));

  return {
    keywords: Array.from(new Set(words)),
    minPrice,
    maxPrice
  };
}

export function hasPriceBounds(filter: ParsedFilter): boolean {
  return filter.minPrice !== null || filter.maxPrice !== null;
}

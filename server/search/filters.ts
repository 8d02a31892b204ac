/**
 * Search Filters
 *
 * In-process versions of the listing predicates DatabaseStorage expresses in SQL:
 * - every keyword must appear in the title, description or artist name
 * - price bounds are inclusive and a listing without a price never satisfies one
 */

import type { ParsedFilter } from './queryParser';

export interface SearchableListing {
  title: string;
  description: string | null;
  artistName: string;
}

export function matchesKeywords(listing: SearchableListing, keywords: string[]): boolean {
  if (keywords.length === 0) return true;

  const fields = [listing.title, listing.description ?? '', listing.artistName].map(f => f.toLowerCase());
  return keywords.every(keyword => fields.some(field => field.includes(keyword)));
}

export function parsePrice(price: string | number | null | undefined): number | null {
  if (price === null || price === undefined || price === '') return null;
  const value = typeof price === 'number' ? price : parseFloat(price);
  return Number.isFinite(value) ? value : null;
}

export function withinPriceBounds(
  price: string | number | null | undefined,
  filter: Pick<ParsedFilter, 'minPrice' | 'maxPrice'>
): boolean {
  if (filter.minPrice === null && filter.maxPrice === null) return true;

  const value = parsePrice(price);
  if (value === null) return false;
  if (filter.minPrice !== null && value < filter.minPrice) return false;
  if (filter.maxPrice !== null && value > filter.maxPrice) return false;
  return true;
}

/**
 * Ranking and Sorting Functions
 *
 * Review stats attached to product listings, and the sort orders the
 * products page offers.
 */

import type { ProductListing, RatedProduct, ReviewStats } from '@shared/schema';
import { parsePrice } from './filters';

export const SORT_ORDERS = ['newest', 'popular', 'price_low', 'price_high'] as const;
export type SortOrder = typeof SORT_ORDERS[number];

const DEFAULT_SORT: SortOrder = 'newest';

function isSortOrder(value: string): value is SortOrder {
  return (SORT_ORDERS as readonly string[]).includes(value);
}

/**
 * Unknown or empty values fall back to newest
 */
export function normalizeSortOrder(raw: string | null | undefined): SortOrder {
  const value = (raw ?? '').trim().toLowerCase();
  return isSortOrder(value) ? value : DEFAULT_SORT;
}

export function computeReviewStats(ratings: number[]): ReviewStats {
  if (ratings.length === 0) return { avgRating: 0, reviewsCount: 0 };
  const total = ratings.reduce((sum, rating) => sum + rating, 0);
  return { avgRating: total / ratings.length, reviewsCount: ratings.length };
}

/**
 * One decimal, ties to even: 2.25 → 2.2, 4.75 → 4.8
 */
export function roundRating(rating: number): number {
  const scaled = rating * 10;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  if (Math.abs(fraction - 0.5) < 1e-9) {
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Math.round(scaled) / 10;
}

export function attachReviewStats(
  products: ProductListing[],
  stats: Map<number, ReviewStats>
): RatedProduct[] {
  return products.map(product => ({
    ...product,
    ...(stats.get(product.productId) ?? { avgRating: 0, reviewsCount: 0 })
  }));
}

// Missing prices sort as 0
function priceOf(product: RatedProduct): number {
  return parsePrice(product.price) ?? 0;
}

export function sortProducts(products: RatedProduct[], order: SortOrder): RatedProduct[] {
  const sorted = [...products];

  switch (order) {
    case 'popular':
      return sorted.sort((a, b) => b.avgRating - a.avgRating || b.reviewsCount - a.reviewsCount);
    case 'price_low':
      return sorted.sort((a, b) => priceOf(a) - priceOf(b));
    case 'price_high':
      return sorted.sort((a, b) => priceOf(b) - priceOf(a));
    case 'newest':
      return sorted.sort((a, b) => b.productId - a.productId);
  }
}

/**
 * Search Module Index
 *
 * Structure:
 * - queryParser.ts: free-text query → keywords + price bounds
 * - hashtags.ts: hashtag extraction and linkification
 * - filters.ts: in-process keyword and price predicates
 * - ranking.ts: review stats and product sort orders
 */

export * from './queryParser';
export * from './hashtags';
export * from './filters';
export * from './ranking';

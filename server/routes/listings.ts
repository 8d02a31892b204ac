import type { Express, Response } from 'express';
import type { ZodError } from 'zod';
import { listingSearchQuerySchema } from '@shared/schema';
import type { IStorage } from '../storage';
import {
  attachReviewStats,
  hasPriceBounds,
  normalizeSortOrder,
  parseSearchQuery,
  roundRating,
  sortProducts,
  withLinkedDescription
} from '../search';

function invalidQuery(res: Response, error: ZodError): void {
  res.status(400).json({
    success: false,
    error: "Invalid query parameters",
    details: error.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; ')
  });
}

export function registerListingRoutes(app: Express, store: IStorage): void {
  app.get("/api/search/parse", (req, res) => {
    const query = listingSearchQuerySchema.safeParse({ q: req.query.q });
    if (!query.success) return invalidQuery(res, query.error);

    res.json({
      success: true,
      query: query.data.q,
      parsed: parseSearchQuery(query.data.q)
    });
  });

  app.get("/api/posts", async (req, res, next) => {
    const query = listingSearchQuerySchema.safeParse({ q: req.query.q });
    if (!query.success) return invalidQuery(res, query.error);

    try {
      const filter = parseSearchQuery(query.data.q);
      if (hasPriceBounds(filter)) {
        console.log(`[Search] Posts carry no price - ignoring bounds in q="${query.data.q}"`);
      }
      const posts = await store.searchPosts(filter);

      res.json({
        success: true,
        endpoint: "/api/posts",
        count: posts.length,
        filters: {
          query: query.data.q || null,
          keywords: filter.keywords
        },
        results: posts.map(withLinkedDescription)
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/products", async (req, res, next) => {
    const query = listingSearchQuerySchema.safeParse({ q: req.query.q, sort: req.query.sort });
    if (!query.success) return invalidQuery(res, query.error);

    try {
      const filter = parseSearchQuery(query.data.q);
      const sort = normalizeSortOrder(query.data.sort);

      const products = await store.searchProducts(filter);
      const stats = await store.getReviewStats(products.map(p => p.productId));
      const sorted = sortProducts(attachReviewStats(products, stats), sort);

      if (sorted.length === 0 && query.data.q) {
        console.log(`[Search] Product search returned 0 results for q="${query.data.q}"`);
      }

      res.json({
        success: true,
        endpoint: "/api/products",
        count: sorted.length,
        filters: {
          query: query.data.q || null,
          keywords: filter.keywords,
          minPrice: filter.minPrice,
          maxPrice: filter.maxPrice,
          sort
        },
        results: sorted.map(withLinkedDescription)
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/hashtags/:tag", async (req, res, next) => {
    const tag = req.params.tag.toLowerCase();

    try {
      const hashtag = await store.getHashtagByName(tag);
      if (!hashtag) {
        return res.status(404).json({
          success: false,
          error: `No content found for #${req.params.tag}`
        });
      }

      const posts = await store.getPostsByHashtag(hashtag.id);
      const products = await store.getProductsByHashtag(hashtag.id);
      const stats = await store.getReviewStats(products.map(p => p.productId));
      const rated = attachReviewStats(products, stats).map(product => ({
        ...product,
        avgRating: roundRating(product.avgRating)
      }));

      res.json({
        success: true,
        hashtag: hashtag.name,
        posts: posts.map(withLinkedDescription),
        products: rated.map(withLinkedDescription)
      });
    } catch (error) {
      next(error);
    }
  });
}

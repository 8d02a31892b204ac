import { createServer, type Server } from "http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { z } from "zod";

import type { PostListing } from "@shared/schema";
import { createApp } from "../server/app";
import { loadConfig } from "../server/config";
import { MemStorage } from "../server/memStorage";
import type { IStorage } from "../server/storage";
import { seedListings } from "./support/listings";

const productsResponse = z.object({
  success: z.literal(true),
  count: z.number(),
  filters: z.object({
    query: z.string().nullable(),
    keywords: z.array(z.string()),
    minPrice: z.number().nullable(),
    maxPrice: z.number().nullable(),
    sort: z.string(),
  }),
  results: z.array(z.object({
    productId: z.number(),
    description: z.string().nullable(),
    avgRating: z.number(),
    reviewsCount: z.number(),
  })),
});

const postsResponse = z.object({
  success: z.literal(true),
  count: z.number(),
  results: z.array(z.object({
    postId: z.number(),
    postTitle: z.string(),
    artistName: z.string(),
  })),
});

const hashtagResponse = z.object({
  success: z.literal(true),
  hashtag: z.string(),
  posts: z.array(z.object({ postId: z.number() })),
  products: z.array(z.object({ productId: z.number(), avgRating: z.number() })),
});

async function startServer(store: IStorage): Promise<{ server: Server; baseUrl: string }> {
  const server = createServer(createApp(store, loadConfig({ NODE_ENV: "test" })));
  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", () => resolve()));

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

describe("listing routes", () => {
  let server: Server;
  let baseUrl: string;

  async function get(path: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
  }

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer(await seedListings()));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  describe("GET /api/search/parse", () => {
    it("returns the parsed filter", async () => {
      const { status, body } = await get("/api/search/parse?q=pottery%20under%20500");
      expect(status).toBe(200);
      expect(body).toEqual({
        success: true,
        query: "pottery under 500",
        parsed: { keywords: ["pottery"], minPrice: null, maxPrice: 500 },
      });
    });
  });

  describe("GET /api/products", () => {
    it("filters by keyword and sorts by price", async () => {
      const { status, body } = await get("/api/products?q=pottery&sort=price_low");
      expect(status).toBe(200);

      const parsed = productsResponse.parse(body);
      expect(parsed.results.map(p => p.productId)).toEqual([2, 1]);
      expect(parsed.filters).toEqual({
        query: "pottery",
        keywords: ["pottery"],
        minPrice: null,
        maxPrice: null,
        sort: "price_low",
      });
    });

    it("sorts by popularity with review stats attached", async () => {
      const parsed = productsResponse.parse((await get("/api/products?sort=popular")).body);
      expect(parsed.results.map(p => p.productId)).toEqual([3, 1, 4, 2]);
      expect(parsed.results[1]).toMatchObject({ productId: 1, avgRating: 4.5, reviewsCount: 2 });
    });

    it("applies a price bound and links hashtags in descriptions", async () => {
      const parsed = productsResponse.parse((await get("/api/products?q=under%20200")).body);
      expect(parsed.count).toBe(1);
      expect(parsed.filters.maxPrice).toBe(200);
      expect(parsed.results[0].description).toBe(
        'Dishwasher safe <a href="/hashtag/pottery" class="hashtag-link">#pottery</a>'
      );
    });

    it("falls back to newest for an unknown sort", async () => {
      const parsed = productsResponse.parse((await get("/api/products?q=bowl&sort=BOGUS")).body);
      expect(parsed.filters.sort).toBe("newest");
      expect(parsed.results.map(p => p.productId)).toEqual([1]);
    });

    it("rejects an overlong query", async () => {
      const { status, body } = await get(`/api/products?q=${"a".repeat(501)}`);
      expect(status).toBe(400);
      expect(body).toMatchObject({ success: false, error: "Invalid query parameters" });
    });

    it("rejects a repeated q parameter", async () => {
      const { status } = await get("/api/products?q=a&q=b");
      expect(status).toBe(400);
    });
  });

  describe("GET /api/posts", () => {
    it("searches posts by keyword", async () => {
      const parsed = postsResponse.parse((await get("/api/posts?q=cotton")).body);
      expect(parsed.count).toBe(1);
      expect(parsed.results[0]).toEqual({ postId: 2, postTitle: "Loom progress", artistName: "Arjun Rao" });
    });
  });

  describe("GET /api/hashtags/:tag", () => {
    it("lists tagged posts and products with rounded ratings", async () => {
      const parsed = hashtagResponse.parse((await get("/api/hashtags/Handmade")).body);
      expect(parsed.hashtag).toBe("handmade");
      expect(parsed.posts).toEqual([]);
      expect(parsed.products).toEqual([
        { productId: 3, avgRating: 5 },
        { productId: 1, avgRating: 4.5 },
      ]);
    });

    it("returns 404 for an unknown tag", async () => {
      const { status, body } = await get("/api/hashtags/ceramics");
      expect(status).toBe(404);
      expect(body).toEqual({ success: false, error: "No content found for #ceramics" });
    });
  });

  describe("GET /healthz", () => {
    it("reports ok", async () => {
      const { status, body } = await get("/healthz");
      expect(status).toBe(200);
      const health = z.object({ status: z.literal("ok"), database: z.boolean() }).strict().parse(body);
      expect(health.status).toBe("ok");
    });
  });
});

describe("error handling", () => {
  class FailingStorage extends MemStorage {
    async searchPosts(): Promise<PostListing[]> {
      throw new Error("connection refused");
    }
  }

  it("answers storage failures with a 500 and the error message", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const { server, baseUrl } = await startServer(new FailingStorage());

    try {
      const res = await fetch(`${baseUrl}/api/posts?q=bowl`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ message: "connection refused" });
      expect(consoleError).toHaveBeenCalledWith("[Server] connection refused", expect.any(Error));
    } finally {
      consoleError.mockRestore();
      await stopServer(server);
    }
  });
});

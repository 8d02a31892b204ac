import {
  type User,
  type InsertUser,
  type Post,
  type InsertPost,
  type Product,
  type InsertProduct,
  type ProductReview,
  type InsertProductReview,
  type Hashtag,
  type PostListing,
  type ProductListing,
  type ReviewStats,
  users,
  posts,
  products,
  productReviews,
  hashtags,
  postHashtags,
  productHashtags,
  insertUserSchema,
  insertPostSchema,
  insertProductSchema,
  insertProductReviewSchema
} from "@shared/schema";
import { db, isDbReady } from "./db";
import { and, avg, count, desc, eq, gte, ilike, inArray, lte, or, type SQL } from "drizzle-orm";
import { extractHashtags, listingText, type ParsedFilter } from "./search";
import { MemStorage } from "./memStorage";

export interface IStorage {
  searchPosts(filter: ParsedFilter): Promise<PostListing[]>;
  searchProducts(filter: ParsedFilter): Promise<ProductListing[]>;
  getReviewStats(productIds: number[]): Promise<Map<number, ReviewStats>>;

  getHashtagByName(name: string): Promise<Hashtag | undefined>;
  getPostsByHashtag(hashtagId: number): Promise<PostListing[]>;
  getProductsByHashtag(hashtagId: number): Promise<ProductListing[]>;

  createUser(user: InsertUser): Promise<User>;
  createPost(post: InsertPost): Promise<Post>;
  createProduct(product: InsertProduct): Promise<Product>;
  createReview(review: InsertProductReview): Promise<ProductReview>;
}

type Transaction = Parameters<Parameters<typeof db.transaction>[0]>[0];

// Keywords come out of the tokenizer as letters, digits and decimal points,
// so they carry no LIKE wildcards of their own
function keywordLike(keyword: string): string {
  return `%${keyword}%`;
}

async function upsertHashtags(tx: Transaction, names: string[]): Promise<Hashtag[]> {
  if (names.length === 0) return [];

  await tx.insert(hashtags)
    .values(names.map(name => ({ name })))
    .onConflictDoNothing({ target: hashtags.name });

  return tx.select().from(hashtags).where(inArray(hashtags.name, names));
}

export class DatabaseStorage implements IStorage {
  async searchPosts(filter: ParsedFilter): Promise<PostListing[]> {
    const conditions: (SQL | undefined)[] = filter.keywords.map(keyword => {
      const like = keywordLike(keyword);
      return or(ilike(posts.postTitle, like), ilike(posts.description, like), ilike(users.name, like));
    });

    const rows = await db
      .select({ post: posts, artistName: users.name })
      .from(posts)
      .innerJoin(users, eq(posts.artistId, users.id))
      .where(and(...conditions))
      .orderBy(desc(posts.postId));

    console.log(`[Storage] searchPosts keywords=${JSON.stringify(filter.keywords)} → ${rows.length} rows`);
    return rows.map(({ post, artistName }) => ({ ...post, artistName }));
  }

  async searchProducts(filter: ParsedFilter): Promise<ProductListing[]> {
    const conditions: (SQL | undefined)[] = filter.keywords.map(keyword => {
      const like = keywordLike(keyword);
      return or(ilike(products.title, like), ilike(products.description, like), ilike(users.name, like));
    });

    // price is NUMERIC, so the bounds travel as strings
    if (filter.minPrice !== null) {
      conditions.push(gte(products.price, filter.minPrice.toString()));
    }
    if (filter.maxPrice !== null) {
      conditions.push(lte(products.price, filter.maxPrice.toString()));
    }

    const rows = await db
      .select({ product: products, artistName: users.name })
      .from(products)
      .innerJoin(users, eq(products.artistId, users.id))
      .where(and(...conditions))
      .orderBy(desc(products.productId));

    console.log(`[Storage] searchProducts keywords=${JSON.stringify(filter.keywords)} price=${filter.minPrice ?? '*'}-${filter.maxPrice ?? '*'} → ${rows.length} rows`);
    return rows.map(({ product, artistName }) => ({ ...product, artistName }));
  }

  async getReviewStats(productIds: number[]): Promise<Map<number, ReviewStats>> {
    const stats = new Map<number, ReviewStats>();
    if (productIds.length === 0) return stats;

    const rows = await db
      .select({
        productId: productReviews.productId,
        avgRating: avg(productReviews.rating),
        reviewsCount: count()
      })
      .from(productReviews)
      .where(inArray(productReviews.productId, productIds))
      .groupBy(productReviews.productId);

    for (const row of rows) {
      stats.set(row.productId, {
        avgRating: row.avgRating === null ? 0 : Number(row.avgRating),
        reviewsCount: row.reviewsCount
      });
    }
    return stats;
  }

  async getHashtagByName(name: string): Promise<Hashtag | undefined> {
    const [hashtag] = await db.select().from(hashtags).where(eq(hashtags.name, name)).limit(1);
    return hashtag;
  }

  async getPostsByHashtag(hashtagId: number): Promise<PostListing[]> {
    const rows = await db
      .select({ post: posts, artistName: users.name })
      .from(postHashtags)
      .innerJoin(posts, eq(postHashtags.postId, posts.postId))
      .innerJoin(users, eq(posts.artistId, users.id))
      .where(eq(postHashtags.hashtagId, hashtagId))
      .orderBy(desc(posts.postId));

    return rows.map(({ post, artistName }) => ({ ...post, artistName }));
  }

  async getProductsByHashtag(hashtagId: number): Promise<ProductListing[]> {
    const rows = await db
      .select({ product: products, artistName: users.name })
      .from(productHashtags)
      .innerJoin(products, eq(productHashtags.productId, products.productId))
      .innerJoin(users, eq(products.artistId, users.id))
      .where(eq(productHashtags.hashtagId, hashtagId))
      .orderBy(desc(products.productId));

    return rows.map(({ product, artistName }) => ({ ...product, artistName }));
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    const values = insertUserSchema.parse(insertUser);
    const [user] = await db.insert(users).values(values).returning();
    return user;
  }

  async createPost(insertPost: InsertPost): Promise<Post> {
    const values = insertPostSchema.parse(insertPost);

    return db.transaction(async (tx) => {
      const [post] = await tx.insert(posts).values(values).returning();
      const tags = await upsertHashtags(tx, extractHashtags(listingText(post.postTitle, post.description)));

      if (tags.length > 0) {
        await tx.insert(postHashtags)
          .values(tags.map(tag => ({ postId: post.postId, hashtagId: tag.id })))
          .onConflictDoNothing();
      }
      return post;
    });
  }

  async createProduct(insertProduct: InsertProduct): Promise<Product> {
    const values = insertProductSchema.parse(insertProduct);

    return db.transaction(async (tx) => {
      const [product] = await tx.insert(products).values(values).returning();
      const tags = await upsertHashtags(tx, extractHashtags(listingText(product.title, product.description)));

      if (tags.length > 0) {
        await tx.insert(productHashtags)
          .values(tags.map(tag => ({ productId: product.productId, hashtagId: tag.id })))
          .onConflictDoNothing();
      }
      return product;
    });
  }

  async createReview(insertReview: InsertProductReview): Promise<ProductReview> {
    const values = insertProductReviewSchema.parse(insertReview);
    const [review] = await db.insert(productReviews).values(values).returning();
    return review;
  }
}

function createStorage(): IStorage {
  if (isDbReady()) {
    return new DatabaseStorage();
  }
  console.warn('[Storage] DATABASE_URL not set - listings are kept in memory');
  return new MemStorage();
}

export const storage = createStorage();

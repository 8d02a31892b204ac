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
  insertUserSchema,
  insertPostSchema,
  insertProductSchema,
  insertProductReviewSchema
} from "@shared/schema";
import type { IStorage } from "./storage";
import {
  computeReviewStats,
  extractHashtags,
  listingText,
  matchesKeywords,
  withinPriceBounds,
  type ParsedFilter
} from "./search";

/**
 * In-process IStorage. Mirrors the DatabaseStorage semantics: keyword and
 * price filters, hashtag indexing on create, NUMERIC(10,2) prices.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private posts = new Map<number, Post>();
  private products = new Map<number, Product>();
  private reviews: ProductReview[] = [];
  private hashtags = new Map<string, Hashtag>();
  // hashtag id → listing ids
  private postTags = new Map<number, Set<number>>();
  private productTags = new Map<number, Set<number>>();
  private nextId = { user: 1, post: 1, product: 1, review: 1, hashtag: 1 };

  private artistName(artistId: number): string {
    return this.users.get(artistId)?.name ?? 'Unknown';
  }

  private toPostListing(post: Post): PostListing {
    return { ...post, artistName: this.artistName(post.artistId) };
  }

  private toProductListing(product: Product): ProductListing {
    return { ...product, artistName: this.artistName(product.artistId) };
  }

  private requireUser(id: number): void {
    if (!this.users.has(id)) {
      throw new Error(`User ${id} does not exist`);
    }
  }

  private indexHashtags(index: Map<number, Set<number>>, listingId: number, text: string): void {
    for (const name of extractHashtags(text)) {
      let hashtag = this.hashtags.get(name);
      if (!hashtag) {
        hashtag = { id: this.nextId.hashtag++, name, createdAt: new Date() };
        this.hashtags.set(name, hashtag);
      }

      const listingIds = index.get(hashtag.id) ?? new Set<number>();
      listingIds.add(listingId);
      index.set(hashtag.id, listingIds);
    }
  }

  async searchPosts(filter: ParsedFilter): Promise<PostListing[]> {
    return Array.from(this.posts.values())
      .map(post => this.toPostListing(post))
      .filter(post => matchesKeywords(
        { title: post.postTitle, description: post.description, artistName: post.artistName },
        filter.keywords
      ))
      .sort((a, b) => b.postId - a.postId);
  }

  async searchProducts(filter: ParsedFilter): Promise<ProductListing[]> {
    return Array.from(this.products.values())
      .map(product => this.toProductListing(product))
      .filter(product => matchesKeywords(product, filter.keywords) && withinPriceBounds(product.price, filter))
      .sort((a, b) => b.productId - a.productId);
  }

  async getReviewStats(productIds: number[]): Promise<Map<number, ReviewStats>> {
    const stats = new Map<number, ReviewStats>();

    for (const productId of productIds) {
      const ratings = this.reviews.filter(r => r.productId === productId).map(r => r.rating);
      if (ratings.length > 0) {
        stats.set(productId, computeReviewStats(ratings));
      }
    }
    return stats;
  }

  async getHashtagByName(name: string): Promise<Hashtag | undefined> {
    return this.hashtags.get(name);
  }

  async getPostsByHashtag(hashtagId: number): Promise<PostListing[]> {
    const ids = Array.from(this.postTags.get(hashtagId) ?? []);
    return ids
      .map(id => this.posts.get(id))
      .filter((post): post is Post => post !== undefined)
      .map(post => this.toPostListing(post))
      .sort((a, b) => b.postId - a.postId);
  }

  async getProductsByHashtag(hashtagId: number): Promise<ProductListing[]> {
    const ids = Array.from(this.productTags.get(hashtagId) ?? []);
    return ids
      .map(id => this.products.get(id))
      .filter((product): product is Product => product !== undefined)
      .map(product => this.toProductListing(product))
      .sort((a, b) => b.productId - a.productId);
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    const values = insertUserSchema.parse(insertUser);
    const duplicate = Array.from(this.users.values()).some(u => u.email === values.email);
    if (duplicate) {
      throw new Error(`Email ${values.email} is already registered`);
    }

    const user: User = { id: this.nextId.user++, name: values.name, email: values.email };
    this.users.set(user.id, user);
    return user;
  }

  async createPost(insertPost: InsertPost): Promise<Post> {
    const values = insertPostSchema.parse(insertPost);
    this.requireUser(values.artistId);

    const post: Post = {
      postId: this.nextId.post++,
      postTitle: values.postTitle,
      description: values.description ?? null,
      artistId: values.artistId,
      createdAt: new Date()
    };
    this.posts.set(post.postId, post);
    this.indexHashtags(this.postTags, post.postId, listingText(post.postTitle, post.description));
    return post;
  }

  async createProduct(insertProduct: InsertProduct): Promise<Product> {
    const values = insertProductSchema.parse(insertProduct);
    this.requireUser(values.artistId);

    const product: Product = {
      productId: this.nextId.product++,
      title: values.title,
      description: values.description ?? null,
      price: values.price ? Number(values.price).toFixed(2) : null,
      artistId: values.artistId,
      createdAt: new Date()
    };
    this.products.set(product.productId, product);
    this.indexHashtags(this.productTags, product.productId, listingText(product.title, product.description));
    return product;
  }

  async createReview(insertReview: InsertProductReview): Promise<ProductReview> {
    const values = insertProductReviewSchema.parse(insertReview);
    this.requireUser(values.userId);
    if (!this.products.has(values.productId)) {
      throw new Error(`Product ${values.productId} does not exist`);
    }

    const review: ProductReview = {
      id: this.nextId.review++,
      productId: values.productId,
      userId: values.userId,
      rating: values.rating,
      createdAt: new Date()
    };
    this.reviews.push(review);
    return review;
  }
}

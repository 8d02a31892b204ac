import { pgTable, serial, text, integer, numeric, timestamp, primaryKey } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============ DATABASE TABLES ============

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  email: text("email").notNull().unique(),
});

export const insertUserSchema = createInsertSchema(users).pick({
  name: true,
  email: true,
});

export type InsertUser = z.infer<typeof insertUserSchema>;
export type User = typeof users.$inferSelect;

// Posts are showcase entries without a price
export const posts = pgTable("posts", {
  postId: serial("post_id").primaryKey(),
  postTitle: text("post_title").notNull(),
  description: text("description"),
  artistId: integer("artist_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at").defaultNow(),
});

export const insertPostSchema = createInsertSchema(posts).omit({
  postId: true,
  createdAt: true,
});

export type InsertPost = z.infer<typeof insertPostSchema>;
export type Post = typeof posts.$inferSelect;

export const products = pgTable("products", {
  productId: serial("product_id").primaryKey(),
  title: text("title").notNull(),
  description: text("description"),
  price: numeric("price", { precision: 10, scale: 2 }),
  artistId: integer("artist_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at").defaultNow(),
});

export const insertProductSchema = createInsertSchema(products)
  .omit({
    productId: true,
    createdAt: true,
  })
  .extend({
    price: z.string().regex(/^\d{1,8}(\.\d{1,2})?$/, "Price must be a non-negative amount below 100000000").nullish(),
  });

export type InsertProduct = z.infer<typeof insertProductSchema>;
export type Product = typeof products.$inferSelect;

export const productReviews = pgTable("product_reviews", {
  id: serial("id").primaryKey(),
  productId: integer("product_id").notNull().references(() => products.productId, { onDelete: "cascade" }),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  rating: integer("rating").notNull(),
  createdAt: timestamp("created_at").defaultNow(),
});

export const insertProductReviewSchema = createInsertSchema(productReviews)
  .omit({
    id: true,
    createdAt: true,
  })
  .extend({
    rating: z.number().int().min(1).max(5),
  });

export type InsertProductReview = z.infer<typeof insertProductReviewSchema>;
export type ProductReview = typeof productReviews.$inferSelect;

export const hashtags = pgTable("hashtags", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
  createdAt: timestamp("created_at").defaultNow(),
});

export type Hashtag = typeof hashtags.$inferSelect;

export const postHashtags = pgTable("post_hashtags", {
  postId: integer("post_id").notNull().references(() => posts.postId, { onDelete: "cascade" }),
  hashtagId: integer("hashtag_id").notNull().references(() => hashtags.id, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.postId, table.hashtagId] }),
]);

export const productHashtags = pgTable("product_hashtags", {
  productId: integer("product_id").notNull().references(() => products.productId, { onDelete: "cascade" }),
  hashtagId: integer("hashtag_id").notNull().references(() => hashtags.id, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.productId, table.hashtagId] }),
]);

// ============ LISTING VIEWS ============

export type PostListing = Post & { artistName: string };
export type ProductListing = Product & { artistName: string };

export interface ReviewStats {
  avgRating: number;
  reviewsCount: number;
}

export type RatedProduct = ProductListing & ReviewStats;

// ============ REQUEST SCHEMAS ============

export const listingSearchQuerySchema = z.object({
  q: z.string().trim().max(500).optional().default(""),
  sort: z.string().max(50).optional(),
});

export type ListingSearchQuery = z.infer<typeof listingSearchQuerySchema>;

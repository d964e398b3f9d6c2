import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ============================================================================
// PUBLICATION LEDGER
// ============================================================================

// One row per feed item that was successfully posted to WordPress.
// Rows are written once and never updated or deleted.
export const publishedItemsTable = sqliteTable("published_items", {
  link: text("link").primaryKey(), // Feed item link, the de-duplication key
  title: text("title"),
  publishedDate: text("published_date"), // As delivered by the feed
  wordpressPostId: integer("wordpress_post_id"),
  createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`),
});

export const PUBLISHED_ITEMS_DDL = `
  CREATE TABLE IF NOT EXISTS published_items (
    link TEXT PRIMARY KEY,
    title TEXT,
    published_date TEXT,
    wordpress_post_id INTEGER,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )
`;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type PublishedItem = typeof publishedItemsTable.$inferSelect;
export type NewPublishedItem = typeof publishedItemsTable.$inferInsert;

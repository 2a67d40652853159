import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------------------------------------------------------------------------
// catalog_apps: last downloaded app list, in document order
// ---------------------------------------------------------------------------
export const catalogApps = sqliteTable("catalog_apps", {
  appId: integer("app_id").primaryKey(),
  // raw `type` attribute of the <game> element; null = no attribute
  appType: text("app_type"),
  position: integer("position").notNull(),
});

export type CatalogApp = typeof catalogApps.$inferSelect;
export type NewCatalogApp = typeof catalogApps.$inferInsert;

// ---------------------------------------------------------------------------
// catalog_fetches: one row per source URL
// ---------------------------------------------------------------------------
export const catalogFetches = sqliteTable("catalog_fetches", {
  sourceUrl: text("source_url").primaryKey(),
  fetchedAt: integer("fetched_at").notNull(), // unix ms
  entryCount: integer("entry_count").notNull(),
  createdAt: integer("created_at")
    .notNull()
    .default(sql`(unixepoch() * 1000)`),
});

export type CatalogFetch = typeof catalogFetches.$inferSelect;

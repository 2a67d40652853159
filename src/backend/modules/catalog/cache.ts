import { asc, eq } from "drizzle-orm";
import type { Db } from "../../db/migrate.js";
import { catalogApps, catalogFetches } from "../../db/schema.js";
import type { CatalogEntry } from "./app-list.js";

// ---------------------------------------------------------------------------
// SQLite copy of the last downloaded app list
// ---------------------------------------------------------------------------

/**
 * Returns the cached entries for `sourceUrl` if they were fetched less
 * than `maxAgeMs` ago, otherwise null.
 */
export function readCachedAppList(
  db: Db,
  sourceUrl: string,
  maxAgeMs: number,
  now: number = Date.now()
): CatalogEntry[] | null {
  const row = db
    .select()
    .from(catalogFetches)
    .where(eq(catalogFetches.sourceUrl, sourceUrl))
    .get();

  if (!row || now - row.fetchedAt >= maxAgeMs) return null;

  return db
    .select({ appId: catalogApps.appId, type: catalogApps.appType })
    .from(catalogApps)
    .orderBy(asc(catalogApps.position))
    .all();
}

/** Replaces the cached list. */
export function writeCachedAppList(
  db: Db,
  sourceUrl: string,
  entries: readonly CatalogEntry[],
  now: number = Date.now()
): void {
  db.transaction((tx) => {
    tx.delete(catalogApps).run();
    tx.delete(catalogFetches).run();

    entries.forEach((entry, position) => {
      tx.insert(catalogApps)
        .values({ appId: entry.appId, appType: entry.type, position })
        .run();
    });

    tx.insert(catalogFetches)
      .values({ sourceUrl, fetchedAt: now, entryCount: entries.length })
      .run();
  });
}

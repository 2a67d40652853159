/**
 * ============================================================
 *  Catalog — owned apps for the library view
 * ============================================================
 *
 * Flow:
 *   1. loadAppList()
 *      → SQLite cache if younger than catalogMaxAgeHours
 *      → otherwise download + parse, then refresh the cache
 *
 *   2. listOwnedApps(session)
 *      → keeps the entries the Steam session reports as owned
 *      → fills each one from the client's app data keys
 * ============================================================
 */
import { logger } from "../../logger.js";
import type { Db } from "../../db/migrate.js";
import { AppTypeSchema, UnlockdError, type AppModel, type AppType } from "../ipc/index.js";
import type { CatalogSession } from "../native/index.js";
import { downloadAppList, parseAppList, type CatalogEntry, type Fetcher } from "./app-list.js";
import { readCachedAppList, writeCachedAppList } from "./cache.js";

const log = logger.child({ module: "catalog" });

const STORE_ASSETS_URL = "https://shared.cloudflare.steamstatic.com/store_item_assets/steam/apps";
const COMMUNITY_IMAGES_URL = "https://cdn.steamstatic.com/steamcommunity/public/images/apps";

const HOUR_MS = 60 * 60 * 1000;

export interface CatalogOptions {
  appListUrl: string;
  catalogMaxAgeHours: number;
  /** Overrides the session's language; empty = ask the session. */
  language: string;
  db: Db;
  fetcher?: Fetcher;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// App list
// ---------------------------------------------------------------------------

export async function loadAppList(options: CatalogOptions): Promise<CatalogEntry[]> {
  const { db, appListUrl } = options;
  const now = options.now?.() ?? Date.now();

  let cached: CatalogEntry[] | null;
  try {
    cached = readCachedAppList(db, appListUrl, options.catalogMaxAgeHours * HOUR_MS, now);
  } catch (err) {
    throw new UnlockdError("AppListRetrievalFailed", "App list cache could not be read", { cause: err });
  }
  if (cached) {
    log.debug({ entries: cached.length }, "Using cached app list");
    return cached;
  }

  const entries = parseAppList(await downloadAppList(appListUrl, options.fetcher));
  try {
    writeCachedAppList(db, appListUrl, entries, now);
    log.info({ entries: entries.length }, "App list cached");
  } catch (err) {
    log.warn({ err }, "App list could not be cached");
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

/** Case-insensitive; no attribute means App. */
export function parseAppType(raw: string | null): AppType {
  if (raw === null) return "App";
  const match = AppTypeSchema.options.find((t) => t.toLowerCase() === raw.toLowerCase());
  if (!match) {
    throw new UnlockdError("AppListRetrievalFailed", `'${raw}' is not a valid app type`);
  }
  return match;
}

/** A u8 score, or null when the value is missing or out of range. */
export function parseMetacriticScore(raw: string): number | null {
  if (!/^\+?\d+$/.test(raw)) return null;
  const score = Number(raw);
  return score <= 255 ? score : null;
}

/** App data value, or "" when the client has none or the call fails. */
async function optionalAppData(session: CatalogSession, appId: number, key: string): Promise<string> {
  try {
    return (await session.getAppData(appId, key)) ?? "";
  } catch (err) {
    log.warn({ err, appId, key }, "App data unavailable");
    return "";
  }
}

/** Small capsule in `language`, then in english, then the community logo. */
export async function resolveImageUrl(
  session: CatalogSession,
  appId: number,
  language: string,
): Promise<string | null> {
  const languages = language === "english" ? ["english"] : [language, "english"];
  for (const lang of languages) {
    const capsule = await optionalAppData(session, appId, `small_capsule/${lang}`);
    if (capsule) return `${STORE_ASSETS_URL}/${appId}/${capsule}`;
  }

  const logo = await optionalAppData(session, appId, "logo");
  if (logo) return `${COMMUNITY_IMAGES_URL}/${appId}/${logo}.jpg`;

  log.debug({ appId }, "No image for app");
  return null;
}

// ---------------------------------------------------------------------------
// Owned apps
// ---------------------------------------------------------------------------

export async function buildAppModel(
  session: CatalogSession,
  entry: CatalogEntry,
  language: string,
): Promise<AppModel> {
  const { appId } = entry;

  let appName: string | null;
  try {
    appName = await session.getAppData(appId, "name");
  } catch (err) {
    throw new UnlockdError("AppListRetrievalFailed", `No name for app ${appId}`, { cause: err });
  }
  if (appName === null) {
    throw new UnlockdError("AppListRetrievalFailed", `No name for app ${appId}`);
  }

  const developer = (await optionalAppData(session, appId, "developer")) || "Unknown";
  const metacriticScore = parseMetacriticScore(await optionalAppData(session, appId, "metacritic_score"));

  return {
    appId,
    appName,
    imageUrl: await resolveImageUrl(session, appId, language),
    appType: parseAppType(entry.type),
    developer,
    metacriticScore,
  };
}

/**
 * Every catalog entry the session owns, as an AppModel, in catalog order.
 * An entry whose ownership check fails is skipped; any other failure
 * fails the whole listing with AppListRetrievalFailed.
 */
async function sessionLanguage(session: CatalogSession): Promise<string> {
  try {
    return await session.getCurrentGameLanguage();
  } catch (err) {
    throw new UnlockdError("AppListRetrievalFailed", "Current language unavailable", { cause: err });
  }
}

export async function listOwnedApps(session: CatalogSession, options: CatalogOptions): Promise<AppModel[]> {
  const entries = await loadAppList(options);
  const language = options.language || (await sessionLanguage(session));

  const models: AppModel[] = [];
  for (const entry of entries) {
    let owned: boolean;
    try {
      owned = await session.isSubscribedApp(entry.appId);
    } catch (err) {
      log.warn({ err, appId: entry.appId }, "Ownership check failed, skipping app");
      continue;
    }
    if (owned) models.push(await buildAppModel(session, entry, language));
  }

  log.info({ owned: models.length, catalog: entries.length }, "Owned apps listed");
  return models;
}

/**
 * ============================================================
 *  App List — the public catalog of apps with statistics
 * ============================================================
 *
 * Downloaded as XML:
 *
 *   <games>
 *     <game>480</game>
 *     <game type="demo">1234</game>
 *   </games>
 *
 * Every failure here is AppListRetrievalFailed; the supervisor
 * forwards that kind to the UI unchanged.
 * ============================================================
 */
import fetch from "node-fetch";
import { load } from "cheerio";
import { logger } from "../../logger.js";
import { UnlockdError } from "../ipc/index.js";

const log = logger.child({ module: "catalog" });

export interface CatalogEntry {
  appId: number;
  /** `type` attribute as written; null when absent. */
  type: string | null;
}

/** The subset of a fetch response the downloader reads. */
export interface TextResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type Fetcher = (url: string) => Promise<TextResponse>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const APP_ID_PATTERN = /^\d+$/;

/**
 * Parses the catalog document; throws AppListRetrievalFailed on anything
 * unexpected. A repeated app id keeps its first entry.
 */
export function parseAppList(xml: string): CatalogEntry[] {
  const $ = load(xml, { xml: true });
  const root = $("games").first();
  if (root.length === 0) {
    throw new UnlockdError("AppListRetrievalFailed", "App list has no <games> element");
  }

  const entries: CatalogEntry[] = [];
  const seen = new Set<number>();
  for (const game of root.children("game").toArray()) {
    const text = $(game).text().trim();
    const appId = Number(text);
    if (!APP_ID_PATTERN.test(text) || appId > 0xffff_ffff) {
      throw new UnlockdError("AppListRetrievalFailed", `Invalid app id in app list: "${text}"`);
    }
    if (seen.has(appId)) continue;
    seen.add(appId);
    entries.push({ appId, type: $(game).attr("type") ?? null });
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

/** GETs the catalog document as text. */
export async function downloadAppList(url: string, fetcher: Fetcher = fetch): Promise<string> {
  log.info({ url }, "Downloading app list");

  let response: TextResponse;
  try {
    response = await fetcher(url);
  } catch (err) {
    throw new UnlockdError("AppListRetrievalFailed", `App list request failed: ${url}`, { cause: err });
  }

  if (!response.ok) {
    throw new UnlockdError(
      "AppListRetrievalFailed",
      `App list download failed (${response.status} ${response.statusText}): ${url}`,
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new UnlockdError("AppListRetrievalFailed", `App list body could not be read: ${url}`, { cause: err });
  }
}

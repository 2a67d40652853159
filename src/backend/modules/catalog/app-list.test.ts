/**
 * ============================================================
 *  app-list — Unit Tests
 * ============================================================
 *
 * Parsing of the catalog XML and the download wrapper. The
 * downloader gets a fake fetcher; no request leaves the process.
 *
 * Module under test: src/backend/modules/catalog/app-list.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { UnlockdError } from "../ipc/index.js";
import { downloadAppList, parseAppList, type Fetcher } from "./app-list.js";

const LIST_URL = "http://catalog.test/games.xml";

function retrievalFailed(message: string) {
  return (err: unknown) =>
    err instanceof UnlockdError && err.kind === "AppListRetrievalFailed" && err.message === message;
}

// ─── parseAppList ─────────────────────────────────────────────────────────────

describe("parseAppList", () => {
  test("ids with and without a type attribute", () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<games>
  <game>480</game>
  <game type="demo">1234</game>
</games>`;
    assert.deepEqual(parseAppList(xml), [
      { appId: 480, type: null },
      { appId: 1234, type: "demo" },
    ]);
  });

  test("whitespace around an id is ignored", () => {
    assert.deepEqual(parseAppList("<games><game> 10 </game></games>"), [{ appId: 10, type: null }]);
  });

  test("a repeated id keeps its first entry", () => {
    assert.deepEqual(parseAppList('<games><game type="mod">5</game><game>5</game></games>'), [
      { appId: 5, type: "mod" },
    ]);
  });

  test("an empty list", () => {
    assert.deepEqual(parseAppList("<games></games>"), []);
  });

  test("no <games> element → AppListRetrievalFailed", () => {
    assert.throws(() => parseAppList("<apps><app>1</app></apps>"), retrievalFailed("App list has no <games> element"));
  });

  test("a non-numeric id → AppListRetrievalFailed", () => {
    assert.throws(
      () => parseAppList("<games><game>abc</game></games>"),
      retrievalFailed('Invalid app id in app list: "abc"'),
    );
  });

  test("an id beyond 32 bits → AppListRetrievalFailed", () => {
    assert.throws(
      () => parseAppList("<games><game>4294967296</game></games>"),
      retrievalFailed('Invalid app id in app list: "4294967296"'),
    );
  });
});

// ─── downloadAppList ──────────────────────────────────────────────────────────

describe("downloadAppList", () => {
  test("returns the body", async () => {
    const fetcher: Fetcher = async () => ({ ok: true, status: 200, statusText: "OK", text: async () => "<games/>" });
    assert.equal(await downloadAppList(LIST_URL, fetcher), "<games/>");
  });

  test("a non-2xx status → AppListRetrievalFailed", async () => {
    const fetcher: Fetcher = async () => ({ ok: false, status: 404, statusText: "Not Found", text: async () => "" });
    await assert.rejects(
      downloadAppList(LIST_URL, fetcher),
      retrievalFailed("App list download failed (404 Not Found): http://catalog.test/games.xml"),
    );
  });

  test("a failed request → AppListRetrievalFailed", async () => {
    const fetcher: Fetcher = async () => {
      throw new Error("ECONNREFUSED");
    };
    await assert.rejects(
      downloadAppList(LIST_URL, fetcher),
      retrievalFailed("App list request failed: http://catalog.test/games.xml"),
    );
  });
});

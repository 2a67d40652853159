/**
 * ============================================================
 *  native — Unit Tests
 * ============================================================
 *
 * Covers the loader fallbacks, the connection wrappers and the
 * Steam path helpers. No real binding is ever loaded.
 *
 * Module under test: src/backend/modules/native/
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { UnlockdError } from "../ipc/index.js";
import {
  createUnavailableClient,
  detectSteamRoot,
  isNativeClient,
  loadNativeClient,
  openCatalogSession,
  openUserStatsSession,
  statsSchemaPath,
  steamRootCandidates,
  toImportSpecifier,
} from "./index.js";
import { FakeNativeClient } from "../../../tests/helpers/index.js";

function isConnectionFailure(message?: string) {
  return (err: unknown) =>
    err instanceof UnlockdError &&
    err.kind === "SteamConnectionFailed" &&
    (message === undefined || err.message === message);
}

// ─── Loader ───────────────────────────────────────────────────────────────────

describe("toImportSpecifier", () => {
  test("relative path → file URL against cwd", () => {
    assert.equal(toImportSpecifier("./native/steam.js", "/opt/unlockd"), "file:///opt/unlockd/native/steam.js");
  });

  test("absolute path → file URL", () => {
    assert.equal(toImportSpecifier("/usr/lib/steam-binding.js", "/opt/unlockd"), "file:///usr/lib/steam-binding.js");
  });

  test("package names are left for node_modules resolution", () => {
    assert.equal(toImportSpecifier("steam-binding", "/opt/unlockd"), "steam-binding");
  });
});

describe("isNativeClient", () => {
  test("needs both connect functions", () => {
    assert.equal(isNativeClient(new FakeNativeClient()), true);
    assert.equal(isNativeClient({ connectCatalog: () => null }), false);
    assert.equal(isNativeClient(null), false);
  });
});

describe("loadNativeClient", () => {
  test("no module configured → a client that cannot connect", async () => {
    const client = await loadNativeClient({ nativeModule: "" });
    await assert.rejects(client.connectApp(480), isConnectionFailure("No native module configured"));
    await assert.rejects(client.connectCatalog(), isConnectionFailure());
  });

  test("a module that cannot be imported → a client that cannot connect", async () => {
    const client = await loadNativeClient({ nativeModule: "./does-not-exist/binding.js" });
    await assert.rejects(
      client.connectCatalog(),
      isConnectionFailure("Native module ./does-not-exist/binding.js could not be loaded"),
    );
  });
});

// ─── Connecting ───────────────────────────────────────────────────────────────

describe("openUserStatsSession / openCatalogSession", () => {
  test("a plain connection error is reported as SteamConnectionFailed", async () => {
    const client = new FakeNativeClient();
    client.failConnections = true;
    await assert.rejects(
      openUserStatsSession(client, 480),
      isConnectionFailure("Could not connect to the Steam client as app 480"),
    );
    await assert.rejects(openCatalogSession(client), isConnectionFailure("Could not connect to the Steam client"));
  });

  test("an existing SteamConnectionFailed passes through unchanged", async () => {
    const client = createUnavailableClient("binding missing");
    await assert.rejects(openUserStatsSession(client, 480), isConnectionFailure("binding missing"));
  });

  test("a successful connection returns the session", async () => {
    const client = new FakeNativeClient();
    const session = await openUserStatsSession(client, 440);
    assert.equal(session.appId, 440);
    assert.deepEqual(client.connectedApps, [440]);
  });
});

// ─── Steam paths ──────────────────────────────────────────────────────────────

describe("steam paths", () => {
  test("candidates in lookup order", () => {
    assert.deepEqual(steamRootCandidates("/home/test"), [
      "/home/test/.steam/steam",
      "/home/test/.steam/root",
      "/home/test/.local/share/Steam",
      "/home/test/.steam/debian-installation",
      "/home/test/.var/app/com.valvesoftware.Steam/.local/share/Steam",
      "/home/test/snap/steam/common/.local/share/Steam",
    ]);
  });

  test("schema path", () => {
    assert.equal(
      statsSchemaPath("/home/test/.steam/steam", 480),
      "/home/test/.steam/steam/appcache/stats/UserGameStatsSchema_480.bin",
    );
  });

  test("an override wins without touching the filesystem", () => {
    assert.equal(detectSteamRoot("/srv/steam", ["/nonexistent"]), "/srv/steam");
  });

  test("first existing candidate is chosen", () => {
    const home = mkdtempSync(join(tmpdir(), "unlockd-steam-"));
    try {
      const second = join(home, "b");
      const third = join(home, "c");
      mkdirSync(second);
      mkdirSync(third);
      assert.equal(detectSteamRoot("", [join(home, "a"), second, third]), second);
    } finally {
      rmSync(home, { recursive: true, force: true });
    }
  });

  test("no candidate exists → null", () => {
    assert.equal(detectSteamRoot("", ["/nonexistent/unlockd/a", "/nonexistent/unlockd/b"]), null);
  });
});

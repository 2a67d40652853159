/**
 * ============================================================
 *  channel — Process Tests
 * ============================================================
 *
 * spawnChild against a real child: a worker started from
 * src/tests/helpers/worker-child.ts over descriptors 3 and 4.
 * The child has no Steam client, so it answers every command
 * with SteamConnectionFailed.
 *
 * Module under test: src/backend/modules/process-channel/channel.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, before } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "url";
import { z } from "zod";
import { UnlockdError, failure } from "../ipc/index.js";
import { roundTrip } from "../../../tests/helpers/index.js";
import { ChildExitTimeoutError, spawnChild, type SelfCommand } from "./channel.js";

const CHILD = fileURLToPath(new URL("../../../tests/helpers/worker-child.ts", import.meta.url));
const self: SelfCommand = { command: process.execPath, args: ["--import", "tsx", CHILD] };

describe("spawnChild — real child process", () => {
  before(() => {
    // the child inherits stdout; keep its log lines out of the test report
    process.env.UNLOCKD_LOG_LEVEL = "silent";
  });

  test("exchanges commands over the pipe pair and exits 0 once it is closed", async () => {
    const child = spawnChild(["--app=480"], { self });
    assert.ok(child.pid > 0);

    assert.deepEqual(
      await roundTrip(child.channel, { type: "Status" }, z.boolean()),
      failure("SteamConnectionFailed"),
    );
    assert.deepEqual(
      await roundTrip(child.channel, { type: "GetStats", appId: 480 }, z.unknown()),
      failure("SteamConnectionFailed"),
    );

    child.close();
    assert.equal(await child.wait(10_000), 0);
  });

  test("wait() with a timeout rejects while the child runs; kill() ends it", async () => {
    const child = spawnChild(["--app=480"], { self });

    await assert.rejects(child.wait(50), ChildExitTimeoutError);

    child.kill();
    assert.equal(await child.wait(), null);
    child.close();
  });

  test("a missing executable → UnknownError, nothing returned", () => {
    assert.throws(
      () => spawnChild(["--app=480"], { self: { command: "/nonexistent/unlockd-node", args: [] } }),
      (err: unknown) => err instanceof UnlockdError && err.kind === "UnknownError",
    );
  });
});

/**
 * ============================================================
 *  worker — Unit Tests
 * ============================================================
 *
 * runWorker driven over an in-memory pipe pair, exactly as the
 * supervisor would drive a spawned worker: one command frame in,
 * one response frame out. The native client is FakeNativeClient.
 *
 * Every test ends the loop (Shutdown or closing the pipe) and
 * awaits it, so nothing is left running.
 *
 * Module under test: src/backend/modules/worker/worker.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import {
  RawFrame,
  StatInfoSchema,
  decodeResponse,
  failure,
  success,
} from "../ipc/index.js";
import { decodeKeyValue } from "../key-value/index.js";
import { runWorker } from "./worker.js";
import {
  FakeNativeClient,
  makeChannelPair,
  roundTrip,
  sampleStatsSchema,
} from "../../../tests/helpers/index.js";

function startWorker(client = new FakeNativeClient()) {
  const { left: supervisor, right } = makeChannelPair();
  const session = client.session(480);
  session.ints.set("NumGames", 3);
  session.floats.set("FeetTraveled", 0.5);

  const done = runWorker({
    appId: 480,
    channel: right,
    client,
    schema: { language: "english", loadSchema: async () => decodeKeyValue(sampleStatsSchema(480)) },
  });
  return { supervisor, session, client, done };
}

// ─── Connected ────────────────────────────────────────────────────────────────

describe("runWorker — connected", () => {
  test("Status → Success(true)", async () => {
    const { supervisor, done } = startWorker();
    assert.deepEqual(await roundTrip(supervisor, { type: "Status" }, z.boolean()), success(true));
    supervisor.writer.close();
    await done;
  });

  test("a command for another app → AppMismatchError, native client untouched", async () => {
    const { supervisor, session, done } = startWorker();
    const response = await roundTrip(supervisor, { type: "GetStats", appId: 481 }, z.array(StatInfoSchema));
    assert.deepEqual(response, failure("AppMismatchError"));
    assert.deepEqual(session.calls, []);
    supervisor.writer.close();
    await done;
  });

  test("GetStats returns this app's stats", async () => {
    const { supervisor, done } = startWorker();
    const response = await roundTrip(supervisor, { type: "GetStats", appId: 480 }, z.array(StatInfoSchema));
    assert.equal(response.type, "Success");
    if (response.type === "Success") {
      assert.deepEqual(response.data.map((s) => [s.id, s.value]), [["NumGames", 3], ["FeetTraveled", 0.5]]);
    }
    supervisor.writer.close();
    await done;
  });

  test("SetIntStat answers with the stored value", async () => {
    const { supervisor, done } = startWorker();
    const response = await roundTrip(
      supervisor,
      { type: "SetIntStat", appId: 480, statId: "NumGames", value: -2147483648 },
      z.number(),
    );
    assert.deepEqual(response, success(-2147483648));
    supervisor.writer.close();
    await done;
  });

  test("SetAchievement → Success(true)", async () => {
    const { supervisor, session, done } = startWorker();
    const response = await roundTrip(
      supervisor,
      { type: "SetAchievement", appId: 480, unlocked: true, achievementId: "ACH_TRAVEL" },
      z.boolean(),
    );
    assert.deepEqual(response, success(true));
    assert.deepEqual(session.achievements.get("ACH_TRAVEL"), { achieved: true, unlockTime: 1_700_000_000 });
    supervisor.writer.close();
    await done;
  });

  test("a native failure is reported, not fatal", async () => {
    const { supervisor, session, done } = startWorker();
    session.failing.add("resetAllStats");
    assert.deepEqual(
      await roundTrip(supervisor, { type: "ResetStats", appId: 480, achievementsToo: true }, z.boolean()),
      failure("UnknownError"),
    );
    assert.deepEqual(await roundTrip(supervisor, { type: "Status" }, z.boolean()), success(true));
    supervisor.writer.close();
    await done;
  });

  test("supervisor-only commands → UnknownError", async () => {
    const { supervisor, done } = startWorker();
    assert.deepEqual(
      await roundTrip(supervisor, { type: "GetOwnedAppList" }, z.unknown()),
      failure("UnknownError"),
    );
    supervisor.writer.close();
    await done;
  });

  test("a malformed frame → SerializationFailed, loop continues", async () => {
    const { supervisor, done } = startWorker();
    await supervisor.writer.write(new RawFrame(Buffer.from('{"type":"Explode"}')));
    assert.deepEqual(decodeResponse(await supervisor.reader.read(), z.unknown()), failure("SerializationFailed"));
    assert.deepEqual(await roundTrip(supervisor, { type: "Status" }, z.boolean()), success(true));
    supervisor.writer.close();
    await done;
  });

  test("Shutdown disconnects, answers and ends the loop", async () => {
    const { supervisor, session, done } = startWorker();
    assert.deepEqual(await roundTrip(supervisor, { type: "Shutdown" }, z.boolean()), success(true));
    await done;
    assert.equal(session.disconnected, true);
  });
});

// ─── Not connected ────────────────────────────────────────────────────────────

describe("runWorker — connection failed", () => {
  test("every command → SteamConnectionFailed, and the attempt is not retried", async () => {
    const client = new FakeNativeClient();
    client.failConnections = true;
    const { supervisor, done } = startWorker(client);

    assert.deepEqual(await roundTrip(supervisor, { type: "Status" }, z.boolean()), failure("SteamConnectionFailed"));
    assert.deepEqual(
      await roundTrip(supervisor, { type: "GetStats", appId: 480 }, z.array(StatInfoSchema)),
      failure("SteamConnectionFailed"),
    );
    assert.deepEqual(await roundTrip(supervisor, { type: "Shutdown" }, z.boolean()), failure("SteamConnectionFailed"));
    assert.deepEqual(client.connectedApps, [480]);

    supervisor.writer.close();
    await done;
  });
});

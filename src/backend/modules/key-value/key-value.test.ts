/**
 * ============================================================
 *  key-value — Unit Tests
 * ============================================================
 *
 * Decodes hand-built binary streams (see KeyValueBytes in the
 * test helpers) and checks tree shape, typed accessors and the
 * three failure reasons. Only loadKeyValueFile touches the
 * filesystem, and only to read a path that does not exist.
 *
 * Module under test: src/backend/modules/key-value/key-value.ts
 * Suite entry:       src/tests/suite.ts
 *
 * Functions tested:
 *   decodeKeyValue(bytes)     — tree construction and errors
 *   KeyValue.get / as*        — lookups, coercions, fallbacks
 *   parseI32 / formatF32      — text ↔ number helpers
 *   loadKeyValueFile(path)    — missing file → Io
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import {
  KeyValue,
  KeyValueError,
  decodeKeyValue,
  formatF32,
  loadKeyValueFile,
  parseI32,
} from "./key-value.js";
import { KeyValueBytes } from "../../../tests/helpers/index.js";

function failsWith(reason: KeyValueError["reason"]) {
  return (err: unknown) => err instanceof KeyValueError && err.reason === reason;
}

// ─── Tree construction ────────────────────────────────────────────────────────

describe("decodeKeyValue — tree construction", () => {
  test("a lone End tag yields an empty root", () => {
    const root = decodeKeyValue(Buffer.from([8]));
    assert.equal(root.name, "<root>");
    assert.equal(root.valid, true);
    assert.equal(root.children.size, 0);
  });

  test("string child is readable by name", () => {
    const root = decodeKeyValue(new KeyValueBytes().string("foo", "bar").build());
    const foo = root.get("foo");
    assert.equal(foo.asString("x"), "bar");
    assert.equal(foo.asI32(-1), -1);
  });

  test("nested containers resolve through chained get()", () => {
    const bytes = new KeyValueBytes()
      .container("480", (app) =>
        app.container("stats", (stats) =>
          stats.container("1", (stat) => stat.int32("type", 1).string("name", "KILLS")),
        ),
      )
      .build();

    const stat = decodeKeyValue(bytes).get("480").get("stats").get("1");
    assert.equal(stat.get("type").asI32(0), 1);
    assert.equal(stat.get("name").asString(""), "KILLS");
    assert.equal(stat.children.size, 2);
  });

  test("the last of two same-named siblings wins", () => {
    const root = decodeKeyValue(new KeyValueBytes().int32("a", 1).int32("a", 2).build());
    assert.equal(root.children.size, 1);
    assert.equal(root.get("a").asI32(0), 2);
  });

  test("strings longer than one scratch chunk survive intact", () => {
    const long = "x".repeat(300);
    const root = decodeKeyValue(new KeyValueBytes().string("k", long).build());
    assert.equal(root.get("k").asString(""), long);
  });

  test("multi-byte UTF-8 in names and values", () => {
    const root = decodeKeyValue(new KeyValueBytes().string("名前", "Überraschung").build());
    assert.equal(root.get("名前").asString(""), "Überraschung");
  });
});

// ─── Failures ─────────────────────────────────────────────────────────────────

describe("decodeKeyValue — failures", () => {
  test("WideString is rejected as an unsupported type", () => {
    const bytes = new KeyValueBytes().raw(5, 0x77, 0).build();
    assert.throws(() => decodeKeyValue(bytes), failsWith("UnsupportedType"));
  });

  test("a tag beyond End is a format error", () => {
    assert.throws(
      () => decodeKeyValue(Buffer.from([9])),
      (err: unknown) =>
        err instanceof KeyValueError &&
        err.reason === "Format" &&
        err.message === "Format error: Invalid KeyValueType: 9",
    );
  });

  test("an empty buffer is an IO error", () => {
    assert.throws(() => decodeKeyValue(Buffer.alloc(0)), failsWith("Io"));
  });

  test("a stream cut inside a value is an IO error", () => {
    const bytes = new KeyValueBytes().string("foo", "bar").unterminated().subarray(0, 6);
    assert.throws(() => decodeKeyValue(bytes), failsWith("Io"));
  });

  test("a container missing its End tag is an IO error", () => {
    const bytes = new KeyValueBytes().raw(0, 0x61, 0).int32("n", 1).unterminated();
    assert.throws(() => decodeKeyValue(bytes), failsWith("Io"));
  });

  test("a missing file is an IO error", async () => {
    await assert.rejects(
      loadKeyValueFile("/nonexistent/unlockd/UserGameStatsSchema_0.bin"),
      failsWith("Io"),
    );
  });
});

// ─── Accessors ────────────────────────────────────────────────────────────────

describe("KeyValue — accessors", () => {
  const root = decodeKeyValue(
    new KeyValueBytes()
      .int32("int", 7)
      .float32("half", 1.5)
      .float32("tenth", 0.1)
      .uint64("wide", 4294967301n)
      .color("color", 255)
      .string("digits", "42")
      .string("mixed", "12abc")
      .string("zero", "0")
      .string("float", "2.5")
      .container("group", (g) => g.int32("inner", 1))
      .build(),
  );

  test("missing keys resolve to the invalid node", () => {
    const missing = root.get("missing");
    assert.equal(missing.valid, false);
    assert.equal(missing.asBool(true), true);
    assert.equal(missing.asString("fallback"), "fallback");
    assert.equal(missing.get("deeper").valid, false);
    assert.equal(missing.toString(), "<invalid>");
  });

  test("the invalid node is shared and frozen", () => {
    assert.equal(root.get("a"), KeyValue.invalid);
    assert.equal(Object.isFrozen(KeyValue.invalid), true);
  });

  test("Int32 converts to every accessor", () => {
    const n = root.get("int");
    assert.equal(n.asI32(0), 7);
    assert.equal(n.asF32(0), 7);
    assert.equal(n.asString(""), "7");
    assert.equal(n.asBool(false), true);
  });

  test("Float32 truncates towards zero as an integer", () => {
    assert.equal(root.get("half").asI32(0), 1);
    assert.equal(root.get("half").asString(""), "1.5");
  });

  test("Float32 text is the shortest round-tripping form", () => {
    assert.equal(root.get("tenth").asString(""), "0.1");
  });

  test("UInt64 keeps the low 32 bits for numeric accessors", () => {
    const wide = root.get("wide");
    assert.equal(wide.asString(""), "4294967301");
    assert.equal(wide.asI32(0), 5);
    assert.equal(wide.asF32(0), 5);
  });

  test("Color reads as text but not as a number", () => {
    assert.equal(root.get("color").asString(""), "255");
    assert.equal(root.get("color").asI32(-1), -1);
  });

  test("numeric strings parse strictly", () => {
    assert.equal(root.get("digits").asI32(0), 42);
    assert.equal(root.get("mixed").asI32(5), 5);
    assert.equal(root.get("float").asF32(0), 2.5);
    assert.equal(root.get("zero").asBool(true), false);
    assert.equal(root.get("mixed").asBool(true), true);
  });

  test("containers have no value of their own", () => {
    const group = root.get("group");
    assert.equal(group.asString("none"), "none");
    assert.equal(group.asI32(-3), -3);
    assert.equal(group.toString(), "group");
  });

  test("leaf toString shows name and value", () => {
    assert.equal(root.get("int").toString(), "int = 7");
  });
});

// ─── Text helpers ─────────────────────────────────────────────────────────────

describe("parseI32 / formatF32", () => {
  test("parseI32 accepts signed integers within range", () => {
    assert.equal(parseI32("-2147483648"), -2147483648);
    assert.equal(parseI32("+17"), 17);
  });

  test("parseI32 rejects out-of-range and non-integer text", () => {
    assert.equal(parseI32("2147483648"), null);
    assert.equal(parseI32("1.0"), null);
    assert.equal(parseI32(""), null);
  });

  test("formatF32 writes non-finite values by name", () => {
    assert.equal(formatF32(Infinity), "inf");
    assert.equal(formatF32(-Infinity), "-inf");
    assert.equal(formatF32(NaN), "NaN");
  });

  test("formatF32 never uses exponent notation", () => {
    assert.equal(formatF32(Math.fround(1e-7)), "0.0000001");
    assert.equal(formatF32(Math.fround(1e21)), "1000000000000000000000");
    assert.equal(formatF32(Math.fround(-1.5e-5)), "-0.000015");
  });

  test("formatF32 keeps the sign of zero", () => {
    assert.equal(formatF32(0), "0");
    assert.equal(formatF32(-0), "-0");
  });
});

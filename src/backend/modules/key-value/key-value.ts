/**
 * ============================================================
 *  Binary KeyValue — tree decoder for statistics schema files
 * ============================================================
 *
 * The native client stores each title's statistics schema as a
 * recursive, self-describing binary tree:
 *
 *   node   := tag:u8  name:cstring  value
 *   value  := (tag = None)        node* End     — container
 *           | (tag = String)      cstring
 *           | (tag = Int32)       i32 LE
 *           | (tag = Float32)     f32 LE
 *           | (tag = UInt64)      u64 LE
 *           | (tag = Color|Pointer) u32 LE
 *
 * Every nesting level, including the top one, is closed by an End tag.
 * WideString is recognised but rejected.
 *
 * The decoded tree is immutable in practice. Lookups never return null:
 * a missing child resolves to a shared, frozen, always-invalid node whose
 * accessors fall back to the caller's default.
 * ============================================================
 */
import { readFile } from "fs/promises";

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

export const KeyValueType = {
  None:       0,
  String:     1,
  Int32:      2,
  Float32:    3,
  Pointer:    4,
  WideString: 5,
  Color:      6,
  UInt64:     7,
  End:        8,
} as const;

export type KeyValueType = (typeof KeyValueType)[keyof typeof KeyValueType];

const TAG_NAMES: Record<KeyValueType, string> = {
  0: "None",
  1: "String",
  2: "Int32",
  3: "Float32",
  4: "Pointer",
  5: "WideString",
  6: "Color",
  7: "UInt64",
  8: "End",
};

function isKeyValueType(tag: number): tag is KeyValueType {
  return tag >= KeyValueType.None && tag <= KeyValueType.End;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type KeyValueErrorReason = "Io" | "Format" | "UnsupportedType";

const REASON_LABELS: Record<KeyValueErrorReason, string> = {
  Io:              "IO error",
  Format:          "Format error",
  UnsupportedType: "Unsupported type",
};

export class KeyValueError extends Error {
  constructor(
    readonly reason: KeyValueErrorReason,
    message: string,
  ) {
    super(`${REASON_LABELS[reason]}: ${message}`);
    this.name = "KeyValueError";
  }
}

// ---------------------------------------------------------------------------
// Node model
// ---------------------------------------------------------------------------

export type KeyValueData =
  | { type: "None" }
  | { type: "String"; value: string }
  | { type: "Int32"; value: number }
  | { type: "Float32"; value: number }
  | { type: "UInt64"; value: bigint }
  | { type: "Color"; value: number };

const NO_DATA: KeyValueData = Object.freeze({ type: "None" });

export class KeyValue {
  constructor(
    readonly name: string,
    readonly data: KeyValueData = NO_DATA,
    readonly children: ReadonlyMap<string, KeyValue> = new Map(),
    readonly valid: boolean = true,
  ) {}

  /** Fresh root node: named "<root>", no data, valid. */
  static root(children: ReadonlyMap<string, KeyValue> = new Map()): KeyValue {
    return new KeyValue("<root>", NO_DATA, children);
  }

  /** The shared missing-lookup node. Never inserted into a tree. */
  static get invalid(): KeyValue {
    return INVALID;
  }

  get(key: string): KeyValue {
    return this.children.get(key) ?? INVALID;
  }

  asString(fallback: string): string {
    if (!this.valid) return fallback;
    switch (this.data.type) {
      case "String":  return this.data.value;
      case "Int32":
      case "Color":   return String(this.data.value);
      case "Float32": return formatF32(this.data.value);
      case "UInt64":  return this.data.value.toString();
      case "None":    return fallback;
    }
  }

  asI32(fallback: number): number {
    if (!this.valid) return fallback;
    switch (this.data.type) {
      case "String":  return parseI32(this.data.value) ?? fallback;
      case "Int32":   return this.data.value;
      case "Float32": return truncateToI32(this.data.value);
      case "UInt64":  return Number(BigInt.asIntN(32, this.data.value));
      default:        return fallback;
    }
  }

  asF32(fallback: number): number {
    if (!this.valid) return fallback;
    switch (this.data.type) {
      case "String":  return parseF32(this.data.value) ?? fallback;
      case "Int32":   return Math.fround(this.data.value);
      case "Float32": return this.data.value;
      case "UInt64":  return Math.fround(Number(BigInt.asUintN(32, this.data.value)));
      default:        return fallback;
    }
  }

  asBool(fallback: boolean): boolean {
    if (!this.valid) return fallback;
    switch (this.data.type) {
      case "String": {
        const parsed = parseI32(this.data.value);
        return parsed === null ? fallback : parsed !== 0;
      }
      case "Int32":
      case "Float32": return this.data.value !== 0;
      case "UInt64":  return this.data.value !== 0n;
      default:        return fallback;
    }
  }

  toString(): string {
    if (!this.valid) return "<invalid>";
    if (this.data.type === "None" && this.children.size > 0) return this.name;
    return `${this.name} = ${this.asString("")}`;
  }
}

const INVALID: KeyValue = Object.freeze(
  new KeyValue("<invalid>", NO_DATA, new Map(), false),
);

// ---------------------------------------------------------------------------
// Numeric coercion helpers
// ---------------------------------------------------------------------------

const I32_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$|^[+-]?(inf|infinity|nan)$/i;

/** Strict integer parse: whole string, in i32 range, otherwise null. */
export function parseI32(text: string): number | null {
  if (!I32_PATTERN.test(text)) return null;
  const value = Number(text);
  if (value < -2147483648 || value > 2147483647) return null;
  return value;
}

/** Strict float parse: whole string, rounded to f32, otherwise null. */
export function parseF32(text: string): number | null {
  if (!FLOAT_PATTERN.test(text)) return null;
  const lower = text.toLowerCase().replace(/^\+/, "");
  if (lower.endsWith("nan")) return NaN;
  if (lower.includes("inf")) return lower.startsWith("-") ? -Infinity : Infinity;
  return Math.fround(Number(text));
}

/** `value` written out in positional notation, never with an exponent. */
function plainDecimal(value: number): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(value.toExponential());
  if (!match) return String(value);
  const [, sign, lead, rest = "", exp] = match;
  const digits = lead + rest;
  const exponent = Number(exp);

  let text: string;
  if (exponent < 0) {
    text = `0.${"0".repeat(-exponent - 1)}${digits}`;
  } else if (digits.length <= exponent + 1) {
    text = digits + "0".repeat(exponent + 1 - digits.length);
  } else {
    text = `${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
  }
  return sign + text;
}

/** Shortest decimal text that reads back as the same f32, without exponent notation. */
export function formatF32(value: number): string {
  if (!Number.isFinite(value)) return Number.isNaN(value) ? "NaN" : value > 0 ? "inf" : "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";
  for (let digits = 1; digits < 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) return plainDecimal(candidate);
  }
  return plainDecimal(Number(value.toPrecision(9)));
}

/** Float → i32 with saturation; NaN becomes 0. */
function truncateToI32(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value >= 2147483647) return 2147483647;
  if (value <= -2147483648) return -2147483648;
  return Math.trunc(value);
}

// ---------------------------------------------------------------------------
// Byte cursor
// ---------------------------------------------------------------------------

/** Bytes added to the string scratch buffer each time it fills up. */
export const STRING_CHUNK = 128;

class ByteCursor {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  private take(count: number): Buffer {
    if (this.offset + count > this.bytes.length) {
      throw new KeyValueError(
        "Io",
        `unexpected end of stream at byte ${this.offset} (needed ${count})`,
      );
    }
    const slice = this.bytes.subarray(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }

  u8(): number {
    return this.take(1)[0] ?? 0;
  }

  i32(): number {
    return this.take(4).readInt32LE(0);
  }

  u32(): number {
    return this.take(4).readUInt32LE(0);
  }

  f32(): number {
    return this.take(4).readFloatLE(0);
  }

  u64(): bigint {
    return this.take(8).readBigUInt64LE(0);
  }

  /** Null-terminated UTF-8 string, scanned one byte at a time. */
  cstring(): string {
    let scratch = Buffer.alloc(STRING_CHUNK);
    let length = 0;
    for (;;) {
      const byte = this.u8();
      if (byte === 0) break;
      if (length === scratch.length) {
        const grown = Buffer.alloc(scratch.length + STRING_CHUNK);
        scratch.copy(grown);
        scratch = grown;
      }
      scratch[length++] = byte;
    }
    return scratch.toString("utf8", 0, length);
  }
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

function readChildren(cursor: ByteCursor): Map<string, KeyValue> {
  const children = new Map<string, KeyValue>();
  for (;;) {
    const tag = cursor.u8();
    if (!isKeyValueType(tag)) {
      throw new KeyValueError("Format", `Invalid KeyValueType: ${tag}`);
    }
    if (tag === KeyValueType.End) return children;

    const name = cursor.cstring();
    let node: KeyValue;

    switch (tag) {
      case KeyValueType.None:
        node = new KeyValue(name, NO_DATA, readChildren(cursor));
        break;
      case KeyValueType.String:
        node = new KeyValue(name, { type: "String", value: cursor.cstring() });
        break;
      case KeyValueType.WideString:
        throw new KeyValueError("UnsupportedType", TAG_NAMES[tag]);
      case KeyValueType.Int32:
        node = new KeyValue(name, { type: "Int32", value: cursor.i32() });
        break;
      case KeyValueType.UInt64:
        node = new KeyValue(name, { type: "UInt64", value: cursor.u64() });
        break;
      case KeyValueType.Float32:
        node = new KeyValue(name, { type: "Float32", value: cursor.f32() });
        break;
      case KeyValueType.Color:
      case KeyValueType.Pointer:
        node = new KeyValue(name, { type: "Color", value: cursor.u32() });
        break;
      default:
        throw new KeyValueError("Format", `Invalid KeyValueType: ${String(tag)}`);
    }

    // last write wins among same-named siblings
    children.set(name, node);
  }
}

/**
 * Decodes a complete binary KeyValue stream into a fresh root node.
 * Throws KeyValueError; nothing built before the failure is returned.
 */
export function decodeKeyValue(bytes: Buffer): KeyValue {
  return KeyValue.root(readChildren(new ByteCursor(bytes)));
}

/** Reads and decodes a binary KeyValue file. File errors surface as "Io". */
export async function loadKeyValueFile(path: string): Promise<KeyValue> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new KeyValueError("Io", message);
  }
  return decodeKeyValue(bytes);
}

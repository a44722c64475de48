/**
 * Canonical CBOR for share bundle payloads.
 *
 * Encoding accepts strings, booleans, null, byte strings, arrays, plain
 * objects and safe integers. Object keys are written in sorted order and
 * undefined fields are dropped. Anything else (floats, bigints, Maps, Dates,
 * class instances) is refused with the path where it was found.
 *
 * Decoding accepts only bytes this encoder would have produced: the decoded
 * value is re-encoded and must match byte for byte.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function normalize(value: unknown, at: string): unknown {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) throw new Error(`non-integer number at ${at}`);
    return value;
  }
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map((v, i) => normalize(v, `${at}/${i}`));
  if (typeof value === "object" && isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = normalize(v, `${at}/${key}`);
    }
    return out;
  }
  throw new Error(`unsupported value at ${at}`);
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

export function canonicalEncode(value: unknown): Uint8Array {
  // Copy out of the encoder's working buffer.
  return new Uint8Array(encoder.encode(normalize(value, "")));
}

/** Throws on malformed, truncated or non-canonical CBOR. */
export function canonicalDecode(bytes: Uint8Array): unknown {
  const value: unknown = encoder.decode(bytes);
  if (!sameBytes(canonicalEncode(value), bytes)) {
    throw new Error("payload is not in canonical form");
  }
  return value;
}

/**
 * ShareBundleCodec.
 *
 * One canonical structure (ShareBundleV1), two encodings:
 *
 *   binary:  "RCTLSHR1" ‖ SHA256(payload) ‖ payload
 *            payload = canonical CBOR of the bundle
 *   text:    base64 of the binary bytes
 *
 * The text form is the binary form in another alphabet, so both decode to
 * the same bundle by construction. Anything that fails the magic, checksum,
 * CBOR, schema or piece layout check is `bundle_corrupt`. Decoded paths
 * are catalog-normalized.
 */

import { sha256 } from "@noble/hashes/sha256";
import { Value } from "@sinclair/typebox/value";
import { canonicalDecode, canonicalEncode } from "./canonical.js";
import {
  BUNDLE_CHECKSUM_BYTES,
  BUNDLE_HEADER_BYTES,
  BUNDLE_MAGIC,
  BUNDLE_MAX_CHUNKS,
  BUNDLE_VERSION,
} from "./constants.js";
import { EngineError } from "./errors.js";
import { normalizeCatalogPath } from "./path.js";
import { ShareBundleV1, type SharedFileV1 } from "./schemas/bundle.js";

const MAGIC_BYTES = new TextEncoder().encode(BUNDLE_MAGIC);
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

function corrupt(detail: string): EngineError {
  return new EngineError("bundle_corrupt", `share bundle is corrupt: ${detail}`);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Every chunk in [0, ceil(file_size / piece_size)) needs at least one piece,
 * and no piece may point past the last chunk.
 */
function checkLayout(f: SharedFileV1): void {
  const chunks = Math.ceil(f.file_size / f.piece_size);
  if (chunks > BUNDLE_MAX_CHUNKS) {
    throw corrupt(`${f.sia_path} spans ${chunks} chunks, more than ${BUNDLE_MAX_CHUNKS}`);
  }
  const covered = new Set<number>();
  for (const p of f.pieces) {
    if (p.chunk >= chunks) {
      throw corrupt(`${f.sia_path} has a piece for chunk ${p.chunk} of ${chunks}`);
    }
    covered.add(p.chunk);
  }
  if (covered.size !== chunks) {
    throw corrupt(`${f.sia_path} has chunks without pieces`);
  }
}

export function buildBundle(files: readonly SharedFileV1[]): ShareBundleV1 {
  if (files.length === 0) {
    throw new Error("a share bundle needs at least one file");
  }
  return { version: BUNDLE_VERSION, files: files.slice() };
}

export function encodeBundle(bundle: ShareBundleV1): Uint8Array {
  const payload = canonicalEncode(bundle);
  const out = new Uint8Array(BUNDLE_HEADER_BYTES + payload.length);
  out.set(MAGIC_BYTES, 0);
  out.set(sha256(payload), MAGIC_BYTES.length);
  out.set(payload, BUNDLE_HEADER_BYTES);
  return out;
}

export function encodeBundleText(bundle: ShareBundleV1): string {
  return Buffer.from(encodeBundle(bundle)).toString("base64");
}

export function decodeBundle(bytes: Uint8Array): ShareBundleV1 {
  if (bytes.length <= BUNDLE_HEADER_BYTES) {
    throw corrupt("truncated header");
  }
  if (!bytesEqual(bytes.subarray(0, MAGIC_BYTES.length), MAGIC_BYTES)) {
    throw corrupt("unrecognized format");
  }

  const checksum = bytes.subarray(MAGIC_BYTES.length, MAGIC_BYTES.length + BUNDLE_CHECKSUM_BYTES);
  const payload = bytes.subarray(BUNDLE_HEADER_BYTES);
  if (!bytesEqual(sha256(payload), checksum)) {
    throw corrupt("checksum mismatch");
  }

  let decoded: unknown;
  try {
    decoded = canonicalDecode(payload);
  } catch (err) {
    throw corrupt(err instanceof Error ? err.message : "undecodable payload");
  }

  if (!Value.Check(ShareBundleV1, decoded)) {
    const first = Value.Errors(ShareBundleV1, decoded).First();
    throw corrupt(first ? `${first.path || "/"} ${first.message}` : "schema mismatch");
  }

  const seen = new Set<string>();
  const files = decoded.files.map((f): SharedFileV1 => {
    const siaPath = normalizeCatalogPath(f.sia_path);
    if (siaPath === "") throw corrupt(`empty path ${JSON.stringify(f.sia_path)}`);
    if (seen.has(siaPath)) throw corrupt(`duplicate path ${siaPath}`);
    seen.add(siaPath);
    const file = { ...f, sia_path: siaPath };
    checkLayout(file);
    return file;
  });

  return { version: decoded.version, files };
}

export function decodeBundleText(text: string): ShareBundleV1 {
  const compact = text.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw corrupt("not valid base64");
  }
  return decodeBundle(new Uint8Array(Buffer.from(compact, "base64")));
}

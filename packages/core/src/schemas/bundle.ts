/**
 * ShareBundleV1 — portable set of catalog entries.
 *
 * Enough metadata to rebuild each entry in another renter: sizes, erasure
 * parameters, the file key, and where every piece lives. No file data.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const SharedPieceV1 = Type.Object(
  {
    host: Type.String({ minLength: 1 }),
    chunk: Type.Integer({ minimum: 0 }),
    piece: Type.Integer({ minimum: 0 }),
    merkle_root: Hex32,
  },
  { additionalProperties: false },
);

export type SharedPieceV1 = Static<typeof SharedPieceV1>;

export const ErasureCodeV1 = Type.Object(
  {
    data_pieces: Type.Integer({ minimum: 1 }),
    parity_pieces: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type ErasureCodeV1 = Static<typeof ErasureCodeV1>;

export const SharedFileV1 = Type.Object(
  {
    sia_path: Type.String({ minLength: 1 }),
    file_size: Type.Integer({ minimum: 0 }),
    master_key: Hex32,
    erasure_code: ErasureCodeV1,
    piece_size: Type.Integer({ minimum: 1 }),
    pieces: Type.Array(SharedPieceV1),
  },
  { additionalProperties: false },
);

export type SharedFileV1 = Static<typeof SharedFileV1>;

export const ShareBundleV1 = Type.Object(
  {
    version: Type.Literal(1),
    files: Type.Array(SharedFileV1, { minItems: 1 }),
  },
  { additionalProperties: false },
);

export type ShareBundleV1 = Static<typeof ShareBundleV1>;

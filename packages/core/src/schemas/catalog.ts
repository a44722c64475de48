/**
 * File catalog and download queue wire shapes.
 */

import { Type, type Static } from "@sinclair/typebox";

export const FileInfoV1 = Type.Object(
  {
    siapath: Type.String(),
    filesize: Type.Integer({ minimum: 0 }),
    available: Type.Boolean(),
    renewing: Type.Boolean(),
    uploadprogress: Type.Number({ minimum: 0, maximum: 100 }),
    expiration: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type FileInfoV1 = Static<typeof FileInfoV1>;

export const DownloadInfoV1 = Type.Object(
  {
    siapath: Type.String(),
    destination: Type.String(),
    filesize: Type.Integer({ minimum: 0 }),
    received: Type.Integer({ minimum: 0 }),
    /** ISO-8601 */
    starttime: Type.String(),
  },
  { additionalProperties: false },
);

export type DownloadInfoV1 = Static<typeof DownloadInfoV1>;

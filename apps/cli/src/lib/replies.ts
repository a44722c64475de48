/**
 * renterd reply envelopes, checked by the http helpers.
 */

import { Type } from "@sinclair/typebox";
import {
  DownloadInfoV1,
  FileInfoV1,
  HostEntryV1,
  RenterContractV1,
} from "@renterctl/core";

export { RenterGetV1 } from "@renterctl/core";

export const OkReply = Type.Object({ ok: Type.Literal(true) });
export const ContractsReply = Type.Object({ contracts: Type.Array(RenterContractV1) });
export const DownloadsReply = Type.Object({ downloads: Type.Array(DownloadInfoV1) });
export const FilesReply = Type.Object({ files: Type.Array(FileInfoV1) });
export const HostsReply = Type.Object({ hosts: Type.Array(HostEntryV1) });
export const ShareAsciiReply = Type.Object({ asciisia: Type.String() });
export const LoadReply = Type.Object({ filesadded: Type.Array(Type.String()) });

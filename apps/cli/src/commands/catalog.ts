/**
 * renterctl renter upload | download | rename | delete
 *
 * renterd only accepts absolute local paths, so relative ones are resolved
 * against the working directory here.
 */

import { resolve } from "node:path";
import type { CliConfig } from "../lib/config.js";
import { catalogUrl, httpGetRotate, httpPostRotate, withQuery } from "../lib/http.js";
import { OkReply } from "../lib/replies.js";

export async function uploadCommand(source: string, path: string, config: CliConfig): Promise<void> {
  const absolute = resolve(source);
  await httpPostRotate(config.apis, catalogUrl("/renter/upload", path), { source: absolute }, OkReply);
  console.log(`Uploaded ${absolute} → ${path}`);
}

export async function downloadCommand(
  path: string,
  destination: string,
  config: CliConfig,
): Promise<void> {
  const absolute = resolve(destination);
  await httpGetRotate(
    config.apis,
    withQuery(catalogUrl("/renter/download", path), { destination: absolute }),
    OkReply,
  );
  console.log(`Downloaded ${path} → ${absolute}`);
}

export async function renameCommand(oldPath: string, newPath: string, config: CliConfig): Promise<void> {
  await httpPostRotate(config.apis, catalogUrl("/renter/rename", oldPath), { newsiapath: newPath }, OkReply);
  console.log(`Renamed ${oldPath} → ${newPath}`);
}

export async function deleteCommand(path: string, config: CliConfig): Promise<void> {
  await httpPostRotate(config.apis, catalogUrl("/renter/delete", path), {}, OkReply);
  console.log(`Deleted ${path}`);
}

/**
 * renterctl renter share <destination> <paths...>
 * renterctl renter share --ascii <paths...>
 * renterctl renter load <source>
 * renterctl renter load --ascii <text>
 */

import { resolve } from "node:path";
import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate, withQuery } from "../lib/http.js";
import { LoadReply, OkReply, ShareAsciiReply } from "../lib/replies.js";

export async function shareCommand(
  destination: string,
  paths: string[],
  config: CliConfig,
): Promise<void> {
  const absolute = resolve(destination);
  await httpGetRotate(
    config.apis,
    withQuery("/renter/share", { siapaths: paths.join(","), destination: absolute }),
    OkReply,
  );
  console.log(`Shared ${paths.length} file(s) → ${absolute}`);
}

/** Prints the bundle text alone so it can be piped. */
export async function shareAsciiCommand(paths: string[], config: CliConfig): Promise<void> {
  const { asciisia } = await httpGetRotate(
    config.apis,
    withQuery("/renter/shareascii", { siapaths: paths.join(",") }),
    ShareAsciiReply,
  );
  console.log(asciisia);
}

function printAdded(filesadded: string[]): void {
  console.log(`Loaded ${filesadded.length} file(s):`);
  for (const path of filesadded) console.log(`  ${path}`);
}

export async function loadCommand(source: string, config: CliConfig): Promise<void> {
  const { filesadded } = await httpPostRotate(
    config.apis,
    "/renter/load",
    { source: resolve(source) },
    LoadReply,
  );
  printAdded(filesadded);
}

export async function loadAsciiCommand(text: string, config: CliConfig): Promise<void> {
  const { filesadded } = await httpPostRotate(config.apis, "/renter/loadascii", { asciisia: text }, LoadReply);
  printAdded(filesadded);
}

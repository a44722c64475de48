/**
 * renterctl renter contracts | downloads | files
 */

import type { CliConfig } from "../lib/config.js";
import { httpGetRotate } from "../lib/http.js";
import { ContractsReply, DownloadsReply, FilesReply } from "../lib/replies.js";

export async function contractsCommand(config: CliConfig): Promise<void> {
  const { contracts } = await httpGetRotate(config.apis, "/renter/contracts", ContractsReply);
  if (contracts.length === 0) {
    console.log("No contracts.");
    return;
  }

  console.log(`${contracts.length} contract(s):\n`);
  for (const c of contracts) {
    console.log(`  ${c.id.slice(0, 16)}...`);
    console.log(`    host:   ${c.netaddress}`);
    console.log(`    ends:   block ${c.endheight}`);
    console.log(`    funds:  ${c.renterfunds}`);
    console.log(`    size:   ${c.size} bytes`);
    console.log();
  }
}

export async function downloadsCommand(config: CliConfig): Promise<void> {
  const { downloads } = await httpGetRotate(config.apis, "/renter/downloads", DownloadsReply);
  if (downloads.length === 0) {
    console.log("No downloads.");
    return;
  }

  for (const d of downloads) {
    const pct = d.filesize === 0 ? 100 : Math.floor((d.received * 100) / d.filesize);
    console.log(`  ${d.siapath} → ${d.destination}  ${d.received}/${d.filesize} (${pct}%)  ${d.starttime}`);
  }
}

export async function filesCommand(config: CliConfig): Promise<void> {
  const { files } = await httpGetRotate(config.apis, "/renter/files", FilesReply);
  if (files.length === 0) {
    console.log("No files.");
    return;
  }

  for (const f of files) {
    const state = f.available ? "available" : `${f.uploadprogress}%`;
    console.log(`  ${f.siapath}  ${f.filesize} bytes  ${state}  expires ${f.expiration}`);
  }
}

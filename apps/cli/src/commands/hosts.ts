/**
 * renterctl hosts active [-n count]
 * renterctl hosts all
 *
 * GET /renter/hosts/{active,all} → print host list + pricing.
 */

import type { HostEntryV1 } from "@renterctl/core";
import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, withQuery } from "../lib/http.js";
import { HostsReply } from "../lib/replies.js";

function printHosts(hosts: HostEntryV1[]): void {
  if (hosts.length === 0) {
    console.log("No hosts known.");
    return;
  }

  console.log(`${hosts.length} host(s):\n`);

  for (const host of hosts) {
    console.log(`  ${host.netaddress}`);
    console.log(`    pubkey:    ${host.publickey.slice(0, 24)}...`);
    console.log(`    accepting: ${host.acceptingcontracts ? "yes" : "no"}`);
    console.log(`    pricing:   ${host.contractprice} per contract, ${host.storageprice} storage`);
    console.log(`    storage:   ${host.remainingstorage} bytes free, max ${host.maxduration} blocks`);
    console.log();
  }
}

export async function hostsActiveCommand(config: CliConfig, count?: string): Promise<void> {
  const { hosts } = await httpGetRotate(
    config.apis,
    withQuery("/renter/hosts/active", { numhosts: count }),
    HostsReply,
  );
  printHosts(hosts);
}

export async function hostsAllCommand(config: CliConfig): Promise<void> {
  const { hosts } = await httpGetRotate(config.apis, "/renter/hosts/all", HostsReply);
  printHosts(hosts);
}

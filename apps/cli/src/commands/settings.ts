/**
 * renterctl renter settings
 * renterctl renter allowance <funds> <period> [--hosts n] [--renew-window n]
 *
 * Values are sent as typed; renterd does the parsing and minimum checks.
 */

import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate } from "../lib/http.js";
import { OkReply, RenterGetV1 } from "../lib/replies.js";

export interface AllowanceOptions {
  hosts?: string;
  renewWindow?: string;
}

export async function settingsCommand(config: CliConfig): Promise<void> {
  const { settings, financialmetrics: m } = await httpGetRotate(config.apis, "/renter", RenterGetV1);
  const a = settings.allowance;

  console.log("Allowance:");
  console.log(`  funds:        ${a.funds}`);
  console.log(`  hosts:        ${a.hosts}`);
  console.log(`  period:       ${a.period} blocks`);
  console.log(`  renew window: ${a.renewwindow} blocks`);
  console.log("Spending:");
  console.log(`  contracts:    ${m.contractspending}`);
  console.log(`  downloads:    ${m.downloadspending}`);
  console.log(`  storage:      ${m.storagespending}`);
  console.log(`  uploads:      ${m.uploadspending}`);
  console.log(`  unspent:      ${m.unspent}`);
}

export async function allowanceCommand(
  funds: string,
  period: string,
  opts: AllowanceOptions,
  config: CliConfig,
): Promise<void> {
  await httpPostRotate(
    config.apis,
    "/renter",
    {
      funds,
      period,
      ...(opts.hosts !== undefined ? { hosts: opts.hosts } : {}),
      ...(opts.renewWindow !== undefined ? { renewwindow: opts.renewWindow } : {}),
    },
    OkReply,
  );
  console.log("Allowance updated.");
}

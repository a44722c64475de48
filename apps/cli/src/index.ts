#!/usr/bin/env node
/**
 * renterctl — command line client for renterd.
 *
 * Commands:
 *   renter settings                          Allowance + spending
 *   renter allowance <funds> <period>        Replace the allowance
 *   renter contracts | downloads | files     Lists
 *   renter upload <source> <path>            Store a local file
 *   renter download <path> <destination>     Fetch a file to a local path
 *   renter rename <old> <new>                Rename a catalog entry
 *   renter delete <path>                     Remove a catalog entry
 *   renter share <destination> <paths...>    Export a bundle file
 *   renter share --ascii <paths...>          Export a bundle as text
 *   renter load <source> | --ascii <text>    Import a bundle
 *   hosts active [-n count] | all            Host directory
 *   config [--api url]                       Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { allowanceCommand, settingsCommand } from "./commands/settings.js";
import { contractsCommand, downloadsCommand, filesCommand } from "./commands/lists.js";
import { deleteCommand, downloadCommand, renameCommand, uploadCommand } from "./commands/catalog.js";
import { loadAsciiCommand, loadCommand, shareAsciiCommand, shareCommand } from "./commands/share.js";
import { hostsActiveCommand, hostsAllCommand } from "./commands/hosts.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("renterctl")
  .description("Control a storage renter over its HTTP API")
  .version("0.1.0")
  .option("-a, --api <url>", "renterd URL override");

/** Config with the --api override applied. */
async function resolveConfig(): Promise<CliConfig> {
  const config = await loadConfig();
  const { api } = program.opts<{ api?: string }>();
  if (api) {
    config.api = api;
    config.apis = [api];
  }
  return config;
}

// ── renter ──────────────────────────────────────────────────────────

const renter = program.command("renter").description("Allowance, catalog and sharing");

renter
  .command("settings")
  .description("Show the allowance and spending")
  .action(async () => {
    await settingsCommand(await resolveConfig());
  });

renter
  .command("allowance")
  .description("Replace the allowance (hosts and renew window default server-side)")
  .argument("<funds>", "Funds in base currency units")
  .argument("<period>", "Period in blocks")
  .option("--hosts <n>", "Number of hosts to form contracts with")
  .option("--renew-window <blocks>", "Blocks before expiry at which contracts renew")
  .action(async (funds: string, period: string, opts: { hosts?: string; renewWindow?: string }) => {
    await allowanceCommand(funds, period, opts, await resolveConfig());
  });

renter
  .command("contracts")
  .description("List active contracts")
  .action(async () => {
    await contractsCommand(await resolveConfig());
  });

renter
  .command("downloads")
  .description("List the download queue")
  .action(async () => {
    await downloadsCommand(await resolveConfig());
  });

renter
  .command("files")
  .description("List the file catalog")
  .action(async () => {
    await filesCommand(await resolveConfig());
  });

renter
  .command("upload")
  .description("Upload a local file under a catalog path")
  .argument("<source>", "Local file")
  .argument("<path>", "Catalog path")
  .action(async (source: string, path: string) => {
    await uploadCommand(source, path, await resolveConfig());
  });

renter
  .command("download")
  .description("Download a catalog file to a local path")
  .argument("<path>", "Catalog path")
  .argument("<destination>", "Local file to write")
  .action(async (path: string, destination: string) => {
    await downloadCommand(path, destination, await resolveConfig());
  });

renter
  .command("rename")
  .description("Rename a catalog entry")
  .argument("<old>", "Current catalog path")
  .argument("<new>", "New catalog path")
  .action(async (oldPath: string, newPath: string) => {
    await renameCommand(oldPath, newPath, await resolveConfig());
  });

renter
  .command("delete")
  .description("Remove a catalog entry")
  .argument("<path>", "Catalog path")
  .action(async (path: string) => {
    await deleteCommand(path, await resolveConfig());
  });

renter
  .command("share")
  .description("Export catalog entries as a share bundle")
  .argument("<targets...>", "<destination> <paths...>, or <paths...> with --ascii")
  .option("--ascii", "Print the bundle as text instead of writing a file")
  .action(async (targets: string[], opts: { ascii?: boolean }) => {
    const config = await resolveConfig();
    if (opts.ascii) {
      await shareAsciiCommand(targets, config);
      return;
    }
    const [destination, ...paths] = targets;
    if (destination === undefined || paths.length === 0) {
      throw new Error("usage: renterctl renter share <destination> <paths...>");
    }
    await shareCommand(destination, paths, config);
  });

renter
  .command("load")
  .description("Import a share bundle")
  .argument("[source]", "Bundle file")
  .option("--ascii <text>", "Bundle text instead of a file")
  .action(async (source: string | undefined, opts: { ascii?: string }) => {
    const config = await resolveConfig();
    if (opts.ascii !== undefined) {
      await loadAsciiCommand(opts.ascii, config);
      return;
    }
    if (source === undefined) {
      throw new Error("usage: renterctl renter load <source> | --ascii <text>");
    }
    await loadCommand(source, config);
  });

// ── hosts ───────────────────────────────────────────────────────────

const hosts = program.command("hosts").description("Host directory");

hosts
  .command("active")
  .description("List hosts accepting contracts")
  .option("-n, --count <n>", "Return at most n hosts")
  .action(async (opts: { count?: string }) => {
    await hostsActiveCommand(await resolveConfig(), opts.count);
  });

hosts
  .command("all")
  .description("List every known host")
  .action(async () => {
    await hostsAllCommand(await resolveConfig());
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration (multi-endpoint aware)")
  .option("--api <url>", "Set primary renterd URL")
  .action(async (opts: { api?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});

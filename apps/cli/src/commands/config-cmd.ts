/**
 * renterctl config [--api url]
 *
 * Show or update CLI configuration. A new --api becomes the primary
 * endpoint; the others stay behind it for rotation.
 */

import { loadConfig, saveConfig, getConfigPath } from "../lib/config.js";

interface ConfigOptions {
  api?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  const config = await loadConfig();

  if (opts.api) {
    const existing = config.apis.filter((a) => a !== opts.api);
    config.apis = [opts.api, ...existing];
    config.api = opts.api;
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  apis: ${config.apis.join(", ") || "(none)"}`);
}

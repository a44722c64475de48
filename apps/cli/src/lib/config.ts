/**
 * CLI configuration — loads from ~/.renterctl/config.json + env overrides.
 *
 * Priority: env vars > config file > default.
 *
 * Multi-endpoint support:
 *   "apis" lists renterd endpoints in preference order; requests rotate to
 *   the next one on network errors. "api" is always apis[0].
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Primary renterd URL (first entry of apis[]). */
  api: string;
  /** All renterd endpoints, ordered by preference. */
  apis: string[];
}

const DEFAULT_API = "http://127.0.0.1:9980";

const ConfigFile = Type.Object({
  api: Type.Optional(Type.String()),
  apis: Type.Optional(Type.Array(Type.String())),
});

/** RENTERCTL_HOME relocates the config directory. */
export function getConfigDir(): string {
  return process.env["RENTERCTL_HOME"] ?? join(homedir(), ".renterctl");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readConfigFile(): Promise<{ api?: string; apis?: string[] }> {
  let raw: string;
  try {
    raw = await readFile(getConfigPath(), "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Value.Check(ConfigFile, parsed)) {
    throw new Error(`${getConfigPath()} is not a valid renterctl config`);
  }
  return parsed;
}

function splitList(raw: string | undefined): string[] | undefined {
  const list = raw?.split(",").map((s) => s.trim()).filter(Boolean);
  return list && list.length > 0 ? list : undefined;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  const file = await readConfigFile();

  // env list > env single > file list > file single > default
  const envApi = process.env["RENTERCTL_API"];
  const apis: string[] =
    splitList(process.env["RENTERCTL_APIS"]) ??
    (envApi ? [envApi] : undefined) ??
    (file.apis && file.apis.length > 0 ? file.apis : undefined) ??
    (file.api ? [file.api] : undefined) ??
    [DEFAULT_API];

  return { api: apis[0] ?? DEFAULT_API, apis };
}

/** Save config to disk. Only the list is persisted; api is derived. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify({ apis: config.apis }, null, 2) + "\n", "utf-8");
}

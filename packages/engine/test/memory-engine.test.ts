/**
 * MemoryRenterEngine — contractor, catalog, transfers and bundle import.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  EngineError,
  PROFILES,
  encodeBundleText,
  type AllowanceSettings,
  type SharedFileV1,
} from "@renterctl/core";
import { MemoryRenterEngine } from "../src/memory-engine.js";
import { syntheticHosts } from "../src/dev-hosts.js";

const SECTOR = PROFILES.testing.sectorSize; // 4096

const ALLOWANCE: AllowanceSettings = { funds: 1000n, hosts: 2, period: 100, renewWindow: 50 };

function newEngine(hostCount = 3, blockHeight = 10): MemoryRenterEngine {
  return new MemoryRenterEngine({
    profile: PROFILES.testing,
    hosts: syntheticHosts(hostCount),
    blockHeight,
    quiet: true,
  });
}

async function codeOf(p: Promise<unknown>): Promise<string | undefined> {
  try {
    await p;
  } catch (err) {
    if (err instanceof EngineError) return err.code;
    throw err;
  }
  return undefined;
}

function pattern(size: number, seed = 0): Uint8Array {
  const bytes = new Uint8Array(size);
  for (let i = 0; i < size; i++) bytes[i] = (i + seed) % 251;
  return bytes;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "memory-engine-test-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function uploadBytes(engine: MemoryRenterEngine, siaPath: string, bytes: Uint8Array) {
  const source = join(dir, `${siaPath.replace(/\//g, "_")}.src`);
  await writeFile(source, bytes);
  await engine.upload({ source, siaPath });
}

// ── Settings ───────────────────────────────────────────────────────

describe("setSettings", () => {
  it("rejects allowances the contractor cannot use", async () => {
    const engine = newEngine();
    await expect(engine.setSettings({ allowance: { ...ALLOWANCE, hosts: 0 } })).rejects.toThrow(
      "allowance must use at least one host",
    );
    await expect(engine.setSettings({ allowance: { ...ALLOWANCE, period: 0, renewWindow: 0 } })).rejects.toThrow(
      "allowance period must be nonzero",
    );
    await expect(engine.setSettings({ allowance: { ...ALLOWANCE, renewWindow: 0 } })).rejects.toThrow(
      "renew window must be nonzero",
    );
    expect(await codeOf(engine.setSettings({ allowance: { ...ALLOWANCE, renewWindow: 100 } }))).toBe(
      "engine_rejected",
    );
  });

  it("leaves settings untouched when rejected", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await engine.setSettings({ allowance: { ...ALLOWANCE, renewWindow: 500 } }).catch(() => undefined);
    expect((await engine.settings()).allowance).toEqual(ALLOWANCE);
  });

  it("forms one contract per host up to the allowance", async () => {
    const engine = newEngine(3, 10);
    await engine.setSettings({ allowance: ALLOWANCE });

    const contracts = await engine.contracts();
    expect(contracts.map((c) => c.netAddress)).toEqual(["host-1.local:9982", "host-2.local:9982"]);
    expect(contracts.every((c) => c.endHeight === 110)).toBe(true);
    expect(contracts.every((c) => c.renterFunds === 500n)).toBe(true);
    expect(contracts.every((c) => c.merkleRoots.length === 0)).toBe(true);
  });

  it("leaves the shortfall unspent when fewer hosts exist", async () => {
    const engine = newEngine(3);
    await engine.setSettings({ allowance: { ...ALLOWANCE, hosts: 4 } });
    expect(await engine.contracts()).toHaveLength(3);
    expect(await engine.financialMetrics()).toEqual({
      contractSpending: 750n,
      downloadSpending: 0n,
      storageSpending: 0n,
      uploadSpending: 0n,
      unspent: 250n,
    });
  });

  it("renews contracts inside the renew window", async () => {
    const engine = newEngine(2, 0);
    await engine.setSettings({ allowance: ALLOWANCE });
    const [first] = await engine.contracts();

    engine.advance(60); // 40 blocks left, inside the 50-block window
    await engine.setSettings({ allowance: ALLOWANCE });
    const [renewed] = await engine.contracts();

    expect(renewed?.id).toBe(first?.id);
    expect(renewed?.endHeight).toBe(160);
  });

  it("does not renew contracts outside the window", async () => {
    const engine = newEngine(2, 0);
    await engine.setSettings({ allowance: ALLOWANCE });
    engine.advance(10);
    await engine.setSettings({ allowance: ALLOWANCE });
    expect((await engine.contracts()).map((c) => c.endHeight)).toEqual([100, 100]);
  });
});

// ── Transfers ──────────────────────────────────────────────────────

describe("upload and download", () => {
  it("refuses uploads before any contract exists", async () => {
    const engine = newEngine();
    expect(await codeOf(engine.upload({ source: join(dir, "x"), siaPath: "x" }))).toBe("no_contracts");
  });

  it("stores sectors on every contract and reassembles the file", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    const original = pattern(SECTOR * 2 + 100);
    await uploadBytes(engine, "docs/big.bin", original);

    const contracts = await engine.contracts();
    expect(contracts.map((c) => c.merkleRoots.length)).toEqual([3, 3]);

    const dest = join(dir, "out.bin");
    await engine.download("docs/big.bin", dest);
    expect(new Uint8Array(await readFile(dest))).toEqual(original);
  });

  it("reports catalog state for uploaded files", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a.txt", pattern(10));

    expect(await engine.fileList()).toEqual([
      { siaPath: "a.txt", fileSize: 10, available: true, renewing: true, uploadProgress: 100, expiration: 110 },
    ]);
  });

  it("handles empty files", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "empty", new Uint8Array(0));
    const dest = join(dir, "empty.out");
    await engine.download("empty", dest);
    expect((await readFile(dest)).length).toBe(0);
  });

  it("rejects an upload onto an existing path", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a.txt", pattern(10));
    expect(await codeOf(uploadBytes(engine, "a.txt", pattern(5)))).toBe("path_exists");
  });

  it("reports unreadable sources as transfer failures", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    expect(await codeOf(engine.upload({ source: join(dir, "missing"), siaPath: "m" }))).toBe(
      "transfer_failed",
    );
    expect(await engine.fileList()).toEqual([]);
  });

  it("records downloads in the queue", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a.txt", pattern(10));
    const dest = join(dir, "a.out");
    await engine.download("a.txt", dest);

    const queue = await engine.downloadQueue();
    expect(queue).toHaveLength(1);
    expect(queue[0]).toMatchObject({ siaPath: "a.txt", destination: dest, fileSize: 10, received: 10 });
    expect(queue[0]?.startTime).toBeInstanceOf(Date);
  });

  it("fails downloads of unknown paths", async () => {
    const engine = newEngine();
    await expect(engine.download("nope", join(dir, "n"))).rejects.toThrow("no file known by the path nope");
  });
});

// ── Catalog ────────────────────────────────────────────────────────

describe("rename and delete", () => {
  it("renames in place", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a", pattern(1));
    await uploadBytes(engine, "b", pattern(2));
    await uploadBytes(engine, "c", pattern(3));

    await engine.renameFile("b", "renamed");
    expect((await engine.fileList()).map((f) => f.siaPath)).toEqual(["a", "renamed", "c"]);
  });

  it("refuses to rename onto an existing path or from a missing one", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a", pattern(1));
    await uploadBytes(engine, "b", pattern(2));

    expect(await codeOf(engine.renameFile("a", "b"))).toBe("path_exists");
    expect(await codeOf(engine.renameFile("zzz", "y"))).toBe("path_not_found");
  });

  it("treats a rename onto the same path as a no-op", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a", pattern(1));
    await uploadBytes(engine, "b", pattern(2));

    await engine.renameFile("a", "a");
    expect((await engine.fileList()).map((f) => f.siaPath)).toEqual(["a", "b"]);
  });

  it("deletes entries", async () => {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "a", pattern(1));
    await engine.deleteFile("a");
    expect(await engine.fileList()).toEqual([]);
    expect(await codeOf(engine.deleteFile("a"))).toBe("path_not_found");
  });
});

// ── Sharing ────────────────────────────────────────────────────────

describe("share bundles", () => {
  async function seeded(): Promise<MemoryRenterEngine> {
    const engine = newEngine();
    await engine.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(engine, "docs/a.txt", pattern(100, 1));
    await uploadBytes(engine, "docs/b.txt", pattern(5000, 2));
    await uploadBytes(engine, "docs/c.txt", pattern(3, 3));
    return engine;
  }

  it("moves catalog entries to another renter as text", async () => {
    const source = await seeded();
    const text = await source.shareFilesAscii(["docs/a.txt", "docs/b.txt"]);

    const target = newEngine();
    expect(await target.loadSharedFilesAscii(text)).toEqual(["docs/a.txt", "docs/b.txt"]);

    // Metadata only: the sectors live with the source renter's hosts.
    const files = await target.fileList();
    expect(files.map((f) => [f.siaPath, f.fileSize, f.available, f.uploadProgress])).toEqual([
      ["docs/a.txt", 100, false, 0],
      ["docs/b.txt", 5000, false, 0],
    ]);
    expect(await codeOf(target.download("docs/a.txt", join(dir, "a")))).toBe("transfer_failed");
  });

  it("moves catalog entries through a bundle file", async () => {
    const source = await seeded();
    const dest = join(dir, "share.rctl");
    await source.shareFiles(["docs/c.txt"], dest);

    const target = newEngine();
    expect(await target.loadSharedFiles(dest)).toEqual(["docs/c.txt"]);
  });

  it("re-importing into the same renter adds the same paths without duplicates", async () => {
    const engine = await seeded();
    const text = await engine.shareFilesAscii(["docs/a.txt", "docs/b.txt"]);
    expect(await engine.loadSharedFilesAscii(text)).toEqual(["docs/a.txt", "docs/b.txt"]);
    expect(await engine.fileList()).toHaveLength(3);
  });

  it("gives conflicting entries a numeric suffix", async () => {
    const source = await seeded();
    const text = await source.shareFilesAscii(["docs/a.txt"]);

    const target = newEngine();
    await target.setSettings({ allowance: ALLOWANCE });
    await uploadBytes(target, "docs/a.txt", pattern(7));
    await uploadBytes(target, "docs/a.txt_1", pattern(8));

    expect(await target.loadSharedFilesAscii(text)).toEqual(["docs/a.txt_2"]);
  });

  it("fails the whole export when any path is unknown", async () => {
    const engine = await seeded();
    await expect(engine.shareFilesAscii(["docs/a.txt", "docs/missing"])).rejects.toThrow(
      "no file known by the path docs/missing",
    );
  });

  it("refuses an empty export", async () => {
    const engine = await seeded();
    expect(await codeOf(engine.shareFilesAscii([]))).toBe("engine_rejected");
  });

  it("leaves the catalog untouched on a corrupt bundle", async () => {
    const engine = await seeded();
    const text = await engine.shareFilesAscii(["docs/a.txt"]);
    const target = newEngine();
    expect(await codeOf(target.loadSharedFilesAscii(text.slice(0, -8)))).toBe("bundle_corrupt");
    expect(await target.fileList()).toEqual([]);
  });

  function crafted(file: Partial<SharedFileV1>): string {
    return encodeBundleText({
      version: 1,
      files: [
        {
          sia_path: "docs/x",
          file_size: 10,
          master_key: "0f".repeat(32),
          erasure_code: { data_pieces: 1, parity_pieces: 0 },
          piece_size: SECTOR,
          pieces: [{ host: "host-1.local:9982", chunk: 0, piece: 0, merkle_root: "ab".repeat(32) }],
          ...file,
        },
      ],
    });
  }

  it("files imported entries under their normalized path", async () => {
    const engine = newEngine();
    expect(await engine.loadSharedFilesAscii(crafted({ sia_path: "/docs/x" }))).toEqual(["docs/x"]);

    await engine.deleteFile("docs/x");
    expect(await engine.fileList()).toEqual([]);
  });

  it("refuses a bundle whose size claims chunks it has no pieces for", async () => {
    const engine = newEngine();
    const text = crafted({ sia_path: "big", file_size: 300_000_000, piece_size: 1, pieces: [] });

    expect(await codeOf(engine.loadSharedFilesAscii(text))).toBe("bundle_corrupt");
    expect(await engine.fileList()).toEqual([]);
  });

  it("reports a missing bundle file as an engine failure", async () => {
    const engine = newEngine();
    expect(await codeOf(engine.loadSharedFiles(join(dir, "nothing.rctl")))).toBe("engine_failure");
  });
});

// ── Hosts ──────────────────────────────────────────────────────────

describe("host directory", () => {
  it("lists only hosts accepting contracts as active", async () => {
    const hosts = syntheticHosts(3);
    const second = hosts[1];
    if (second) second.acceptingContracts = false;
    const engine = new MemoryRenterEngine({ profile: PROFILES.testing, hosts, quiet: true });

    expect((await engine.activeHosts()).map((h) => h.netAddress)).toEqual([
      "host-1.local:9982",
      "host-3.local:9982",
    ]);
    expect(await engine.allHosts()).toHaveLength(3);
  });
});

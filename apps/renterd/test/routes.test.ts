/**
 * renterd routes against the in-process engine.
 *
 * Flow: set allowance → upload → list → download → share → delete → load
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FastifyInstance } from "fastify";
import { PROFILES } from "@renterctl/core";
import { MemoryRenterEngine, syntheticHosts } from "@renterctl/engine";
import { buildApp } from "../src/server.js";

function testApp(profile = PROFILES.testing): Promise<FastifyInstance> {
  const engine = new MemoryRenterEngine({ profile, hosts: syntheticHosts(3), quiet: true });
  return buildApp({ engine, profile, logger: false });
}

describe("renterd (testing profile)", () => {
  let app: FastifyInstance;
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "renterd-routes-test-"));
    await writeFile(join(tmpDir, "a.txt"), "hello renter");
    await writeFile(join(tmpDir, "b.txt"), "second file");
    app = await testApp();
  });

  afterAll(async () => {
    await app.close();
    await rm(tmpDir, { recursive: true, force: true });
  });

  // ── Health ───────────────────────────────────────────────────

  it("reports the profile", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", profile: "testing" });
  });

  // ── Settings ─────────────────────────────────────────────────

  it("starts with an empty allowance", async () => {
    const res = await app.inject({ method: "GET", url: "/renter" });
    expect(res.json().settings.allowance).toEqual({
      funds: "0",
      hosts: 0,
      period: 0,
      renewwindow: 0,
    });
  });

  it("refuses uploads before any contract exists", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/upload/docs/a.txt",
      payload: { source: join(tmpDir, "a.txt") },
    });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: "no_contracts",
      detail: "Upload failed: no contracts formed; set an allowance first",
    });
  });

  it("applies an allowance with defaulted hosts and renew window", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter",
      payload: { funds: "900", period: "100" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });

    const get = await app.inject({ method: "GET", url: "/renter" });
    expect(get.json()).toEqual({
      settings: { allowance: { funds: "900", hosts: 2, period: 100, renewwindow: 50 } },
      financialmetrics: {
        contractspending: "900",
        downloadspending: "0",
        storagespending: "0",
        uploadspending: "0",
        unspent: "0",
      },
    });
  });

  it("leaves settings unchanged when funds do not parse", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter",
      payload: { funds: "abc", period: "100" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "invalid_amount", detail: 'Couldn\'t parse funds: "abc"' });

    const get = await app.inject({ method: "GET", url: "/renter" });
    expect(get.json().settings.allowance.funds).toBe("900");
  });

  it("rejects a body missing required fields", async () => {
    const res = await app.inject({ method: "POST", url: "/renter", payload: { period: "100" } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("lists one contract per used host", async () => {
    const res = await app.inject({ method: "GET", url: "/renter/contracts" });
    const { contracts } = res.json();
    expect(contracts).toHaveLength(2);
    expect(contracts[0]).toMatchObject({
      netaddress: "host-1.local:9982",
      endheight: 100,
      renterfunds: "450",
      size: 0,
    });
  });

  // ── Transfers ────────────────────────────────────────────────

  it("uploads a local file into the catalog", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/upload/docs/a.txt",
      payload: { source: join(tmpDir, "a.txt") },
    });
    expect(res.statusCode).toBe(200);

    const files = await app.inject({ method: "GET", url: "/renter/files" });
    expect(files.json().files).toEqual([
      {
        siapath: "docs/a.txt",
        filesize: 12,
        available: true,
        renewing: true,
        uploadprogress: 100,
        expiration: 100,
      },
    ]);

    const contracts = await app.inject({ method: "GET", url: "/renter/contracts" });
    for (const c of contracts.json().contracts) expect(c.size).toBe(4096);
  });

  it("rejects an upload from a relative source", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/upload/docs/x.txt",
      payload: { source: "a.txt" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "relative_path_rejected",
      detail: "source must be an absolute path",
    });
  });

  it("downloads a file to an absolute destination", async () => {
    const destination = join(tmpDir, "out.txt");
    const res = await app.inject({
      method: "GET",
      url: "/renter/download/docs/a.txt",
      query: { destination },
    });
    expect(res.statusCode).toBe(200);
    expect(await readFile(destination, "utf-8")).toBe("hello renter");

    const queue = await app.inject({ method: "GET", url: "/renter/downloads" });
    expect(queue.json().downloads).toHaveLength(1);
    expect(queue.json().downloads[0]).toMatchObject({
      siapath: "docs/a.txt",
      destination,
      filesize: 12,
      received: 12,
    });
  });

  it("rejects a relative download destination", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/download/docs/a.txt",
      query: { destination: "out.txt" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "relative_path_rejected",
      detail: "destination must be an absolute path",
    });
  });

  it("reports download failures as server errors", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/download/docs/missing.txt",
      query: { destination: join(tmpDir, "missing.txt") },
    });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: "path_not_found",
      detail: "Download failed: no file known by the path docs/missing.txt",
    });
  });

  // ── Catalog ──────────────────────────────────────────────────

  it("renames a file, stripping a leading separator from the new path", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/rename/docs/a.txt",
      payload: { newsiapath: "/docs/c.txt" },
    });
    expect(res.statusCode).toBe(200);

    const files = await app.inject({ method: "GET", url: "/renter/files" });
    expect(files.json().files.map((f: { siapath: string }) => f.siapath)).toEqual(["docs/c.txt"]);
  });

  it("refuses to rename onto an empty path", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/rename/docs/c.txt",
      payload: { newsiapath: "/" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "empty_path", detail: "catalog path must not be empty" });

    const files = await app.inject({ method: "GET", url: "/renter/files" });
    expect(files.json().files.map((f: { siapath: string }) => f.siapath)).toEqual(["docs/c.txt"]);
  });

  it("refuses an export naming an empty path", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/shareascii",
      query: { siapaths: "docs/c.txt,/" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "empty_path", detail: "catalog path must not be empty" });
  });

  it("splits siapaths on every comma", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/shareascii",
      query: { siapaths: "docs/c.txt,d" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "path_not_found", detail: "no file known by the path d" });
  });

  it("refuses to delete an unknown path", async () => {
    const res = await app.inject({ method: "POST", url: "/renter/delete/docs/a.txt" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "path_not_found",
      detail: "no file known by the path docs/a.txt",
    });
  });

  // ── Sharing ──────────────────────────────────────────────────

  it("exports a text bundle and loads it back after deletion", async () => {
    const upload = await app.inject({
      method: "POST",
      url: "/renter/upload/docs/b.txt",
      payload: { source: join(tmpDir, "b.txt") },
    });
    expect(upload.statusCode).toBe(200);

    const share = await app.inject({
      method: "GET",
      url: "/renter/shareascii",
      query: { siapaths: "docs/c.txt,docs/b.txt" },
    });
    expect(share.statusCode).toBe(200);
    const { asciisia } = share.json();
    expect(typeof asciisia).toBe("string");

    for (const path of ["docs/c.txt", "docs/b.txt"]) {
      const del = await app.inject({ method: "POST", url: `/renter/delete/${path}` });
      expect(del.statusCode).toBe(200);
    }

    const load = await app.inject({ method: "POST", url: "/renter/loadascii", payload: { asciisia } });
    expect(load.statusCode).toBe(200);
    expect(load.json()).toEqual({ filesadded: ["docs/c.txt", "docs/b.txt"] });
  });

  it("exports a binary bundle to a file and loads it", async () => {
    const destination = join(tmpDir, "share.rctl");
    const share = await app.inject({
      method: "GET",
      url: "/renter/share",
      query: { siapaths: "docs/b.txt", destination },
    });
    expect(share.statusCode).toBe(200);

    // Identical entry already at the path: accepted without a rename.
    const load = await app.inject({
      method: "POST",
      url: "/renter/load",
      payload: { source: destination },
    });
    expect(load.json()).toEqual({ filesadded: ["docs/b.txt"] });
  });

  it("rejects a corrupt text bundle", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter/loadascii",
      payload: { asciisia: "not a bundle!" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("bundle_corrupt");
  });

  // ── Hosts ────────────────────────────────────────────────────

  it("clamps numhosts to the directory size", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/hosts/active",
      query: { numhosts: "5" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().hosts).toHaveLength(3);
  });

  it("returns a prefix of the active hosts", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/hosts/active",
      query: { numhosts: "1" },
    });
    expect(res.json().hosts.map((h: { netaddress: string }) => h.netaddress)).toEqual([
      "host-1.local:9982",
    ]);
  });

  it("rejects an unparseable numhosts", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/renter/hosts/active",
      query: { numhosts: "abc" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "invalid_count", detail: 'Couldn\'t parse numhosts: "abc"' });
  });

  it("lists every known host", async () => {
    const res = await app.inject({ method: "GET", url: "/renter/hosts/all" });
    expect(res.json().hosts).toHaveLength(3);
    expect(res.json().hosts[1]).toMatchObject({
      netaddress: "host-2.local:9982",
      acceptingcontracts: true,
      contractprice: "20",
      storageprice: "4",
    });
  });
});

describe("renterd (standard profile)", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await testApp(PROFILES.standard);
  });

  afterAll(async () => {
    await app.close();
  });

  it("defaults to the recommended host count and half the period", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter",
      payload: { funds: "1000", period: "100" },
    });
    expect(res.statusCode).toBe(200);

    const get = await app.inject({ method: "GET", url: "/renter" });
    expect(get.json().settings.allowance).toEqual({
      funds: "1000",
      hosts: 30,
      period: 100,
      renewwindow: 50,
    });
    // 1000 / 30 per contract, three hosts available.
    expect(get.json().financialmetrics).toMatchObject({ contractspending: "99", unspent: "901" });
  });

  it("rejects a host count below the minimum", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter",
      payload: { funds: "1000", hosts: "2", period: "100" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "below_minimum",
      detail: "Insufficient number of hosts, need at least 24 but have 2.",
    });
  });

  it("rejects a renew window below the minimum", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/renter",
      payload: { funds: "1000", period: "1000", renewwindow: "10" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "below_minimum",
      detail: "Renew window is too small, must be at least 288 blocks but have 10 blocks.",
    });
  });
});

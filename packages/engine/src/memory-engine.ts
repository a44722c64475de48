/**
 * In-process renter engine for dev mode and tests.
 *
 * Hosts are seeded at construction. setSettings forms one contract per
 * accepting host, up to the allowance's host count, and renews contracts
 * that have entered the renew window. Uploads are cut into sectors held in
 * memory; each sector's root is recorded on every contract that stores a
 * copy of it. Bundles go through the core codec.
 *
 * Every mutation runs after its awaited I/O in a single synchronous step,
 * so a settings replacement or an import is never seen half-applied.
 */

import { readFile, writeFile } from "node:fs/promises";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, randomBytes, utf8ToBytes } from "@noble/hashes/utils";
import {
  EngineError,
  buildBundle,
  canonicalEncode,
  decodeBundle,
  decodeBundleText,
  encodeBundle,
  encodeBundleText,
  type AllowanceSettings,
  type ContractRecord,
  type DownloadRecord,
  type FileRecord,
  type FinancialMetricsRecord,
  type HostRecord,
  type ProfileConstants,
  type ShareBundleV1,
  type SharedFileV1,
  type SharedPieceV1,
} from "@renterctl/core";
import type {
  MemoryRenterEngineOptions,
  RenterEngine,
  RenterSettings,
  UploadParams,
} from "./types.js";

const EMPTY_ALLOWANCE: AllowanceSettings = { funds: 0n, hosts: 0, period: 0, renewWindow: 0 };

interface Contract {
  id: string;
  netAddress: string;
  endHeight: number;
  renterFunds: bigint;
  merkleRoots: string[];
}

function sectorRoot(sector: Uint8Array): string {
  return bytesToHex(sha256(sector));
}

function contractId(netAddress: string, height: number): string {
  return bytesToHex(sha256(utf8ToBytes(`${netAddress}@${height}`)));
}

function rejected(message: string): EngineError {
  return new EngineError("engine_rejected", message);
}

function notFound(path: string): EngineError {
  return new EngineError("path_not_found", `no file known by the path ${path}`);
}

function chunkCount(file: SharedFileV1): number {
  return Math.ceil(file.file_size / file.piece_size);
}

function sameEntry(a: SharedFileV1, b: SharedFileV1): boolean {
  return Buffer.from(canonicalEncode(a)).equals(Buffer.from(canonicalEncode(b)));
}

export class MemoryRenterEngine implements RenterEngine {
  private readonly profile: ProfileConstants;
  private readonly hosts: HostRecord[];
  private readonly quiet: boolean;
  private height: number;

  private allowance: AllowanceSettings = EMPTY_ALLOWANCE;
  private contractSpending = 0n;
  private contractsByHost = new Map<string, Contract>();
  private readonly sectors = new Map<string, Uint8Array>();
  private catalog = new Map<string, SharedFileV1>();
  private readonly downloads: DownloadRecord[] = [];

  constructor(opts: MemoryRenterEngineOptions) {
    this.profile = opts.profile;
    this.hosts = (opts.hosts ?? []).map((h) => ({ ...h }));
    this.height = opts.blockHeight ?? 0;
    this.quiet = opts.quiet ?? false;
  }

  // ── Settings ─────────────────────────────────────────────────────

  async settings(): Promise<RenterSettings> {
    return { allowance: { ...this.allowance } };
  }

  async setSettings({ allowance }: RenterSettings): Promise<void> {
    if (allowance.hosts === 0) throw rejected("allowance must use at least one host");
    if (allowance.period === 0) throw rejected("allowance period must be nonzero");
    if (allowance.renewWindow === 0) throw rejected("renew window must be nonzero");
    if (allowance.renewWindow >= allowance.period) {
      throw rejected("renew window must be less than the allowance period");
    }

    const candidates = this.hosts.filter((h) => h.acceptingContracts);
    const target = Math.min(allowance.hosts, candidates.length);
    // Funds are split across the requested host count; shortfall stays unspent.
    const perContract = allowance.funds / BigInt(allowance.hosts);

    // Contracts with hosts outside the target set stay until they expire:
    // they still hold sectors.
    const next = new Map(this.contractsByHost);
    let spent = this.contractSpending;
    let held = 0;
    let formed = 0;
    let renewed = 0;

    for (const host of candidates) {
      if (held >= target) break;
      const existing = next.get(host.netAddress);
      if (existing) {
        held++;
        if (existing.endHeight - this.height <= allowance.renewWindow) {
          next.set(host.netAddress, {
            ...existing,
            endHeight: this.height + allowance.period,
            renterFunds: perContract,
            merkleRoots: existing.merkleRoots.slice(),
          });
          spent += perContract;
          renewed++;
        }
        continue;
      }
      next.set(host.netAddress, {
        id: contractId(host.netAddress, this.height),
        netAddress: host.netAddress,
        endHeight: this.height + allowance.period,
        renterFunds: perContract,
        merkleRoots: [],
      });
      spent += perContract;
      held++;
      formed++;
    }

    this.allowance = { ...allowance };
    this.contractsByHost = next;
    this.contractSpending = spent;
    this.log(`allowance set: ${formed} contract(s) formed, ${renewed} renewed, ${next.size} held`);
  }

  async financialMetrics(): Promise<FinancialMetricsRecord> {
    const funds = this.allowance.funds;
    return {
      contractSpending: this.contractSpending,
      downloadSpending: 0n,
      storageSpending: 0n,
      uploadSpending: 0n,
      unspent: funds > this.contractSpending ? funds - this.contractSpending : 0n,
    };
  }

  // ── Read models ──────────────────────────────────────────────────

  async contracts(): Promise<ContractRecord[]> {
    return [...this.contractsByHost.values()].map((c) => ({
      ...c,
      merkleRoots: c.merkleRoots.slice(),
    }));
  }

  async downloadQueue(): Promise<DownloadRecord[]> {
    return this.downloads.map((d) => ({ ...d, startTime: new Date(d.startTime) }));
  }

  async fileList(): Promise<FileRecord[]> {
    return [...this.catalog.values()].map((f) => this.describe(f));
  }

  async activeHosts(): Promise<HostRecord[]> {
    return this.hosts.filter((h) => h.acceptingContracts).map((h) => ({ ...h }));
  }

  async allHosts(): Promise<HostRecord[]> {
    return this.hosts.map((h) => ({ ...h }));
  }

  // ── Catalog ──────────────────────────────────────────────────────

  async upload(params: UploadParams): Promise<void> {
    const { siaPath } = params;
    this.assertFree(siaPath);
    if (this.contractsByHost.size === 0) {
      throw new EngineError("no_contracts", "no contracts formed; set an allowance first");
    }

    let data: Uint8Array;
    try {
      data = await readFile(params.source);
    } catch (err) {
      throw EngineError.from(err, "transfer_failed");
    }

    // Re-check: the catalog may have changed while the file was read.
    this.assertFree(siaPath);
    const holders = [...this.contractsByHost.values()];
    if (holders.length === 0) {
      throw new EngineError("no_contracts", "no contracts formed; set an allowance first");
    }

    const pieceSize = this.profile.sectorSize;
    const sectors: Array<[string, Uint8Array]> = [];
    const pieces: SharedPieceV1[] = [];
    for (let offset = 0, chunk = 0; offset < data.length; offset += pieceSize, chunk++) {
      const sector = new Uint8Array(pieceSize);
      sector.set(data.subarray(offset, offset + pieceSize));
      const root = sectorRoot(sector);
      sectors.push([root, sector]);
      holders.forEach((c, piece) => {
        pieces.push({ host: c.netAddress, chunk, piece, merkle_root: root });
      });
    }

    const entry: SharedFileV1 = {
      sia_path: siaPath,
      file_size: data.length,
      master_key: bytesToHex(randomBytes(32)),
      erasure_code: { data_pieces: 1, parity_pieces: holders.length - 1 },
      piece_size: pieceSize,
      pieces,
    };

    for (const [root, sector] of sectors) this.sectors.set(root, sector);
    for (const p of pieces) this.contractsByHost.get(p.host)?.merkleRoots.push(p.merkle_root);
    this.catalog.set(siaPath, entry);
    this.log(`uploaded ${siaPath}: ${data.length} bytes, ${sectors.length} sector(s) × ${holders.length} host(s)`);
  }

  async download(path: string, destination: string): Promise<void> {
    const entry = this.catalog.get(path);
    if (!entry) throw notFound(path);

    const record: DownloadRecord = {
      siaPath: path,
      destination,
      fileSize: entry.file_size,
      received: 0,
      startTime: new Date(),
    };
    this.downloads.push(record);

    const bytes = this.reassemble(entry);
    try {
      await writeFile(destination, bytes);
    } catch (err) {
      throw EngineError.from(err, "transfer_failed");
    }
    record.received = entry.file_size;
  }

  async renameFile(oldPath: string, newPath: string): Promise<void> {
    const entry = this.catalog.get(oldPath);
    if (!entry) throw notFound(oldPath);
    if (oldPath === newPath) return;
    this.assertFree(newPath);

    // Rebuild so the entry keeps its place in catalog order.
    this.catalog = new Map(
      [...this.catalog].map(([path, f]): [string, SharedFileV1] =>
        path === oldPath ? [newPath, { ...f, sia_path: newPath }] : [path, f],
      ),
    );
  }

  async deleteFile(path: string): Promise<void> {
    if (!this.catalog.delete(path)) throw notFound(path);
  }

  // ── Sharing ──────────────────────────────────────────────────────

  async shareFiles(paths: string[], destination: string): Promise<void> {
    const bytes = encodeBundle(this.bundleFor(paths));
    try {
      await writeFile(destination, bytes);
    } catch (err) {
      throw EngineError.from(err, "engine_failure");
    }
  }

  async shareFilesAscii(paths: string[]): Promise<string> {
    return encodeBundleText(this.bundleFor(paths));
  }

  async loadSharedFiles(source: string): Promise<string[]> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(source);
    } catch (err) {
      throw EngineError.from(err, "engine_failure");
    }
    return this.importBundle(decodeBundle(bytes));
  }

  async loadSharedFilesAscii(text: string): Promise<string[]> {
    return this.importBundle(decodeBundleText(text));
  }

  // ── Test helpers ─────────────────────────────────────────────────

  /** Move the chain forward. Contracts are only renewed on setSettings. */
  advance(blocks: number): void {
    this.height += blocks;
  }

  get blockHeight(): number {
    return this.height;
  }

  // ── Internals ────────────────────────────────────────────────────

  private assertFree(path: string): void {
    if (this.catalog.has(path)) {
      throw new EngineError("path_exists", `a file already exists at ${path}`);
    }
  }

  private bundleFor(paths: string[]): ShareBundleV1 {
    if (paths.length === 0) throw rejected("no files to share");
    const entries = paths.map((p) => {
      const entry = this.catalog.get(p);
      if (!entry) throw notFound(p);
      return entry;
    });
    return buildBundle(entries);
  }

  /**
   * All-or-nothing: placements are computed first, then applied together.
   * An entry identical to the one already at its path is accepted as-is;
   * a conflicting one takes the first free `_N` suffix.
   */
  private importBundle(bundle: ShareBundleV1): string[] {
    const staged = new Map<string, SharedFileV1>();
    const added: string[] = [];
    const taken = (p: string) => this.catalog.has(p) || staged.has(p);

    for (const f of bundle.files) {
      const existing = this.catalog.get(f.sia_path);
      if (existing && sameEntry(existing, f)) {
        added.push(f.sia_path);
        continue;
      }
      let name = f.sia_path;
      for (let n = 1; taken(name); n++) name = `${f.sia_path}_${n}`;
      staged.set(name, { ...f, sia_path: name });
      added.push(name);
    }

    for (const [path, f] of staged) this.catalog.set(path, f);
    this.log(`loaded ${added.length} file(s) from bundle`);
    return added;
  }

  /** First retrievable sector per chunk, in one pass over the pieces. */
  private storedChunks(f: SharedFileV1): Map<number, Uint8Array> {
    const stored = new Map<number, Uint8Array>();
    for (const p of f.pieces) {
      if (stored.has(p.chunk)) continue;
      const sector = this.sectors.get(p.merkle_root);
      if (sector) stored.set(p.chunk, sector);
    }
    return stored;
  }

  private describe(f: SharedFileV1): FileRecord {
    const chunks = chunkCount(f);
    const stored = this.storedChunks(f).size;

    const hostsUsed = [...new Set(f.pieces.map((p) => p.host))];
    const held = hostsUsed.flatMap((h) => {
      const c = this.contractsByHost.get(h);
      return c ? [c] : [];
    });

    return {
      siaPath: f.sia_path,
      fileSize: f.file_size,
      available: stored === chunks,
      renewing: hostsUsed.length > 0 && held.length === hostsUsed.length,
      uploadProgress: chunks === 0 ? 100 : Math.floor((stored * 100) / chunks),
      expiration: held.length > 0 ? Math.min(...held.map((c) => c.endHeight)) : 0,
    };
  }

  /** Every chunk is located before the output buffer is allocated. */
  private reassemble(f: SharedFileV1): Uint8Array {
    const chunks = chunkCount(f);
    const stored = this.storedChunks(f);
    for (let chunk = 0; chunk < chunks; chunk++) {
      if (!stored.has(chunk)) {
        throw new EngineError(
          "transfer_failed",
          `chunk ${chunk} of ${f.sia_path} is not retrievable from any host`,
        );
      }
    }

    const out = new Uint8Array(f.file_size);
    for (const [chunk, sector] of stored) {
      const offset = chunk * f.piece_size;
      out.set(sector.subarray(0, Math.min(f.piece_size, f.file_size - offset)), offset);
    }
    return out;
  }

  private log(message: string): void {
    if (!this.quiet) console.log(`[memory-engine] ${message}`);
  }
}

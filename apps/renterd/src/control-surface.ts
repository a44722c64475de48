/**
 * ControlSurface — one method per renter operation.
 *
 * Inputs are validated (settings, counts, paths) before the engine is
 * called; engine results are projected through the core views. Engine
 * failures come back as EngineError with the engine's message. Transfer
 * failures are server faults, everything else a client fault.
 *
 * No retries and no rollback: a failed call leaves the catalog as the
 * engine left it.
 */

import {
  EngineError,
  SettingsValidator,
  parseHostCount,
  projectAllowance,
  projectContracts,
  projectDownloads,
  projectFiles,
  projectFinancialMetrics,
  projectHosts,
  requireAbsolute,
  requireCatalogPath,
  requireCatalogPaths,
  sliceHosts,
  type AllowanceSettings,
  type DownloadInfoV1,
  type EngineErrorCode,
  type FileInfoV1,
  type HostEntryV1,
  type ProfileConstants,
  type RawSettings,
  type RenterContractV1,
  type RenterGetV1,
} from "@renterctl/core";
import type { RenterEngine } from "@renterctl/engine";

export class ControlSurface {
  private readonly validator: SettingsValidator;

  constructor(
    private readonly engine: RenterEngine,
    readonly profile: ProfileConstants,
  ) {
    this.validator = new SettingsValidator(profile);
  }

  // ── Settings ─────────────────────────────────────────────────────

  async getSettings(): Promise<RenterGetV1> {
    const [settings, metrics] = await this.call("engine_failure", () =>
      Promise.all([this.engine.settings(), this.engine.financialMetrics()]),
    );
    return {
      settings: { allowance: projectAllowance(settings.allowance) },
      financialmetrics: projectFinancialMetrics(metrics),
    };
  }

  /** Validate, then replace the engine's settings. Returns what was applied. */
  async setSettings(raw: RawSettings): Promise<AllowanceSettings> {
    const allowance = this.validator.resolve(raw);
    await this.call("engine_rejected", () => this.engine.setSettings({ allowance }));
    return allowance;
  }

  // ── Lists ────────────────────────────────────────────────────────

  async listContracts(): Promise<RenterContractV1[]> {
    const contracts = await this.call("engine_failure", () => this.engine.contracts());
    return projectContracts(contracts, this.profile);
  }

  async listDownloads(): Promise<DownloadInfoV1[]> {
    return projectDownloads(await this.call("engine_failure", () => this.engine.downloadQueue()));
  }

  async listFiles(): Promise<FileInfoV1[]> {
    return projectFiles(await this.call("engine_failure", () => this.engine.fileList()));
  }

  async listActiveHosts(numHosts?: string): Promise<HostEntryV1[]> {
    parseHostCount(numHosts); // reject before the engine is asked
    const hosts = await this.call("engine_failure", () => this.engine.activeHosts());
    return sliceHosts(projectHosts(hosts), numHosts);
  }

  async listAllHosts(): Promise<HostEntryV1[]> {
    return projectHosts(await this.call("engine_failure", () => this.engine.allHosts()));
  }

  // ── Bundles ──────────────────────────────────────────────────────

  async loadBundle(source: string): Promise<string[]> {
    requireAbsolute(source, "source");
    return this.call("engine_failure", () => this.engine.loadSharedFiles(source));
  }

  async loadBundleText(text: string): Promise<string[]> {
    return this.call("engine_failure", () => this.engine.loadSharedFilesAscii(text));
  }

  async exportBundle(paths: readonly string[], destination: string): Promise<void> {
    requireAbsolute(destination, "destination");
    const siaPaths = requireCatalogPaths(paths);
    await this.call("engine_failure", () => this.engine.shareFiles(siaPaths, destination));
  }

  async exportBundleText(paths: readonly string[]): Promise<string> {
    const siaPaths = requireCatalogPaths(paths);
    return this.call("engine_failure", () => this.engine.shareFilesAscii(siaPaths));
  }

  // ── Catalog ──────────────────────────────────────────────────────

  async renameFile(oldPath: string, newPath: string): Promise<void> {
    const from = requireCatalogPath(oldPath);
    const to = requireCatalogPath(newPath);
    await this.call("engine_failure", () => this.engine.renameFile(from, to));
  }

  async deleteFile(path: string): Promise<void> {
    const siaPath = requireCatalogPath(path);
    await this.call("engine_failure", () => this.engine.deleteFile(siaPath));
  }

  async downloadFile(path: string, destination: string): Promise<void> {
    requireAbsolute(destination, "destination");
    const siaPath = requireCatalogPath(path);
    await this.transfer("Download failed", () => this.engine.download(siaPath, destination));
  }

  async uploadFile(source: string, path: string): Promise<void> {
    requireAbsolute(source, "source");
    const siaPath = requireCatalogPath(path);
    await this.transfer("Upload failed", () => this.engine.upload({ source, siaPath }));
  }

  // ── Internals ────────────────────────────────────────────────────

  private async call<T>(fallback: EngineErrorCode, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw EngineError.from(err, fallback);
    }
  }

  private async transfer(prefix: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      const wrapped = EngineError.from(err, "transfer_failed");
      throw new EngineError(wrapped.code, `${prefix}: ${wrapped.message}`, "server");
    }
  }
}

/**
 * Storage engine contract — what the control surface calls.
 *
 * The engine owns contracts, the file catalog, transfers and persistence.
 * It is responsible for serializing mutations: at most one in-flight
 * mutation per catalog path, and settings replacement visible all at once.
 *
 * Swap a real engine for MemoryRenterEngine in tests.
 */

import type {
  AllowanceSettings,
  ContractRecord,
  DownloadRecord,
  FileRecord,
  FinancialMetricsRecord,
  HostRecord,
  ProfileConstants,
} from "@renterctl/core";

export interface RenterSettings {
  allowance: AllowanceSettings;
}

export interface UploadParams {
  /** Absolute path of the local file. */
  source: string;
  /** Catalog path for the new entry. */
  siaPath: string;
}

export interface RenterEngine {
  settings(): Promise<RenterSettings>;
  /** Replace the settings wholesale. Rejects if the engine's own checks fail. */
  setSettings(settings: RenterSettings): Promise<void>;
  financialMetrics(): Promise<FinancialMetricsRecord>;

  contracts(): Promise<ContractRecord[]>;
  downloadQueue(): Promise<DownloadRecord[]>;
  fileList(): Promise<FileRecord[]>;

  /** Import a bundle file. Resolves to the catalog paths added. */
  loadSharedFiles(source: string): Promise<string[]>;
  loadSharedFilesAscii(text: string): Promise<string[]>;
  shareFiles(paths: string[], destination: string): Promise<void>;
  shareFilesAscii(paths: string[]): Promise<string>;

  renameFile(oldPath: string, newPath: string): Promise<void>;
  deleteFile(path: string): Promise<void>;
  download(path: string, destination: string): Promise<void>;
  upload(params: UploadParams): Promise<void>;

  activeHosts(): Promise<HostRecord[]>;
  allHosts(): Promise<HostRecord[]>;
}

export interface MemoryRenterEngineOptions {
  /** Sector size comes from here. */
  profile: ProfileConstants;
  /** Known hosts, in directory order. */
  hosts?: HostRecord[];
  /** Current chain height used for contract end heights. */
  blockHeight?: number;
  /** Silence the `[memory-engine]` log lines. */
  quiet?: boolean;
}

/**
 * Engine-side read models. The engine owns and mutates these; this layer
 * only reads them and copies fields into wire shapes.
 */

/** Currency amounts are whole base units. */
export type Currency = bigint;

export interface AllowanceSettings {
  funds: Currency;
  hosts: number;
  /** Contract duration in blocks. */
  period: number;
  /** Blocks before expiry during which contracts are renewed. */
  renewWindow: number;
}

export interface FinancialMetricsRecord {
  contractSpending: Currency;
  downloadSpending: Currency;
  storageSpending: Currency;
  uploadSpending: Currency;
  unspent: Currency;
}

export interface ContractRecord {
  id: string;
  netAddress: string;
  endHeight: number;
  renterFunds: Currency;
  /** One root per sector stored under this contract. */
  merkleRoots: readonly string[];
}

export interface DownloadRecord {
  siaPath: string;
  destination: string;
  fileSize: number;
  received: number;
  startTime: Date;
}

export interface FileRecord {
  siaPath: string;
  fileSize: number;
  available: boolean;
  renewing: boolean;
  /** Percent, 0–100. */
  uploadProgress: number;
  expiration: number;
}

export interface HostRecord {
  netAddress: string;
  publicKey: string;
  acceptingContracts: boolean;
  maxDuration: number;
  contractPrice: Currency;
  storagePrice: Currency;
  remainingStorage: number;
}

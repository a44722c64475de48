/**
 * List views — engine read models → wire shapes.
 *
 * No filtering, sorting or caching: output order is input order. Fields are
 * copied; engine-owned records are never touched.
 */

import type { ProfileConstants } from "./constants.js";
import type {
  AllowanceSettings,
  ContractRecord,
  DownloadRecord,
  FileRecord,
  FinancialMetricsRecord,
  HostRecord,
} from "./records.js";
import type {
  AllowanceV1,
  DownloadInfoV1,
  FileInfoV1,
  FinancialMetricsV1,
  HostEntryV1,
  RenterContractV1,
} from "./schemas/index.js";

export function projectAllowance(a: AllowanceSettings): AllowanceV1 {
  return {
    funds: a.funds.toString(),
    hosts: a.hosts,
    period: a.period,
    renewwindow: a.renewWindow,
  };
}

export function projectFinancialMetrics(m: FinancialMetricsRecord): FinancialMetricsV1 {
  return {
    contractspending: m.contractSpending.toString(),
    downloadspending: m.downloadSpending.toString(),
    storagespending: m.storageSpending.toString(),
    uploadspending: m.uploadSpending.toString(),
    unspent: m.unspent.toString(),
  };
}

/** Contract size is derived here: sector size × recorded merkle roots. */
export function contractSize(c: ContractRecord, profile: ProfileConstants): number {
  return profile.sectorSize * c.merkleRoots.length;
}

export function projectContracts(
  contracts: readonly ContractRecord[],
  profile: ProfileConstants,
): RenterContractV1[] {
  return contracts.map((c) => ({
    endheight: c.endHeight,
    id: c.id,
    netaddress: c.netAddress,
    renterfunds: c.renterFunds.toString(),
    size: contractSize(c, profile),
  }));
}

export function projectDownloads(downloads: readonly DownloadRecord[]): DownloadInfoV1[] {
  return downloads.map((d) => ({
    siapath: d.siaPath,
    destination: d.destination,
    filesize: d.fileSize,
    received: d.received,
    starttime: d.startTime.toISOString(),
  }));
}

export function projectFiles(files: readonly FileRecord[]): FileInfoV1[] {
  return files.map((f) => ({
    siapath: f.siaPath,
    filesize: f.fileSize,
    available: f.available,
    renewing: f.renewing,
    uploadprogress: f.uploadProgress,
    expiration: f.expiration,
  }));
}

export function projectHosts(hosts: readonly HostRecord[]): HostEntryV1[] {
  return hosts.map((h) => ({
    netaddress: h.netAddress,
    publickey: h.publicKey,
    acceptingcontracts: h.acceptingContracts,
    maxduration: h.maxDuration,
    contractprice: h.contractPrice.toString(),
    storageprice: h.storagePrice.toString(),
    remainingstorage: h.remainingStorage,
  }));
}

/**
 * @renterctl/core — renter control primitives.
 *
 * Validation, views, pagination and the share bundle codec. No I/O and no
 * engine state; the daemon and the engine both import from here.
 */

export {
  PROFILES,
  profileByName,
  isProfileName,
  BUNDLE_MAGIC,
  BUNDLE_VERSION,
  BUNDLE_CHECKSUM_BYTES,
  BUNDLE_HEADER_BYTES,
  BUNDLE_MAX_CHUNKS,
  type ProfileName,
  type ProfileConstants,
} from "./constants.js";

export {
  InputValidationError,
  EngineError,
  type ValidationCode,
  type EngineErrorCode,
  type Severity,
} from "./errors.js";

export type {
  Currency,
  AllowanceSettings,
  FinancialMetricsRecord,
  ContractRecord,
  DownloadRecord,
  FileRecord,
  HostRecord,
} from "./records.js";

export { scanAmount, scanUnsigned, isAbsent } from "./scan.js";
export { SettingsValidator, type RawSettings } from "./settings.js";
export {
  normalizeCatalogPath,
  normalizeCatalogPaths,
  requireAbsolute,
  requireCatalogPath,
  requireCatalogPaths,
} from "./path.js";
export { parseHostCount, takeHosts, sliceHosts } from "./host-directory.js";

export {
  projectAllowance,
  projectFinancialMetrics,
  projectContracts,
  projectDownloads,
  projectFiles,
  projectHosts,
  contractSize,
} from "./views.js";

export { canonicalEncode, canonicalDecode } from "./canonical.js";

export {
  buildBundle,
  encodeBundle,
  encodeBundleText,
  decodeBundle,
  decodeBundleText,
} from "./bundle.js";

export * from "./schemas/index.js";

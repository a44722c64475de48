/**
 * Schema barrel export.
 */

export {
  CurrencyString,
  AllowanceV1,
  FinancialMetricsV1,
  RenterGetV1,
  SetSettingsBody,
} from "./allowance.js";

export { RenterContractV1 } from "./contract.js";

export { FileInfoV1, DownloadInfoV1 } from "./catalog.js";

export { HostEntryV1 } from "./host.js";

export {
  ShareBundleV1,
  SharedFileV1,
  SharedPieceV1,
  ErasureCodeV1,
} from "./bundle.js";

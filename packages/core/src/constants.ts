/**
 * Renter constants.
 *
 * Profile minimums are fixed when the process starts and never change
 * afterwards. Callers pick a profile once and pass its `ProfileConstants`
 * around as a value.
 */

export type ProfileName = "standard" | "dev" | "testing";

export interface ProfileConstants {
  readonly name: ProfileName;
  /** Hosts used when a settings request omits the host count. */
  readonly recommendedHosts: number;
  /** Smallest host count a settings request may ask for. */
  readonly requiredHosts: number;
  /** Smallest renew window (blocks) a settings request may ask for. */
  readonly requiredRenewWindow: number;
  /** Bytes per sector; a contract's size is sectorSize × merkle roots. */
  readonly sectorSize: number;
}

export const PROFILES: Readonly<Record<ProfileName, ProfileConstants>> = {
  standard: {
    name: "standard",
    recommendedHosts: 30,
    requiredHosts: 24,
    requiredRenewWindow: 288,
    sectorSize: 1 << 22, // 4 MiB
  },
  dev: {
    name: "dev",
    recommendedHosts: 4,
    requiredHosts: 1,
    requiredRenewWindow: 1,
    sectorSize: 1 << 18, // 256 KiB
  },
  testing: {
    name: "testing",
    recommendedHosts: 2,
    requiredHosts: 1,
    requiredRenewWindow: 1,
    sectorSize: 1 << 12, // 4 KiB
  },
};

export function isProfileName(value: string): value is ProfileName {
  return value === "standard" || value === "dev" || value === "testing";
}

/** Look up a profile by name. Throws on an unknown name. */
export function profileByName(name: string): ProfileConstants {
  if (!isProfileName(name)) {
    throw new Error(`Unknown profile "${name}" (expected standard, dev or testing)`);
  }
  return PROFILES[name];
}

// ── Share bundles ──────────────────────────────────────────────────
export const BUNDLE_MAGIC = "RCTLSHR1"; // 8 ASCII bytes
export const BUNDLE_VERSION = 1;
export const BUNDLE_CHECKSUM_BYTES = 32; // SHA-256
export const BUNDLE_HEADER_BYTES = BUNDLE_MAGIC.length + BUNDLE_CHECKSUM_BYTES;
/** Upper bound on ceil(file_size / piece_size) for one bundled file. */
export const BUNDLE_MAX_CHUNKS = 1 << 20;

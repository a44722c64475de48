/**
 * renterd configuration.
 * All env access centralized here — no direct process.env elsewhere.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("RENTERD_PORT", "9980"), 10),
  host: env("RENTERD_HOST", "127.0.0.1"),
  /** standard | dev | testing — fixes the allowance minimums. */
  profile: env("RENTERD_PROFILE", "standard"),
  logLevel: env("RENTERD_LOG_LEVEL", "info"),
  /** Synthetic hosts seeded into the in-process engine. */
  devHosts: parseInt(env("RENTERD_DEV_HOSTS", "0"), 10),
  /** Starting chain height for the in-process engine. */
  blockHeight: parseInt(env("RENTERD_BLOCK_HEIGHT", "0"), 10),
} as const;

/**
 * @renterctl/engine — storage engine contract.
 *
 * The daemon talks to the engine only through RenterEngine.
 * MemoryRenterEngine runs in-process for dev mode and tests.
 */

export type {
  RenterEngine,
  RenterSettings,
  UploadParams,
  MemoryRenterEngineOptions,
} from "./types.js";

export { MemoryRenterEngine } from "./memory-engine.js";
export { syntheticHosts } from "./dev-hosts.js";

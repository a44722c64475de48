/**
 * Synthetic host directory for dev mode and tests.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { HostRecord } from "@renterctl/core";

export function syntheticHosts(count: number): HostRecord[] {
  const hosts: HostRecord[] = [];
  for (let i = 1; i <= count; i++) {
    const netAddress = `host-${i}.local:9982`;
    hosts.push({
      netAddress,
      publicKey: `ed25519:${bytesToHex(sha256(utf8ToBytes(netAddress)))}`,
      acceptingContracts: true,
      maxDuration: 25_920,
      contractPrice: 10n * BigInt(i),
      storagePrice: 2n * BigInt(i),
      remainingStorage: 1 << 30,
    });
  }
  return hosts;
}

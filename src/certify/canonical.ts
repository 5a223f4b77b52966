import type { NetworkStats } from '../types/stats.js';
import { sha256Bytes } from '../utils/crypto.js';

/**
 * Fixed field order, decimal integers, no whitespace. Clients in any language
 * rebuild the same string from the returned stats to recompute the fingerprint.
 */
export function canonicalStatsString(stats: NetworkStats): string {
  return [
    `subnets:${stats.totalSubnets}`,
    `nodes:${stats.totalNodes}`,
    `gen1:${stats.gen1Nodes}`,
    `gen2:${stats.gen2Nodes}`,
    `unknown:${stats.unknownNodes}`,
    `updated:${stats.lastUpdated}`
  ].join(',');
}

export function statsFingerprint(stats: NetworkStats): Uint8Array {
  return sha256Bytes(canonicalStatsString(stats));
}

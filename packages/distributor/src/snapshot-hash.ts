/**
 * Snapshot hashing.
 *
 * SHA-256 over the RFC 8785 canonical JSON of a snapshot, leaving out
 * `asOf`: two distributors holding the same state hash the same no
 * matter when the snapshot was read.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { DistributorSnapshot } from "./types.js";

export function computeSnapshotHash(snap: DistributorSnapshot): string {
  const { asOf: _asOf, ...state } = snap;
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * Whether `snap` hashes to `expected` (hex, case-insensitive).
 */
export function verifySnapshotHash(snap: DistributorSnapshot, expected: string): boolean {
  return computeSnapshotHash(snap) === expected.toLowerCase();
}

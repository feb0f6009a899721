/**
 * @rewardstream/accrual — Deterministic point arithmetic.
 *
 * All arithmetic uses bigint. Amounts cross serialization boundaries
 * as canonical base-10 strings.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative
 * - Division always rounds toward zero (floor for non-negative inputs)
 */

import type { Amount, Timestamp } from "@rewardstream/types";
import { AccrualError } from "./types.js";

/**
 * Seconds elapsed since a record was last synchronized.
 *
 * An uninitialized record (`null`) has accrued nothing, so the elapsed
 * window is zero regardless of `now`.
 */
export function elapsedSeconds(lastUpdate: Timestamp | null, now: Timestamp): bigint {
  if (lastUpdate === null) {
    return 0n;
  }
  if (now < lastUpdate) {
    throw new AccrualError(
      "CLOCK_REGRESSION",
      `Clock moved backwards: now=${String(now)} is before lastUpdate=${String(lastUpdate)}`,
    );
  }
  return BigInt(now - lastUpdate);
}

/**
 * Integrate a constant balance over an elapsed window.
 *
 * points' = points + balance × elapsed
 */
export function accruePoints(points: Amount, balance: Amount, elapsed: bigint): Amount {
  return points + balance * elapsed;
}

/**
 * floor(amount × part / whole).
 *
 * Returns 0 when `whole` is zero.
 */
export function proportionalShare(amount: Amount, part: Amount, whole: Amount): Amount {
  if (whole === 0n) {
    return 0n;
  }
  return (amount * part) / whole;
}

/**
 * Parse a canonical base-10 string into a non-negative bigint.
 *
 * "100000" → 100000n
 */
export function parseAmount(amount: string): Amount {
  if (typeof amount !== "string" || !/^\d+$/.test(amount.trim())) {
    throw new AccrualError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }
  return BigInt(amount.trim());
}

/**
 * Format a non-negative bigint as a base-10 string.
 */
export function formatAmount(amount: Amount): string {
  if (amount < 0n) {
    throw new AccrualError("INVALID_AMOUNT", `Amounts cannot be negative: ${amount.toString()}`);
  }
  return amount.toString();
}

/**
 * Runtime Type Guards
 *
 * Narrowing functions for distributor domain types.
 * Used to validate restored snapshots before they are trusted.
 */

import type { Identity, Timestamp } from "./identity.js";
import { isNullIdentity } from "./identity.js";

// =============================================================================
// Primitive guards
// =============================================================================

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * A non-null identity string.
 */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && !isNullIdentity(value);
}

/**
 * A canonical base-10 representation of a non-negative integer.
 */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isTimestamp(value: unknown): value is Timestamp {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

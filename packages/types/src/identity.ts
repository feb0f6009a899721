/**
 * Identity & Amount Primitives
 *
 * Every participant in the distributor (producer tokens, reward tokens,
 * holders, recipients, wrappers, the administrator) is an opaque
 * identity string. Amounts are bigint and never negative.
 *
 * Rules:
 * - The null identity is never a valid participant
 * - Amounts cross JSON boundaries as base-10 strings
 * - Timestamps are whole seconds
 */

/**
 * An opaque participant identifier (typically a 0x-prefixed address).
 */
export type Identity = string;

/** Identity of a balance ledger whose holders accrue points. */
export type ProducerToken = Identity;

/** Identity of a fungible token distributed to producer-token holders. */
export type RewardToken = Identity;

/**
 * An exact, non-negative token quantity (smallest unit).
 */
export type Amount = bigint;

/**
 * Whole seconds since the Unix epoch.
 */
export type Timestamp = number;

/**
 * The null identity (the all-zero address).
 */
export const NULL_IDENTITY: Identity = "0x0000000000000000000000000000000000000000";

/**
 * Whether an identity is the null value.
 * The empty string is treated as null as well.
 */
export function isNullIdentity(identity: Identity): boolean {
  return identity === "" || identity.toLowerCase() === NULL_IDENTITY;
}

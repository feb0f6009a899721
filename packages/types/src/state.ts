/**
 * Accrual State Records
 *
 * Points are the time-integral of a balance: supply-seconds for the
 * global record, balance-seconds for a holder record.
 *
 * `lastUpdate === null` means the record has never been touched. This is
 * distinct from a record created at timestamp 0.
 */

import type { Amount, Timestamp } from "./identity.js";

/**
 * Per-producer integral of total supply over time.
 */
export interface GlobalState {
  /** When the record was last synchronized, or null if never */
  readonly lastUpdate: Timestamp | null;

  /** Total supply observed at `lastUpdate` */
  readonly lastSupply: Amount;

  /** Accumulated supply-seconds not yet consumed by claims */
  readonly points: Amount;
}

/**
 * Per-(producer, holder) integral of balance over time.
 */
export interface UserState {
  /** When the record was last synchronized, or null if never */
  readonly lastUpdate: Timestamp | null;

  /** Holder balance observed at `lastUpdate` */
  readonly lastBalance: Amount;

  /** Accumulated balance-seconds not yet claimed */
  readonly points: Amount;
}

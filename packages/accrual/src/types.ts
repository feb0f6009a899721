/**
 * @rewardstream/accrual — Internal types for the accrual engine.
 *
 * Rules:
 * - All exposed records are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { BalanceLedger, Clock, GlobalState, Identity, UserState } from "@rewardstream/types";
import type { TransactionJournal } from "./journal.js";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for accrual operations. */
export type AccrualErrorCode =
  | "NULL_IDENTITY"
  | "CLOCK_REGRESSION"
  | "INSUFFICIENT_POINTS"
  | "INVALID_AMOUNT";

/**
 * Structured error from the accrual engine.
 * Always thrown — never returns error codes silently.
 */
export class AccrualError extends Error {
  public readonly code: AccrualErrorCode;

  constructor(code: AccrualErrorCode, message: string) {
    super(message);
    this.name = "AccrualError";
    this.code = code;
  }
}

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Collaborators the accrual ledger reads from.
 */
export interface AccrualDeps {
  readonly balances: BalanceLedger;
  readonly clock: Clock;
  /** Shared journal; a private one is created when omitted */
  readonly journal?: TransactionJournal | undefined;
}

// ─── Defaults ────────────────────────────────────────────────────────────

/** State reported for a producer that has never been accrued. */
export const UNINITIALIZED_GLOBAL: GlobalState = {
  lastUpdate: null,
  lastSupply: 0n,
  points: 0n,
} as const;

/** State reported for a holder that has never been accrued. */
export const UNINITIALIZED_USER: UserState = {
  lastUpdate: null,
  lastBalance: 0n,
  points: 0n,
} as const;

// ─── Export Types ────────────────────────────────────────────────────────

/**
 * A holder's state together with its keys, for export/import.
 */
export interface UserStateRecord {
  readonly producerToken: Identity;
  readonly holder: Identity;
  readonly state: UserState;
}

/**
 * A producer's global state together with its key, for export/import.
 */
export interface GlobalStateRecord {
  readonly producerToken: Identity;
  readonly state: GlobalState;
}

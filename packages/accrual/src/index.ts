/**
 * @rewardstream/accrual — Lazy time-weighted balance accrual.
 *
 * A pure TypeScript engine with zero runtime dependencies.
 * Enforces accrual invariants:
 * - Points grow strictly as balance × elapsed seconds
 * - Nothing accrues before a record's first synchronization
 * - Claimed points leave holder and global totals together
 * - All arithmetic uses bigint (no floating point)
 * - Failed operations leave no trace (journaled rollback)
 */

// Core engine
export { AccrualLedger } from "./accrual-ledger.js";

// Atomicity
export {
  TransactionJournal,
  JournaledMap,
  JournaledValue,
  compositeKey,
  splitKey,
} from "./journal.js";

// Point arithmetic
export {
  elapsedSeconds,
  accruePoints,
  proportionalShare,
  parseAmount,
  formatAmount,
} from "./point-math.js";

// Types
export type {
  AccrualErrorCode,
  AccrualDeps,
  GlobalStateRecord,
  UserStateRecord,
} from "./types.js";

export { AccrualError, UNINITIALIZED_GLOBAL, UNINITIALIZED_USER } from "./types.js";

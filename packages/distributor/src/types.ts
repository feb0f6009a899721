/**
 * @rewardstream/distributor domain types.
 *
 * The distributor turns accrued points into proportional claims on
 * harvested reward tokens:
 * - Reward token registry per producer token
 * - Reward silo per (producer, reward) pair
 * - Personal and privileged recipient redirection
 * - Harvest integration and the claim engine
 *
 * Rules:
 * - All exposed records are readonly
 * - Amounts are bigint in memory, decimal strings in snapshots
 * - Errors are thrown, never returned
 */

import type { TransactionJournal } from "@rewardstream/accrual";
import type {
  Amount,
  BalanceLedger,
  Clock,
  CodeInspector,
  DistributorEvent,
  HarvestSource,
  Identity,
  ProducerToken,
  RewardToken,
  Timestamp,
  TokenTransport,
} from "@rewardstream/types";

// =============================================================================
// Error
// =============================================================================

export type DistributorErrorCode =
  | "NULL_IDENTITY"
  | "UNAUTHORIZED"
  | "NOT_CONTRACT"
  | "ZERO_AMOUNT"
  | "INVALID_AMOUNT"
  | "DUPLICATE_REWARD_TOKEN"
  | "INDEX_OUT_OF_BOUNDS"
  | "INSUFFICIENT_SILO"
  | "INSUFFICIENT_BALANCE"
  | "HARVESTER_NOT_SET"
  | "INVALID_SNAPSHOT";

export class DistributorError extends Error {
  public readonly code: DistributorErrorCode;
  constructor(code: DistributorErrorCode, message: string) {
    super(message);
    this.name = "DistributorError";
    this.code = code;
  }
}

// =============================================================================
// Construction
// =============================================================================

export type EventListener = (event: DistributorEvent) => void;

/** Receives an error thrown by the event listener for a committed event. */
export type ListenerErrorHook = (err: unknown, event: DistributorEvent) => void;

export interface DistributorDeps {
  /** Identity holding the administrator capability */
  readonly administrator: Identity;
  readonly balances: BalanceLedger;
  readonly transport: TokenTransport;
  readonly codeInspector: CodeInspector;
  readonly clock: Clock;
  /** Wired harvest collaborator; can also be set later by the administrator */
  readonly harvestSource?: HarvestSource | undefined;
  /** Shared journal, so collaborators can join the same transactions */
  readonly journal?: TransactionJournal | undefined;
  /** Receives every committed event */
  readonly onEvent?: EventListener | undefined;
  /** Receives listener errors instead of the caller */
  readonly onListenerError?: ListenerErrorHook | undefined;
}

// =============================================================================
// Results
// =============================================================================

/** One reward token's share of a claim. */
export interface ClaimPayout {
  readonly rewardToken: RewardToken;
  readonly recipient: Identity;
  readonly amount: Amount;
}

export interface ClaimResult {
  readonly producerToken: ProducerToken;
  readonly holder: Identity;
  /** Points consumed by the claim */
  readonly points: Amount;
  readonly payouts: readonly ClaimPayout[];
}

/**
 * Parallel sequences: entry i of each array describes one harvested pair.
 * Pairs that yielded nothing are omitted.
 */
export interface HarvestResult {
  readonly producerTokens: readonly ProducerToken[];
  readonly rewardTokens: readonly RewardToken[];
  readonly amounts: readonly Amount[];
}

// =============================================================================
// Snapshot
// =============================================================================

export interface GlobalStateEntry {
  readonly producerToken: ProducerToken;
  readonly lastUpdate: Timestamp | null;
  readonly lastSupply: string;
  readonly points: string;
}

export interface UserStateEntry {
  readonly producerToken: ProducerToken;
  readonly holder: Identity;
  readonly lastUpdate: Timestamp | null;
  readonly lastBalance: string;
  readonly points: string;
}

export interface RegistryEntry {
  readonly producerToken: ProducerToken;
  readonly rewardTokens: readonly RewardToken[];
}

export interface SiloEntry {
  readonly producerToken: ProducerToken;
  readonly rewardToken: RewardToken;
  readonly amount: string;
}

export interface RecipientEntry {
  /** Holder (personal) or wrapper (privileged) the redirect belongs to */
  readonly owner: Identity;
  readonly producerToken: ProducerToken;
  readonly rewardToken: RewardToken;
  readonly recipient: Identity;
}

/**
 * Serializable snapshot of the entire distributor state.
 * Restored with RewardDistributor.fromSnapshot().
 */
export interface DistributorSnapshot {
  readonly version: 1;
  readonly administrator: Identity;
  readonly harvester: Identity | null;
  readonly globalStates: readonly GlobalStateEntry[];
  readonly userStates: readonly UserStateEntry[];
  readonly registries: readonly RegistryEntry[];
  readonly silos: readonly SiloEntry[];
  readonly personalRecipients: readonly RecipientEntry[];
  readonly privilegedRecipients: readonly RecipientEntry[];
  readonly asOf: Timestamp;
}

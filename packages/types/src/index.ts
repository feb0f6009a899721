/**
 * @rewardstream/types — Shared domain types for the rewardstream stack.
 *
 * These types are used across all rewardstream packages:
 * - Identities, amounts and timestamps
 * - Accrual state records
 * - Collaborator seams (balance ledger, harvest source, transport)
 * - Distributor events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint in memory, decimal strings on the wire
 */

// Primitives
export type {
  Identity,
  ProducerToken,
  RewardToken,
  Amount,
  Timestamp,
} from "./identity.js";
export { NULL_IDENTITY, isNullIdentity } from "./identity.js";

// State records
export type { GlobalState, UserState } from "./state.js";

// Collaborators
export type {
  Clock,
  BalanceLedger,
  HarvestSource,
  TokenTransport,
  CodeInspector,
} from "./collaborators.js";

// Event types
export type {
  EventMetadata,
  DistributorEvent,
  DistributorEventType,
  RewardTokenAddedEvent,
  RewardTokenRemovedEvent,
  HarvestCollectedEvent,
  RewardAccruedEvent,
  RewardsClaimedEvent,
  RecipientSetEvent,
  RecipientUnsetEvent,
  HarvestSourceSetEvent,
  AdministrationTransferredEvent,
} from "./event.js";

// Runtime type guards
export {
  isIdentity,
  isAmountString,
  isTimestamp,
} from "./guards.js";

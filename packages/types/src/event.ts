/**
 * Distributor Events
 *
 * Every committed state change in the distributor is published as a
 * typed event. Rolled-back operations publish nothing.
 *
 * Amounts in payloads are base-10 strings so events can be logged or
 * serialized without bigint handling.
 */

import type { Identity, Timestamp } from "./identity.js";

/**
 * Metadata common to all distributor events.
 */
export interface EventMetadata {
  /** Monotonic sequence number within one distributor */
  readonly sequence: number;

  /** Clock time when the operation ran */
  readonly timestamp: Timestamp;

  /** Who initiated the operation */
  readonly actor: Identity;
}

interface EventShape<TType extends string, TPayload> {
  readonly type: TType;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<TPayload>;
}

export type RewardTokenAddedEvent = EventShape<
  "reward-token.added",
  { producerToken: Identity; rewardToken: Identity; index: number }
>;

export type RewardTokenRemovedEvent = EventShape<
  "reward-token.removed",
  { producerToken: Identity; rewardToken: Identity; index: number }
>;

export type HarvestCollectedEvent = EventShape<
  "harvest.collected",
  { producerToken: Identity; rewardToken: Identity; amount: string }
>;

export type RewardAccruedEvent = EventShape<
  "reward.accrued",
  { producerToken: Identity; rewardToken: Identity; amount: string; siloBalance: string }
>;

export type RewardsClaimedEvent = EventShape<
  "rewards.claimed",
  {
    producerToken: Identity;
    holder: Identity;
    points: string;
    payouts: readonly { rewardToken: Identity; recipient: Identity; amount: string }[];
  }
>;

export type RecipientSetEvent = EventShape<
  "recipient.set" | "recipient.privileged.set",
  { owner: Identity; producerToken: Identity; rewardToken: Identity; recipient: Identity }
>;

export type RecipientUnsetEvent = EventShape<
  "recipient.unset" | "recipient.privileged.unset",
  { owner: Identity; producerToken: Identity; rewardToken: Identity }
>;

export type HarvestSourceSetEvent = EventShape<
  "harvest-source.set",
  { harvester: Identity }
>;

export type AdministrationTransferredEvent = EventShape<
  "administration.transferred",
  { previous: Identity; next: Identity }
>;

/**
 * A distributor event, discriminated by `type`.
 */
export type DistributorEvent =
  | RewardTokenAddedEvent
  | RewardTokenRemovedEvent
  | HarvestCollectedEvent
  | RewardAccruedEvent
  | RewardsClaimedEvent
  | RecipientSetEvent
  | RecipientUnsetEvent
  | HarvestSourceSetEvent
  | AdministrationTransferredEvent;

export type DistributorEventType = DistributorEvent["type"];

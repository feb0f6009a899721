/**
 * Collaborator Interfaces
 *
 * The distributor never owns balances, yield sources or tokens. It talks
 * to them through these narrow, synchronous seams.
 */

import type { Amount, Identity, ProducerToken, RewardToken, Timestamp } from "./identity.js";

/**
 * Source of current time, in whole seconds.
 */
export interface Clock {
  now(): Timestamp;
}

/**
 * Read side of a producer-token balance ledger.
 *
 * The ledger must notify the accrual hooks before every supply or
 * balance change takes effect.
 */
export interface BalanceLedger {
  totalSupply(producerToken: ProducerToken): Amount;
  balanceOf(producerToken: ProducerToken, holder: Identity): Amount;
}

/**
 * Upstream yield source that reward amounts are harvested from.
 */
export interface HarvestSource {
  /** Identity the source uses when depositing into the silo */
  readonly identity: Identity;

  /** Currently claimable (not yet harvested) amount for a pair */
  pendingRewards(producerToken: ProducerToken, rewardToken: RewardToken): Amount;

  /**
   * Deliver the pending amount for a pair to the distributor and reset
   * the source's own counter for that pair to zero.
   */
  collectRewards(producerToken: ProducerToken, rewardToken: RewardToken): Amount;
}

/**
 * Moves reward tokens out of the distributor's custody.
 * Implementations may call back into the distributor.
 */
export interface TokenTransport {
  transfer(rewardToken: RewardToken, to: Identity, amount: Amount): void;
}

/**
 * Tells deployed contracts apart from plain accounts.
 */
export interface CodeInspector {
  isContract(identity: Identity): boolean;
}

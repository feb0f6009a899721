/**
 * Reward Token Registry — which reward tokens each producer distributes.
 *
 * Rules:
 * - A reward token appears at most once per producer
 * - Removal is positional: the last element moves into the freed slot,
 *   so the formerly-last token changes index. Callers removing several
 *   tokens must re-query indices (indexOf) between removals.
 * - Producers whose list becomes empty keep an (empty) entry
 */

import { JournaledMap } from "@rewardstream/accrual";
import type { TransactionJournal } from "@rewardstream/accrual";
import type { ProducerToken, RewardToken } from "@rewardstream/types";
import { DistributorError } from "./types.js";
import type { RegistryEntry } from "./types.js";

export class RewardTokenRegistry {
  private readonly tokens: JournaledMap<ProducerToken, readonly RewardToken[]>;

  constructor(journal: TransactionJournal) {
    this.tokens = new JournaledMap(journal);
  }

  /**
   * Append a reward token. Returns its index.
   */
  add(producerToken: ProducerToken, rewardToken: RewardToken): number {
    const current = this.list(producerToken);
    if (current.includes(rewardToken)) {
      throw new DistributorError(
        "DUPLICATE_REWARD_TOKEN",
        `Reward token '${rewardToken}' is already registered for '${producerToken}'`,
      );
    }

    this.tokens.set(producerToken, [...current, rewardToken]);
    return current.length;
  }

  /**
   * Remove the token at `index` by swapping in the last token.
   * Returns the removed token.
   */
  removeAt(producerToken: ProducerToken, index: number): RewardToken {
    const current = this.list(producerToken);
    const removed = current[index];
    if (!Number.isInteger(index) || removed === undefined) {
      throw new DistributorError(
        "INDEX_OUT_OF_BOUNDS",
        `Index ${String(index)} is out of bounds for '${producerToken}' (length ${String(current.length)})`,
      );
    }

    const next = [...current];
    const last = next.pop();
    if (last !== undefined && index < next.length) {
      next[index] = last;
    }
    this.tokens.set(producerToken, next);
    return removed;
  }

  list(producerToken: ProducerToken): readonly RewardToken[] {
    return this.tokens.get(producerToken) ?? [];
  }

  /**
   * Current index of a reward token, or -1.
   */
  indexOf(producerToken: ProducerToken, rewardToken: RewardToken): number {
    return this.list(producerToken).indexOf(rewardToken);
  }

  /**
   * Producers with at least one registered reward token.
   */
  producers(): readonly ProducerToken[] {
    return [...this.tokens.entries()]
      .filter(([, rewardTokens]) => rewardTokens.length > 0)
      .map(([producerToken]) => producerToken);
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for RewardDistributor)
  // ─────────────────────────────────────────────────────────────────────

  exportEntries(): readonly RegistryEntry[] {
    return [...this.tokens.entries()].map(([producerToken, rewardTokens]) => ({
      producerToken,
      rewardTokens: [...rewardTokens],
    }));
  }

  importEntries(entries: readonly RegistryEntry[]): void {
    for (const e of entries) {
      this.tokens.set(e.producerToken, [...e.rewardTokens]);
    }
  }
}

/**
 * Reward Silo — harvested but not yet claimed reward amounts.
 *
 * Rules:
 * - One balance per (producer, reward) pair
 * - Balances never go negative
 * - Entries persist at zero once created
 */

import { JournaledMap, compositeKey, splitKey, formatAmount, parseAmount } from "@rewardstream/accrual";
import type { TransactionJournal } from "@rewardstream/accrual";
import type { Amount, ProducerToken, RewardToken } from "@rewardstream/types";
import { DistributorError } from "./types.js";
import type { SiloEntry } from "./types.js";

export class RewardSilo {
  private readonly balances: JournaledMap<string, Amount>;

  constructor(journal: TransactionJournal) {
    this.balances = new JournaledMap(journal);
  }

  balanceOf(producerToken: ProducerToken, rewardToken: RewardToken): Amount {
    return this.balances.get(compositeKey(producerToken, rewardToken)) ?? 0n;
  }

  /**
   * Add harvested rewards. Returns the new balance.
   */
  credit(producerToken: ProducerToken, rewardToken: RewardToken, amount: Amount): Amount {
    const next = this.balanceOf(producerToken, rewardToken) + amount;
    this.balances.set(compositeKey(producerToken, rewardToken), next);
    return next;
  }

  /**
   * Remove claimed rewards. Returns the new balance.
   */
  debit(producerToken: ProducerToken, rewardToken: RewardToken, amount: Amount): Amount {
    const current = this.balanceOf(producerToken, rewardToken);
    if (amount > current) {
      throw new DistributorError(
        "INSUFFICIENT_SILO",
        `Silo '${producerToken}/${rewardToken}' holds ${current.toString()}, cannot debit ${amount.toString()}`,
      );
    }

    const next = current - amount;
    this.balances.set(compositeKey(producerToken, rewardToken), next);
    return next;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for RewardDistributor)
  // ─────────────────────────────────────────────────────────────────────

  exportEntries(): readonly SiloEntry[] {
    return [...this.balances.entries()].map(([key, amount]) => {
      const [producerToken = "", rewardToken = ""] = splitKey(key);
      return { producerToken, rewardToken, amount: formatAmount(amount) };
    });
  }

  importEntries(entries: readonly SiloEntry[]): void {
    for (const e of entries) {
      this.balances.set(compositeKey(e.producerToken, e.rewardToken), parseAmount(e.amount));
    }
  }
}

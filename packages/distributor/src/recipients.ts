/**
 * Recipient Directory — who actually receives a claim.
 *
 * Two redirect maps, both keyed by (owner, producer, reward):
 * - personal: set by a holder for its own claims
 * - privileged: set by the administrator for a wrapper contract
 *
 * Resolution for a claiming holder:
 *   privileged[holder] → personal[holder] → holder
 */

import { JournaledMap, compositeKey, splitKey } from "@rewardstream/accrual";
import type { TransactionJournal } from "@rewardstream/accrual";
import type { Identity, ProducerToken, RewardToken } from "@rewardstream/types";
import type { RecipientEntry } from "./types.js";

export type RecipientScope = "personal" | "privileged";

export class RecipientDirectory {
  private readonly personal: JournaledMap<string, Identity>;
  private readonly privileged: JournaledMap<string, Identity>;

  constructor(journal: TransactionJournal) {
    this.personal = new JournaledMap(journal);
    this.privileged = new JournaledMap(journal);
  }

  set(
    scope: RecipientScope,
    owner: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
    recipient: Identity,
  ): void {
    this.map(scope).set(compositeKey(owner, producerToken, rewardToken), recipient);
  }

  /**
   * Remove a redirect. Returns whether one existed.
   */
  unset(
    scope: RecipientScope,
    owner: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
  ): boolean {
    return this.map(scope).delete(compositeKey(owner, producerToken, rewardToken));
  }

  get(
    scope: RecipientScope,
    owner: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
  ): Identity | undefined {
    return this.map(scope).get(compositeKey(owner, producerToken, rewardToken));
  }

  resolve(holder: Identity, producerToken: ProducerToken, rewardToken: RewardToken): Identity {
    return (
      this.get("privileged", holder, producerToken, rewardToken) ??
      this.get("personal", holder, producerToken, rewardToken) ??
      holder
    );
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internal state access (for RewardDistributor)
  // ─────────────────────────────────────────────────────────────────────

  exportEntries(scope: RecipientScope): readonly RecipientEntry[] {
    return [...this.map(scope).entries()].map(([key, recipient]) => {
      const [owner = "", producerToken = "", rewardToken = ""] = splitKey(key);
      return { owner, producerToken, rewardToken, recipient };
    });
  }

  importEntries(scope: RecipientScope, entries: readonly RecipientEntry[]): void {
    for (const e of entries) {
      this.set(scope, e.owner, e.producerToken, e.rewardToken, e.recipient);
    }
  }

  private map(scope: RecipientScope): JournaledMap<string, Identity> {
    return scope === "personal" ? this.personal : this.privileged;
  }
}

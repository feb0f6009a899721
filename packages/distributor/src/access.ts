/**
 * Access Control — the administrator capability and the harvest wiring.
 *
 * Rules:
 * - Exactly one administrator at a time
 * - Only the administrator may hand the capability over
 * - Only the wired harvest source may deposit rewards
 */

import { JournaledValue } from "@rewardstream/accrual";
import type { TransactionJournal } from "@rewardstream/accrual";
import type { HarvestSource, Identity } from "@rewardstream/types";
import { DistributorError } from "./types.js";

export class AccessControl {
  private readonly administrator: JournaledValue<Identity>;
  private readonly harvestSource: JournaledValue<HarvestSource | undefined>;

  constructor(
    journal: TransactionJournal,
    administrator: Identity,
    harvestSource?: HarvestSource,
  ) {
    this.administrator = new JournaledValue(journal, administrator);
    this.harvestSource = new JournaledValue(journal, harvestSource);
  }

  get admin(): Identity {
    return this.administrator.get();
  }

  get harvester(): HarvestSource | undefined {
    return this.harvestSource.get();
  }

  assertAdministrator(caller: Identity, action: string): void {
    if (caller !== this.administrator.get()) {
      throw new DistributorError(
        "UNAUTHORIZED",
        `'${caller}' is not the administrator and cannot ${action}`,
      );
    }
  }

  assertHarvester(caller: Identity): void {
    const source = this.harvestSource.get();
    if (source === undefined || caller !== source.identity) {
      throw new DistributorError(
        "UNAUTHORIZED",
        `'${caller}' is not the harvest source and cannot deposit rewards`,
      );
    }
  }

  /**
   * The wired harvest source. Throws if none is set.
   */
  requireHarvester(): HarvestSource {
    const source = this.harvestSource.get();
    if (source === undefined) {
      throw new DistributorError("HARVESTER_NOT_SET", "No harvest source has been wired");
    }
    return source;
  }

  setAdministrator(next: Identity): Identity {
    const previous = this.administrator.get();
    this.administrator.set(next);
    return previous;
  }

  setHarvester(source: HarvestSource): void {
    this.harvestSource.set(source);
  }
}

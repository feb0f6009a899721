/**
 * @rewardstream/accrual — Core AccrualLedger class.
 *
 * Integrates balance over time, lazily, one record at a time. The global
 * record of a producer integrates total supply; a holder record integrates
 * that holder's balance. Nothing ever iterates over all holders.
 *
 * API surface:
 * - globalAccrue() — Bring a producer's supply integral up to now
 * - userAccrue() — Bring a holder's balance integral up to now
 * - debitPoints() — Consume claimed points from holder and global totals
 * - getGlobalState() / getUserState() — Read stored records
 * - previewGlobalPoints() / previewUserPoints() — Project points to now
 * - exportGlobalStates() / exportUserStates() — Dump records
 * - importGlobalState() / importUserState() — Restore records
 *
 * The balance ledger calls globalAccrue() on every supply change and
 * userAccrue() on every balance change, at the instant of the change and
 * inside the same journal run. The elapsed window is integrated with the
 * stored snapshot, which still holds the pre-change value; the snapshot
 * is then refreshed from the ledger.
 */

import type {
  BalanceLedger,
  Clock,
  GlobalState,
  Identity,
  ProducerToken,
  UserState,
} from "@rewardstream/types";
import { isNullIdentity } from "@rewardstream/types";
import { TransactionJournal, JournaledMap, compositeKey, splitKey } from "./journal.js";
import { accruePoints, elapsedSeconds } from "./point-math.js";
import type { AccrualDeps, GlobalStateRecord, UserStateRecord } from "./types.js";
import { AccrualError, UNINITIALIZED_GLOBAL, UNINITIALIZED_USER } from "./types.js";

export class AccrualLedger {
  private readonly _balances: BalanceLedger;
  private readonly _clock: Clock;
  private readonly _journal: TransactionJournal;
  private readonly _global: JournaledMap<ProducerToken, GlobalState>;
  private readonly _users: JournaledMap<string, UserState>;

  constructor(deps: AccrualDeps) {
    this._balances = deps.balances;
    this._clock = deps.clock;
    this._journal = deps.journal ?? new TransactionJournal();
    this._global = new JournaledMap(this._journal);
    this._users = new JournaledMap(this._journal);
  }

  // ─── Accrual ─────────────────────────────────────────────────────────

  /**
   * Accrue supply-seconds for a producer and refresh its supply snapshot.
   *
   * points += lastSupply × (now − lastUpdate); lastSupply = totalSupply;
   * lastUpdate = now. The first call initializes the record with zero
   * points.
   */
  globalAccrue(producerToken: ProducerToken): GlobalState {
    assertIdentity(producerToken, "producerToken");

    return this._journal.run(() => {
      const now = this._clock.now();
      const current = this.getGlobalState(producerToken);
      const elapsed = elapsedSeconds(current.lastUpdate, now);

      const next: GlobalState = {
        lastUpdate: now,
        lastSupply: this._balances.totalSupply(producerToken),
        points: accruePoints(current.points, current.lastSupply, elapsed),
      };
      this._global.set(producerToken, next);
      return next;
    });
  }

  /**
   * Accrue balance-seconds for a holder and refresh its balance snapshot.
   */
  userAccrue(producerToken: ProducerToken, holder: Identity): UserState {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");

    return this._journal.run(() => {
      const now = this._clock.now();
      const current = this.getUserState(producerToken, holder);
      const elapsed = elapsedSeconds(current.lastUpdate, now);

      const next: UserState = {
        lastUpdate: now,
        lastBalance: this._balances.balanceOf(producerToken, holder),
        points: accruePoints(current.points, current.lastBalance, elapsed),
      };
      this._users.set(compositeKey(producerToken, holder), next);
      return next;
    });
  }

  /**
   * Remove claimed points from a holder and from the producer's global
   * total. Both records must already hold at least `points`.
   */
  debitPoints(producerToken: ProducerToken, holder: Identity, points: bigint): void {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");
    if (points < 0n) {
      throw new AccrualError("INVALID_AMOUNT", `Cannot debit negative points: ${points.toString()}`);
    }

    this._journal.run(() => {
      const user = this.getUserState(producerToken, holder);
      const global = this.getGlobalState(producerToken);

      if (user.points < points) {
        throw new AccrualError(
          "INSUFFICIENT_POINTS",
          `Holder "${holder}" has ${user.points.toString()} points, cannot debit ${points.toString()}`,
        );
      }
      if (global.points < points) {
        throw new AccrualError(
          "INSUFFICIENT_POINTS",
          `Producer "${producerToken}" has ${global.points.toString()} global points, cannot debit ${points.toString()}`,
        );
      }

      this._users.set(compositeKey(producerToken, holder), { ...user, points: user.points - points });
      this._global.set(producerToken, { ...global, points: global.points - points });
    });
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getGlobalState(producerToken: ProducerToken): GlobalState {
    return this._global.get(producerToken) ?? UNINITIALIZED_GLOBAL;
  }

  getUserState(producerToken: ProducerToken, holder: Identity): UserState {
    return this._users.get(compositeKey(producerToken, holder)) ?? UNINITIALIZED_USER;
  }

  /**
   * Global points as they would be after a globalAccrue() right now.
   * Does not mutate state.
   */
  previewGlobalPoints(producerToken: ProducerToken): bigint {
    const state = this.getGlobalState(producerToken);
    return accruePoints(
      state.points,
      state.lastSupply,
      elapsedSeconds(state.lastUpdate, this._clock.now()),
    );
  }

  /**
   * Holder points as they would be after a userAccrue() right now.
   * Does not mutate state.
   */
  previewUserPoints(producerToken: ProducerToken, holder: Identity): bigint {
    const state = this.getUserState(producerToken, holder);
    return accruePoints(
      state.points,
      state.lastBalance,
      elapsedSeconds(state.lastUpdate, this._clock.now()),
    );
  }

  // ─── Export / Import ─────────────────────────────────────────────────

  exportGlobalStates(): readonly GlobalStateRecord[] {
    return [...this._global.entries()].map(([producerToken, state]) => ({
      producerToken,
      state,
    }));
  }

  exportUserStates(): readonly UserStateRecord[] {
    return [...this._users.entries()].map(([key, state]) => {
      const [producerToken = "", holder = ""] = splitKey(key);
      return { producerToken, holder, state };
    });
  }

  importGlobalState(record: GlobalStateRecord): void {
    assertIdentity(record.producerToken, "producerToken");
    this._global.set(record.producerToken, { ...record.state });
  }

  importUserState(record: UserStateRecord): void {
    assertIdentity(record.producerToken, "producerToken");
    assertIdentity(record.holder, "holder");
    this._users.set(compositeKey(record.producerToken, record.holder), { ...record.state });
  }
}

function assertIdentity(identity: Identity, role: string): void {
  if (isNullIdentity(identity)) {
    throw new AccrualError("NULL_IDENTITY", `${role} must not be the null identity`);
  }
}

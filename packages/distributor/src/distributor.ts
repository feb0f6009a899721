/**
 * RewardDistributor — Top-level coordinator for reward accrual and claims.
 *
 * Composes:
 * - AccrualLedger: lazy global and holder point integrals
 * - RewardTokenRegistry: reward tokens per producer
 * - RewardSilo: harvested, unclaimed amounts
 * - RecipientDirectory: personal and privileged redirects
 * - AccessControl: administrator capability and harvest wiring
 *
 * Every public mutating operation runs inside the shared transaction
 * journal: it either completes or leaves no trace.
 */

import {
  AccrualLedger,
  TransactionJournal,
  formatAmount,
  parseAmount,
  proportionalShare,
} from "@rewardstream/accrual";
import type {
  Amount,
  Clock,
  CodeInspector,
  GlobalState,
  HarvestSource,
  Identity,
  ProducerToken,
  RewardToken,
  TokenTransport,
  UserState,
} from "@rewardstream/types";
import { isAmountString, isIdentity, isTimestamp } from "@rewardstream/types";
import { AccessControl } from "./access.js";
import { EventPublisher } from "./events.js";
import { assertIdentity, assertNonZero } from "./guards.js";
import { RecipientDirectory } from "./recipients.js";
import { RewardTokenRegistry } from "./registry.js";
import { RewardSilo } from "./silo.js";
import type {
  ClaimPayout,
  ClaimResult,
  DistributorDeps,
  DistributorSnapshot,
  HarvestResult,
} from "./types.js";
import { DistributorError } from "./types.js";

// =============================================================================
// RewardDistributor
// =============================================================================

export class RewardDistributor {
  private readonly journal: TransactionJournal;
  private readonly clock: Clock;
  private readonly transport: TokenTransport;
  private readonly codeInspector: CodeInspector;
  private readonly accrual: AccrualLedger;
  private readonly registry: RewardTokenRegistry;
  private readonly silo: RewardSilo;
  private readonly recipients: RecipientDirectory;
  private readonly access: AccessControl;
  private readonly events: EventPublisher;

  constructor(deps: DistributorDeps) {
    assertIdentity(deps.administrator, "administrator");

    this.journal = deps.journal ?? new TransactionJournal();
    this.clock = deps.clock;
    this.transport = deps.transport;
    this.codeInspector = deps.codeInspector;
    this.accrual = new AccrualLedger({
      balances: deps.balances,
      clock: deps.clock,
      journal: this.journal,
    });
    this.registry = new RewardTokenRegistry(this.journal);
    this.silo = new RewardSilo(this.journal);
    this.recipients = new RecipientDirectory(this.journal);
    this.access = new AccessControl(this.journal, deps.administrator, deps.harvestSource);
    this.events = new EventPublisher(
      this.journal,
      deps.clock,
      deps.onEvent,
      deps.onListenerError,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accrual hooks (called by the balance ledger)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Bring a producer's supply integral up to now.
   * Must run around every mint and burn.
   */
  globalAccrue(producerToken: ProducerToken): GlobalState {
    assertIdentity(producerToken, "producerToken");
    return this.journal.run(() => this.accrual.globalAccrue(producerToken));
  }

  /**
   * Bring a holder's balance integral up to now.
   * Must run for every holder whose balance changes.
   */
  userAccrue(producerToken: ProducerToken, holder: Identity): UserState {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");
    return this.journal.run(() => this.accrual.userAccrue(producerToken, holder));
  }

  getGlobalState(producerToken: ProducerToken): GlobalState {
    return this.accrual.getGlobalState(producerToken);
  }

  getUserState(producerToken: ProducerToken, holder: Identity): UserState {
    return this.accrual.getUserState(producerToken, holder);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reward token registry
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a reward token for a producer. Returns its index.
   */
  addRewardToken(caller: Identity, producerToken: ProducerToken, rewardToken: RewardToken): number {
    this.access.assertAdministrator(caller, "add reward tokens");
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");

    return this.journal.run(() => {
      const index = this.registry.add(producerToken, rewardToken);
      this.events.publish(
        { type: "reward-token.added", payload: { producerToken, rewardToken, index } },
        caller,
      );
      return index;
    });
  }

  /**
   * Remove the reward token at `index`. The last token takes its place,
   * so indices held from before this call may now point elsewhere.
   * Returns the removed token.
   */
  removeRewardToken(caller: Identity, producerToken: ProducerToken, index: number): RewardToken {
    this.access.assertAdministrator(caller, "remove reward tokens");
    assertIdentity(producerToken, "producerToken");

    return this.journal.run(() => {
      const rewardToken = this.registry.removeAt(producerToken, index);
      this.events.publish(
        { type: "reward-token.removed", payload: { producerToken, rewardToken, index } },
        caller,
      );
      return rewardToken;
    });
  }

  getRewardTokens(producerToken: ProducerToken): readonly RewardToken[] {
    return this.registry.list(producerToken);
  }

  indexOfRewardToken(producerToken: ProducerToken, rewardToken: RewardToken): number {
    return this.registry.indexOf(producerToken, rewardToken);
  }

  listProducers(): readonly ProducerToken[] {
    return this.registry.producers();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Harvest & silo
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Wire the harvest collaborator allowed to deposit rewards.
   */
  setHarvestSource(caller: Identity, source: HarvestSource): void {
    this.access.assertAdministrator(caller, "set the harvest source");
    assertIdentity(source.identity, "harvester");

    this.journal.run(() => {
      this.access.setHarvester(source);
      this.events.publish(
        { type: "harvest-source.set", payload: { harvester: source.identity } },
        caller,
      );
    });
  }

  getHarvester(): Identity | undefined {
    return this.access.harvester?.identity;
  }

  /**
   * Pull newly available rewards for every registered pair into the silo.
   *
   * Each producer's global points are brought current before its rewards
   * land, so the new rewards are shared by points accrued up to now.
   */
  harvest(): HarvestResult {
    const source = this.access.requireHarvester();

    return this.journal.run(() => {
      const producerTokens: ProducerToken[] = [];
      const rewardTokens: RewardToken[] = [];
      const amounts: Amount[] = [];

      for (const producerToken of this.registry.producers()) {
        for (const rewardToken of this.registry.list(producerToken)) {
          this.accrual.globalAccrue(producerToken);

          const amount = source.collectRewards(producerToken, rewardToken);
          if (amount === 0n) {
            continue;
          }

          this.events.publish(
            {
              type: "harvest.collected",
              payload: { producerToken, rewardToken, amount: formatAmount(amount) },
            },
            source.identity,
          );
          this.rewardAccrue(source.identity, producerToken, rewardToken, amount);

          producerTokens.push(producerToken);
          rewardTokens.push(rewardToken);
          amounts.push(amount);
        }
      }

      return { producerTokens, rewardTokens, amounts };
    });
  }

  /**
   * Deposit harvested rewards into the silo. Only the harvest source may
   * call this. Returns the new silo balance.
   */
  rewardAccrue(
    caller: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
    amount: Amount,
  ): Amount {
    this.access.assertHarvester(caller);
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");
    assertNonZero(amount, "amount");

    return this.journal.run(() => {
      const siloBalance = this.silo.credit(producerToken, rewardToken, amount);
      this.events.publish(
        {
          type: "reward.accrued",
          payload: {
            producerToken,
            rewardToken,
            amount: formatAmount(amount),
            siloBalance: formatAmount(siloBalance),
          },
        },
        caller,
      );
      return siloBalance;
    });
  }

  getSiloBalance(producerToken: ProducerToken, rewardToken: RewardToken): Amount {
    return this.silo.balanceOf(producerToken, rewardToken);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Claims
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Convert a holder's points into its share of every silo.
   *
   * All silo debits and point debits complete before the first token
   * leaves, so a transport that calls back into claim() finds nothing
   * left to take. A failed delivery unwinds the whole claim.
   */
  claim(producerToken: ProducerToken, holder: Identity): ClaimResult {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");

    return this.journal.run(() => {
      const userPoints = this.accrual.userAccrue(producerToken, holder).points;
      const globalPoints = this.accrual.globalAccrue(producerToken).points;

      if (globalPoints === 0n) {
        return { producerToken, holder, points: 0n, payouts: [] };
      }

      const payouts: ClaimPayout[] = [];
      for (const rewardToken of this.registry.list(producerToken)) {
        const amount = proportionalShare(
          this.silo.balanceOf(producerToken, rewardToken),
          userPoints,
          globalPoints,
        );
        this.silo.debit(producerToken, rewardToken, amount);
        payouts.push({
          rewardToken,
          recipient: this.recipients.resolve(holder, producerToken, rewardToken),
          amount,
        });
      }

      this.accrual.debitPoints(producerToken, holder, userPoints);

      this.events.publish(
        {
          type: "rewards.claimed",
          payload: {
            producerToken,
            holder,
            points: formatAmount(userPoints),
            payouts: payouts.map((p) => ({
              rewardToken: p.rewardToken,
              recipient: p.recipient,
              amount: formatAmount(p.amount),
            })),
          },
        },
        holder,
      );

      for (const payout of payouts) {
        if (payout.amount > 0n) {
          this.transport.transfer(payout.rewardToken, payout.recipient, payout.amount);
        }
      }

      return { producerToken, holder, points: userPoints, payouts };
    });
  }

  /**
   * What claim() would deliver right now, without changing anything.
   */
  previewClaim(producerToken: ProducerToken, holder: Identity): readonly ClaimPayout[] {
    const userPoints = this.accrual.previewUserPoints(producerToken, holder);
    const globalPoints = this.accrual.previewGlobalPoints(producerToken);

    return this.registry.list(producerToken).map((rewardToken) => ({
      rewardToken,
      recipient: this.recipients.resolve(holder, producerToken, rewardToken),
      amount: proportionalShare(
        this.silo.balanceOf(producerToken, rewardToken),
        userPoints,
        globalPoints,
      ),
    }));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recipient redirection
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Redirect the caller's own future claims for a pair.
   */
  setRewardRecipient(
    caller: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
    recipient: Identity,
  ): void {
    assertIdentity(caller, "caller");
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");
    assertIdentity(recipient, "recipient");

    this.journal.run(() => {
      this.recipients.set("personal", caller, producerToken, rewardToken, recipient);
      this.events.publish(
        {
          type: "recipient.set",
          payload: { owner: caller, producerToken, rewardToken, recipient },
        },
        caller,
      );
    });
  }

  unsetRewardRecipient(caller: Identity, producerToken: ProducerToken, rewardToken: RewardToken): void {
    assertIdentity(caller, "caller");
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");

    this.journal.run(() => {
      if (this.recipients.unset("personal", caller, producerToken, rewardToken)) {
        this.events.publish(
          { type: "recipient.unset", payload: { owner: caller, producerToken, rewardToken } },
          caller,
        );
      }
    });
  }

  /**
   * Redirect a wrapper contract's claims. Administrator only.
   */
  setRewardRecipientPrivileged(
    caller: Identity,
    wrapper: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
    recipient: Identity,
  ): void {
    this.access.assertAdministrator(caller, "set privileged recipients");
    assertIdentity(wrapper, "wrapper");
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");
    assertIdentity(recipient, "recipient");
    this.assertContract(wrapper);

    this.journal.run(() => {
      this.recipients.set("privileged", wrapper, producerToken, rewardToken, recipient);
      this.events.publish(
        {
          type: "recipient.privileged.set",
          payload: { owner: wrapper, producerToken, rewardToken, recipient },
        },
        caller,
      );
    });
  }

  unsetRewardRecipientPrivileged(
    caller: Identity,
    wrapper: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
  ): void {
    this.access.assertAdministrator(caller, "unset privileged recipients");
    assertIdentity(wrapper, "wrapper");
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");
    this.assertContract(wrapper);

    this.journal.run(() => {
      if (this.recipients.unset("privileged", wrapper, producerToken, rewardToken)) {
        this.events.publish(
          {
            type: "recipient.privileged.unset",
            payload: { owner: wrapper, producerToken, rewardToken },
          },
          caller,
        );
      }
    });
  }

  getRewardRecipient(
    holder: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
  ): Identity | undefined {
    return this.recipients.get("personal", holder, producerToken, rewardToken);
  }

  getPrivilegedRecipient(
    wrapper: Identity,
    producerToken: ProducerToken,
    rewardToken: RewardToken,
  ): Identity | undefined {
    return this.recipients.get("privileged", wrapper, producerToken, rewardToken);
  }

  /**
   * Who a claim by `holder` for this pair would be delivered to.
   */
  resolveRecipient(holder: Identity, producerToken: ProducerToken, rewardToken: RewardToken): Identity {
    return this.recipients.resolve(holder, producerToken, rewardToken);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  getAdministrator(): Identity {
    return this.access.admin;
  }

  transferAdministration(caller: Identity, next: Identity): void {
    this.access.assertAdministrator(caller, "transfer administration");
    assertIdentity(next, "next administrator");

    this.journal.run(() => {
      const previous = this.access.setAdministrator(next);
      this.events.publish(
        { type: "administration.transferred", payload: { previous, next } },
        caller,
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): DistributorSnapshot {
    return {
      version: 1,
      administrator: this.access.admin,
      harvester: this.access.harvester?.identity ?? null,
      globalStates: this.accrual.exportGlobalStates().map(({ producerToken, state }) => ({
        producerToken,
        lastUpdate: state.lastUpdate,
        lastSupply: formatAmount(state.lastSupply),
        points: formatAmount(state.points),
      })),
      userStates: this.accrual.exportUserStates().map(({ producerToken, holder, state }) => ({
        producerToken,
        holder,
        lastUpdate: state.lastUpdate,
        lastBalance: formatAmount(state.lastBalance),
        points: formatAmount(state.points),
      })),
      registries: this.registry.exportEntries(),
      silos: this.silo.exportEntries(),
      personalRecipients: this.recipients.exportEntries("personal"),
      privilegedRecipients: this.recipients.exportEntries("privileged"),
      asOf: this.clock.now(),
    };
  }

  /**
   * Rebuild a distributor from a snapshot. The administrator comes from
   * the snapshot; a harvest source in `deps` must match the snapshot's
   * harvester identity.
   */
  static fromSnapshot(
    snap: DistributorSnapshot,
    deps: Omit<DistributorDeps, "administrator">,
  ): RewardDistributor {
    validateSnapshot(snap);

    if (snap.harvester !== null) {
      if (deps.harvestSource === undefined) {
        throw new DistributorError(
          "INVALID_SNAPSHOT",
          `Snapshot names harvester '${snap.harvester}' but no harvest source was supplied`,
        );
      }
      if (deps.harvestSource.identity !== snap.harvester) {
        throw new DistributorError(
          "INVALID_SNAPSHOT",
          `Snapshot harvester '${snap.harvester}' does not match '${deps.harvestSource.identity}'`,
        );
      }
    }

    const distributor = new RewardDistributor({ ...deps, administrator: snap.administrator });

    distributor.journal.run(() => {
      for (const g of snap.globalStates) {
        distributor.accrual.importGlobalState({
          producerToken: g.producerToken,
          state: {
            lastUpdate: g.lastUpdate,
            lastSupply: parseAmount(g.lastSupply),
            points: parseAmount(g.points),
          },
        });
      }
      for (const u of snap.userStates) {
        distributor.accrual.importUserState({
          producerToken: u.producerToken,
          holder: u.holder,
          state: {
            lastUpdate: u.lastUpdate,
            lastBalance: parseAmount(u.lastBalance),
            points: parseAmount(u.points),
          },
        });
      }
      distributor.registry.importEntries(snap.registries);
      distributor.silo.importEntries(snap.silos);
      distributor.recipients.importEntries("personal", snap.personalRecipients);
      distributor.recipients.importEntries("privileged", snap.privilegedRecipients);
    });

    return distributor;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private assertContract(wrapper: Identity): void {
    if (!this.codeInspector.isContract(wrapper)) {
      throw new DistributorError("NOT_CONTRACT", `'${wrapper}' is not a deployed contract`);
    }
  }
}

function validateSnapshot(snap: DistributorSnapshot): void {
  if (snap.version !== 1) {
    throw new DistributorError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snap.version)}`);
  }
  if (!isIdentity(snap.administrator)) {
    throw new DistributorError("INVALID_SNAPSHOT", "Snapshot administrator must not be the null identity");
  }

  const identities = [
    ...(snap.harvester === null ? [] : [snap.harvester]),
    ...snap.globalStates.map((g) => g.producerToken),
    ...snap.userStates.flatMap((u) => [u.producerToken, u.holder]),
    ...snap.registries.flatMap((r) => [r.producerToken, ...r.rewardTokens]),
    ...snap.silos.flatMap((s) => [s.producerToken, s.rewardToken]),
    ...[...snap.personalRecipients, ...snap.privilegedRecipients].flatMap((r) => [
      r.owner,
      r.producerToken,
      r.rewardToken,
      r.recipient,
    ]),
  ];
  for (const identity of identities) {
    if (!isIdentity(identity)) {
      throw new DistributorError("INVALID_SNAPSHOT", `Malformed identity in snapshot: "${String(identity)}"`);
    }
  }

  const amounts = [
    ...snap.globalStates.flatMap((g) => [g.lastSupply, g.points]),
    ...snap.userStates.flatMap((u) => [u.lastBalance, u.points]),
    ...snap.silos.map((s) => s.amount),
  ];
  for (const amount of amounts) {
    if (!isAmountString(amount)) {
      throw new DistributorError("INVALID_SNAPSHOT", `Malformed amount in snapshot: "${String(amount)}"`);
    }
  }

  const timestamps = [...snap.globalStates, ...snap.userStates].map((s) => s.lastUpdate);
  for (const ts of timestamps) {
    if (ts !== null && !isTimestamp(ts)) {
      throw new DistributorError("INVALID_SNAPSHOT", `Malformed timestamp in snapshot: ${String(ts)}`);
    }
  }
}

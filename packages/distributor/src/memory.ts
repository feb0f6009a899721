/**
 * In-memory collaborators.
 *
 * Process-local stand-ins for the systems the distributor talks to:
 * a producer-token balance ledger, an upstream harvest source, a token
 * bank that receives deliveries, and a code inspector. They share the
 * distributor's journal, so a failed operation rolls their state back
 * together with the distributor's.
 */

import { JournaledMap, TransactionJournal, compositeKey } from "@rewardstream/accrual";
import type {
  Amount,
  BalanceLedger,
  Clock,
  CodeInspector,
  HarvestSource,
  Identity,
  ProducerToken,
  RewardToken,
  TokenTransport,
} from "@rewardstream/types";
import { RewardDistributor } from "./distributor.js";
import { assertIdentity, assertNonZero } from "./guards.js";
import { DistributorError } from "./types.js";
import type { EventListener, ListenerErrorHook } from "./types.js";

// =============================================================================
// Balance ledger
// =============================================================================

/**
 * The accrual hooks a balance ledger must notify.
 */
export interface AccrualHooks {
  globalAccrue(producerToken: ProducerToken): unknown;
  userAccrue(producerToken: ProducerToken, holder: Identity): unknown;
}

/**
 * Fungible balances for any number of producer tokens.
 *
 * Each mint, burn or transfer applies the change and then synchronizes
 * the affected accrual records at the same instant: the elapsed window
 * is integrated with the stored pre-change snapshot, and the snapshot is
 * refreshed to the post-change value.
 */
export class MemoryBalanceLedger implements BalanceLedger {
  private readonly journal: TransactionJournal;
  private readonly supplies: JournaledMap<ProducerToken, Amount>;
  private readonly balances: JournaledMap<string, Amount>;
  private hooks: AccrualHooks | undefined;

  constructor(journal: TransactionJournal) {
    this.journal = journal;
    this.supplies = new JournaledMap(journal);
    this.balances = new JournaledMap(journal);
  }

  attach(hooks: AccrualHooks): void {
    this.hooks = hooks;
  }

  totalSupply(producerToken: ProducerToken): Amount {
    return this.supplies.get(producerToken) ?? 0n;
  }

  balanceOf(producerToken: ProducerToken, holder: Identity): Amount {
    return this.balances.get(compositeKey(producerToken, holder)) ?? 0n;
  }

  mint(producerToken: ProducerToken, holder: Identity, amount: Amount): void {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");
    assertNonZero(amount, "amount");

    this.journal.run(() => {
      this.supplies.set(producerToken, this.totalSupply(producerToken) + amount);
      this.setBalance(producerToken, holder, this.balanceOf(producerToken, holder) + amount);
      this.hooks?.globalAccrue(producerToken);
      this.hooks?.userAccrue(producerToken, holder);
    });
  }

  burn(producerToken: ProducerToken, holder: Identity, amount: Amount): void {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(holder, "holder");
    assertNonZero(amount, "amount");
    this.assertCovered(producerToken, holder, amount);

    this.journal.run(() => {
      this.supplies.set(producerToken, this.totalSupply(producerToken) - amount);
      this.setBalance(producerToken, holder, this.balanceOf(producerToken, holder) - amount);
      this.hooks?.globalAccrue(producerToken);
      this.hooks?.userAccrue(producerToken, holder);
    });
  }

  transfer(producerToken: ProducerToken, from: Identity, to: Identity, amount: Amount): void {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(from, "from");
    assertIdentity(to, "to");
    assertNonZero(amount, "amount");
    this.assertCovered(producerToken, from, amount);

    this.journal.run(() => {
      this.setBalance(producerToken, from, this.balanceOf(producerToken, from) - amount);
      this.setBalance(producerToken, to, this.balanceOf(producerToken, to) + amount);
      this.hooks?.userAccrue(producerToken, from);
      this.hooks?.userAccrue(producerToken, to);
    });
  }

  private assertCovered(producerToken: ProducerToken, holder: Identity, amount: Amount): void {
    const balance = this.balanceOf(producerToken, holder);
    if (balance < amount) {
      throw new DistributorError(
        "INSUFFICIENT_BALANCE",
        `'${holder}' holds ${balance.toString()} of '${producerToken}', needs ${amount.toString()}`,
      );
    }
  }

  private setBalance(producerToken: ProducerToken, holder: Identity, amount: Amount): void {
    this.balances.set(compositeKey(producerToken, holder), amount);
  }
}

// =============================================================================
// Harvest source
// =============================================================================

/**
 * A yield source whose pending rewards are funded by hand.
 * Collecting a pair hands over its pending amount and zeroes it.
 */
export class MemoryHarvestSource implements HarvestSource {
  readonly identity: Identity;
  private readonly pending: JournaledMap<string, Amount>;

  constructor(identity: Identity, journal: TransactionJournal) {
    assertIdentity(identity, "harvester");
    this.identity = identity;
    this.pending = new JournaledMap(journal);
  }

  fund(producerToken: ProducerToken, rewardToken: RewardToken, amount: Amount): Amount {
    assertIdentity(producerToken, "producerToken");
    assertIdentity(rewardToken, "rewardToken");
    assertNonZero(amount, "amount");

    const next = this.pendingRewards(producerToken, rewardToken) + amount;
    this.pending.set(compositeKey(producerToken, rewardToken), next);
    return next;
  }

  pendingRewards(producerToken: ProducerToken, rewardToken: RewardToken): Amount {
    return this.pending.get(compositeKey(producerToken, rewardToken)) ?? 0n;
  }

  collectRewards(producerToken: ProducerToken, rewardToken: RewardToken): Amount {
    const amount = this.pendingRewards(producerToken, rewardToken);
    if (amount > 0n) {
      this.pending.set(compositeKey(producerToken, rewardToken), 0n);
    }
    return amount;
  }
}

// =============================================================================
// Token bank
// =============================================================================

export interface Delivery {
  readonly rewardToken: RewardToken;
  readonly to: Identity;
  readonly amount: Amount;
}

/**
 * Receives reward deliveries and keeps per-holder totals.
 * An optional hook runs after each delivery (it may call back into the
 * distributor).
 */
export class MemoryTokenBank implements TokenTransport {
  private readonly received: JournaledMap<string, Amount>;
  private readonly log: JournaledMap<number, Delivery>;
  onTransfer: ((delivery: Delivery) => void) | undefined;

  constructor(journal: TransactionJournal) {
    this.received = new JournaledMap(journal);
    this.log = new JournaledMap(journal);
  }

  transfer(rewardToken: RewardToken, to: Identity, amount: Amount): void {
    const delivery: Delivery = { rewardToken, to, amount };
    this.received.set(compositeKey(rewardToken, to), this.balanceOf(rewardToken, to) + amount);
    this.log.set(this.log.size, delivery);
    this.onTransfer?.(delivery);
  }

  balanceOf(rewardToken: RewardToken, holder: Identity): Amount {
    return this.received.get(compositeKey(rewardToken, holder)) ?? 0n;
  }

  deliveries(): readonly Delivery[] {
    return [...this.log.entries()].map(([, delivery]) => delivery);
  }
}

// =============================================================================
// Code inspector
// =============================================================================

export class MemoryCodeInspector implements CodeInspector {
  private readonly contracts: Set<Identity>;

  constructor(contracts: Iterable<Identity> = []) {
    this.contracts = new Set(contracts);
  }

  markContract(identity: Identity): void {
    this.contracts.add(identity);
  }

  isContract(identity: Identity): boolean {
    return this.contracts.has(identity);
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface MemoryDistributorOptions {
  readonly administrator: Identity;
  readonly harvester: Identity;
  readonly clock: Clock;
  readonly contracts?: Iterable<Identity> | undefined;
  readonly onEvent?: EventListener | undefined;
  readonly onListenerError?: ListenerErrorHook | undefined;
}

export interface MemoryDistributor {
  readonly distributor: RewardDistributor;
  readonly balances: MemoryBalanceLedger;
  readonly harvestSource: MemoryHarvestSource;
  readonly bank: MemoryTokenBank;
  readonly codeInspector: MemoryCodeInspector;
  readonly journal: TransactionJournal;
}

/**
 * Build a distributor wired to in-memory collaborators that share one
 * journal.
 */
export function createMemoryDistributor(options: MemoryDistributorOptions): MemoryDistributor {
  const journal = new TransactionJournal();
  const balances = new MemoryBalanceLedger(journal);
  const harvestSource = new MemoryHarvestSource(options.harvester, journal);
  const bank = new MemoryTokenBank(journal);
  const codeInspector = new MemoryCodeInspector(options.contracts);

  const distributor = new RewardDistributor({
    administrator: options.administrator,
    balances,
    transport: bank,
    codeInspector,
    clock: options.clock,
    harvestSource,
    journal,
    onEvent: options.onEvent,
    onListenerError: options.onListenerError,
  });
  balances.attach(distributor);

  return { distributor, balances, harvestSource, bank, codeInspector, journal };
}

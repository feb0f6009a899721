/**
 * RewardService — Composition root for the distributor packages.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. The service wires a RewardDistributor to the
 * in-memory balance ledger, harvest source, token bank and code
 * inspector, registers the boot-time reward tokens and keeps a bounded
 * log of committed events.
 */

import { createMemoryDistributor } from "@rewardstream/distributor";
import type {
  ListenerErrorHook,
  MemoryBalanceLedger,
  MemoryCodeInspector,
  MemoryHarvestSource,
  MemoryTokenBank,
  RewardDistributor,
} from "@rewardstream/distributor";
import type { Clock, DistributorEvent, Identity } from "@rewardstream/types";
import type { RewardTokenPair } from "../config.js";

// =============================================================================
// Clock
// =============================================================================

/**
 * Wall-clock time in whole seconds.
 */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

// =============================================================================
// Configuration
// =============================================================================

export interface RewardServiceConfig {
  readonly administrator: Identity;
  readonly harvester: Identity;
  readonly contracts?: readonly Identity[] | undefined;
  readonly rewardTokens?: readonly RewardTokenPair[] | undefined;
  readonly clock?: Clock | undefined;
  /** Maximum number of events kept for the events endpoint. Default: 10000 */
  readonly eventRetention?: number | undefined;
  /** Receives every committed event (after it is logged) */
  readonly onEvent?: ((event: DistributorEvent) => void) | undefined;
  /** Receives errors thrown by onEvent; the operation itself still succeeds */
  readonly onEventError?: ListenerErrorHook | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class RewardService {
  readonly distributor: RewardDistributor;
  readonly balances: MemoryBalanceLedger;
  readonly harvestSource: MemoryHarvestSource;
  readonly bank: MemoryTokenBank;
  readonly codeInspector: MemoryCodeInspector;
  readonly clock: Clock;

  private readonly _events: DistributorEvent[] = [];
  private readonly _retention: number;

  constructor(config: RewardServiceConfig) {
    this.clock = config.clock ?? new SystemClock();
    this._retention = config.eventRetention ?? 10000;

    const memory = createMemoryDistributor({
      administrator: config.administrator,
      harvester: config.harvester,
      clock: this.clock,
      contracts: config.contracts,
      onEvent: (event) => {
        this._events.push(event);
        if (this._events.length > this._retention) {
          this._events.shift();
        }
        config.onEvent?.(event);
      },
      onListenerError: config.onEventError,
    });

    this.distributor = memory.distributor;
    this.balances = memory.balances;
    this.harvestSource = memory.harvestSource;
    this.bank = memory.bank;
    this.codeInspector = memory.codeInspector;

    for (const pair of config.rewardTokens ?? []) {
      this.distributor.addRewardToken(config.administrator, pair.producerToken, pair.rewardToken);
    }
  }

  /**
   * Committed events still held in the log, oldest first.
   */
  events(): readonly DistributorEvent[] {
    return this._events;
  }
}

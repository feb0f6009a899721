/**
 * Shared fixtures for @rewardstream/distributor tests.
 */

import type { Clock, DistributorEvent } from "@rewardstream/types";
import { createMemoryDistributor } from "../src/memory.js";
import type { MemoryDistributor } from "../src/memory.js";

export const ADMIN = "0xad31n";
export const HARVESTER = "0xha2v";
export const PRODUCER = "0xpr0d";
export const OTHER_PRODUCER = "0xpr0d2";
export const WETH = "0xwe7h";
export const ARB = "0xa2b";
export const GMX = "0x6m8";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";
export const CAROL = "0xca401";
export const WRAPPER = "0xw2a9";
export const COMPOUNDER = "0xc0mp";

export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export interface Harness extends MemoryDistributor {
  readonly clock: ManualClock;
  readonly events: DistributorEvent[];
}

export function createHarness(start = 0): Harness {
  const clock = new ManualClock(start);
  const events: DistributorEvent[] = [];
  const memory = createMemoryDistributor({
    administrator: ADMIN,
    harvester: HARVESTER,
    clock,
    contracts: [WRAPPER],
    onEvent: (event) => events.push(event),
  });
  return { ...memory, clock, events };
}

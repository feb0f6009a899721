/**
 * Tests for the in-memory collaborators.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccrualError, TransactionJournal } from "@rewardstream/accrual";
import { NULL_IDENTITY } from "@rewardstream/types";
import { MemoryCodeInspector, MemoryHarvestSource, MemoryTokenBank } from "../src/memory.js";
import { DistributorError } from "../src/types.js";
import { ALICE, BOB, HARVESTER, PRODUCER, WETH, WRAPPER, createHarness } from "./fixtures.js";
import type { Harness } from "./fixtures.js";

describe("MemoryBalanceLedger", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("mints and updates supply", () => {
    h.balances.mint(PRODUCER, ALICE, 100n);
    h.balances.mint(PRODUCER, BOB, 50n);

    expect(h.balances.totalSupply(PRODUCER)).toBe(150n);
    expect(h.balances.balanceOf(PRODUCER, ALICE)).toBe(100n);
    expect(h.distributor.getGlobalState(PRODUCER).lastSupply).toBe(150n);
  });

  it("burns with dampened global accrual", () => {
    h.balances.mint(PRODUCER, ALICE, 100n);
    h.clock.advance(10);
    h.balances.burn(PRODUCER, ALICE, 30n);

    expect(h.distributor.getGlobalState(PRODUCER)).toEqual({
      lastUpdate: 10,
      lastSupply: 70n,
      points: 1000n,
    });
    expect(h.distributor.getUserState(PRODUCER, ALICE)).toEqual({
      lastUpdate: 10,
      lastBalance: 70n,
      points: 1000n,
    });
  });

  it("accrues both sides of a transfer and leaves the global record alone", () => {
    h.balances.mint(PRODUCER, ALICE, 100n);
    h.clock.advance(10);
    h.balances.transfer(PRODUCER, ALICE, BOB, 40n);

    expect(h.distributor.getUserState(PRODUCER, ALICE)).toEqual({
      lastUpdate: 10,
      lastBalance: 60n,
      points: 1000n,
    });
    expect(h.distributor.getUserState(PRODUCER, BOB)).toEqual({
      lastUpdate: 10,
      lastBalance: 40n,
      points: 0n,
    });
    expect(h.distributor.getGlobalState(PRODUCER)).toEqual({
      lastUpdate: 0,
      lastSupply: 100n,
      points: 0n,
    });
  });

  it("rejects uncovered burns and transfers", () => {
    h.balances.mint(PRODUCER, ALICE, 10n);

    expect(() => h.balances.burn(PRODUCER, ALICE, 11n)).toThrow(DistributorError);
    expect(() => h.balances.transfer(PRODUCER, ALICE, BOB, 11n)).toThrow(/needs 11/);
    expect(h.balances.balanceOf(PRODUCER, ALICE)).toBe(10n);
  });

  it("rejects zero amounts and null identities", () => {
    expect(() => h.balances.mint(PRODUCER, ALICE, 0n)).toThrow("amount must not be zero");
    expect(() => h.balances.mint(PRODUCER, NULL_IDENTITY, 1n)).toThrow(
      "holder must not be the null identity",
    );
  });

  it("rolls the balance change back when accrual fails", () => {
    const late = createHarness(100);
    late.balances.mint(PRODUCER, ALICE, 100n);
    late.clock.advance(-50);

    let code: string | undefined;
    try {
      late.balances.mint(PRODUCER, ALICE, 5n);
    } catch (err) {
      if (err instanceof AccrualError) {
        code = err.code;
      }
    }

    expect(code).toBe("CLOCK_REGRESSION");
    expect(late.balances.balanceOf(PRODUCER, ALICE)).toBe(100n);
    expect(late.balances.totalSupply(PRODUCER)).toBe(100n);
  });
});

describe("MemoryHarvestSource", () => {
  let source: MemoryHarvestSource;

  beforeEach(() => {
    source = new MemoryHarvestSource(HARVESTER, new TransactionJournal());
  });

  it("accumulates funding per pair", () => {
    expect(source.fund(PRODUCER, WETH, 10n)).toBe(10n);
    expect(source.fund(PRODUCER, WETH, 5n)).toBe(15n);
    expect(source.pendingRewards(PRODUCER, WETH)).toBe(15n);
  });

  it("zeroes a pair on collection", () => {
    source.fund(PRODUCER, WETH, 10n);
    expect(source.collectRewards(PRODUCER, WETH)).toBe(10n);
    expect(source.pendingRewards(PRODUCER, WETH)).toBe(0n);
    expect(source.collectRewards(PRODUCER, WETH)).toBe(0n);
  });

  it("rejects zero funding and a null identity", () => {
    expect(() => source.fund(PRODUCER, WETH, 0n)).toThrow(DistributorError);
    expect(() => new MemoryHarvestSource(NULL_IDENTITY, new TransactionJournal())).toThrow(
      "harvester must not be the null identity",
    );
  });
});

describe("MemoryTokenBank", () => {
  it("records deliveries and totals", () => {
    const bank = new MemoryTokenBank(new TransactionJournal());
    bank.transfer(WETH, ALICE, 3n);
    bank.transfer(WETH, ALICE, 4n);

    expect(bank.balanceOf(WETH, ALICE)).toBe(7n);
    expect(bank.deliveries()).toEqual([
      { rewardToken: WETH, to: ALICE, amount: 3n },
      { rewardToken: WETH, to: ALICE, amount: 4n },
    ]);
  });
});

describe("MemoryCodeInspector", () => {
  it("reports marked identities as contracts", () => {
    const inspector = new MemoryCodeInspector([WRAPPER]);
    expect(inspector.isContract(WRAPPER)).toBe(true);
    expect(inspector.isContract(ALICE)).toBe(false);

    inspector.markContract(ALICE);
    expect(inspector.isContract(ALICE)).toBe(true);
  });
});

/**
 * Test fixtures for @rewardstream/accrual.
 *
 * A manual clock and a minimal balance ledger that applies each change
 * and then synchronizes the affected accrual records at the same instant.
 */

import type { BalanceLedger, Clock, Identity, ProducerToken } from "@rewardstream/types";
import type { AccrualLedger } from "../src/accrual-ledger.js";

export const PRODUCER = "0xpr0d";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";
export const CAROL = "0xca401";

export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): void {
    this._now += seconds;
  }
}

export class ScriptedBalances implements BalanceLedger {
  private readonly _supply = new Map<ProducerToken, bigint>();
  private readonly _balances = new Map<string, bigint>();
  accrual: AccrualLedger | undefined;

  totalSupply(producerToken: ProducerToken): bigint {
    return this._supply.get(producerToken) ?? 0n;
  }

  balanceOf(producerToken: ProducerToken, holder: Identity): bigint {
    return this._balances.get(`${producerToken}/${holder}`) ?? 0n;
  }

  mint(producerToken: ProducerToken, holder: Identity, amount: bigint): void {
    this._supply.set(producerToken, this.totalSupply(producerToken) + amount);
    this._setBalance(producerToken, holder, this.balanceOf(producerToken, holder) + amount);
    this.accrual?.globalAccrue(producerToken);
    this.accrual?.userAccrue(producerToken, holder);
  }

  burn(producerToken: ProducerToken, holder: Identity, amount: bigint): void {
    this._supply.set(producerToken, this.totalSupply(producerToken) - amount);
    this._setBalance(producerToken, holder, this.balanceOf(producerToken, holder) - amount);
    this.accrual?.globalAccrue(producerToken);
    this.accrual?.userAccrue(producerToken, holder);
  }

  transfer(producerToken: ProducerToken, from: Identity, to: Identity, amount: bigint): void {
    this._setBalance(producerToken, from, this.balanceOf(producerToken, from) - amount);
    this._setBalance(producerToken, to, this.balanceOf(producerToken, to) + amount);
    this.accrual?.userAccrue(producerToken, from);
    this.accrual?.userAccrue(producerToken, to);
  }

  private _setBalance(producerToken: ProducerToken, holder: Identity, amount: bigint): void {
    this._balances.set(`${producerToken}/${holder}`, amount);
  }
}

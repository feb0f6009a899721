/**
 * Response views.
 *
 * JSON cannot carry bigint, so every amount leaves the API as a base-10
 * string.
 */

import { formatAmount } from "@rewardstream/accrual";
import type { ClaimPayout, ClaimResult, HarvestResult } from "@rewardstream/distributor";
import type { GlobalState, Identity, Timestamp, UserState } from "@rewardstream/types";

export interface GlobalStateView {
  readonly lastUpdate: Timestamp | null;
  readonly lastSupply: string;
  readonly points: string;
}

export interface UserStateView {
  readonly lastUpdate: Timestamp | null;
  readonly lastBalance: string;
  readonly points: string;
}

export interface PayoutView {
  readonly rewardToken: Identity;
  readonly recipient: Identity;
  readonly amount: string;
}

export interface ClaimView {
  readonly producerToken: Identity;
  readonly holder: Identity;
  readonly points: string;
  readonly payouts: readonly PayoutView[];
}

export interface HarvestView {
  readonly producerTokens: readonly Identity[];
  readonly rewardTokens: readonly Identity[];
  readonly amounts: readonly string[];
}

export function toGlobalStateView(state: GlobalState): GlobalStateView {
  return {
    lastUpdate: state.lastUpdate,
    lastSupply: formatAmount(state.lastSupply),
    points: formatAmount(state.points),
  };
}

export function toUserStateView(state: UserState): UserStateView {
  return {
    lastUpdate: state.lastUpdate,
    lastBalance: formatAmount(state.lastBalance),
    points: formatAmount(state.points),
  };
}

export function toPayoutView(payout: ClaimPayout): PayoutView {
  return {
    rewardToken: payout.rewardToken,
    recipient: payout.recipient,
    amount: formatAmount(payout.amount),
  };
}

export function toClaimView(result: ClaimResult): ClaimView {
  return {
    producerToken: result.producerToken,
    holder: result.holder,
    points: formatAmount(result.points),
    payouts: result.payouts.map(toPayoutView),
  };
}

export function toHarvestView(result: HarvestResult): HarvestView {
  return {
    producerTokens: result.producerTokens,
    rewardTokens: result.rewardTokens,
    amounts: result.amounts.map(formatAmount),
  };
}

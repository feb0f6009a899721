/**
 * Shared argument checks for distributor operations.
 */

import type { Amount, Identity } from "@rewardstream/types";
import { isNullIdentity } from "@rewardstream/types";
import { DistributorError } from "./types.js";

export function assertIdentity(identity: Identity, role: string): void {
  if (isNullIdentity(identity)) {
    throw new DistributorError("NULL_IDENTITY", `${role} must not be the null identity`);
  }
}

export function assertNonZero(amount: Amount, role: string): void {
  if (amount === 0n) {
    throw new DistributorError("ZERO_AMOUNT", `${role} must not be zero`);
  }
  if (amount < 0n) {
    throw new DistributorError("INVALID_AMOUNT", `${role} must be positive, got ${amount.toString()}`);
  }
}

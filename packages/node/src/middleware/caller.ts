/**
 * Caller middleware.
 *
 * Mutating routes act on behalf of an identity named by the
 * X-Caller-Id header. The distributor decides what that identity may
 * do; this middleware only requires that one is named.
 */

import type { MiddlewareHandler } from "hono";
import { isNullIdentity } from "@rewardstream/types";
import type { CallerEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Id";

export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER)?.trim();
    if (caller === undefined || isNullIdentity(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `${CALLER_HEADER} header is required`),
        401,
      );
    }

    c.set("caller", caller);
    await next();
  };
}

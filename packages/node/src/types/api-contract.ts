/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Identity } from "@rewardstream/types";
import type { RewardService } from "../services/reward-service.js";

/**
 * Hono environment type for the rewardstream app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The distributor service (set for every /api route) */
    service: RewardService;
  };
}

/**
 * Environment of a route guarded by requireCaller().
 */
export interface CallerEnv extends AppEnv {
  Variables: AppEnv["Variables"] & {
    /** Identity the request acts as (X-Caller-Id header) */
    caller: Identity;
  };
}

/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps distributor and accrual error codes to HTTP status codes.
 * Anything else is a 500 whose message is not exposed.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { AccrualError } from "@rewardstream/accrual";
import type { AccrualErrorCode } from "@rewardstream/accrual";
import { DistributorError } from "@rewardstream/distributor";
import type { DistributorErrorCode } from "@rewardstream/distributor";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainErrorCode = DistributorErrorCode | AccrualErrorCode;
type DomainStatus = 400 | 403 | 404 | 409 | 422;

const STATUS_MAP: Record<DomainErrorCode, DomainStatus> = {
  // Argument errors
  NULL_IDENTITY: 400,
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  INVALID_SNAPSHOT: 400,

  // Capability errors
  UNAUTHORIZED: 403,

  // Registry errors
  DUPLICATE_REWARD_TOKEN: 409,
  INDEX_OUT_OF_BOUNDS: 404,

  // State errors
  NOT_CONTRACT: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_SILO: 409,
  INSUFFICIENT_POINTS: 409,
  HARVESTER_NOT_SET: 409,
  CLOCK_REGRESSION: 409,
};

/**
 * Called with every error that ends up as a 500.
 */
export type UnexpectedErrorHook = (err: Error, requestId: string) => void;

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(onUnexpected?: UnexpectedErrorHook): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof DistributorError || err instanceof AccrualError) {
      return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
    }
    if (err instanceof HTTPException || !(err instanceof Error)) {
      return err.getResponse();
    }

    onUnexpected?.(err, c.get("requestId"));

    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

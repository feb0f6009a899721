/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { RewardService } from "./services/reward-service.js";
import type { RewardServiceConfig } from "./services/reward-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { UnexpectedErrorHook } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createProducerRoutes } from "./routes/producers.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createHarvestRoutes } from "./routes/harvest.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: RewardServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Receives errors that are answered with a 500 */
  readonly onUnexpectedError?: UnexpectedErrorHook | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RewardService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new RewardService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/producers", createProducerRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1/harvest", createHarvestRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}

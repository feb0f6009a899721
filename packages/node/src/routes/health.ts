/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (503 until a harvest source is wired)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { RewardService } from "../services/reward-service.js";

export function createHealthRoutes(service: RewardService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const harvester = service.distributor.getHarvester();
    const ready = harvester !== undefined;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        harvester: harvester ?? null,
        producers: service.distributor.listProducers().length,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

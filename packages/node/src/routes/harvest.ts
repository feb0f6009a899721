/**
 * Harvest routes.
 *
 * POST /api/v1/harvest                              — Pull pending rewards into the silos
 * POST /api/v1/harvest/fund                         — Add pending rewards to the simulated source
 * GET  /api/v1/harvest/pending/:producer/:reward    — Pending amount at the source
 * POST /api/v1/harvest/deposit                      — Direct silo deposit (harvest source only)
 */

import { Hono } from "hono";
import { formatAmount } from "@rewardstream/accrual";
import type { AppEnv } from "../types/api-contract.js";
import { RewardAmountSchema } from "../types/dto.js";
import { toHarvestView } from "../types/views.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createHarvestRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", (c) => {
    const { distributor } = c.get("service");
    return c.json({ data: toHarvestView(distributor.harvest()) });
  });

  routes.post("/fund", validateBody(RewardAmountSchema), (c) => {
    const { harvestSource } = c.get("service");
    const body = c.get("validatedBody");

    const pending = harvestSource.fund(body.producerToken, body.rewardToken, body.amount);

    return c.json({ data: { pending: formatAmount(pending) } });
  });

  routes.get("/pending/:producer/:reward", (c) => {
    const { harvestSource } = c.get("service");
    const pending = harvestSource.pendingRewards(c.req.param("producer"), c.req.param("reward"));
    return c.json({ data: { pending: formatAmount(pending) } });
  });

  routes.post("/deposit", requireCaller(), validateBody(RewardAmountSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");

    const siloBalance = distributor.rewardAccrue(
      c.get("caller"),
      body.producerToken,
      body.rewardToken,
      body.amount,
    );

    return c.json({ data: { siloBalance: formatAmount(siloBalance) } });
  });

  return routes;
}

/**
 * Administration routes.
 *
 * GET  /api/v1/admin               — Administrator and harvest source
 * POST /api/v1/admin/transfer      — Hand the administrator capability over
 * GET  /api/v1/admin/snapshot      — Full distributor snapshot and its state hash
 * GET  /api/v1/admin/deliveries    — Reward deliveries made by claims
 */

import { Hono } from "hono";
import { formatAmount } from "@rewardstream/accrual";
import { computeSnapshotHash } from "@rewardstream/distributor";
import type { AppEnv } from "../types/api-contract.js";
import { TransferAdministrationSchema } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { distributor } = c.get("service");
    return c.json({
      data: {
        administrator: distributor.getAdministrator(),
        harvester: distributor.getHarvester() ?? null,
      },
    });
  });

  routes.post(
    "/transfer",
    requireCaller(),
    validateBody(TransferAdministrationSchema),
    (c) => {
      const { distributor } = c.get("service");
      const body = c.get("validatedBody");

      distributor.transferAdministration(c.get("caller"), body.next);

      return c.json({ data: { administrator: distributor.getAdministrator() } });
    },
  );

  routes.get("/snapshot", (c) => {
    const { distributor } = c.get("service");
    const snapshot = distributor.snapshot();
    return c.json({ data: snapshot, stateHash: computeSnapshotHash(snapshot) });
  });

  routes.get("/deliveries", (c) => {
    const { bank } = c.get("service");
    return c.json({
      data: bank.deliveries().map((d) => ({
        rewardToken: d.rewardToken,
        to: d.to,
        amount: formatAmount(d.amount),
      })),
    });
  });

  return routes;
}

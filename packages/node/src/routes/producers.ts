/**
 * Producer routes — accrual state, reward tokens, claims and recipients.
 *
 * GET    /api/v1/producers                                         — List producers with reward tokens
 * GET    /api/v1/producers/:producer                               — Global state, reward tokens, silos
 * POST   /api/v1/producers/:producer/accrue                        — globalAccrue
 * GET    /api/v1/producers/:producer/holders/:holder               — Holder state and claim preview
 * POST   /api/v1/producers/:producer/holders/:holder/accrue        — userAccrue
 * POST   /api/v1/producers/:producer/holders/:holder/claim         — Claim for a holder
 * POST   /api/v1/producers/:producer/reward-tokens                 — Register a reward token (admin)
 * DELETE /api/v1/producers/:producer/reward-tokens/:index          — Remove by index (admin)
 * GET    /api/v1/producers/:producer/recipients/:reward/:holder    — Redirects for a holder
 * PUT    /api/v1/producers/:producer/recipients/:reward            — Set the caller's redirect
 * DELETE /api/v1/producers/:producer/recipients/:reward            — Clear the caller's redirect
 * PUT    /api/v1/producers/:producer/privileged/:reward/:wrapper   — Set a wrapper redirect (admin)
 * DELETE /api/v1/producers/:producer/privileged/:reward/:wrapper   — Clear a wrapper redirect (admin)
 */

import { Hono } from "hono";
import { formatAmount } from "@rewardstream/accrual";
import type { AppEnv } from "../types/api-contract.js";
import { AddRewardTokenSchema, IndexParamSchema, SetRecipientSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import {
  toClaimView,
  toGlobalStateView,
  toPayoutView,
  toUserStateView,
} from "../types/views.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createProducerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Accrual & reads ─────────────────────────────────────────────────

  routes.get("/", (c) => {
    const { distributor } = c.get("service");
    return c.json({ data: distributor.listProducers() });
  });

  routes.get("/:producer", (c) => {
    const { distributor } = c.get("service");
    const producer = c.req.param("producer");
    const rewardTokens = distributor.getRewardTokens(producer);

    return c.json({
      data: {
        producerToken: producer,
        globalState: toGlobalStateView(distributor.getGlobalState(producer)),
        rewardTokens,
        silos: rewardTokens.map((rewardToken) => ({
          rewardToken,
          amount: formatAmount(distributor.getSiloBalance(producer, rewardToken)),
        })),
      },
    });
  });

  routes.post("/:producer/accrue", (c) => {
    const { distributor } = c.get("service");
    const state = distributor.globalAccrue(c.req.param("producer"));
    return c.json({ data: toGlobalStateView(state) });
  });

  routes.get("/:producer/holders/:holder", (c) => {
    const { distributor, balances } = c.get("service");
    const producer = c.req.param("producer");
    const holder = c.req.param("holder");

    return c.json({
      data: {
        producerToken: producer,
        holder,
        balance: formatAmount(balances.balanceOf(producer, holder)),
        userState: toUserStateView(distributor.getUserState(producer, holder)),
        claimable: distributor.previewClaim(producer, holder).map(toPayoutView),
      },
    });
  });

  routes.post("/:producer/holders/:holder/accrue", (c) => {
    const { distributor } = c.get("service");
    const state = distributor.userAccrue(c.req.param("producer"), c.req.param("holder"));
    return c.json({ data: toUserStateView(state) });
  });

  routes.post("/:producer/holders/:holder/claim", (c) => {
    const { distributor } = c.get("service");
    const result = distributor.claim(c.req.param("producer"), c.req.param("holder"));
    return c.json({ data: toClaimView(result) });
  });

  // ─── Reward token registry ───────────────────────────────────────────

  routes.post(
    "/:producer/reward-tokens",
    requireCaller(),
    validateBody(AddRewardTokenSchema),
    (c) => {
      const { distributor } = c.get("service");
      const producer = c.req.param("producer");
      const body = c.get("validatedBody");

      const index = distributor.addRewardToken(c.get("caller"), producer, body.rewardToken);

      return c.json(
        { data: { index, rewardTokens: distributor.getRewardTokens(producer) } },
        201,
      );
    },
  );

  routes.delete("/:producer/reward-tokens/:index", requireCaller(), (c) => {
    const { distributor } = c.get("service");
    const producer = c.req.param("producer");

    const index = IndexParamSchema.safeParse(c.req.param("index"));
    if (!index.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Index must be a non-negative integer"),
        400,
      );
    }

    const removed = distributor.removeRewardToken(c.get("caller"), producer, index.data);

    return c.json({ data: { removed, rewardTokens: distributor.getRewardTokens(producer) } });
  });

  // ─── Recipients ──────────────────────────────────────────────────────

  routes.get("/:producer/recipients/:reward/:holder", (c) => {
    const { distributor } = c.get("service");
    const producer = c.req.param("producer");
    const reward = c.req.param("reward");
    const holder = c.req.param("holder");

    return c.json({
      data: {
        personal: distributor.getRewardRecipient(holder, producer, reward) ?? null,
        privileged: distributor.getPrivilegedRecipient(holder, producer, reward) ?? null,
        resolved: distributor.resolveRecipient(holder, producer, reward),
      },
    });
  });

  routes.put(
    "/:producer/recipients/:reward",
    requireCaller(),
    validateBody(SetRecipientSchema),
    (c) => {
      const { distributor } = c.get("service");
      const body = c.get("validatedBody");

      distributor.setRewardRecipient(
        c.get("caller"),
        c.req.param("producer"),
        c.req.param("reward"),
        body.recipient,
      );

      return c.json({ data: { recipient: body.recipient } });
    },
  );

  routes.delete("/:producer/recipients/:reward", requireCaller(), (c) => {
    const { distributor } = c.get("service");
    distributor.unsetRewardRecipient(c.get("caller"), c.req.param("producer"), c.req.param("reward"));
    return c.body(null, 204);
  });

  routes.put(
    "/:producer/privileged/:reward/:wrapper",
    requireCaller(),
    validateBody(SetRecipientSchema),
    (c) => {
      const { distributor } = c.get("service");
      const body = c.get("validatedBody");

      distributor.setRewardRecipientPrivileged(
        c.get("caller"),
        c.req.param("wrapper"),
        c.req.param("producer"),
        c.req.param("reward"),
        body.recipient,
      );

      return c.json({ data: { recipient: body.recipient } });
    },
  );

  routes.delete("/:producer/privileged/:reward/:wrapper", requireCaller(), (c) => {
    const { distributor } = c.get("service");
    distributor.unsetRewardRecipientPrivileged(
      c.get("caller"),
      c.req.param("wrapper"),
      c.req.param("producer"),
      c.req.param("reward"),
    );
    return c.body(null, 204);
  });

  return routes;
}

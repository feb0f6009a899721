/**
 * Simulated balance ledger routes.
 *
 * The service runs an in-memory producer-token ledger; each change
 * synchronizes the distributor's accrual records.
 *
 * GET  /api/v1/ledger/:producer                 — Total supply
 * GET  /api/v1/ledger/:producer/:holder         — Holder balance
 * POST /api/v1/ledger/:producer/mint            — Mint to a holder
 * POST /api/v1/ledger/:producer/burn            — Burn from a holder
 * POST /api/v1/ledger/:producer/transfer        — Move between holders
 */

import { Hono } from "hono";
import { formatAmount } from "@rewardstream/accrual";
import type { AppEnv } from "../types/api-contract.js";
import { SupplyChangeSchema, TransferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:producer", (c) => {
    const { balances } = c.get("service");
    const producer = c.req.param("producer");
    return c.json({
      data: { producerToken: producer, totalSupply: formatAmount(balances.totalSupply(producer)) },
    });
  });

  routes.get("/:producer/:holder", (c) => {
    const { balances } = c.get("service");
    const producer = c.req.param("producer");
    const holder = c.req.param("holder");
    return c.json({
      data: { producerToken: producer, holder, balance: formatAmount(balances.balanceOf(producer, holder)) },
    });
  });

  routes.post("/:producer/mint", validateBody(SupplyChangeSchema), (c) => {
    const { balances } = c.get("service");
    const producer = c.req.param("producer");
    const body = c.get("validatedBody");

    balances.mint(producer, body.holder, body.amount);

    return c.json({
      data: {
        totalSupply: formatAmount(balances.totalSupply(producer)),
        balance: formatAmount(balances.balanceOf(producer, body.holder)),
      },
    });
  });

  routes.post("/:producer/burn", validateBody(SupplyChangeSchema), (c) => {
    const { balances } = c.get("service");
    const producer = c.req.param("producer");
    const body = c.get("validatedBody");

    balances.burn(producer, body.holder, body.amount);

    return c.json({
      data: {
        totalSupply: formatAmount(balances.totalSupply(producer)),
        balance: formatAmount(balances.balanceOf(producer, body.holder)),
      },
    });
  });

  routes.post("/:producer/transfer", validateBody(TransferSchema), (c) => {
    const { balances } = c.get("service");
    const producer = c.req.param("producer");
    const body = c.get("validatedBody");

    balances.transfer(producer, body.from, body.to, body.amount);

    return c.json({
      data: {
        from: formatAmount(balances.balanceOf(producer, body.from)),
        to: formatAmount(balances.balanceOf(producer, body.to)),
      },
    });
  });

  return routes;
}

/**
 * Tests for harvest routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, ARB, HARVESTER, PRODUCER, WETH, as, createTestApp, jsonRequest } from "../setup.js";
import type { TestApp } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

async function post(path: string, body?: unknown, headers?: Record<string, string>): Promise<Response> {
  return instance.app.request(jsonRequest(`/api/v1/harvest${path}`, "POST", body, headers));
}

describe("POST /api/v1/harvest", () => {
  it("moves pending rewards into the silos", async () => {
    const fund = await post("/fund", { producerToken: PRODUCER, rewardToken: WETH, amount: "500" });
    expect(await fund.json()).toEqual({ data: { pending: "500" } });

    const res = await post("");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { producerTokens: [PRODUCER], rewardTokens: [WETH], amounts: ["500"] },
    });

    const pending = await instance.app.request(`/api/v1/harvest/pending/${PRODUCER}/${WETH}`);
    expect(await pending.json()).toEqual({ data: { pending: "0" } });

    const producer = (await (await instance.app.request(`/api/v1/producers/${PRODUCER}`)).json()) as {
      data: { silos: { rewardToken: string; amount: string }[] };
    };
    expect(producer.data.silos).toEqual([{ rewardToken: WETH, amount: "500" }]);
  });

  it("leaves pairs with nothing pending out of the result", async () => {
    const res = await post("");

    expect(await res.json()).toEqual({
      data: { producerTokens: [], rewardTokens: [], amounts: [] },
    });
  });

  it("accumulates funding for a pair", async () => {
    await post("/fund", { producerToken: PRODUCER, rewardToken: ARB, amount: "7" });
    const res = await post("/fund", { producerToken: PRODUCER, rewardToken: ARB, amount: "5" });

    expect(await res.json()).toEqual({ data: { pending: "12" } });
  });
});

describe("POST /api/v1/harvest/deposit", () => {
  const deposit = { producerToken: PRODUCER, rewardToken: WETH, amount: "200" };

  it("credits the silo when the harvest source deposits", async () => {
    await post("/deposit", deposit, as(HARVESTER));
    const res = await post("/deposit", deposit, as(HARVESTER));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { siloBalance: "400" } });
  });

  it("requires a caller", async () => {
    const res = await post("/deposit", deposit);
    expect(res.status).toBe(401);
  });

  it("rejects any other caller", async () => {
    const res = await post("/deposit", deposit, as(ALICE));

    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNAUTHORIZED");
  });

  it("rejects a zero deposit", async () => {
    const res = await post("/deposit", { ...deposit, amount: "0" }, as(HARVESTER));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ZERO_AMOUNT");
  });
});

/**
 * Tests for the simulated balance ledger routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, BOB, PRODUCER, createTestApp, jsonRequest } from "../setup.js";
import type { TestApp } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string; details?: { issues: { path: string; message: string }[] } };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

async function post(path: string, body: unknown): Promise<Response> {
  return instance.app.request(jsonRequest(`/api/v1/ledger/${PRODUCER}${path}`, "POST", body));
}

describe("ledger routes", () => {
  it("mints to a holder", async () => {
    const res = await post("/mint", { holder: ALICE, amount: "100" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { totalSupply: "100", balance: "100" } });

    const supply = await instance.app.request(`/api/v1/ledger/${PRODUCER}`);
    expect(await supply.json()).toEqual({ data: { producerToken: PRODUCER, totalSupply: "100" } });
  });

  it("burns from a holder", async () => {
    await post("/mint", { holder: ALICE, amount: "100" });
    const res = await post("/burn", { holder: ALICE, amount: "30" });

    expect(await res.json()).toEqual({ data: { totalSupply: "70", balance: "70" } });
  });

  it("transfers between holders", async () => {
    await post("/mint", { holder: ALICE, amount: "100" });
    const res = await post("/transfer", { from: ALICE, to: BOB, amount: "40" });

    expect(await res.json()).toEqual({ data: { from: "60", to: "40" } });

    const bob = await instance.app.request(`/api/v1/ledger/${PRODUCER}/${BOB}`);
    expect(await bob.json()).toEqual({ data: { producerToken: PRODUCER, holder: BOB, balance: "40" } });
  });

  it("keeps amounts beyond the safe integer range exact", async () => {
    const res = await post("/mint", { holder: ALICE, amount: "123456789012345678901234567890" });

    expect(await res.json()).toEqual({
      data: {
        totalSupply: "123456789012345678901234567890",
        balance: "123456789012345678901234567890",
      },
    });
  });

  it("rejects a burn larger than the balance", async () => {
    await post("/mint", { holder: ALICE, amount: "10" });
    const res = await post("/burn", { holder: ALICE, amount: "11" });

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INSUFFICIENT_BALANCE");
  });

  it("rejects a zero amount", async () => {
    const res = await post("/mint", { holder: ALICE, amount: "0" });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "ZERO_AMOUNT",
      message: "amount must not be zero",
    });
  });

  it("rejects the null identity", async () => {
    const res = await post("/mint", {
      holder: "0x0000000000000000000000000000000000000000",
      amount: "1",
    });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NULL_IDENTITY");
  });

  it.each(["-5", "1.5", "0x10", "007"])("rejects the amount %s", async (amount) => {
    const res = await post("/mint", { holder: ALICE, amount });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues[0]?.path).toBe("amount");
  });

  it("rejects a malformed JSON body", async () => {
    const res = await instance.app.request(
      new Request(`http://localhost/api/v1/ledger/${PRODUCER}/mint`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{",
      }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });
});

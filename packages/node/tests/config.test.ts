/**
 * Tests for config.ts — list parsers + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseIdentityList, parseRewardTokens } from "../src/config.js";

// =============================================================================
// parseIdentityList
// =============================================================================

describe("parseIdentityList", () => {
  it("returns empty array for empty string", () => {
    expect(parseIdentityList("")).toEqual([]);
    expect(parseIdentityList("   ")).toEqual([]);
  });

  it("splits and trims entries", () => {
    expect(parseIdentityList(" 0xa , 0xb ")).toEqual(["0xa", "0xb"]);
  });

  it("throws on an empty or null entry", () => {
    expect(() => parseIdentityList("0xa,,0xb")).toThrow("Invalid identity");
    expect(() =>
      parseIdentityList("0x0000000000000000000000000000000000000000"),
    ).toThrow("Invalid identity");
  });
});

// =============================================================================
// parseRewardTokens
// =============================================================================

describe("parseRewardTokens", () => {
  it("returns empty array for empty string", () => {
    expect(parseRewardTokens("")).toEqual([]);
  });

  it("parses comma-separated pairs", () => {
    expect(parseRewardTokens("0xp1:0xr1, 0xp1:0xr2,0xp2:0xr1")).toEqual([
      { producerToken: "0xp1", rewardToken: "0xr1" },
      { producerToken: "0xp1", rewardToken: "0xr2" },
      { producerToken: "0xp2", rewardToken: "0xr1" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseRewardTokens("0xp1")).toThrow("Invalid REWARD_TOKENS entry");
    expect(() => parseRewardTokens("a:b:c")).toThrow("Invalid REWARD_TOKENS entry");
  });

  it("throws on an empty side", () => {
    expect(() => parseRewardTokens("0xp1:")).toThrow("names the null identity");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.ADMIN_IDENTITY).toBe("0xadmin");
    expect(config.HARVESTER_IDENTITY).toBe("0xharvester");
    expect(config.CONTRACT_IDENTITIES).toBe("");
    expect(config.REWARD_TOKENS).toBe("");
    expect(config.EVENT_RETENTION).toBe(10000);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      ADMIN_IDENTITY: "0xops",
      EVENT_RETENTION: "50",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.ADMIN_IDENTITY).toBe("0xops");
    expect(config.EVENT_RETENTION).toBe(50);
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ ADMIN_IDENTITY: "" })).toThrow();
  });
});

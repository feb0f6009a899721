/**
 * Runtime type guard tests for @rewardstream/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isIdentity,
  isAmountString,
  isTimestamp,
} from "../src/guards.js";
import { NULL_IDENTITY, isNullIdentity } from "../src/identity.js";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isNullIdentity", () => {
  it("recognizes the zero address", () => {
    expect(isNullIdentity(NULL_IDENTITY)).toBe(true);
  });

  it("treats the empty string as null", () => {
    expect(isNullIdentity("")).toBe(true);
  });

  it("ignores hex casing", () => {
    expect(isNullIdentity("0X0000000000000000000000000000000000000000")).toBe(true);
  });

  it("rejects a real identity", () => {
    expect(isNullIdentity("0xa11ce")).toBe(false);
  });
});

describe("isIdentity", () => {
  it("accepts a non-null string", () => {
    expect(isIdentity("0xb0b")).toBe(true);
  });

  it("rejects the null identity", () => {
    expect(isIdentity(NULL_IDENTITY)).toBe(false);
    expect(isIdentity("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isIdentity(42)).toBe(false);
    expect(isIdentity(null)).toBe(false);
    expect(isIdentity(undefined)).toBe(false);
  });
});

describe("isAmountString", () => {
  it("accepts zero and positive integers", () => {
    expect(isAmountString("0")).toBe(true);
    expect(isAmountString("100000")).toBe(true);
  });

  it("rejects leading zeros", () => {
    expect(isAmountString("007")).toBe(false);
  });

  it("rejects negatives and decimals", () => {
    expect(isAmountString("-1")).toBe(false);
    expect(isAmountString("1.5")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isAmountString(100)).toBe(false);
  });
});

describe("isTimestamp", () => {
  it("accepts zero and whole seconds", () => {
    expect(isTimestamp(0)).toBe(true);
    expect(isTimestamp(1_700_000_000)).toBe(true);
  });

  it("rejects fractional, negative and non-number values", () => {
    expect(isTimestamp(1.5)).toBe(false);
    expect(isTimestamp(-1)).toBe(false);
    expect(isTimestamp("1")).toBe(false);
  });
});

/**
 * @rewardstream/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Identity, ProducerToken, RewardToken } from "@rewardstream/types";
import { isNullIdentity } from "@rewardstream/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Capabilities
  ADMIN_IDENTITY: z.string().min(1).default("0xadmin"),
  HARVESTER_IDENTITY: z.string().min(1).default("0xharvester"),

  // Code inspector
  CONTRACT_IDENTITIES: z.string().default(""),

  // Reward tokens registered at boot
  REWARD_TOKENS: z.string().default(""),

  // Event log
  EVENT_RETENTION: z.coerce.number().int().min(1).default(10000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

export interface RewardTokenPair {
  readonly producerToken: ProducerToken;
  readonly rewardToken: RewardToken;
}

/**
 * Parse a comma-separated identity list (CONTRACT_IDENTITIES).
 */
export function parseIdentityList(raw: string): readonly Identity[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const identity = entry.trim();
    if (isNullIdentity(identity)) {
      throw new Error(`Invalid identity "${entry}" in CONTRACT_IDENTITIES`);
    }
    return identity;
  });
}

/**
 * Parse the REWARD_TOKENS env var.
 *
 * Format: "producer1:reward1,producer1:reward2,producer2:reward1"
 */
export function parseRewardTokens(raw: string): readonly RewardTokenPair[] {
  if (raw.trim() === "") {
    return [];
  }

  const pairs: RewardTokenPair[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [producerToken, rewardToken] = parts;
    if (parts.length !== 2 || producerToken === undefined || rewardToken === undefined) {
      throw new Error(
        `Invalid REWARD_TOKENS entry: "${entry.trim()}". Expected format: producer:reward`,
      );
    }
    if (isNullIdentity(producerToken) || isNullIdentity(rewardToken)) {
      throw new Error(`REWARD_TOKENS entry "${entry.trim()}" names the null identity`);
    }

    pairs.push({ producerToken, rewardToken });
  }

  return pairs;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

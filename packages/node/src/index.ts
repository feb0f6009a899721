/**
 * @rewardstream/node — HTTP service for the reward distributor.
 */

export { RewardService, SystemClock } from "./services/reward-service.js";
export type { RewardServiceConfig } from "./services/reward-service.js";
export {
  loadConfig,
  parseIdentityList,
  parseRewardTokens,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, RewardTokenPair } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

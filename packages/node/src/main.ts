/**
 * @rewardstream/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseIdentityList, parseRewardTokens } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const contracts = parseIdentityList(config.CONTRACT_IDENTITIES);
  const rewardTokens = parseRewardTokens(config.REWARD_TOKENS);
  const eventLogger = logger.child({ component: "distributor" });

  const { app } = createApp({
    serviceConfig: {
      administrator: config.ADMIN_IDENTITY,
      harvester: config.HARVESTER_IDENTITY,
      contracts,
      rewardTokens,
      eventRetention: config.EVENT_RETENTION,
      onEvent: (event) => {
        eventLogger.info(
          { sequence: event.metadata.sequence, actor: event.metadata.actor, payload: event.payload },
          event.type,
        );
      },
      onEventError: (err, event) => {
        eventLogger.error({ err, sequence: event.metadata.sequence }, "Event listener failed");
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      administrator: config.ADMIN_IDENTITY,
      harvester: config.HARVESTER_IDENTITY,
      contracts: contracts.length,
      rewardTokens: rewardTokens.length,
    },
    "Rewardstream node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

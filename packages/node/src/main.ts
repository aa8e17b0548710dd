/**
 * @souk/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      arbitrator: config.ARBITRATOR,
      settlementSymbol: config.SETTLEMENT_SYMBOL,
      settlementDecimals: config.SETTLEMENT_DECIMALS,
      paymentWindowSeconds: config.PAYMENT_WINDOW_SECONDS,
      maxOpenEscrowsPerOffer: config.MAX_OPEN_ESCROWS_PER_OFFER,
      mintEnabled: config.MINT_ENABLED,
      onSubscriberError: (err, { position, event }) => {
        logger.error({ err, position, type: event.type }, "Event subscriber failed");
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  service.exchange.events.subscribe(({ position, event }) => {
    logger.debug(
      { position, type: event.type, ...event.metadata, payload: event.payload },
      "Domain event committed",
    );
  });

  if (config.MINT_ENABLED) {
    logger.warn("MINT_ENABLED is set, the settlement faucet route is open");
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      arbitrator: config.ARBITRATOR,
      settlement: config.SETTLEMENT_SYMBOL,
    },
    "Souk node started",
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

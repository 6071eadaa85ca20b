/**
 * @pegledger/node — Entry point.
 *
 * Loads config, starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseGenesisAllocations } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const genesis = parseGenesisAllocations(config.GENESIS_ALLOCATIONS);

  const { app, service } = createApp({
    serviceConfig: {
      chainId: config.CHAIN_ID,
      ledgerAddress: config.LEDGER_ADDRESS,
      token: {
        name: config.TOKEN_NAME,
        symbol: config.TOKEN_SYMBOL,
        decimals: config.TOKEN_DECIMALS,
      },
      eip712Version: config.EIP712_VERSION,
      genesis,
      logger: logger.child({ component: "ledger" }),
    },
    logger: logger.child({ component: "http" }),
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
      chainId: config.CHAIN_ID,
      ledger: service.ledger.address,
      genesisAccounts: genesis.length,
    },
    "pegledger node started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

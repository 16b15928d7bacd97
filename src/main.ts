// Synth Engine - Standalone Query Node
// Runs an engine over the in-memory host and serves the read-only query API.

import * as dotenv from "dotenv";
import { loadConfig, validateConfig } from "./config";
import { SolvencyEngine } from "./engine";
import { InMemoryHost } from "./host";
import { createEngineLogger } from "./logger";
import { createEngineMetrics } from "./metrics";
import { createQueryApp, startQueryServer } from "./server";

dotenv.config();

process.on("unhandledRejection", (reason) => {
  console.error("[FATAL] Unhandled rejection:", reason);
  process.exit(1);
});

process.on("uncaughtException", (error) => {
  console.error("[FATAL] Uncaught exception:", error);
  process.exit(1);
});

function main(): void {
  const config = loadConfig();
  validateConfig(config);

  const logger = createEngineLogger("ENGINE", config.logLevel);
  const metrics = config.metricsEnabled ? createEngineMetrics({ collectDefaults: true }) : undefined;
  const host = new InMemoryHost(config.custodyIdentity, { caller: config.adminIdentity });
  const engine = new SolvencyEngine({
    adminIdentity: config.adminIdentity,
    capabilities: host,
    logger,
    metrics,
  });

  const app = createQueryApp(engine, {
    blockHeight: () => host.blockHeight(),
    metrics,
    logger: createEngineLogger("QUERY-API", config.logLevel),
  });
  const handle = startQueryServer(app, config.serverPort, logger);
  logger.info(`environment=${config.environment} admin=${config.adminIdentity} custody=${config.custodyIdentity}`);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    handle
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[FATAL] Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();

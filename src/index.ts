/**
 * Bootstrap config + inference stack + HTTP server
 */

import "dotenv/config";
import http from "http";
import { loadConfig } from "./core/config";
import { toError } from "./core/errors";
import { EventBus } from "./core/eventBus";
import { createGatewayContext } from "./core/gateway";
import { prepareBackend } from "./core/inference";
import { GatewayLogger } from "./core/logger";
import { startServer, stopServer } from "./server";

export async function main(): Promise<http.Server> {
  const config = loadConfig();
  const eventBus = new EventBus();
  const logger = new GatewayLogger(
    { level: config.logLevel, format: config.logFormat, source: "gateway" },
    { eventBus }
  );

  logger.info("Starting LLM gateway", {
    ollamaBaseURL: config.ollamaBaseURL,
    defaultModel: config.defaultModel,
    logLevel: config.logLevel,
    logFormat: config.logFormat,
  });

  const { client, gateway } = createGatewayContext(config, { logger, eventBus });

  await prepareBackend({ client, config, logger: logger.child({ component: "bootstrap" }) });

  const server = await startServer({
    host: config.host,
    port: config.port,
    gateway,
    client,
    logger: logger.child({ component: "http" }),
    defaultModel: config.defaultModel,
    eventBus,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    stopServer(server)
      .then(() => logger.flush())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(toError(error));
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  process.on("unhandledRejection", (reason) => {
    logger.fatal(toError(reason), { type: "unhandledRejection" });
  });
  process.on("uncaughtException", (error) => {
    logger.fatal(error, { type: "uncaughtException" });
    process.exit(1);
  });

  return server;
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", toError(error).message);
    process.exit(1);
  });
}

export { loadConfig } from "./core/config";
export type { GatewayConfig } from "./core/config";
export { createGatewayContext } from "./core/gateway";
export * from "./core/errors";
export * from "./core/inference";
export { createHttpServer } from "./server/http";
export { startServer, stopServer } from "./server";

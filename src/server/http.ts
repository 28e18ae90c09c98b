import express from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { EventBus } from "../core/eventBus";
import { GenerationGateway, ManagedInferenceClient } from "../core/inference";
import { GatewayLogger } from "../core/logger";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { generateRoutes } from "./routes/generate";
import { statusRoutes } from "./routes/status";

export interface HttpServerDeps {
  gateway: GenerationGateway;
  client: ManagedInferenceClient;
  logger: GatewayLogger;
  defaultModel: string;
  eventBus?: EventBus;
}

export function createHttpServer(deps: HttpServerDeps) {
  const app = express();
  app.disable("x-powered-by");

  // Before everything else so rejected bodies and 404s are logged too
  app.use(requestLogger(deps.logger, deps.eventBus));
  app.use(cors());
  app.use(bodyParser.json({ limit: "1mb" }));

  app.use(statusRoutes(deps.client, deps.defaultModel));
  app.use(generateRoutes(deps.gateway));

  app.use((req, res) => {
    res.status(404).json({ detail: `Route ${req.method} ${req.path} not found` });
  });

  app.use(errorHandler(deps.logger));

  return app;
}

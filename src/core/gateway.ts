/**
 * Wires the inference stack from configuration. The client is built here
 * and injected everywhere else, so tests can swap in their own.
 */

import { GatewayConfig } from "./config";
import { EventBus } from "./eventBus";
import { GenerationGateway, ManagedInferenceClient, ModelResolver, OllamaClient } from "./inference";
import { GatewayLogger } from "./logger";

export interface GatewayContext {
  client: ManagedInferenceClient;
  resolver: ModelResolver;
  gateway: GenerationGateway;
}

export function createGatewayContext(
  config: Pick<GatewayConfig, "ollamaBaseURL" | "defaultModel">,
  deps: { logger: GatewayLogger; eventBus?: EventBus; client?: ManagedInferenceClient }
): GatewayContext {
  const client = deps.client ?? new OllamaClient({ baseURL: config.ollamaBaseURL });
  const resolver = new ModelResolver({
    client,
    defaultModel: config.defaultModel,
    logger: deps.logger.child({ component: "resolver" }),
    eventBus: deps.eventBus,
  });
  const gateway = new GenerationGateway({
    client,
    resolver,
    logger: deps.logger.child({ component: "gateway" }),
    eventBus: deps.eventBus,
  });
  return { client, resolver, gateway };
}

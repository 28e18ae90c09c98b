/**
 * Startup preparation: wait for the inference service and make sure the
 * default model is installed before the first request needs it. Nothing
 * here is fatal; the gateway serves fallback text if the backend stays down.
 */

import { GatewayConfig } from "../config";
import { toError } from "../errors";
import { GatewayLogger } from "../logger";
import { ManagedInferenceClient } from "./types";

export interface PrepareBackendOptions {
  client: ManagedInferenceClient;
  config: Pick<GatewayConfig, "defaultModel" | "startupTimeoutMs" | "pullDefaultOnStartup">;
  logger: GatewayLogger;
  pollIntervalMs?: number;
}

export interface BackendStatus {
  ready: boolean;
  defaultModelInstalled: boolean;
}

export async function prepareBackend(options: PrepareBackendOptions): Promise<BackendStatus> {
  const { client, config, logger } = options;

  logger.info("Waiting for inference service to be ready...");
  try {
    await client.waitUntilAvailable(config.startupTimeoutMs, options.pollIntervalMs);
  } catch (error) {
    logger.warn(`Inference service not ready: ${toError(error).message}`);
    return { ready: false, defaultModelInstalled: false };
  }
  logger.info("Inference service is ready");

  if (!config.pullDefaultOnStartup) {
    return { ready: true, defaultModelInstalled: false };
  }

  const model = config.defaultModel;
  try {
    const installed = await client.listInstalledModels();
    if (installed.has(model)) {
      logger.info(`Default model '${model}' already available`, { model });
      return { ready: true, defaultModelInstalled: true };
    }

    logger.info(`Pulling default model: ${model}`, { model });
    await client.acquireModel(model);
    logger.info(`Default model '${model}' pulled`, { model });
    return { ready: true, defaultModelInstalled: true };
  } catch (error) {
    logger.warn(`Could not prepare default model '${model}': ${toError(error).message}`, { model });
    return { ready: true, defaultModelInstalled: false };
  }
}

/**
 * Model resolution
 *
 * Turns whatever model name a client sent into one the backend can serve:
 * default substitution, an installed-models check, and a pull when the
 * model is missing. Every request re-evaluates from scratch.
 */

import { LEGACY_MODEL_PLACEHOLDER } from "../config";
import { AcquisitionFailedError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { GatewayLogger } from "../logger";
import { AcquisitionGate } from "./acquisitionGate";
import { InferenceClient, ModelIdentifier } from "./types";

export interface ModelResolverDeps {
  client: InferenceClient;
  defaultModel: ModelIdentifier;
  logger: GatewayLogger;
  eventBus?: EventBus;
  acquisitionGate?: AcquisitionGate;
}

/**
 * Absent, empty and the exact legacy "local-model" placeholder all mean
 * "use the default". Names are opaque: nothing is trimmed or case-folded.
 */
export function normalizeModelName(requested: string | undefined, defaultModel: ModelIdentifier): ModelIdentifier {
  if (requested === undefined || requested === "" || requested === LEGACY_MODEL_PLACEHOLDER) return defaultModel;
  return requested;
}

export class ModelResolver {
  private readonly client: InferenceClient;
  private readonly logger: GatewayLogger;
  private readonly eventBus?: EventBus;
  private readonly gate: AcquisitionGate;
  readonly defaultModel: ModelIdentifier;

  constructor(deps: ModelResolverDeps) {
    this.client = deps.client;
    this.defaultModel = deps.defaultModel;
    this.logger = deps.logger;
    this.eventBus = deps.eventBus;
    this.gate = deps.acquisitionGate ?? new AcquisitionGate();
  }

  /**
   * @throws AcquisitionFailedError when the model is missing and the pull fails
   */
  async resolve(requested?: string): Promise<ModelIdentifier> {
    const model = normalizeModelName(requested, this.defaultModel);

    let installed: Set<ModelIdentifier>;
    try {
      installed = await this.client.listInstalledModels();
    } catch (error) {
      // A broken listing downgrades this one request to the default; no retry
      const reason = toError(error).message;
      this.logger.warn(`Could not check/pull model '${model}': ${reason}. Using default model.`, {
        model,
        fallback: this.defaultModel,
      });
      this.eventBus?.emit("ModelFallbackEvent", { requested: model, fallback: this.defaultModel, reason });
      this.emitResolved(requested, this.defaultModel);
      return this.defaultModel;
    }

    if (!installed.has(model)) {
      this.logger.warn(`Model '${model}' not found locally. Attempting to pull...`, { model });
      await this.acquire(model);
    }

    this.emitResolved(requested, model);
    return model;
  }

  private async acquire(model: ModelIdentifier): Promise<void> {
    const joining = this.gate.isAcquiring(model);
    if (joining) {
      this.logger.info(`Pull of '${model}' already in progress, waiting for it`, { model });
    } else {
      this.eventBus?.emit("ModelAcquisitionEvent", { model, status: "started" });
    }

    const started = Date.now();
    try {
      await this.gate.acquire(model, () => this.client.acquireModel(model));
    } catch (error) {
      const cause = toError(error);
      if (!joining) {
        this.eventBus?.emit("ModelAcquisitionEvent", { model, status: "failed", error: cause.message });
      }
      if (cause instanceof AcquisitionFailedError) throw cause;
      throw new AcquisitionFailedError(cause.message, model, cause);
    }

    if (!joining) {
      this.eventBus?.emit("ModelAcquisitionEvent", { model, status: "succeeded" });
      this.logger.info(`Pulled model '${model}'`, { model, duration: Date.now() - started });
    }
  }

  private emitResolved(requested: string | undefined, resolved: ModelIdentifier): void {
    this.eventBus?.emit("ModelResolvedEvent", { requested: requested ?? "", resolved });
  }
}

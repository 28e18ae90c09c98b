/**
 * Generation gateway
 *
 * Single entry point for "model + prompt -> text". Internally every step is
 * fail-fast and the outcome is a Result; `respond` is the boundary that
 * turns a failure into an "Error: ..." string and never rejects.
 */

import { GenerationFailedError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { GatewayLogger } from "../logger";
import { err, ok, Result } from "../utils/result";
import { ModelResolver, normalizeModelName } from "./modelResolver";
import { GenerationError, InferenceClient, ModelIdentifier } from "./types";

export interface GenerationGatewayDeps {
  client: InferenceClient;
  resolver: ModelResolver;
  logger: GatewayLogger;
  eventBus?: EventBus;
}

export function formatGenerationError(error: GenerationError): string {
  return `Error: Unable to generate response using model '${error.model}'. ${error.cause.message}`;
}

export class GenerationGateway {
  private readonly client: InferenceClient;
  private readonly resolver: ModelResolver;
  private readonly logger: GatewayLogger;
  private readonly eventBus?: EventBus;

  constructor(deps: GenerationGatewayDeps) {
    this.client = deps.client;
    this.resolver = deps.resolver;
    this.logger = deps.logger;
    this.eventBus = deps.eventBus;
  }

  async generate(model: string | undefined, prompt: string): Promise<Result<string, GenerationError>> {
    let resolved: ModelIdentifier;
    try {
      resolved = await this.resolver.resolve(model);
    } catch (error) {
      return this.fail({
        kind: "acquisition",
        model: normalizeModelName(model, this.resolver.defaultModel),
        cause: toError(error),
      });
    }

    this.logger.info(`Generating response using model: ${resolved}`, { model: resolved });
    const started = Date.now();

    let text: string;
    try {
      text = await this.client.generate(resolved, prompt);
    } catch (error) {
      return this.fail({ kind: "generation", model: resolved, cause: toError(error) });
    }

    if (text.length === 0) {
      return this.fail({
        kind: "generation",
        model: resolved,
        cause: new GenerationFailedError("Backend returned an empty response", resolved),
      });
    }

    const duration = Date.now() - started;
    this.logger.traceModelCall(resolved, prompt, text, duration);
    this.eventBus?.emit("GenerationEvent", {
      model: resolved,
      promptLength: prompt.length,
      responseLength: text.length,
      duration,
    });
    return ok(text);
  }

  /**
   * Always resolves to text: the generated response verbatim, or a
   * message starting with "Error:".
   */
  async respond(model: string | undefined, prompt: string): Promise<string> {
    try {
      const result = await this.generate(model, prompt);
      return result.ok ? result.value : formatGenerationError(result.error);
    } catch (error) {
      // Only reachable if logging itself throws, so don't log again
      return formatGenerationError({
        kind: "generation",
        model: normalizeModelName(model, this.resolver.defaultModel),
        cause: toError(error),
      });
    }
  }

  private fail(error: GenerationError): Result<never, GenerationError> {
    this.logger.error(`Error generating response: ${error.cause.message}`, {
      model: error.model,
      kind: error.kind,
    });
    this.eventBus?.emit("GenerationErrorEvent", {
      model: error.model,
      kind: error.kind,
      error: error.cause.message,
    });
    return err(error);
  }
}

import { z } from "zod";

/**
 * Opaque model name, e.g. "llama3.2:1b". Only ever compared by equality.
 */
export type ModelIdentifier = string;

/**
 * The three operations the gateway needs from an inference service.
 * Implementations are stateless and fail fast with the typed errors from
 * core/errors.
 */
export interface InferenceClient {
  /** @throws BackendUnavailableError */
  listInstalledModels(): Promise<Set<ModelIdentifier>>;
  /**
   * Download/install a model. May take minutes for large models; no
   * timeout is imposed here.
   * @throws AcquisitionFailedError
   */
  acquireModel(id: ModelIdentifier): Promise<void>;
  /** @throws GenerationFailedError */
  generate(id: ModelIdentifier, prompt: string): Promise<string>;
}

/**
 * Inference client that can also report whether the service is up.
 */
export interface ManagedInferenceClient extends InferenceClient {
  isAvailable(): Promise<boolean>;
  /** @throws BackendUnavailableError when the deadline passes */
  waitUntilAvailable(timeoutMs: number, intervalMs?: number): Promise<void>;
}

export interface GenerationRequest {
  model?: ModelIdentifier;
  prompt: string;
}

export interface GenerationResponse {
  response: string;
}

export type GenerationErrorKind = "acquisition" | "generation";

export interface GenerationError {
  kind: GenerationErrorKind;
  model: ModelIdentifier;
  cause: Error;
}

// Ollama wire payloads; only the fields the gateway reads are checked

export const OllamaTagsResponseSchema = z.object({
  models: z
    .array(
      z
        .object({
          name: z.string(),
          model: z.string().optional(),
          size: z.number().optional(),
          modified_at: z.string().optional(),
        })
        .passthrough()
    )
    .nullish(),
});

export const OllamaPullResponseSchema = z
  .object({
    status: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export const OllamaGenerateResponseSchema = z
  .object({
    model: z.string().optional(),
    response: z.string(),
    done: z.boolean().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export const OllamaErrorBodySchema = z.object({ error: z.string() });

/**
 * Ollama inference client
 * Thin translation layer over the Ollama REST API (/api/tags, /api/pull,
 * /api/generate). Holds no state beyond its base URL.
 */

import { Agent, Dispatcher, fetch, Response } from "undici";
import { z } from "zod";
import {
  AcquisitionFailedError,
  BackendUnavailableError,
  GenerationFailedError,
  toError,
} from "../errors";
import {
  ManagedInferenceClient,
  ModelIdentifier,
  OllamaErrorBodySchema,
  OllamaGenerateResponseSchema,
  OllamaPullResponseSchema,
  OllamaTagsResponseSchema,
} from "./types";
import { err, ok, Result } from "../utils/result";

export interface OllamaClientConfig {
  baseURL: string;
  // Applies to listing and availability probes only; pulls and generations run unbounded
  listTimeoutMs?: number;
  probeTimeoutMs?: number;
  // Connection pool for every request; the default one never times out on its own
  dispatcher?: Dispatcher;
}

export class OllamaClient implements ManagedInferenceClient {
  readonly baseURL: string;
  private readonly listTimeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly dispatcher: Dispatcher;

  constructor(config: OllamaClientConfig) {
    this.baseURL = config.baseURL.replace(/\/+$/, "");
    this.listTimeoutMs = config.listTimeoutMs ?? 10000;
    this.probeTimeoutMs = config.probeTimeoutMs ?? 3000;
    // A non-streaming pull sends no headers until the download is done
    this.dispatcher = config.dispatcher ?? new Agent({ headersTimeout: 0, bodyTimeout: 0 });
  }

  async listInstalledModels(): Promise<Set<ModelIdentifier>> {
    let response: Response;
    try {
      response = await fetch(`${this.baseURL}/api/tags`, {
        method: "GET",
        signal: AbortSignal.timeout(this.listTimeoutMs),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      const cause = toError(error);
      throw new BackendUnavailableError(
        `Could not reach inference service at ${this.baseURL}: ${describeNetworkError(cause)}`,
        this.baseURL,
        cause
      );
    }

    if (!response.ok) {
      throw new BackendUnavailableError(await this.describeFailure(response), this.baseURL);
    }

    const data = await this.readJson(response, OllamaTagsResponseSchema);
    if (!data.ok) {
      throw new BackendUnavailableError(`Malformed model list: ${data.error}`, this.baseURL);
    }

    return new Set((data.value.models ?? []).map((m) => m.name));
  }

  async acquireModel(id: ModelIdentifier): Promise<void> {
    let response: Response;
    try {
      response = await fetch(`${this.baseURL}/api/pull`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: id, stream: false }),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      const cause = toError(error);
      throw new AcquisitionFailedError(describeNetworkError(cause), id, cause);
    }

    if (!response.ok) {
      throw new AcquisitionFailedError(await this.describeFailure(response), id);
    }

    const data = await this.readJson(response, OllamaPullResponseSchema);
    if (!data.ok) {
      throw new AcquisitionFailedError(`Malformed pull response: ${data.error}`, id);
    }
    if (data.value.error) {
      throw new AcquisitionFailedError(data.value.error, id);
    }
  }

  async generate(id: ModelIdentifier, prompt: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseURL}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: id, prompt, stream: false }),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      const cause = toError(error);
      throw new GenerationFailedError(describeNetworkError(cause), id, cause);
    }

    if (!response.ok) {
      throw new GenerationFailedError(await this.describeFailure(response), id);
    }

    // Body errors here mean the connection dropped mid-response
    const data = await this.readJson(response, OllamaGenerateResponseSchema);
    if (!data.ok) {
      throw new GenerationFailedError(`Malformed generate response: ${data.error}`, id);
    }
    if (data.value.error) {
      throw new GenerationFailedError(data.value.error, id);
    }

    return data.value.response;
  }

  /**
   * Check if the service answers at all
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseURL}/api/tags`, {
        method: "GET",
        signal: AbortSignal.timeout(this.probeTimeoutMs),
        dispatcher: this.dispatcher,
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  /**
   * Poll until the service answers or the deadline passes.
   */
  async waitUntilAvailable(timeoutMs: number, intervalMs = 1000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await this.isAvailable()) return;
      if (Date.now() + intervalMs > deadline) {
        throw new BackendUnavailableError(
          `Inference service at ${this.baseURL} did not become ready within ${timeoutMs}ms`,
          this.baseURL
        );
      }
      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    }
  }

  /**
   * Prefer the service's own `error` message; fall back to the status line.
   */
  private async describeFailure(response: Response): Promise<string> {
    let text = "";
    try {
      text = await response.text();
    } catch (error) {
      return `${response.status} ${response.statusText}: ${toError(error).message}`;
    }

    const body = OllamaErrorBodySchema.safeParse(tryParseJson(text));
    if (body.success) return body.data.error;

    const suffix = text.trim() ? ` - ${text.trim()}` : "";
    return `${response.status} ${response.statusText}${suffix}`;
  }

  private async readJson<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T, string>> {
    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      return err(toError(error).message);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return err(parsed.error.errors.map((e) => `${e.path.join(".") || "body"}: ${e.message}`).join("; "));
    }
    return ok(parsed.data);
  }
}

/**
 * fetch rejects with a bare "fetch failed"; the socket-level reason
 * (ECONNREFUSED, headers timeout, ...) sits on `cause`.
 */
export function describeNetworkError(error: Error): string {
  const nested = error.cause;
  if (nested instanceof Error && nested.message && nested.message !== error.message) {
    return `${error.message}: ${nested.message}`;
  }
  return error.message;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

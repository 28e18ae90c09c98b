/**
 * Error types for the gateway.
 *
 * Everything below the generation gateway throws one of these; the gateway
 * turns them into text, and the HTTP layer maps `statusCode` onto responses.
 */

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "GatewayError";
    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

/**
 * The inference service could not be reached or answered with garbage
 * while listing installed models.
 */
export class BackendUnavailableError extends GatewayError {
  constructor(message: string, public readonly baseURL?: string, public readonly originalError?: Error) {
    super(message, "BACKEND_UNAVAILABLE", 503, { baseURL, originalError: originalError?.message });
    this.name = "BackendUnavailableError";
    Object.setPrototypeOf(this, BackendUnavailableError.prototype);
  }
}

export class AcquisitionFailedError extends GatewayError {
  constructor(message: string, public readonly modelName: string, public readonly originalError?: Error) {
    super(message, "ACQUISITION_FAILED", 502, { modelName, originalError: originalError?.message });
    this.name = "AcquisitionFailedError";
    Object.setPrototypeOf(this, AcquisitionFailedError.prototype);
  }
}

export class GenerationFailedError extends GatewayError {
  constructor(message: string, public readonly modelName: string, public readonly originalError?: Error) {
    super(message, "GENERATION_FAILED", 502, { modelName, originalError: originalError?.message });
    this.name = "GenerationFailedError";
    Object.setPrototypeOf(this, GenerationFailedError.prototype);
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, "VALIDATION_ERROR", 400, details);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Normalize anything caught into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

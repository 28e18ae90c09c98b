export { AcquisitionGate } from "./acquisitionGate";
export { prepareBackend } from "./bootstrap";
export type { BackendStatus, PrepareBackendOptions } from "./bootstrap";
export { GenerationGateway, formatGenerationError } from "./generationGateway";
export type { GenerationGatewayDeps } from "./generationGateway";
export { ModelResolver, normalizeModelName } from "./modelResolver";
export type { ModelResolverDeps } from "./modelResolver";
export { OllamaClient, describeNetworkError } from "./ollamaClient";
export type { OllamaClientConfig } from "./ollamaClient";
export * from "./types";

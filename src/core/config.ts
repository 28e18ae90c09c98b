/**
 * Process-wide gateway configuration.
 *
 * Read once from the environment at startup and frozen; nothing mutates it
 * afterwards, so it can be shared freely between concurrent requests.
 */

import { z } from "zod";
import { ValidationError } from "./errors";
import { LogFormat, LogLevel, parseLogFormat, parseLogLevel } from "./logger/config";

export const LEGACY_MODEL_PLACEHOLDER = "local-model";

const portSchema = z.coerce.number().int().min(0).max(65535);

const EnvSchema = z.object({
  OLLAMA_HOST: z.string().min(1).default("localhost"),
  OLLAMA_PORT: portSchema.default(11434),
  DEFAULT_MODEL: z.string().min(1).default("llama3.2:1b"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: portSchema.default(8000),
  LOG_LEVEL: z.string().optional(),
  LOG_FORMAT: z.string().optional(),
  OLLAMA_STARTUP_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
  PULL_DEFAULT_MODEL: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((v) => v === "true" || v === "1"),
});

export interface GatewayConfig {
  ollamaHost: string;
  ollamaPort: number;
  ollamaBaseURL: string;
  defaultModel: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  startupTimeoutMs: number;
  pullDefaultOnStartup: boolean;
}

/**
 * Build the configuration from environment variables. Empty strings count
 * as unset so `OLLAMA_PORT=` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<GatewayConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    throw new ValidationError("invalid environment configuration", {
      issues: parsed.error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
    });
  }

  const e = parsed.data;
  return Object.freeze({
    ollamaHost: e.OLLAMA_HOST,
    ollamaPort: e.OLLAMA_PORT,
    ollamaBaseURL: `http://${e.OLLAMA_HOST}:${e.OLLAMA_PORT}`,
    defaultModel: e.DEFAULT_MODEL,
    host: e.HOST,
    port: e.PORT,
    logLevel: parseLogLevel(e.LOG_LEVEL),
    logFormat: parseLogFormat(e.LOG_FORMAT),
    startupTimeoutMs: e.OLLAMA_STARTUP_TIMEOUT_MS,
    pullDefaultOnStartup: e.PULL_DEFAULT_MODEL,
  });
}

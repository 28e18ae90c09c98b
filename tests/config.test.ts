/**
 * Configuration loading
 */

import { loadConfig } from "../src/core/config";
import { ValidationError } from "../src/core/errors";

describe("loadConfig", () => {
  test("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      ollamaHost: "localhost",
      ollamaPort: 11434,
      ollamaBaseURL: "http://localhost:11434",
      defaultModel: "llama3.2:1b",
      host: "0.0.0.0",
      port: 8000,
      logLevel: "info",
      logFormat: "pretty",
      startupTimeoutMs: 30000,
      pullDefaultOnStartup: true,
    });
  });

  test("reads the inference service location and default model", () => {
    const config = loadConfig({
      OLLAMA_HOST: "ollama.internal",
      OLLAMA_PORT: "11500",
      DEFAULT_MODEL: "mistral:7b",
      PORT: "9000",
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "json",
      PULL_DEFAULT_MODEL: "false",
    });

    expect(config.ollamaBaseURL).toBe("http://ollama.internal:11500");
    expect(config.defaultModel).toBe("mistral:7b");
    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe("debug");
    expect(config.logFormat).toBe("json");
    expect(config.pullDefaultOnStartup).toBe(false);
  });

  test("treats empty strings as unset", () => {
    expect(loadConfig({ OLLAMA_PORT: "", DEFAULT_MODEL: "" }).ollamaBaseURL).toBe("http://localhost:11434");
  });

  test("rejects a non-numeric port", () => {
    expect(() => loadConfig({ OLLAMA_PORT: "eleven" })).toThrow(ValidationError);
  });

  test("returns a frozen object", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
  });
});

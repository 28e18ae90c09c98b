/**
 * Logger Configuration
 * Defines configuration and env parsing for the gateway logger
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  source?: string;
  // "stderr" keeps stdout clean for the CLI, whose stdout is the answer
  destination: "stdout" | "stderr";
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
  destination: "stdout",
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return { ...DEFAULT_CONFIG, ...config };
}

export function isValidLogLevel(level: string): level is LogLevel {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(level);
}

/**
 * Parse log level from environment
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return DEFAULT_CONFIG.level;
  const normalized = level.toLowerCase();
  if (isValidLogLevel(normalized)) return normalized;
  console.warn(`Invalid log level "${level}", using default "${DEFAULT_CONFIG.level}"`);
  return DEFAULT_CONFIG.level;
}

/**
 * Parse log format from environment
 */
export function parseLogFormat(format: string | undefined): LogFormat {
  if (!format) return DEFAULT_CONFIG.format;
  if (format === "json" || format === "pretty") return format;
  console.warn(`Invalid log format "${format}", using default "${DEFAULT_CONFIG.format}"`);
  return DEFAULT_CONFIG.format;
}

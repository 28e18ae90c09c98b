export { GatewayLogger } from "./logger";
export type { GatewayLoggerOptions, LoggerContext } from "./logger";
export { createLoggerConfig, parseLogFormat, parseLogLevel, isValidLogLevel } from "./config";
export type { LogFormat, LogLevel, LoggerConfig } from "./config";

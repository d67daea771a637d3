export * from "./screens";
export * from "./hubs";
export * from "./flow";
export * from "./workers";
export * from "./ui";
export * from "./hooks";
export { configureLogger, createScopedLogger, getLogFile, logger, type DebugLogger } from "./lib/debug-logger";
export { resolveRuntimeConfig, type LogLevel, type LogThreshold, type RuntimeConfig } from "./lib/runtime-config";
export { err, ok, type Result } from "./lib/result";

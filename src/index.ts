/**
 * Barrel exports for library-style use. The CLI and server import modules
 * directly.
 */
export * from "./api";
export * from "./backoff";
export * from "./batch";
export * from "./config";
export * from "./errors";
export * from "./health";
export * from "./metrics";
export * from "./orchestrator";
export * from "./registry";
export * from "./report";
export * from "./retry";
export * from "./schemas";
export * from "./types";
export * from "./workflow";
export { createLogger, componentLogger, type Logger } from "./logger";
export { createApp } from "./app";

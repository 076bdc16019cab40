/**
 * Shared contracts for the klines exporter: the kline record, exact decimals,
 * UTC time helpers, the error taxonomy, logging and configuration.
 */
export * from "./types";
export * from "./decimal";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export * from "./utils/logger";

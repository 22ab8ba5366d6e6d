/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./symbols";
export * from "./sql";
export * from "./config";
export * from "./utils/logger";

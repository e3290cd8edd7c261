/**
 * @fileoverview Public API of the engine, for embedding it without the CLI.
 *
 * @module fleetwright
 */

export * from "./core/charts/index.ts";
export * from "./core/dns/index.ts";
export * from "./core/progress/index.ts";
export * from "./core/retry/index.ts";
export * from "./core/service/index.ts";
export * from "./core/transaction/index.ts";
export * from "./core/errors.ts";
export { EngineContext } from "./core/context.ts";
export { ConfigManager, DEFAULT_CONFIG } from "./core/config-manager.ts";
export * from "./kubernetes/index.ts";
export { Logger } from "./logger.ts";
export { loadClusterDescriptor, parseClusterDescriptor } from "./services/cluster-loader.ts";
export { EnvironmentLoader } from "./services/environment-loader.ts";
export type * from "./types/config-types.ts";
export * from "./types/service-types.ts";

/**
 * @fileoverview Configuration management type definitions.
 *
 * @module ConfigTypes
 * @since 1.0.0
 */

/**
 * Cluster-wide feature flags deciding which optional charts are installed.
 */
export interface FeatureFlags {
  logHistoryEnabled: boolean;
  metricsHistoryEnabled: boolean;
  /** Skips the resource-lifecycle daemon (pleco) */
  disablePleco: boolean;
}

/**
 * Retry budgets of the DNS readiness checks.
 */
export interface DnsCheckSettings {
  cnameCheckAttempts: number;
  cnameCheckDelayMs: number;
  domainCheckAttempts: number;
  domainCheckDelayMs: number;
}

/**
 * Engine configuration, as loaded from `fleetwright.config.json`.
 */
export interface EngineConfig {
  /** Root of the chart and template library */
  libRootDir: string;
  /** Root under which every execution gets its own workspace */
  workspaceRootDir: string;
  kubeconfigPath: string | null;
  defaultStartTimeoutInSeconds: number;
  startTimeoutMultiplier: number;
  /** Test clusters use the ACME staging endpoint and skip final snapshots */
  testCluster: boolean;
  features: FeatureFlags;
  dns: DnsCheckSettings;
}

/**
 * @fileoverview Service definition type definitions.
 *
 * This module provides the data shapes shared by applications, databases and
 * routers: lifecycle actions, sizing, ports, storage and routing.
 *
 * @module ServiceTypes
 * @since 1.0.0
 */

export const actions = [
  "create",
  "pause",
  "delete",
  "upgrade",
  "downgrade",
  "backup",
  "restore",
  "clone",
] as const;

/**
 * Lifecycle action requested for a service or an environment.
 */
export type Action = typeof actions[number];

/**
 * Actions the transaction drives by itself. The others are capability-gated.
 */
export type LifecycleAction = Extract<Action, "create" | "pause" | "delete">;

export type CapabilityAction = Exclude<Action, LifecycleAction>;

export function isLifecycleAction(action: Action): action is LifecycleAction {
  return action === "create" || action === "pause" || action === "delete";
}

export type ServiceKind = "application" | "database" | "router";

/**
 * Resources requested for a service. Frozen once the service is built.
 */
export interface Sizing {
  /** CPU request, Kubernetes notation ("500m", "1.5") */
  totalCpus: string;
  /** CPU limit, Kubernetes notation */
  cpuBurst: string;
  totalRamInMib: number;
  minInstances: number;
  maxInstances: number;
}

export interface Port {
  id: string;
  port: number;
  publiclyAccessible: boolean;
  name?: string;
}

export interface EnvironmentVariable {
  key: string;
  value: string;
}

export interface Storage {
  id: string;
  name: string;
  sizeInGib: number;
  mountPoint: string;
  snapshotRetentionInDays: number;
}

export interface Image {
  name: string;
  tag: string;
  registryUrl: string;
  registryName?: string;
  commitId: string;
}

export interface CustomDomain {
  /** Domain owned by the user */
  domain: string;
  /** Domain the user's CNAME must point to */
  targetDomain: string;
}

export interface Route {
  path: string;
  applicationName: string;
}

export const databaseEngines = ["postgresql", "mysql", "mongodb", "redis"] as const;

export type DatabaseEngine = typeof databaseEngines[number];

export type DatabaseMode = "managed" | "container";

export interface DatabaseOptions {
  login: string;
  password: string;
  host: string;
  port: number;
  diskSizeInGib: number;
  databaseDiskType: string;
  publiclyAccessible: boolean;
  activateHighAvailability: boolean;
  activateBackups: boolean;
}

/**
 * Provider-specific constants handed to otherwise provider-agnostic code.
 */
export interface ProviderSettings {
  /** Short provider name used in logs and chart values ("do", "aws", "scw") */
  shortName: string;
  /** Directory under the lib root holding the provider's charts and values */
  libDirectory: string;
  storageClassName: string;
  registrySecretName?: string;
  extra: Record<string, string>;
}

/**
 * Key/value context handed to the template renderer.
 */
export type RenderContext = Record<string, unknown>;

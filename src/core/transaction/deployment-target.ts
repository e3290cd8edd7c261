import type { Cluster } from "./cluster.ts";
import type { Environment } from "./environment.ts";
import type { DatabaseMode } from "../../types/service-types.ts";

export type DeploymentTargetKind = "managed-services" | "self-hosted";

/**
 * Where a service is deployed: the cluster, the environment, and whether
 * stateful services use the provider's managed offerings.
 */
export interface DeploymentTarget {
  readonly kind: DeploymentTargetKind;
  readonly cluster: Cluster;
  readonly environment: Environment;
}

/**
 * Managed services when the environment's databases are provided by the
 * cloud provider, self-hosted when they run inside the cluster.
 */
export function deploymentTargetFor(cluster: Cluster, environment: Environment): DeploymentTarget {
  return {
    kind: environment.databaseMode === "managed" ? "managed-services" : "self-hosted",
    cluster,
    environment,
  };
}

export function databaseModeOf(target: DeploymentTarget): DatabaseMode {
  return target.kind === "managed-services" ? "managed" : "container";
}

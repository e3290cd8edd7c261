export { Cluster, type ClusterFields, type ClusterTools } from "./cluster.ts";
export { deploymentTargetFor, type DeploymentTarget, type DeploymentTargetKind } from "./deployment-target.ts";
export { Environment, type EnvironmentAction, type EnvironmentFields, type EnvironmentKind } from "./environment.ts";
export {
  Transaction,
  type TransactionOptions,
  type TransactionResult,
  type TransactionState,
} from "./transaction.ts";

/**
 * @fileoverview External collaborators: package manager, control plane,
 * template renderer and chart backups.
 */

export { HelmCli, parseReleaseList } from "./helm.ts";
export type { HelmClient, HelmUpgradeOptions, ReleaseStatus } from "./helm.ts";
export { KubectlCli, parsePodList, parseSecretList } from "./kubectl.ts";
export type { KubectlClient, PodStatus, ScalableKind, SecretItem } from "./kubectl.ts";
export { FileTemplateRenderer, substitute } from "./template-renderer.ts";
export type { TemplateRenderer } from "./template-renderer.ts";
export { applyChartBackup, backupSecretName, cleanBackupYaml, prepareChartBackup } from "./chart-backup.ts";
export type { BackupInfo } from "./chart-backup.ts";
export { runCommand } from "./command-runner.ts";

/**
 * @fileoverview Backup and restore of resources a breaking chart upgrade
 * would lose.
 *
 * Each backed-up resource kind becomes one secret in the chart's namespace,
 * named `<chart-name>-<resource>-q-backup`, holding the resources' YAML.
 *
 * @module ChartBackup
 * @since 1.0.0
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { CommandError } from "../core/errors.ts";
import { Logger } from "../logger.ts";
import { isRecord } from "../utils/guards.ts";
import type { ChartInfo } from "../core/charts/chart-types.ts";
import type { KubectlClient } from "./kubectl.ts";

export const BACKUP_SUFFIX = "-q-backup";

export interface BackupInfo {
  /** Backed-up resource kind */
  name: string;
  /** Secret the backup is stored in */
  secretName: string;
  path: string;
}

export function backupSecretName(chartName: string, resource: string): string {
  return `${chartName}-${resource}${BACKUP_SUFFIX}`;
}

/**
 * Drops the list wrapper and the server-owned `resourceVersion` and `uid`
 * fields. Returns an empty string when there is nothing to back up.
 */
export function cleanBackupYaml(content: string): string {
  const lowered = content.toLowerCase();
  if (content.trim() === "" || lowered.includes("no resources found") || content.includes("items: []")) {
    return "";
  }

  const parsed: unknown = parse(content);
  const items: Record<string, unknown>[] = isRecord(parsed) && Array.isArray(parsed.items) ? parsed.items.filter(isRecord) : [];
  return items
    .map((item) => {
      const metadata: Record<string, unknown> = isRecord(item.metadata) ? item.metadata : {};
      const { resourceVersion: _resourceVersion, uid: _uid, ...kept } = metadata;
      return stringify({ ...item, metadata: kept });
    })
    .join("---\n");
}

/**
 * Saves every `backupResources` kind of the chart into its backup secret.
 * An existing backup secret is replaced, never duplicated.
 */
export async function prepareChartBackup(
  kubectl: KubectlClient,
  workspaceDir: string,
  chart: ChartInfo,
): Promise<BackupInfo[]> {
  const infos: BackupInfo[] = [];
  const backupDir = join(workspaceDir, "backups", chart.name);

  for (const resource of chart.backupResources ?? []) {
    let content: string;
    try {
      content = cleanBackupYaml(await kubectl.getResourceYaml(resource, chart.namespace));
    } catch (err) {
      // A kind the cluster does not know has nothing to lose.
      Logger.warning(`Unable to read ${resource} of ${chart.name} for backup`);
      Logger.debug(err instanceof Error ? err.message : String(err));
      continue;
    }
    if (content === "") {
      continue;
    }

    await mkdir(backupDir, { recursive: true });
    const path = join(backupDir, `${resource}.yaml`);
    await writeFile(path, content, "utf8");

    const secretName = backupSecretName(chart.name, resource);
    await kubectl.deleteSecret(chart.namespace, secretName);
    await kubectl.createSecretFromFile(chart.namespace, secretName, resource, path);
    infos.push({ name: resource, secretName, path });
  }

  return infos;
}

/**
 * Re-applies every backup secret of the chart's namespace, then deletes it.
 * A backup without content is only deleted.
 */
export async function applyChartBackup(
  kubectl: KubectlClient,
  workspaceDir: string,
  chart: ChartInfo,
): Promise<string[]> {
  const restored: string[] = [];
  const restoreDir = join(workspaceDir, "restores", chart.name);

  for (const secret of await kubectl.getSecrets(chart.namespace)) {
    if (!secret.name.includes(BACKUP_SUFFIX)) {
      continue;
    }

    const content = Object.values(secret.data).join("\n").trim();
    if (content !== "") {
      await mkdir(restoreDir, { recursive: true });
      const path = join(restoreDir, `${secret.name}.yaml`);
      await writeFile(path, content, "utf8");
      try {
        await kubectl.apply(path);
      } catch (err) {
        const raw = err instanceof CommandError ? err.messageRaw : undefined;
        throw new CommandError(`Unable to restore backup ${secret.name} of ${chart.name}`, raw);
      }
      restored.push(secret.name);
    }

    await kubectl.deleteSecret(chart.namespace, secret.name);
  }

  return restored;
}

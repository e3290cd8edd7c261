/**
 * @fileoverview Level-by-level installation of infrastructure charts.
 *
 * @module ChartInstaller
 * @since 1.0.0
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import semver from "semver";
import { parse } from "yaml";
import { ExecutionError, describeError, rawMessage } from "../errors.ts";
import { Logger } from "../../logger.ts";
import { applyChartBackup, prepareChartBackup } from "../../kubernetes/chart-backup.ts";
import { isRecord } from "../../utils/guards.ts";
import type { HelmClient } from "../../kubernetes/helm.ts";
import type { KubectlClient } from "../../kubernetes/kubectl.ts";
import type { ProgressBus } from "../progress/progress-bus.ts";
import type { ChartInfo, Level } from "./chart-types.ts";

export interface ChartInstallerOptions {
  helm: HelmClient;
  kubectl: KubectlClient;
  /** Where backups and generated files are written */
  workspaceDir: string;
  progress?: ProgressBus;
  clusterId?: string;
  executionId?: string;
}

/**
 * Installs levels strictly in order. Charts of one level go in declaration
 * order, and the first failing chart aborts everything after it.
 *
 * @example
 * ```typescript
 * const installer = new ChartInstaller({ helm, kubectl, workspaceDir });
 * await installer.installLevels(await buildChartLevels(infraFile, prerequisites, prefix));
 * ```
 *
 * @since 1.0.0
 */
export class ChartInstaller {
  constructor(private readonly options: ChartInstallerOptions) {}

  async installLevels(levels: readonly Level[]): Promise<void> {
    for (const [index, level] of levels.entries()) {
      if (level.length === 0) {
        continue;
      }
      Logger.step(index + 1, levels.length, `Installing ${level.map((chart) => chart.name).join(", ")}`);

      for (const chart of level) {
        try {
          await this.installChart(chart);
        } catch (err) {
          this.notify("error", `Chart ${chart.name} failed, remaining charts were not installed`);
          throw new ExecutionError(`Error while deploying chart ${chart.name}`, rawMessage(err));
        }
      }
    }
    Logger.success("Infrastructure charts installed");
  }

  /**
   * Installs (or destroys) a single chart, saving and restoring its backup
   * resources around an upgrade that crosses its breaking version.
   */
  async installChart(chart: ChartInfo): Promise<void> {
    const { helm, kubectl, workspaceDir } = this.options;

    if (chart.action === "destroy") {
      this.notify("info", `Removing chart ${chart.name}`);
      await helm.uninstall(chart.name, chart.namespace);
      return;
    }

    this.notify("info", `Deploying chart ${chart.name}`);

    const backupRequired = await this.crossesBreakingVersion(chart);
    const backups = backupRequired ? await prepareChartBackup(kubectl, workspaceDir, chart) : [];

    await helm.upgrade(chart, { wait: true, timeoutInSeconds: chart.timeoutInSeconds });

    if (backups.length > 0) {
      await applyChartBackup(kubectl, workspaceDir, chart);
    }
  }

  /**
   * True when the deployed release is older than the chart's breaking
   * version and the version about to be installed is not. An unknown target
   * version counts as crossing.
   */
  private async crossesBreakingVersion(chart: ChartInfo): Promise<boolean> {
    const breaking = semver.coerce(chart.lastBreakingVersionRequiringRestart);
    if (breaking === null || (chart.backupResources ?? []).length === 0) {
      return false;
    }

    const status = await this.options.helm.status(chart.name, chart.namespace);
    const deployed = semver.coerce(status.chartVersion);
    if (!status.deployed || deployed === null || semver.gte(deployed, breaking)) {
      return false;
    }

    const target = semver.coerce(await readChartVersion(chart.path));
    return target === null || semver.gte(target, breaking);
  }

  private notify(level: "info" | "error", message: string): void {
    const { progress, clusterId, executionId } = this.options;
    if (progress === undefined || clusterId === undefined || executionId === undefined) {
      return;
    }
    progress.inProgress({ kind: "infrastructure", id: clusterId }, level, message, executionId);
  }
}

async function readChartVersion(chartPath: string): Promise<string | undefined> {
  try {
    const chart: unknown = parse(await readFile(join(chartPath, "Chart.yaml"), "utf8"));
    return isRecord(chart) && typeof chart.version === "string" ? chart.version : undefined;
  } catch (err) {
    Logger.debug(`No readable Chart.yaml in ${chartPath}: ${describeError(err)}`);
    return undefined;
  }
}

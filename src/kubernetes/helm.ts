/**
 * @fileoverview Helm package manager invocation.
 *
 * @module Helm
 * @since 1.0.0
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "yaml";
import { runCommand, type CommandRunner } from "./command-runner.ts";
import type { ChartInfo } from "../core/charts/chart-types.ts";

export interface HelmUpgradeOptions {
  wait: boolean;
  timeoutInSeconds: number;
}

/**
 * Last known state of a release. A release can exist without being
 * deployed, after a failed or interrupted install.
 */
export interface ReleaseStatus {
  exists: boolean;
  deployed: boolean;
  chartVersion?: string;
}

/**
 * The package manager, as seen by the engine. Every method rejects with a
 * `CommandError` when the underlying call fails.
 */
export interface HelmClient {
  /** Installs the chart, or upgrades it when the release already exists. */
  upgrade(chart: ChartInfo, options: HelmUpgradeOptions): Promise<ReleaseStatus>;
  /** Removes the release whatever its status; a missing release is a no-op. */
  uninstall(releaseName: string, namespace: string): Promise<void>;
  /** Rolls the release back to its previous revision. */
  rollback(releaseName: string, namespace: string): Promise<void>;
  status(releaseName: string, namespace: string): Promise<ReleaseStatus>;
}

/**
 * `HelmClient` driving the `helm` binary.
 *
 * @example
 * ```typescript
 * const helm = new HelmCli("/home/me/.kube/config", "/tmp/exec-1");
 * await helm.upgrade(chart, { wait: true, timeoutInSeconds: 300 });
 * ```
 *
 * @since 1.0.0
 */
export class HelmCli implements HelmClient {
  constructor(
    private readonly kubeconfigPath: string | null,
    /** Where generated values files are written */
    private readonly workingDir: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  async upgrade(chart: ChartInfo, options: HelmUpgradeOptions): Promise<ReleaseStatus> {
    const args = [
      "upgrade",
      "--install",
      chart.name,
      chart.path,
      "--namespace",
      chart.namespace,
      "--create-namespace",
      "--history-max",
      "50",
      "--timeout",
      `${options.timeoutInSeconds}s`,
    ];
    if (options.wait) args.push("--wait");
    if (chart.atomic) args.push("--atomic");

    for (const file of chart.valuesFiles) {
      args.push("-f", file);
    }
    for (const file of await this.writeValuesFiles(chart)) {
      args.push("-f", file);
    }
    for (const value of chart.values) {
      args.push("--set", `${value.key}=${value.value}`);
    }

    await this.run("helm", args, { kubeconfigPath: this.kubeconfigPath });
    return this.status(chart.name, chart.namespace);
  }

  async uninstall(releaseName: string, namespace: string): Promise<void> {
    const status = await this.status(releaseName, namespace);
    if (!status.exists) {
      return;
    }
    await this.run("helm", ["uninstall", releaseName, "--namespace", namespace, "--wait"], {
      kubeconfigPath: this.kubeconfigPath,
    });
  }

  async rollback(releaseName: string, namespace: string): Promise<void> {
    await this.run("helm", ["rollback", releaseName, "--namespace", namespace, "--wait"], {
      kubeconfigPath: this.kubeconfigPath,
    });
  }

  async status(releaseName: string, namespace: string): Promise<ReleaseStatus> {
    const output = await this.run(
      "helm",
      ["list", "--all", "--namespace", namespace, "--filter", `^${releaseName}$`, "--output", "yaml"],
      { kubeconfigPath: this.kubeconfigPath },
    );
    return parseReleaseList(output);
  }

  private async writeValuesFiles(chart: ChartInfo): Promise<string[]> {
    if (chart.yamlFilesContent.length === 0) {
      return [];
    }
    const dir = join(this.workingDir, chart.name);
    await mkdir(dir, { recursive: true });
    const paths: string[] = [];
    for (const file of chart.yamlFilesContent) {
      const path = join(dir, file.filename);
      await writeFile(path, file.yamlContent, "utf8");
      paths.push(path);
    }
    return paths;
  }
}

/**
 * Reads the output of `helm list --all --output yaml`. The chart field has
 * the form `<chart-name>-<version>`.
 */
export function parseReleaseList(output: string): ReleaseStatus {
  const releases: unknown = parse(output);
  if (!Array.isArray(releases) || releases.length === 0) {
    return { exists: false, deployed: false };
  }
  const [release]: unknown[] = releases;
  if (typeof release !== "object" || release === null) {
    return { exists: false, deployed: false };
  }
  const status = "status" in release ? release.status : undefined;
  const chart = "chart" in release ? release.chart : undefined;
  const version = typeof chart === "string" ? chart.match(/-v?(\d+\.\d+\.\d+[^\s]*)$/)?.[1] : undefined;
  const deployed = status === "deployed";
  return version === undefined
    ? { exists: true, deployed }
    : { exists: true, deployed, chartVersion: version };
}

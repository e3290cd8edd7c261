/**
 * @fileoverview Kubernetes cluster services are deployed onto.
 *
 * @module Cluster
 * @since 1.0.0
 */

import { join } from "node:path";
import { Logger } from "../../logger.ts";
import { buildChartLevels, type ChartPrerequisites } from "../charts/chart-catalog.ts";
import { ChartInstaller } from "../charts/chart-installer.ts";
import type { EngineContext } from "../context.ts";
import type { Level } from "../charts/chart-types.ts";
import type { ReadinessProber } from "../dns/readiness-prober.ts";
import type { HelmClient } from "../../kubernetes/helm.ts";
import type { KubectlClient } from "../../kubernetes/kubectl.ts";
import type { TemplateRenderer } from "../../kubernetes/template-renderer.ts";
import type { ProviderSettings } from "../../types/service-types.ts";

/**
 * External collaborators bound to one cluster.
 */
export interface ClusterTools {
  helm: HelmClient;
  kubectl: KubectlClient;
  renderer: TemplateRenderer;
  prober: ReadinessProber;
}

export interface ClusterFields {
  id: string;
  name: string;
  region: string;
  provider: ProviderSettings;
  /** JSON outputs written by the infrastructure provisioning step */
  infraConfigFile: string;
  prerequisites: ChartPrerequisites;
}

/**
 * A cluster plus the tools reaching it. Bootstrapping (installing the
 * infrastructure charts) happens at most once per instance; concurrent
 * callers share the same run, and a failed run can be retried.
 *
 * @example
 * ```typescript
 * const cluster = new Cluster(fields, { helm, kubectl, renderer, prober });
 * await cluster.bootstrap(context);
 * await cluster.bootstrap(context); // no-op
 * ```
 *
 * @since 1.0.0
 */
export class Cluster {
  readonly id: string;
  readonly name: string;
  readonly region: string;
  readonly provider: ProviderSettings;
  readonly infraConfigFile: string;
  readonly prerequisites: ChartPrerequisites;

  private bootstrapped = false;
  private inFlight: Promise<void> | undefined;

  constructor(fields: ClusterFields, readonly tools: ClusterTools) {
    this.id = fields.id;
    this.name = fields.name;
    this.region = fields.region;
    this.provider = fields.provider;
    this.infraConfigFile = fields.infraConfigFile;
    this.prerequisites = fields.prerequisites;
  }

  get isBootstrapped(): boolean {
    return this.bootstrapped;
  }

  /**
   * Infrastructure charts of this cluster, from the provider's library.
   */
  chartLevels(context: EngineContext): Promise<Level[]> {
    const chartPrefix = join(context.libRootDir, this.provider.libDirectory, "bootstrap");
    return buildChartLevels(this.infraConfigFile, this.prerequisites, chartPrefix);
  }

  bootstrap(context: EngineContext): Promise<void> {
    if (this.bootstrapped) {
      Logger.info(`Cluster ${this.name} is already bootstrapped`);
      return Promise.resolve();
    }
    if (this.inFlight === undefined) {
      this.inFlight = this.installInfrastructure(context).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async installInfrastructure(context: EngineContext): Promise<void> {
    Logger.info(`Bootstrapping cluster ${this.name} (${this.provider.shortName.toUpperCase()} ${this.region})`);
    const levels = await this.chartLevels(context);
    const installer = new ChartInstaller({
      helm: this.tools.helm,
      kubectl: this.tools.kubectl,
      workspaceDir: join(context.workspaceRootDir, "infrastructure", this.id),
      progress: context.progress,
      clusterId: this.id,
      executionId: context.executionId,
    });
    await installer.installLevels(levels);
    this.bootstrapped = true;
  }
}

/**
 * @fileoverview Database service, either run in the cluster or provided by
 * the cloud provider and exposed through an ExternalName service.
 *
 * @module Database
 * @since 1.0.0
 */

import { join } from "node:path";
import { ExecutionError, rawMessage } from "../errors.ts";
import { Logger } from "../../logger.ts";
import { chartInfo, type ChartInfo } from "../charts/chart-types.ts";
import { PodHealthChecker } from "./health-checker.ts";
import { BaseService, cut, type ServiceFields } from "./service.ts";
import type { EngineContext } from "../context.ts";
import type { SupportedVersionLookup } from "./supported-versions.ts";
import { databaseModeOf, type DeploymentTarget } from "../transaction/deployment-target.ts";
import type {
  DatabaseEngine,
  DatabaseOptions,
  RenderContext,
} from "../../types/service-types.ts";

const engineLabels: Record<DatabaseEngine, string> = {
  postgresql: "PostgreSQL",
  mysql: "MySQL",
  mongodb: "MongoDB",
  redis: "Redis",
};

export interface DatabaseFields extends ServiceFields {
  engine: DatabaseEngine;
  fqdn: string;
  fqdnId: string;
  options: DatabaseOptions;
  databaseName?: string;
  instanceType?: string;
}

/**
 * Runs in the cluster on a self-hosted target and points at the provider's
 * instance on a managed-services one.
 *
 * @example
 * ```typescript
 * const postgres = new Database(context, lookup, {
 *   id: "db-1",
 *   name: "main",
 *   action: "create",
 *   version: "13",
 *   engine: "postgresql",
 *   fqdn: "main.internal",
 *   fqdnId: "main",
 *   sizing,
 *   options,
 * });
 * postgres.resolvedVersion(target); // "13.4.0" on a self-hosted target
 * ```
 *
 * @since 1.0.0
 */
export class Database extends BaseService {
  readonly kind = "database";
  protected readonly structName: string;

  readonly engine: DatabaseEngine;
  readonly fqdn: string;
  readonly fqdnId: string;
  readonly options: Readonly<DatabaseOptions>;
  readonly databaseName: string;
  readonly instanceType: string;

  constructor(
    context: EngineContext,
    private readonly versions: SupportedVersionLookup,
    fields: DatabaseFields,
  ) {
    super(context, fields);
    this.engine = fields.engine;
    this.fqdn = fields.fqdn;
    this.fqdnId = fields.fqdnId;
    this.options = Object.freeze({ ...fields.options });
    this.databaseName = fields.databaseName ?? fields.name;
    this.instanceType = fields.instanceType ?? "";
    this.structName = engineLabels[fields.engine];
  }

  protected override hookScope(target?: DeploymentTarget): string {
    return target !== undefined && databaseModeOf(target) === "managed" ? `Managed${this.structName}` : this.structName;
  }

  protected get namePrefix(): string {
    return this.engine;
  }

  get privatePort(): number {
    return this.options.port;
  }

  get selector(): string {
    return `app=${this.sanitizedName}`;
  }

  get helmReleaseName(): string {
    return cut(`${this.engine}-${this.id}`);
  }

  isStateful(): boolean {
    return true;
  }

  startTimeoutInSeconds(): number {
    const { defaultStartTimeoutInSeconds, startTimeoutMultiplier } = this.context.config;
    return defaultStartTimeoutInSeconds * startTimeoutMultiplier;
  }

  /**
   * Exact version deployed for the requested one on this target.
   *
   * @throws {ValidationError} When the engine does not support it in this mode
   */
  resolvedVersion(target: DeploymentTarget): string {
    return this.versions.resolve(this.engine, databaseModeOf(target), this.version);
  }

  async renderContext(target: DeploymentTarget): Promise<RenderContext> {
    const version = this.resolvedVersion(target);
    const testCluster = this.context.isTestCluster;

    return {
      ...this.defaultRenderContext(target),
      version,
      version_major: version.split(".")[0],
      fqdn: this.fqdn,
      fqdn_id: this.fqdnId,
      database_login: this.options.login,
      database_password: this.options.password,
      database_port: this.options.port,
      database_disk_size_in_gib: this.options.diskSizeInGib,
      database_instance_type: this.instanceType,
      database_disk_type: this.options.databaseDiskType,
      database_name: this.databaseName,
      database_ram_size_in_mib: this.sizing.totalRamInMib,
      database_total_cpus: this.sizing.totalCpus,
      database_fqdn: this.options.host,
      database_id: this.id,
      publicly_accessible: this.options.publiclyAccessible,
      activate_high_availability: this.options.activateHighAvailability,
      activate_backups: this.options.activateBackups,
      delete_automated_backups: testCluster,
      skip_final_snapshot: testCluster,
    };
  }

  override async onCreateCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateCheck", target);
    this.resolvedVersion(target);
  }

  async onCreate(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreate", target);
    const { helm, kubectl } = target.cluster.tools;
    const { namespace } = target.environment;

    const managed = databaseModeOf(target) === "managed";
    const chart = managed ? await this.renderExternalNameChart(target) : await this.renderEngineChart(target);

    try {
      await helm.upgrade(chart, { wait: true, timeoutInSeconds: this.startTimeoutInSeconds() });
    } catch (err) {
      const diagnostics = managed ? "" : await new PodHealthChecker(kubectl).diagnose(this.selector, namespace);
      throw new ExecutionError(
        `${engineLabels[this.engine]} database ${this.name} has failed to deploy`,
        diagnostics === "" ? rawMessage(err) : `${rawMessage(err)}\n${diagnostics}`,
      );
    }
  }

  async onCreateError(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateError", target);
  }

  async onPause(target: DeploymentTarget): Promise<void> {
    this.printAction("onPause", target);
    if (databaseModeOf(target) === "managed") {
      Logger.info(`${this.name} is a managed database, it keeps running`);
      return;
    }
    await this.guard(`Unable to pause database ${this.name}`, () =>
      target.cluster.tools.kubectl.scale("statefulset", this.selector, target.environment.namespace, 0),
    );
  }

  async onPauseError(target: DeploymentTarget): Promise<void> {
    this.printAction("onPauseError", target);
  }

  async onDelete(target: DeploymentTarget): Promise<void> {
    this.printAction("onDelete", target);
    await this.guard(`Unable to delete database ${this.name}`, () =>
      target.cluster.tools.helm.uninstall(this.helmReleaseName, target.environment.namespace),
    );
  }

  async onDeleteError(target: DeploymentTarget): Promise<void> {
    this.printAction("onDeleteError", target);
  }

  private async renderExternalNameChart(target: DeploymentTarget): Promise<ChartInfo> {
    const path = await target.cluster.tools.renderer.render(
      join(this.context.libRootDir, "common", "charts", "external-name-svc"),
      join(this.workspaceDir(), "external-name-svc"),
      await this.renderContext(target),
    );
    return chartInfo({ name: this.helmReleaseName, path, namespace: target.environment.namespace });
  }

  private async renderEngineChart(target: DeploymentTarget): Promise<ChartInfo> {
    const { renderer } = target.cluster.tools;
    const { provider } = target.cluster;
    const context = await this.renderContext(target);
    const workspace = this.workspaceDir();

    const path = await renderer.render(
      join(this.context.libRootDir, "common", "services", this.engine),
      join(workspace, "chart"),
      context,
    );
    const valuesDir = await renderer.render(
      join(this.context.libRootDir, provider.libDirectory, "chart_values", this.engine),
      join(workspace, "values"),
      context,
    );

    return chartInfo({
      name: this.helmReleaseName,
      path,
      namespace: target.environment.namespace,
      timeoutInSeconds: this.startTimeoutInSeconds(),
      valuesFiles: [join(valuesDir, "q-values.yaml")],
    });
  }
}

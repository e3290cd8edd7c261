/**
 * @fileoverview Stateless or volume-backed container workload.
 *
 * @module Application
 * @since 1.0.0
 */

import { join } from "node:path";
import { ExecutionError, rawMessage } from "../errors.ts";
import { Logger } from "../../logger.ts";
import { chartInfo } from "../charts/chart-types.ts";
import { validateCpuAndBurst } from "./cpu.ts";
import { PodHealthChecker } from "./health-checker.ts";
import { BaseService, cut, type ServiceFields } from "./service.ts";
import type { EngineContext } from "../context.ts";
import type { DeploymentTarget } from "../transaction/deployment-target.ts";
import type {
  EnvironmentVariable,
  Image,
  Port,
  RenderContext,
  Storage,
} from "../../types/service-types.ts";

export interface ApplicationFields extends Omit<ServiceFields, "version"> {
  image: Image;
  ports?: Port[];
  environmentVariables?: EnvironmentVariable[];
  storage?: Storage[];
  /** Base start timeout; the engine's default when absent */
  startTimeoutInSeconds?: number;
}

/**
 * A container image run as a Deployment, or as a StatefulSet when it
 * mounts storage.
 *
 * @example
 * ```typescript
 * const web = new Application(context, {
 *   id: "app-1",
 *   name: "web",
 *   action: "create",
 *   sizing: { totalCpus: "500m", cpuBurst: "1", totalRamInMib: 256, minInstances: 1, maxInstances: 2 },
 *   image: { name: "web", tag: "1.0.0", registryUrl: "registry.local", commitId: "a1b2c3d4e5" },
 *   ports: [{ id: "p1", port: 8080, publiclyAccessible: true }],
 * });
 * web.sanitizedName; // "app-web"
 * web.startTimeoutInSeconds(); // (300 + 10) * 4
 * ```
 *
 * @since 1.0.0
 */
export class Application extends BaseService {
  readonly kind = "application";
  protected readonly namePrefix = "app";
  protected readonly structName = "Application";

  readonly image: Image;
  readonly ports: readonly Port[];
  readonly environmentVariables: readonly EnvironmentVariable[];
  readonly storage: readonly Storage[];
  private readonly baseStartTimeoutInSeconds: number;

  constructor(context: EngineContext, fields: ApplicationFields) {
    super(context, { ...fields, version: fields.image.tag });
    this.image = fields.image;
    this.ports = [...(fields.ports ?? [])];
    this.environmentVariables = [...(fields.environmentVariables ?? [])];
    this.storage = [...(fields.storage ?? [])];
    this.baseStartTimeoutInSeconds = fields.startTimeoutInSeconds ?? context.config.defaultStartTimeoutInSeconds;
  }

  get privatePort(): number | undefined {
    return this.ports.find((port) => port.publiclyAccessible)?.port;
  }

  get selector(): string {
    return `appId=${this.id}`;
  }

  get helmReleaseName(): string {
    return cut(`application-${this.name}-${this.id}`);
  }

  isStateful(): boolean {
    return this.storage.length > 0;
  }

  startTimeoutInSeconds(): number {
    return (this.baseStartTimeoutInSeconds + 10) * 4;
  }

  async renderContext(target: DeploymentTarget): Promise<RenderContext> {
    const { provider } = target.cluster;
    const cpu = validateCpuAndBurst(this.sizing.totalCpus, this.sizing.cpuBurst);
    if (cpu.warning !== undefined) {
      Logger.warning(cpu.warning);
      this.notify("warn", cpu.warning);
    }

    const registryPrefix = this.image.registryUrl === "" ? "" : `${this.image.registryUrl}/`;

    return {
      ...this.defaultRenderContext(target),
      helm_app_version: this.image.commitId.slice(0, 7),
      image_name_with_tag: `${registryPrefix}${this.image.name}:${this.image.tag}`,
      cpu_burst: cpu.cpuLimit,
      environment_variables: this.environmentVariables.map(({ key, value }) => ({
        key,
        value: Buffer.from(value).toString("base64"),
      })),
      ports: this.ports.map((port) => ({
        port: port.port,
        name: port.name ?? `p${port.port}`,
        publicly_accessible: port.publiclyAccessible,
      })),
      is_registry_secret: provider.registrySecretName !== undefined,
      registry_secret: provider.registrySecretName ?? "",
      is_storage: this.isStateful(),
      storage: this.storage.map((storage) => ({
        id: storage.id,
        name: storage.name,
        storage_type: provider.storageClassName,
        size_in_gib: storage.sizeInGib,
        mount_point: storage.mountPoint,
        snapshot_retention_in_days: storage.snapshotRetentionInDays,
      })),
      clone: false,
    };
  }

  override async onCreateCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateCheck", target);
    validateCpuAndBurst(this.sizing.totalCpus, this.sizing.cpuBurst);
  }

  async onCreate(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreate", target);
    const { helm, kubectl, renderer } = target.cluster.tools;
    const { namespace } = target.environment;

    const context = await this.renderContext(target);
    const chartDir = await renderer.render(
      join(this.context.libRootDir, "common", "charts", "application"),
      join(this.workspaceDir(), "chart"),
      context,
    );

    try {
      await helm.upgrade(
        chartInfo({ name: this.helmReleaseName, path: chartDir, namespace, timeoutInSeconds: this.startTimeoutInSeconds() }),
        { wait: true, timeoutInSeconds: this.startTimeoutInSeconds() },
      );
    } catch (err) {
      const diagnostics = await new PodHealthChecker(kubectl).diagnose(this.selector, namespace);
      throw new ExecutionError(
        `Application ${this.name} has failed to start`,
        `${rawMessage(err)}\n${diagnostics}`,
      );
    }
  }

  async onCreateError(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateError", target);
    await this.revertRelease(target);
  }

  async onPause(target: DeploymentTarget): Promise<void> {
    this.printAction("onPause", target);
    const kind = this.isStateful() ? "statefulset" : "deployment";
    await this.guard(`Unable to pause application ${this.name}`, () =>
      target.cluster.tools.kubectl.scale(kind, this.selector, target.environment.namespace, 0),
    );
  }

  async onPauseError(target: DeploymentTarget): Promise<void> {
    this.printAction("onPauseError", target);
  }

  async onDelete(target: DeploymentTarget): Promise<void> {
    this.printAction("onDelete", target);
    await this.guard(`Unable to delete application ${this.name}`, () =>
      target.cluster.tools.helm.uninstall(this.helmReleaseName, target.environment.namespace),
    );
  }

  async onDeleteError(target: DeploymentTarget): Promise<void> {
    this.printAction("onDeleteError", target);
    await this.guard(`Unable to delete application ${this.name}`, () =>
      target.cluster.tools.helm.uninstall(this.helmReleaseName, target.environment.namespace),
    );
  }
}

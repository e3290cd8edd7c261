/**
 * @fileoverview Lifecycle contract shared by every deployable service.
 *
 * Exactly three kinds implement it: `Application`, `Database` and `Router`.
 * Each main hook (`onCreate`, `onPause`, `onDelete`) has a `Check` hook run
 * before any mutation and an `Error` hook run only when the main hook
 * failed. Upgrade, downgrade, backup, restore and clone are capabilities no
 * kind supports yet.
 *
 * @module Service
 * @since 1.0.0
 */

import { join } from "node:path";
import { EngineError, ExecutionError, NotImplementedError, rawMessage } from "../errors.ts";
import { Logger } from "../../logger.ts";
import type { EngineContext } from "../context.ts";
import type { LongTaskOwner } from "../progress/long-task.ts";
import type { ProgressBus } from "../progress/progress-bus.ts";
import type { ProgressLevel, ProgressScope } from "../progress/progress-types.ts";
import type { DeploymentTarget } from "../transaction/deployment-target.ts";
import type {
  Action,
  CapabilityAction,
  LifecycleAction,
  RenderContext,
  ServiceKind,
  Sizing,
} from "../../types/service-types.ts";

export type HookPhase = "check" | "run" | "error";

export interface Service extends LongTaskOwner {
  readonly kind: ServiceKind;
  /** Stable for the whole lifetime of the service */
  readonly id: string;
  readonly name: string;
  /** `<prefix>-<name>` with underscores replaced by dashes */
  readonly sanitizedName: string;
  readonly sizing: Readonly<Sizing>;
  readonly action: Action;
  readonly version: string;
  readonly privatePort: number | undefined;
  readonly selector: string;
  readonly helmReleaseName: string;

  isStateful(): boolean;
  /** Upper bound of the readiness wait after the service's chart is applied */
  startTimeoutInSeconds(): number;
  renderContext(target: DeploymentTarget): Promise<RenderContext>;

  onCreate(target: DeploymentTarget): Promise<void>;
  onCreateCheck(target: DeploymentTarget): Promise<void>;
  onCreateError(target: DeploymentTarget): Promise<void>;

  onPause(target: DeploymentTarget): Promise<void>;
  onPauseCheck(target: DeploymentTarget): Promise<void>;
  onPauseError(target: DeploymentTarget): Promise<void>;

  onDelete(target: DeploymentTarget): Promise<void>;
  onDeleteCheck(target: DeploymentTarget): Promise<void>;
  onDeleteError(target: DeploymentTarget): Promise<void>;

  /** Rejects with `NotImplementedError` for every kind. */
  runCapability(action: CapabilityAction, phase: HookPhase, target: DeploymentTarget): Promise<void>;
}

/**
 * Calls the check hook of a lifecycle action.
 */
export function runCheckHook(service: Service, action: LifecycleAction, target: DeploymentTarget): Promise<void> {
  switch (action) {
    case "create":
      return service.onCreateCheck(target);
    case "pause":
      return service.onPauseCheck(target);
    case "delete":
      return service.onDeleteCheck(target);
  }
}

/**
 * Calls the main hook of a lifecycle action. Only the long-task decorator
 * should reach this.
 */
export function runMainHook(service: Service, action: LifecycleAction, target: DeploymentTarget): Promise<void> {
  switch (action) {
    case "create":
      return service.onCreate(target);
    case "pause":
      return service.onPause(target);
    case "delete":
      return service.onDelete(target);
  }
}

export function runErrorHook(service: Service, action: LifecycleAction, target: DeploymentTarget): Promise<void> {
  switch (action) {
    case "create":
      return service.onCreateError(target);
    case "pause":
      return service.onPauseError(target);
    case "delete":
      return service.onDeleteError(target);
  }
}

export function sanitizeName(prefix: string, name: string): string {
  return `${prefix}-${name}`.replaceAll("_", "-");
}

/**
 * Truncates to `maxLength` characters; helm refuses longer release names.
 */
export function cut(value: string, maxLength = 50): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

export interface ServiceFields {
  id: string;
  name: string;
  action: Action;
  version: string;
  sizing: Sizing;
}

/**
 * Identity, sizing, logging and progress plumbing common to every kind.
 */
export abstract class BaseService implements Service {
  abstract readonly kind: ServiceKind;
  readonly id: string;
  readonly name: string;
  readonly action: Action;
  readonly version: string;
  readonly sizing: Readonly<Sizing>;

  protected constructor(protected readonly context: EngineContext, fields: ServiceFields) {
    this.id = fields.id;
    this.name = fields.name;
    this.action = fields.action;
    this.version = fields.version;
    this.sizing = Object.freeze({ ...fields.sizing });
  }

  /** Prefix of `sanitizedName` */
  protected abstract readonly namePrefix: string;
  /** Name used in hook logs ("Application", "PostgreSQL"...) */
  protected abstract readonly structName: string;

  abstract readonly privatePort: number | undefined;
  abstract readonly selector: string;
  abstract readonly helmReleaseName: string;

  abstract isStateful(): boolean;
  abstract startTimeoutInSeconds(): number;
  abstract renderContext(target: DeploymentTarget): Promise<RenderContext>;
  abstract onCreate(target: DeploymentTarget): Promise<void>;
  abstract onCreateError(target: DeploymentTarget): Promise<void>;
  abstract onPause(target: DeploymentTarget): Promise<void>;
  abstract onPauseError(target: DeploymentTarget): Promise<void>;
  abstract onDelete(target: DeploymentTarget): Promise<void>;
  abstract onDeleteError(target: DeploymentTarget): Promise<void>;

  get sanitizedName(): string {
    return sanitizeName(this.namePrefix, this.name);
  }

  get progress(): ProgressBus {
    return this.context.progress;
  }

  get executionId(): string {
    return this.context.executionId;
  }

  progressScope(): ProgressScope {
    return { kind: this.kind, id: this.id, name: this.name };
  }

  /**
   * `<workspaceRoot>/<executionId>/<kind>s/<id>`: never shared between two
   * executions.
   */
  workspaceDir(): string {
    return join(this.context.workspaceRootDir, `${this.kind}s`, this.id);
  }

  async onCreateCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateCheck", target);
  }

  async onPauseCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onPauseCheck", target);
  }

  async onDeleteCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onDeleteCheck", target);
  }

  async runCapability(action: CapabilityAction, phase: HookPhase, target: DeploymentTarget): Promise<void> {
    this.printAction(`on${capitalize(action)}${phase === "run" ? "" : capitalize(phase)}`, target);
    throw new NotImplementedError(`${capitalize(action)} is not supported for ${this.kind} ${this.name}`);
  }

  /**
   * Values every template can rely on.
   */
  protected defaultRenderContext(target: DeploymentTarget): RenderContext {
    const { cluster, environment } = target;
    return {
      ...cluster.provider.extra,
      id: this.id,
      name: this.name,
      sanitized_name: this.sanitizedName,
      version: this.version,
      execution_id: this.executionId,
      organization_id: environment.organizationId,
      project_id: environment.projectId,
      environment_id: environment.id,
      namespace: environment.namespace,
      cluster_id: cluster.id,
      cluster_name: cluster.name,
      region: cluster.region,
      cloud_provider: cluster.provider.shortName,
      storage_class_name: cluster.provider.storageClassName,
      total_cpus: this.sizing.totalCpus,
      cpu_burst: this.sizing.cpuBurst,
      total_ram_in_mib: this.sizing.totalRamInMib,
      min_instances: this.sizing.minInstances,
      max_instances: this.sizing.maxInstances,
      is_private_port: this.privatePort !== undefined,
      private_port: this.privatePort ?? null,
      selector: this.selector,
      start_timeout_in_seconds: this.startTimeoutInSeconds(),
    };
  }

  /**
   * Logs which hook runs; error hooks log as warnings.
   */
  protected printAction(hook: string, target?: DeploymentTarget): void {
    const provider = target === undefined ? "" : `${target.cluster.provider.shortName.toUpperCase()}.`;
    Logger.hook(`${provider}${this.hookScope(target)}`, hook, this.name);
  }

  protected hookScope(_target?: DeploymentTarget): string {
    return this.structName;
  }

  /**
   * Removes a release that never reached "deployed", otherwise rolls it
   * back to its previous revision.
   */
  protected async revertRelease(target: DeploymentTarget): Promise<void> {
    const { helm } = target.cluster.tools;
    const { namespace } = target.environment;

    await this.guard(`Unable to revert ${this.kind} ${this.name}`, async () => {
      const status = await helm.status(this.helmReleaseName, namespace);
      if (status.deployed) {
        await helm.rollback(this.helmReleaseName, namespace);
      } else {
        await helm.uninstall(this.helmReleaseName, namespace);
      }
    });
  }

  /**
   * Runs a collaborator call, turning command and unexpected failures into
   * an `ExecutionError` with `messageSafe`. Validation, execution and
   * other engine errors pass through.
   */
  protected async guard<T>(messageSafe: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (err) {
      if (err instanceof EngineError && err.tag !== "command") {
        throw err;
      }
      throw new ExecutionError(messageSafe, rawMessage(err));
    }
  }

  protected notify(level: ProgressLevel, message: string): void {
    this.progress.inProgress(this.progressScope(), level, message, this.executionId);
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * @fileoverview Batch of lifecycle operations committed as one unit.
 *
 * Steps are queued (`createKubernetes`, `deployEnvironment`,
 * `pauseEnvironment`, `deleteEnvironment`) and run by `commit()`, which
 * always resolves to exactly one `TransactionResult`:
 *
 * - every check hook of an environment runs before any main hook; a failing
 *   check ends the run as `unrecoverable` with nothing mutated
 * - a failing main hook triggers the error hooks of the failed service and
 *   of every service that already succeeded, newest first, and ends the run
 *   as `rollback`
 * - an environment queued with a failover is retried on the failover when
 *   the primary fails; when both fail the run is `unrecoverable`
 *
 * @module Transaction
 * @since 1.0.0
 */

import {
  CancelledError,
  EngineError,
  NotImplementedError,
  rawMessage,
  toEngineError,
} from "../errors.ts";
import { Logger } from "../../logger.ts";
import { sendProgressOnLongTask } from "../progress/long-task.ts";
import { runCheckHook, runErrorHook, runMainHook, type Service } from "../service/service.ts";
import { isLifecycleAction, type LifecycleAction } from "../../types/service-types.ts";
import { deploymentTargetFor, type DeploymentTarget } from "./deployment-target.ts";
import type { EngineContext } from "../context.ts";
import type { Cluster } from "./cluster.ts";
import type { Environment, EnvironmentAction } from "./environment.ts";

export type TransactionState = "pending" | "executing" | "committed" | "rolled-back" | "unrecoverable";

export type TransactionResult =
  | { kind: "ok" }
  | { kind: "rollback"; serviceId: string | undefined; cause: EngineError; compensationErrors: EngineError[] }
  | { kind: "unrecoverable"; serviceId: string | undefined; cause: EngineError };

type Step =
  | { kind: "create-kubernetes"; cluster: Cluster }
  | { kind: "environment"; action: LifecycleAction; cluster: Cluster; environmentAction: EnvironmentAction };

const transitions: Record<TransactionState, readonly TransactionState[]> = {
  pending: ["executing"],
  executing: ["committed", "rolled-back", "unrecoverable"],
  committed: [],
  "rolled-back": [],
  unrecoverable: [],
};

export interface TransactionOptions {
  /** Checked before every check hook and every main hook */
  signal?: AbortSignal;
}

/**
 * @example
 * ```typescript
 * const transaction = new Transaction(context)
 *   .createKubernetes(cluster)
 *   .deployEnvironment(cluster, { kind: "environment", environment });
 *
 * const result = await transaction.commit();
 * if (result.kind === "rollback") {
 *   Logger.error(result.cause.messageSafe);
 * }
 * ```
 *
 * @since 1.0.0
 */
export class Transaction {
  private readonly steps: Step[] = [];
  private currentState: TransactionState = "pending";
  private readonly signal: AbortSignal | undefined;

  constructor(private readonly context: EngineContext, options: TransactionOptions = {}) {
    this.signal = options.signal;
  }

  get state(): TransactionState {
    return this.currentState;
  }

  /** Installs the cluster's infrastructure charts unless already done. */
  createKubernetes(cluster: Cluster): this {
    return this.queue({ kind: "create-kubernetes", cluster });
  }

  deployEnvironment(cluster: Cluster, environmentAction: EnvironmentAction): this {
    return this.queue({ kind: "environment", action: "create", cluster, environmentAction });
  }

  pauseEnvironment(cluster: Cluster, environmentAction: EnvironmentAction): this {
    return this.queue({ kind: "environment", action: "pause", cluster, environmentAction });
  }

  deleteEnvironment(cluster: Cluster, environmentAction: EnvironmentAction): this {
    return this.queue({ kind: "environment", action: "delete", cluster, environmentAction });
  }

  /**
   * Runs every queued step in order. Can only be called once.
   */
  async commit(): Promise<TransactionResult> {
    this.transition("executing");

    for (const step of this.steps) {
      const result = step.kind === "create-kubernetes"
        ? await this.runCreateKubernetes(step.cluster)
        : await this.runEnvironmentAction(step.action, step.cluster, step.environmentAction);

      if (result.kind !== "ok") {
        this.transition(result.kind === "rollback" ? "rolled-back" : "unrecoverable");
        return result;
      }
    }

    this.transition("committed");
    return { kind: "ok" };
  }

  private queue(step: Step): this {
    if (this.currentState !== "pending") {
      throw new Error(`Cannot add a step to a transaction in state ${this.currentState}`);
    }
    this.steps.push(step);
    return this;
  }

  private transition(next: TransactionState): void {
    if (!transitions[this.currentState].includes(next)) {
      throw new Error(`Illegal transaction transition from ${this.currentState} to ${next}`);
    }
    this.currentState = next;
  }

  private async runCreateKubernetes(cluster: Cluster): Promise<TransactionResult> {
    if (this.signal?.aborted) {
      return { kind: "unrecoverable", serviceId: undefined, cause: new CancelledError() };
    }

    try {
      await cluster.bootstrap(this.context);
      return { kind: "ok" };
    } catch (err) {
      const cause = toEngineError(err, `Unable to bootstrap cluster ${cluster.name}`);
      this.logFailure(cause);
      return cause.tag === "unrecoverable"
        ? { kind: "unrecoverable", serviceId: undefined, cause }
        : { kind: "rollback", serviceId: undefined, cause, compensationErrors: [] };
    }
  }

  private async runEnvironmentAction(
    action: LifecycleAction,
    cluster: Cluster,
    environmentAction: EnvironmentAction,
  ): Promise<TransactionResult> {
    const primary = await this.runEnvironment(action, cluster, environmentAction.environment);
    if (primary.kind === "ok" || environmentAction.kind === "environment") {
      return primary;
    }
    if (primary.cause instanceof CancelledError) {
      return primary;
    }

    const { failover } = environmentAction;
    Logger.warning(`Environment ${environmentAction.environment.id} failed, trying failover environment ${failover.id}`);
    this.publishEnvironment(failover, "warn", `Primary environment failed, switching to failover ${failover.id}`);
    const secondary = await this.runEnvironment(action, cluster, failover);
    if (secondary.kind !== "rollback") {
      return secondary;
    }
    // Nothing is left to fall back on once the failover has been rolled back too.
    return { kind: "unrecoverable", serviceId: secondary.serviceId, cause: secondary.cause };
  }

  private async runEnvironment(
    action: LifecycleAction,
    cluster: Cluster,
    environment: Environment,
  ): Promise<TransactionResult> {
    if (!isLifecycleAction(environment.action)) {
      return {
        kind: "unrecoverable",
        serviceId: undefined,
        cause: new NotImplementedError(`${environment.action} is not supported for environment ${environment.id}`),
      };
    }

    const target = deploymentTargetFor(cluster, environment);
    const services = environment.servicesInOrder(action);
    Logger.info(`Running ${action} on environment ${environment.id} (${services.length} services)`);

    for (const service of services) {
      if (this.signal?.aborted) {
        return { kind: "unrecoverable", serviceId: service.id, cause: new CancelledError() };
      }
      try {
        await runCheckHook(service, action, target);
      } catch (err) {
        const cause = toEngineError(err, `Pre-flight check of ${service.kind} ${service.name} failed`);
        this.logFailure(cause);
        return { kind: "unrecoverable", serviceId: service.id, cause };
      }
    }

    if (action === "create" && services.length > 0) {
      try {
        await cluster.tools.kubectl.createNamespace(environment.namespace);
      } catch (err) {
        const cause = toEngineError(err, `Unable to create namespace ${environment.namespace}`);
        this.logFailure(cause);
        return { kind: "rollback", serviceId: undefined, cause, compensationErrors: [] };
      }
    }

    const succeeded: Service[] = [];
    for (const [index, service] of services.entries()) {
      if (this.signal?.aborted) {
        return { kind: "unrecoverable", serviceId: service.id, cause: new CancelledError() };
      }

      Logger.step(index + 1, services.length, `${action} ${service.kind} ${service.name}`);
      try {
        await sendProgressOnLongTask(service, action, () => runMainHook(service, action, target));
        succeeded.push(service);
      } catch (err) {
        const cause = toEngineError(err, `${service.kind} ${service.name} failed`);
        this.logFailure(cause);
        if (cause.tag === "unrecoverable") {
          return { kind: "unrecoverable", serviceId: service.id, cause };
        }
        const compensationErrors = await this.compensate([service, ...succeeded.reverse()], action, target);
        return { kind: "rollback", serviceId: service.id, cause, compensationErrors };
      }
    }

    if (action === "create") {
      for (const router of environment.routers) {
        await cluster.tools.prober.checkDomains(router.domains(), this.context.executionId);
      }
    }

    this.publishEnvironment(environment, "info", `Environment ${environment.id}: ${action} succeeded`);
    return { kind: "ok" };
  }

  /**
   * Runs error hooks in the given order. A failing hook does not stop the
   * others; its error is collected.
   */
  private async compensate(
    services: readonly Service[],
    action: LifecycleAction,
    target: DeploymentTarget,
  ): Promise<EngineError[]> {
    const failures: EngineError[] = [];
    for (const service of services) {
      try {
        await runErrorHook(service, action, target);
      } catch (err) {
        const failure = toEngineError(err, `Error hook of ${service.kind} ${service.name} failed`);
        Logger.warning(failure.messageSafe);
        Logger.debug(rawMessage(failure));
        failures.push(failure);
      }
    }
    return failures;
  }

  private publishEnvironment(environment: Environment, level: "info" | "warn", message: string): void {
    this.context.progress.inProgress(
      { kind: "environment", id: environment.id },
      level,
      message,
      this.context.executionId,
    );
  }

  private logFailure(cause: EngineError): void {
    Logger.error(cause.messageSafe);
    if (cause.messageRaw !== undefined) {
      Logger.debug(cause.messageRaw);
    }
  }
}

import { EngineError } from "../errors.ts";
import type { ProgressBus } from "./progress-bus.ts";
import type { ProgressScope } from "./progress-types.ts";
import type { LifecycleAction } from "../../types/service-types.ts";

/**
 * The minimum a long task needs to know about whoever runs it.
 */
export interface LongTaskOwner {
  readonly name: string;
  progressScope(): ProgressScope;
  readonly progress: ProgressBus;
  readonly executionId: string;
}

const actionLabels: Record<LifecycleAction, string> = {
  create: "Deployment",
  pause: "Pause",
  delete: "Deletion",
};

/**
 * Runs a long, blocking lifecycle call and brackets it with progress events:
 * "long task started" before, "succeeded" or "failed" after. The task's
 * outcome is returned or rethrown unchanged.
 *
 * Main lifecycle hooks are only ever invoked through this function.
 */
export async function sendProgressOnLongTask<T>(
  owner: LongTaskOwner,
  action: LifecycleAction,
  task: () => Promise<T>,
): Promise<T> {
  const scope = owner.progressScope();
  const label = actionLabels[action];

  owner.progress.publish({
    scope,
    level: "info",
    step: "long-task-started",
    action,
    message: `${label} of ${owner.name} is in progress...`,
    executionId: owner.executionId,
    timestamp: new Date(),
  });

  try {
    const result = await task();
    owner.progress.publish({
      scope,
      level: "info",
      step: "succeeded",
      action,
      message: `${label} of ${owner.name} succeeded`,
      executionId: owner.executionId,
      timestamp: new Date(),
    });
    return result;
  } catch (err) {
    owner.progress.publish({
      scope,
      level: "error",
      step: "failed",
      action,
      message: err instanceof EngineError
        ? `${label} of ${owner.name} failed: ${err.messageSafe}`
        : `${label} of ${owner.name} failed`,
      executionId: owner.executionId,
      timestamp: new Date(),
    });
    throw err;
  }
}

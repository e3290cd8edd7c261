/**
 * @fileoverview Pod diagnostics collected when a deployment fails.
 *
 * @module HealthChecker
 * @since 1.0.0
 */

import { describeError } from "../errors.ts";
import type { KubectlClient, PodStatus } from "../../kubernetes/kubectl.ts";

/**
 * Summarizes the pods behind a selector so a failed rollout says why it
 * failed. Never throws: a listing failure becomes part of the summary.
 *
 * @example
 * ```typescript
 * const checker = new PodHealthChecker(kubectl);
 * const report = await checker.diagnose("appId=app-1", "project-1-env-1");
 * // "pod web-6f7 is Pending (not ready, 3 restarts): CrashLoopBackOff"
 * ```
 *
 * @since 1.0.0
 */
export class PodHealthChecker {
  constructor(private readonly kubectl: KubectlClient) {}

  async diagnose(selector: string, namespace: string): Promise<string> {
    let pods: PodStatus[];
    try {
      pods = await this.kubectl.getPods(selector, namespace);
    } catch (err) {
      return `unable to list pods matching ${selector}: ${describeError(err)}`;
    }

    if (pods.length === 0) {
      return `no pod matches ${selector} in namespace ${namespace}`;
    }
    return pods.map(describePod).join("\n");
  }
}

export function describePod(pod: PodStatus): string {
  const readiness = pod.ready ? "ready" : "not ready";
  const restarts = `${pod.restarts} restart${pod.restarts === 1 ? "" : "s"}`;
  const line = `pod ${pod.name} is ${pod.phase} (${readiness}, ${restarts})`;
  return pod.reason === undefined ? line : `${line}: ${pod.reason}`;
}

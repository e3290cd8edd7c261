/**
 * @fileoverview Publish/subscribe channel for progress notifications.
 *
 * Publishing never waits on subscribers and never fails: a subscriber that
 * throws or rejects is reported through the logger and the publisher moves
 * on.
 *
 * @module ProgressBus
 * @since 1.0.0
 */

import { Logger } from "../../logger.ts";
import type { ProgressInfo, ProgressLevel, ProgressListener, ProgressScope } from "./progress-types.ts";

/**
 * Fan-out of progress events to every subscriber.
 *
 * @example
 * ```typescript
 * const bus = new ProgressBus();
 * const unsubscribe = bus.subscribe((event) => console.log(event.message));
 * bus.inProgress({ kind: "environment", id: "env-1" }, "info", "Deploying...", "exec-1");
 * unsubscribe();
 * ```
 *
 * @since 1.0.0
 */
export class ProgressBus {
  private listeners: Set<ProgressListener> = new Set();

  /**
   * Registers a listener and returns the function removing it.
   */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  publish(event: ProgressInfo): void {
    for (const listener of this.listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportListenerFailure(err));
        }
      } catch (err) {
        this.reportListenerFailure(err);
      }
    }
  }

  /**
   * Shorthand for an "in progress" event.
   */
  inProgress(scope: ProgressScope, level: ProgressLevel, message: string, executionId: string): void {
    this.publish({
      scope,
      level,
      step: "in-progress",
      message,
      executionId,
      timestamp: new Date(),
    });
  }

  private reportListenerFailure(err: unknown): void {
    Logger.warning(`Progress listener failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * @fileoverview Per-execution context shared by every service of one run.
 *
 * @module EngineContext
 * @since 1.0.0
 */

import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { ProgressBus } from "./progress/progress-bus.ts";
import { systemClock, type Clock } from "./retry/clock.ts";
import type { EngineConfig } from "../types/config-types.ts";

/**
 * Everything a lifecycle hook needs besides its deployment target: the
 * execution id (isolation key of the run), directories, timing settings,
 * the progress channel and the clock.
 *
 * Two contexts never share an execution id, so two runs never share a
 * workspace directory.
 *
 * @since 1.0.0
 */
export class EngineContext {
  readonly executionId: string;
  readonly progress: ProgressBus;
  readonly clock: Clock;

  constructor(
    readonly config: EngineConfig,
    options: { executionId?: string; progress?: ProgressBus; clock?: Clock } = {},
  ) {
    this.executionId = options.executionId ?? randomUUID();
    this.progress = options.progress ?? new ProgressBus();
    this.clock = options.clock ?? systemClock;
  }

  get libRootDir(): string {
    return this.config.libRootDir;
  }

  get isTestCluster(): boolean {
    return this.config.testCluster;
  }

  /**
   * Workspace of this execution: `<workspaceRoot>/<executionId>`.
   */
  get workspaceRootDir(): string {
    return join(this.config.workspaceRootDir, this.executionId);
  }
}

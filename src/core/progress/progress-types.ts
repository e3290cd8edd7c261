/**
 * @fileoverview Progress event type definitions.
 *
 * @module ProgressTypes
 * @since 1.0.0
 */

import type { Action } from "../../types/service-types.ts";

/**
 * What an event is about.
 */
export type ProgressScope =
  | { kind: "infrastructure"; id: string }
  | { kind: "environment"; id: string }
  | { kind: "application"; id: string; name: string }
  | { kind: "database"; id: string; name: string }
  | { kind: "router"; id: string; name: string };

export type ProgressLevel = "info" | "warn" | "error";

/**
 * Where the reported operation stands.
 */
export type ProgressStep = "in-progress" | "long-task-started" | "succeeded" | "failed";

export interface ProgressInfo {
  scope: ProgressScope;
  level: ProgressLevel;
  step: ProgressStep;
  /** Safe, user-facing text. Raw diagnostics never travel in events. */
  message?: string;
  action?: Action;
  executionId: string;
  timestamp: Date;
}

/**
 * Subscriber callback. Whatever it returns or throws is ignored by the
 * publisher.
 */
export type ProgressListener = (event: ProgressInfo) => void | Promise<void>;

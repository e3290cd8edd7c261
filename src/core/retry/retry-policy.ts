/**
 * @fileoverview Bounded retry policies and the generic polling loop.
 *
 * The policy (how many attempts, how long between them) is kept apart from
 * the probe (the side-effecting call) and the predicate (whether the probe's
 * value is the one we wait for), so each can be swapped independently.
 *
 * @module RetryPolicy
 * @since 1.0.0
 */

import { systemClock, type Clock } from "./clock.ts";

/**
 * Attempt budget plus the delay slept between two attempts.
 *
 * @example
 * ```typescript
 * // 30 attempts, 5 seconds apart
 * const policy = RetryPolicy.fixed(5000, 30);
 *
 * // 4 attempts: wait 1s, then 2s, then 4s between them
 * const custom = RetryPolicy.custom([1000, 2000, 4000]);
 * ```
 *
 * @since 1.0.0
 */
export class RetryPolicy {
  private constructor(
    readonly maxAttempts: number,
    private readonly schedule: (attempt: number) => number,
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`A retry policy needs at least one attempt, got ${maxAttempts}`);
    }
  }

  /**
   * Same delay between every attempt.
   *
   * @param delayMs - Delay slept after a failed attempt
   * @param maxAttempts - Total number of attempts, the first one included
   */
  static fixed(delayMs: number, maxAttempts: number): RetryPolicy {
    return new RetryPolicy(maxAttempts, () => delayMs);
  }

  /**
   * Explicit delay list; the budget is one attempt more than there are delays.
   */
  static custom(delaysMs: readonly number[]): RetryPolicy {
    const delays = [...delaysMs];
    return new RetryPolicy(delays.length + 1, (attempt) => delays[attempt - 1] ?? 0);
  }

  /**
   * Delay multiplied by `factor` after each attempt and capped at `maxDelayMs`.
   */
  static exponential(initialDelayMs: number, factor: number, maxDelayMs: number, maxAttempts: number): RetryPolicy {
    return new RetryPolicy(maxAttempts, (attempt) =>
      Math.min(initialDelayMs * Math.pow(factor, attempt - 1), maxDelayMs),
    );
  }

  /**
   * Delay to sleep after the given (1-based) failed attempt.
   */
  delayAfter(attempt: number): number {
    return this.schedule(attempt);
  }

  /**
   * Sum of every delay the policy can sleep, i.e. its wall-clock budget.
   */
  totalDelayMs(): number {
    let total = 0;
    for (let attempt = 1; attempt < this.maxAttempts; attempt++) {
      total += this.delayAfter(attempt);
    }
    return total;
  }
}

/**
 * Why a single attempt did not succeed.
 */
export type AttemptFailure<T> =
  | { reason: "error"; error: unknown }
  | { reason: "rejected"; value: T };

export interface PollOptions<T> {
  policy: RetryPolicy;
  /** Side-effecting call made once per attempt; `attempt` starts at 1. */
  probe: (attempt: number) => Promise<T>;
  /** Accepts or rejects the probe's value. Every value is accepted by default. */
  predicate?: (value: T) => boolean;
  /** Called after each failed attempt that will be retried. */
  onRetry?: (attempt: number, failure: AttemptFailure<T>) => void;
  clock?: Clock;
}

export type PollOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastFailure: AttemptFailure<T> };

/**
 * Calls `probe` until `predicate` accepts its value or the policy's attempt
 * budget is exhausted. Attempts are strictly sequential; the delay is only
 * slept between two attempts, never after the last one.
 *
 * @example
 * ```typescript
 * const outcome = await pollUntil({
 *   policy: RetryPolicy.fixed(3000, 100),
 *   probe: () => kubectl.getPods("app=web", "prod"),
 *   predicate: (pods) => pods.every((pod) => pod.ready),
 * });
 * if (!outcome.ok) {
 *   Logger.warning(`Pods not ready after ${outcome.attempts} attempts`);
 * }
 * ```
 *
 * @since 1.0.0
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<PollOutcome<T>> {
  const { policy, probe, onRetry } = options;
  const predicate = options.predicate ?? (() => true);
  const clock = options.clock ?? systemClock;

  let lastFailure: AttemptFailure<T> = { reason: "error", error: new Error("No attempt was made") };

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await probe(attempt);
      if (predicate(value)) {
        return { ok: true, value, attempts: attempt };
      }
      lastFailure = { reason: "rejected", value };
    } catch (error) {
      lastFailure = { reason: "error", error };
    }

    if (attempt < policy.maxAttempts) {
      onRetry?.(attempt, lastFailure);
      await clock.sleep(policy.delayAfter(attempt));
    }
  }

  return { ok: false, attempts: policy.maxAttempts, lastFailure };
}

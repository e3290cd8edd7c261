import { test } from "node:test";
import assert from "node:assert/strict";
import { ResourcePool, RetryPolicy, pollUntil } from "../src/core/retry/index.ts";
import { FakeClock } from "./helpers/fakes.ts";

test("RetryPolicy - fixed policy budget", () => {
  const policy = RetryPolicy.fixed(5000, 30);
  assert.equal(policy.maxAttempts, 30);
  assert.equal(policy.delayAfter(1), 5000);
  assert.equal(policy.delayAfter(29), 5000);
  assert.equal(policy.totalDelayMs(), 145000);
});

test("RetryPolicy - custom schedule has one attempt more than delays", () => {
  const policy = RetryPolicy.custom([1000, 2000, 4000]);
  assert.equal(policy.maxAttempts, 4);
  assert.equal(policy.delayAfter(2), 2000);
  assert.equal(policy.totalDelayMs(), 7000);
});

test("RetryPolicy - exponential delays are capped", () => {
  const policy = RetryPolicy.exponential(1000, 2, 3000, 4);
  assert.deepEqual([1, 2, 3].map((attempt) => policy.delayAfter(attempt)), [1000, 2000, 3000]);
});

test("RetryPolicy - rejects an empty budget", () => {
  assert.throws(() => RetryPolicy.fixed(1000, 0), /at least one attempt/);
});

test("pollUntil - returns the first accepted value", async () => {
  const clock = new FakeClock();
  const values = ["", "", "target.example.net"];
  const retries: number[] = [];

  const outcome = await pollUntil({
    policy: RetryPolicy.fixed(3000, 10),
    probe: async (attempt) => values[attempt - 1] ?? "",
    predicate: (value) => value !== "",
    onRetry: (attempt) => retries.push(attempt),
    clock,
  });

  assert.deepEqual(outcome, { ok: true, value: "target.example.net", attempts: 3 });
  assert.deepEqual(retries, [1, 2]);
  assert.deepEqual(clock.sleeps, [3000, 3000]);
});

test("pollUntil - never sleeps after the last attempt", async () => {
  const clock = new FakeClock();
  let calls = 0;

  const outcome = await pollUntil({
    policy: RetryPolicy.fixed(5000, 3),
    probe: async () => {
      calls++;
      throw new Error("unreachable");
    },
    clock,
  });

  assert.equal(calls, 3);
  assert.equal(clock.elapsed, 10000);
  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.attempts, 3);
    assert.equal(outcome.lastFailure.reason, "error");
  }
});

test("pollUntil - keeps the last rejected value", async () => {
  const outcome = await pollUntil({
    policy: RetryPolicy.fixed(1, 2),
    probe: async (attempt) => attempt,
    predicate: (value) => value > 5,
    clock: new FakeClock(),
  });

  assert.deepEqual(outcome, { ok: false, attempts: 2, lastFailure: { reason: "rejected", value: 2 } });
});

test("ResourcePool - hands out resources round-robin", () => {
  const pool = new ResourcePool(["google", "cloudflare", "quad9"]);
  const picked = Array.from({ length: 7 }, () => pool.next());
  assert.deepEqual(picked, ["google", "cloudflare", "quad9", "google", "cloudflare", "quad9", "google"]);

  pool.reset();
  assert.equal(pool.next(), "google");
  assert.equal(pool.size, 3);
});

test("ResourcePool - refuses an empty pool", () => {
  assert.throws(() => new ResourcePool([]), /at least one resource/);
});

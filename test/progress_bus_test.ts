import { test } from "node:test";
import assert from "node:assert/strict";
import { ProgressBus, sendProgressOnLongTask, type LongTaskOwner } from "../src/core/progress/index.ts";
import { ExecutionError } from "../src/core/errors.ts";
import type { ProgressInfo } from "../src/core/progress/progress-types.ts";

function owner(progress: ProgressBus): LongTaskOwner {
  return {
    name: "web",
    progress,
    executionId: "exec-1",
    progressScope: () => ({ kind: "application", id: "app-1", name: "web" }),
  };
}

test("ProgressBus - delivers events to every subscriber", () => {
  const bus = new ProgressBus();
  const first: string[] = [];
  const second: string[] = [];
  bus.subscribe((event) => {
    first.push(event.message ?? "");
  });
  bus.subscribe((event) => {
    second.push(event.message ?? "");
  });

  bus.inProgress({ kind: "environment", id: "env-1" }, "info", "Deploying...", "exec-1");

  assert.deepEqual(first, ["Deploying..."]);
  assert.deepEqual(second, ["Deploying..."]);
});

test("ProgressBus - a throwing subscriber does not stop the others", () => {
  const bus = new ProgressBus();
  const received: ProgressInfo[] = [];
  bus.subscribe(() => {
    throw new Error("listener crashed");
  });
  bus.subscribe(async () => {
    throw new Error("async listener crashed");
  });
  bus.subscribe((event) => {
    received.push(event);
  });

  assert.doesNotThrow(() => bus.inProgress({ kind: "environment", id: "env-1" }, "warn", "Slow", "exec-1"));
  assert.equal(received.length, 1);
  assert.equal(received[0].level, "warn");
  assert.equal(received[0].step, "in-progress");
});

test("ProgressBus - unsubscribe removes the listener", () => {
  const bus = new ProgressBus();
  let calls = 0;
  const unsubscribe = bus.subscribe(() => {
    calls++;
  });
  assert.equal(bus.listenerCount, 1);

  unsubscribe();
  bus.inProgress({ kind: "environment", id: "env-1" }, "info", "ignored", "exec-1");

  assert.equal(calls, 0);
  assert.equal(bus.listenerCount, 0);
});

test("sendProgressOnLongTask - brackets a successful task", async () => {
  const bus = new ProgressBus();
  const events: ProgressInfo[] = [];
  bus.subscribe((event) => {
    events.push(event);
  });

  const result = await sendProgressOnLongTask(owner(bus), "create", async () => 42);

  assert.equal(result, 42);
  assert.deepEqual(events.map((event) => [event.step, event.message]), [
    ["long-task-started", "Deployment of web is in progress..."],
    ["succeeded", "Deployment of web succeeded"],
  ]);
  assert.equal(events[1].action, "create");
});

test("sendProgressOnLongTask - reports and rethrows a failure", async () => {
  const bus = new ProgressBus();
  const events: ProgressInfo[] = [];
  bus.subscribe((event) => {
    events.push(event);
  });
  const failure = new ExecutionError("helm upgrade timed out", "raw helm output");

  await assert.rejects(
    sendProgressOnLongTask(owner(bus), "delete", () => Promise.reject(failure)),
    (err) => err === failure,
  );

  assert.equal(events.length, 2);
  assert.equal(events[1].step, "failed");
  assert.equal(events[1].level, "error");
  assert.equal(events[1].message, "Deletion of web failed: helm upgrade timed out");
});

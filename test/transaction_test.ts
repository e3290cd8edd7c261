import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  CancelledError,
  ExecutionError,
  NotImplementedError,
  UnrecoverableError,
  ValidationError,
} from "../src/core/errors.ts";
import { Transaction } from "../src/core/transaction/transaction.ts";
import { makeApplication, makeDatabase, makeEnvironment, makeRouter } from "./helpers/builders.ts";
import { testCluster, testContext } from "./helpers/fakes.ts";
import type { EngineContext } from "../src/core/context.ts";
import type { ReadinessProber } from "../src/core/dns/readiness-prober.ts";
import type { Environment, EnvironmentFields } from "../src/core/transaction/environment.ts";

const namespace = "project-1-env-1";

function setup(options: { infraConfigFile?: string } = {}) {
  const harness = testContext();
  const tools = testCluster(harness, {
    infraConfigFile: options.infraConfigFile,
    answers: { "A main.env-1.example.net": ["10.0.0.1"] },
  });
  return { ...harness, ...tools };
}

/**
 * One database, one application and one router without custom domains.
 */
function fullEnvironment(
  context: EngineContext,
  prober: ReadinessProber,
  overrides: Partial<EnvironmentFields> = {},
): Environment {
  return makeEnvironment({
    databases: [makeDatabase(context)],
    applications: [makeApplication(context)],
    routers: [makeRouter(context, prober, { name: "edge", customDomains: [] })],
    ...overrides,
  });
}

async function withInfraFile(fn: (path: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "transaction-"));
  try {
    const path = join(dir, "infra.json");
    await writeFile(path, JSON.stringify({
      loki_storage_config_access_id: "test-access-id",
      loki_storage_config_secret_key: "test-secret",
      loki_storage_config_region: "fra1",
      loki_storage_config_host: "https://storage.example.net",
      loki_storage_config_bucket_name: "loki-bucket",
    }), "utf8");
    await fn(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("Transaction - deploys databases, applications, then routers", async () => {
  const { context, cluster, helm, kubectl, resolver, events } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);

  const transaction = new Transaction(context).deployEnvironment(cluster, { kind: "environment", environment });
  const result = await transaction.commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.equal(transaction.state, "committed");
  assert.deepEqual(kubectl.calls, [`create namespace ${namespace}`]);
  assert.deepEqual(helm.calls, ["upgrade postgresql-db-1", "upgrade application-web-app-1", "upgrade router-router-1"]);
  assert.deepEqual(resolver.queries, ["A main.env-1.example.net"]);
  assert.deepEqual(
    events.filter((event) => event.step === "long-task-started").map((event) => event.message),
    ["Deployment of main is in progress...", "Deployment of web is in progress...", "Deployment of edge is in progress..."],
  );
  assert.equal(events.at(-1)?.message, "Environment env-1: create succeeded");
});

test("Transaction - a failing check mutates nothing", async () => {
  const { context, cluster, helm, kubectl } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober, {
    databases: [makeDatabase(context, { version: "9" })],
  });

  const transaction = new Transaction(context).deployEnvironment(cluster, { kind: "environment", environment });
  const result = await transaction.commit();

  assert.equal(result.kind, "unrecoverable");
  assert.ok(result.kind === "unrecoverable" && result.cause instanceof ValidationError);
  assert.equal(result.serviceId, "db-1");
  assert.equal(transaction.state, "unrecoverable");
  assert.deepEqual(helm.calls, []);
  assert.deepEqual(kubectl.calls, []);
});

test("Transaction - a failing hook reverts it and every earlier service, newest first", async () => {
  const { context, cluster, helm, kubectl } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);
  helm.failingUpgrades.add("application-web-app-1");

  const transaction = new Transaction(context).deployEnvironment(cluster, { kind: "environment", environment });
  const result = await transaction.commit();

  assert.equal(result.kind, "rollback");
  assert.ok(result.kind === "rollback");
  assert.ok(result.cause instanceof ExecutionError);
  assert.equal(result.serviceId, "app-1");
  assert.equal(result.cause.messageSafe, "Application web has failed to start");
  assert.deepEqual(result.compensationErrors, []);
  assert.equal(transaction.state, "rolled-back");
  assert.deepEqual(helm.calls, [
    "upgrade postgresql-db-1",
    "upgrade application-web-app-1",
    "status application-web-app-1",
    `uninstall application-web-app-1 ${namespace}`,
  ]);
  assert.deepEqual(kubectl.calls, [`create namespace ${namespace}`, "get pods appId=app-1"]);
});

test("Transaction - failing error hooks are collected", async () => {
  const { context, cluster, helm } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);
  helm.failingUpgrades.add("application-web-app-1");
  helm.failingUninstalls.add("application-web-app-1");

  const result = await new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment", environment })
    .commit();

  assert.ok(result.kind === "rollback");
  assert.deepEqual(result.compensationErrors.map((err) => err.messageSafe), ["Unable to revert application web"]);
});

test("Transaction - switches to the failover environment", async () => {
  const { context, cluster, helm, events } = setup();
  const primary = makeEnvironment({ applications: [makeApplication(context)] });
  const failover = makeEnvironment({
    id: "env-2",
    namespace: "project-1-env-2",
    applications: [makeApplication(context, { id: "app-9" })],
  });
  helm.failingUpgrades.add("application-web-app-1");

  const result = await new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment-with-failover", environment: primary, failover })
    .commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.ok(helm.calls.includes("upgrade application-web-app-9"));
  const switchEvent = events.find((event) => event.level === "warn");
  assert.deepEqual(switchEvent?.scope, { kind: "environment", id: "env-2" });
  assert.equal(switchEvent?.message, "Primary environment failed, switching to failover env-2");
});

test("Transaction - a failed primary check also switches to the failover", async () => {
  const { context, cluster, helm } = setup();
  const primary = makeEnvironment({ databases: [makeDatabase(context, { version: "9" })] });
  const failover = makeEnvironment({
    id: "env-2",
    namespace: "project-1-env-2",
    databases: [makeDatabase(context, { id: "db-2" })],
  });

  const result = await new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment-with-failover", environment: primary, failover })
    .commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.deepEqual(helm.calls, ["upgrade postgresql-db-2"]);
});

test("Transaction - primary and failover both failing is unrecoverable", async () => {
  const { context, cluster, helm } = setup();
  const primary = makeEnvironment({ applications: [makeApplication(context)] });
  const failover = makeEnvironment({
    id: "env-2",
    namespace: "project-1-env-2",
    applications: [makeApplication(context, { id: "app-9" })],
  });
  helm.failingUpgrades.add("application-web-app-1");
  helm.failingUpgrades.add("application-web-app-9");

  const transaction = new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment-with-failover", environment: primary, failover });
  const result = await transaction.commit();

  assert.ok(result.kind === "unrecoverable");
  assert.equal(result.serviceId, "app-9");
  assert.equal(result.cause.messageSafe, "Application web has failed to start");
  assert.equal(transaction.state, "unrecoverable");
});

test("Transaction - cancellation stops before the next hook", async () => {
  const { context, cluster, helm, kubectl } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);
  const controller = new AbortController();
  controller.abort();

  const result = await new Transaction(context, { signal: controller.signal })
    .deployEnvironment(cluster, { kind: "environment", environment })
    .commit();

  assert.ok(result.kind === "unrecoverable");
  assert.ok(result.cause instanceof CancelledError);
  assert.equal(result.cause.messageSafe, "Operation has been cancelled");
  assert.equal(result.serviceId, "db-1");
  assert.deepEqual(helm.calls, []);
  assert.deepEqual(kubectl.calls, []);
});

test("Transaction - cancellation does not trigger the failover", async () => {
  const { context, cluster, helm } = setup();
  const primary = makeEnvironment({ applications: [makeApplication(context)] });
  const failover = makeEnvironment({ id: "env-2", applications: [makeApplication(context, { id: "app-9" })] });
  const controller = new AbortController();
  controller.abort();

  const result = await new Transaction(context, { signal: controller.signal })
    .deployEnvironment(cluster, { kind: "environment-with-failover", environment: primary, failover })
    .commit();

  assert.ok(result.kind === "unrecoverable");
  assert.ok(result.cause instanceof CancelledError);
  assert.deepEqual(helm.calls, []);
});

test("Transaction - capability actions are not implemented", async () => {
  const { context, cluster } = setup();
  const environment = makeEnvironment({ action: "backup", applications: [makeApplication(context)] });

  const result = await new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment", environment })
    .commit();

  assert.ok(result.kind === "unrecoverable");
  assert.ok(result.cause instanceof NotImplementedError);
  assert.equal(result.cause.messageSafe, "backup is not supported for environment env-1");
  assert.equal(result.serviceId, undefined);
});

test("Transaction - pause goes routers, applications, databases", async () => {
  const { context, cluster, kubectl, helm } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);

  const result = await new Transaction(context)
    .pauseEnvironment(cluster, { kind: "environment", environment })
    .commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.deepEqual(kubectl.calls, [
    `scale deployment appId=app-1 ${namespace} 0`,
    `scale statefulset app=postgresql-main ${namespace} 0`,
  ]);
  assert.deepEqual(helm.calls, []);
});

test("Transaction - delete goes routers, applications, databases", async () => {
  const { context, cluster, helm } = setup();
  const environment = fullEnvironment(context, cluster.tools.prober);

  const result = await new Transaction(context)
    .deleteEnvironment(cluster, { kind: "environment", environment })
    .commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.deepEqual(helm.calls, [
    `uninstall router-router-1 ${namespace}`,
    `uninstall application-web-app-1 ${namespace}`,
    `uninstall postgresql-db-1 ${namespace}`,
  ]);
});

test("Transaction - commits once and takes no step afterwards", async () => {
  const { context, cluster } = setup();
  const environment = makeEnvironment();
  const transaction = new Transaction(context).deployEnvironment(cluster, { kind: "environment", environment });

  assert.equal(transaction.state, "pending");
  assert.deepEqual(await transaction.commit(), { kind: "ok" });

  await assert.rejects(transaction.commit(), { message: "Illegal transaction transition from committed to executing" });
  assert.throws(
    () => transaction.deployEnvironment(cluster, { kind: "environment", environment }),
    { message: "Cannot add a step to a transaction in state committed" },
  );
});

test("Transaction - an empty environment creates no namespace", async () => {
  const { context, cluster, kubectl } = setup();

  const result = await new Transaction(context)
    .deployEnvironment(cluster, { kind: "environment", environment: makeEnvironment() })
    .commit();

  assert.deepEqual(result, { kind: "ok" });
  assert.deepEqual(kubectl.calls, []);
});

test("Transaction - bootstrap without infrastructure outputs is unrecoverable", async () => {
  const { context, cluster, helm } = setup();

  const result = await new Transaction(context).createKubernetes(cluster).commit();

  assert.ok(result.kind === "unrecoverable");
  assert.ok(result.cause instanceof UnrecoverableError);
  assert.equal(result.serviceId, undefined);
  assert.deepEqual(helm.calls, []);
});

test("Transaction - bootstraps a cluster only once", async () => {
  await withInfraFile(async (path) => {
    const { context, cluster, helm } = setup({ infraConfigFile: path });

    assert.deepEqual(await new Transaction(context).createKubernetes(cluster).commit(), { kind: "ok" });
    assert.equal(cluster.isBootstrapped, true);
    assert.equal(helm.upgrades.length, 17);

    assert.deepEqual(await new Transaction(context).createKubernetes(cluster).commit(), { kind: "ok" });
    assert.equal(helm.upgrades.length, 17);
  });
});

test("Transaction - a failing chart rolls the bootstrap back", async () => {
  await withInfraFile(async (path) => {
    const { context, cluster, helm } = setup({ infraConfigFile: path });
    helm.failingUpgrades.add("coredns");

    const result = await new Transaction(context).createKubernetes(cluster).commit();

    assert.ok(result.kind === "rollback");
    assert.equal(result.cause.messageSafe, "Error while deploying chart coredns");
    assert.deepEqual(result.compensationErrors, []);
    assert.deepEqual(helm.calls, ["upgrade q-storageclass", "upgrade coredns"]);
    assert.equal(cluster.isBootstrapped, false);
  });
});

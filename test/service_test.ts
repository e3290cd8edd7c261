import { test } from "node:test";
import assert from "node:assert/strict";
import { ExecutionError, NotImplementedError, ValidationError } from "../src/core/errors.ts";
import { domainHash, ACME_STAGING_URL } from "../src/core/service/router.ts";
import { describePod } from "../src/core/service/health-checker.ts";
import { cut, sanitizeName } from "../src/core/service/service.ts";
import { deploymentTargetFor } from "../src/core/transaction/deployment-target.ts";
import { makeApplication, makeDatabase, makeEnvironment, makeRouter } from "./helpers/builders.ts";
import { testCluster, testConfig, testContext, testSizing } from "./helpers/fakes.ts";
import type { Application } from "../src/core/service/application.ts";
import type { EnvironmentFields } from "../src/core/transaction/environment.ts";

function setup(applications: Application[] = [], overrides: Partial<EnvironmentFields> = {}) {
  const harness = testContext();
  const tools = testCluster(harness, {
    answers: { "CNAME www.example.com": ["main.env-1.example.net."] },
  });
  const environment = makeEnvironment({ applications, ...overrides });
  const target = deploymentTargetFor(tools.cluster, environment);
  return { ...harness, ...tools, environment, target };
}

test("sanitizeName - prefixes and replaces underscores", () => {
  assert.equal(sanitizeName("app", "my_web_app"), "app-my-web-app");
});

test("cut - truncates to 50 characters by default", () => {
  assert.equal(cut("a".repeat(60)).length, 50);
  assert.equal(cut("short"), "short");
});

test("describePod - summarizes phase, readiness and restarts", () => {
  assert.equal(
    describePod({ name: "web-1", phase: "Running", ready: true, restarts: 1 }),
    "pod web-1 is Running (ready, 1 restart)",
  );
  assert.equal(
    describePod({ name: "web-2", phase: "Pending", ready: false, restarts: 3, reason: "CrashLoopBackOff" }),
    "pod web-2 is Pending (not ready, 3 restarts): CrashLoopBackOff",
  );
});

test("Application - naming, selector and private port", () => {
  const { context } = testContext();
  const app = makeApplication(context, { name: "my_web" });

  assert.equal(app.sanitizedName, "app-my-web");
  assert.equal(app.helmReleaseName, "application-my_web-app-1");
  assert.equal(app.selector, "appId=app-1");
  assert.equal(app.privatePort, 8080);
  assert.equal(app.version, "1.0.0");
  assert.equal(app.isStateful(), false);
  assert.equal(Object.isFrozen(app.sizing), true);
});

test("Application - start timeout is (base + 10) * 4", () => {
  const { context } = testContext();
  assert.equal(makeApplication(context).startTimeoutInSeconds(), 1240);
  assert.equal(makeApplication(context, { startTimeoutInSeconds: 20 }).startTimeoutInSeconds(), 120);
});

test("Application - release name is capped at 50 characters", () => {
  const { context } = testContext();
  const app = makeApplication(context, { name: "n".repeat(60) });
  assert.equal(app.helmReleaseName, `application-${"n".repeat(38)}`);
});

test("Application - render context", async () => {
  const { context } = testContext();
  const app = makeApplication(context);
  const { target } = setup([app]);

  const values = await app.renderContext(target);

  assert.equal(values.helm_app_version, "a1b2c3d");
  assert.equal(values.image_name_with_tag, "registry.local/web:1.0.0");
  assert.equal(values.cpu_burst, "1");
  assert.deepEqual(values.environment_variables, [{ key: "GREETING", value: "dmFsdWU=" }]);
  assert.deepEqual(values.ports, [
    { port: 9090, name: "p9090", publicly_accessible: false },
    { port: 8080, name: "p8080", publicly_accessible: true },
  ]);
  assert.equal(values.is_registry_secret, true);
  assert.equal(values.registry_secret, "registry-credentials");
  assert.equal(values.is_storage, false);
  assert.equal(values.namespace, "project-1-env-1");
  assert.equal(values.cloud_provider, "do");
  assert.equal(values.do_space_bucket, "test-bucket");
  assert.equal(values.private_port, 8080);
  assert.equal(values.execution_id, "exec-1");
});

test("Application - image without registry has no prefix", async () => {
  const { context } = testContext();
  const app = makeApplication(context, {
    image: { name: "web", tag: "2.0.0", registryUrl: "", commitId: "a1b2c3d4e5" },
  });
  const { target } = setup([app]);

  const values = await app.renderContext(target);
  assert.equal(values.image_name_with_tag, "web:2.0.0");
});

test("Application - burst below request is raised with a warning", async () => {
  const { context, events } = testContext();
  const app = makeApplication(context, { sizing: testSizing({ totalCpus: "1", cpuBurst: "500m" }) });
  const { target } = setup([app]);

  const values = await app.renderContext(target);

  assert.equal(values.cpu_burst, "1");
  assert.deepEqual(
    events.map((event) => [event.level, event.message]),
    [["warn", "CPU burst 500m is lower than the CPU request 1, using 1 as CPU limit"]],
  );
});

test("Application - onCreateCheck rejects an invalid CPU quantity", async () => {
  const { context } = testContext();
  const app = makeApplication(context, { sizing: testSizing({ totalCpus: "lots" }) });

  await assert.rejects(app.onCreateCheck(setup().target), ValidationError);
});

test("Application - onCreate renders the chart then upgrades the release", async () => {
  const { target, renderer, helm } = setup();
  const app = makeApplication(testContext().context);

  await app.onCreate(target);

  assert.equal(renderer.renders.length, 1);
  assert.equal(renderer.renders[0].templateDir, "/lib/common/charts/application");
  assert.equal(renderer.renders[0].outputDir, "/workspace/exec-1/applications/app-1/chart");
  assert.equal(helm.upgrades.length, 1);
  assert.equal(helm.upgrades[0].chart.name, "application-web-app-1");
  assert.equal(helm.upgrades[0].chart.namespace, "project-1-env-1");
  assert.deepEqual(helm.upgrades[0].options, { wait: true, timeoutInSeconds: 1240 });
});

test("Application - failed rollout carries pod diagnostics", async () => {
  const { target, helm, kubectl } = setup();
  const app = makeApplication(testContext().context);
  helm.failingUpgrades.add("application-web-app-1");
  kubectl.pods = [{ name: "web-1", phase: "Pending", ready: false, restarts: 3, reason: "CrashLoopBackOff" }];

  await assert.rejects(app.onCreate(target), (err: unknown) => {
    assert.ok(err instanceof ExecutionError);
    assert.equal(err.messageSafe, "Application web has failed to start");
    assert.equal(
      err.messageRaw,
      "release application-web-app-1: timed out\npod web-1 is Pending (not ready, 3 restarts): CrashLoopBackOff",
    );
    return true;
  });
  assert.ok(kubectl.calls.includes("get pods appId=app-1"));
});

test("Application - onCreateError uninstalls a release that never deployed", async () => {
  const { target, helm } = setup();
  const app = makeApplication(testContext().context);

  await app.onCreateError(target);

  assert.deepEqual(helm.calls, ["status application-web-app-1", "uninstall application-web-app-1 project-1-env-1"]);
});

test("Application - onCreateError rolls back a deployed release", async () => {
  const { target, helm } = setup();
  const app = makeApplication(testContext().context);
  helm.statuses.set("application-web-app-1", { exists: true, deployed: true });

  await app.onCreateError(target);

  assert.deepEqual(helm.calls, ["status application-web-app-1", "rollback application-web-app-1 project-1-env-1"]);
});

test("Application - pause scales the deployment, or the statefulset with storage", async () => {
  const { target, kubectl } = setup();
  const { context } = testContext();
  const stateless = makeApplication(context);
  const stateful = makeApplication(context, {
    id: "app-2",
    storage: [{ id: "s1", name: "data", sizeInGib: 5, mountPoint: "/data", snapshotRetentionInDays: 0 }],
  });

  await stateless.onPause(target);
  await stateful.onPause(target);

  assert.deepEqual(kubectl.calls, [
    "scale deployment appId=app-1 project-1-env-1 0",
    "scale statefulset appId=app-2 project-1-env-1 0",
  ]);
});

test("Application - failing delete becomes an execution error", async () => {
  const { target, helm } = setup();
  const app = makeApplication(testContext().context);
  helm.failingUninstalls.add("application-web-app-1");

  await assert.rejects(app.onDelete(target), (err: unknown) => {
    assert.ok(err instanceof ExecutionError);
    assert.equal(err.messageSafe, "Unable to delete application web");
    assert.equal(err.messageRaw, "cluster unreachable");
    return true;
  });
});

test("Application - capabilities are not implemented", async () => {
  const { target } = setup();
  const app = makeApplication(testContext().context);

  await assert.rejects(app.runCapability("backup", "run", target), (err: unknown) => {
    assert.ok(err instanceof NotImplementedError);
    assert.equal(err.message, "Backup is not supported for application web");
    return true;
  });
});

test("Database - naming, selector and timeout", () => {
  const { context } = testContext();
  const database = makeDatabase(context);

  assert.equal(database.sanitizedName, "postgresql-main");
  assert.equal(database.selector, "app=postgresql-main");
  assert.equal(database.helmReleaseName, "postgresql-db-1");
  assert.equal(database.privatePort, 5432);
  assert.equal(database.isStateful(), true);
  assert.equal(database.startTimeoutInSeconds(), 300);
  assert.equal(database.databaseName, "main");
});

test("Database - start timeout follows the multiplier", () => {
  const { context } = testContext(testConfig({ startTimeoutMultiplier: 2 }));
  assert.equal(makeDatabase(context).startTimeoutInSeconds(), 600);
});

test("Database - resolves the exact version for the target", () => {
  const { context } = testContext();
  const selfHosted = setup().target;
  const managed = setup([], { databaseMode: "managed" }).target;

  assert.equal(makeDatabase(context).resolvedVersion(selfHosted), "13.4.0");
  assert.equal(makeDatabase(context, { version: "13.2" }).resolvedVersion(selfHosted), "13.2.0");
  assert.equal(makeDatabase(context).resolvedVersion(managed), "13");
});

test("Database - a version that only exists as an object property is unsupported", () => {
  const { context } = testContext();
  const database = makeDatabase(context, { version: "constructor" });

  assert.throws(() => database.resolvedVersion(setup().target), (err: unknown) => {
    assert.ok(err instanceof ValidationError);
    assert.equal(err.message, "Postgresql constructor version is not supported");
    return true;
  });
});

test("Database - onCreateCheck rejects an unsupported version", async () => {
  const { context } = testContext();
  const database = makeDatabase(context, { version: "9" });

  await assert.rejects(database.onCreateCheck(setup().target), (err: unknown) => {
    assert.ok(err instanceof ValidationError);
    assert.equal(err.message, "Postgresql 9 version is not supported");
    return true;
  });
});

test("Database - container mode renders the engine chart and provider values", async () => {
  const { target, renderer, helm } = setup();
  const database = makeDatabase(testContext().context);

  await database.onCreate(target);

  assert.deepEqual(renderer.renders.map((render) => [render.templateDir, render.outputDir]), [
    ["/lib/common/services/postgresql", "/workspace/exec-1/databases/db-1/chart"],
    ["/lib/digitalocean/chart_values/postgresql", "/workspace/exec-1/databases/db-1/values"],
  ]);
  assert.equal(renderer.renders[0].context.version, "13.4.0");
  assert.equal(renderer.renders[0].context.version_major, "13");
  assert.equal(renderer.renders[0].context.skip_final_snapshot, false);
  assert.deepEqual(helm.upgrades[0].chart.valuesFiles, ["/workspace/exec-1/databases/db-1/values/q-values.yaml"]);
  assert.equal(helm.upgrades[0].chart.timeoutInSeconds, 300);
});

test("Database - a managed-services target only renders an ExternalName service", async () => {
  const { target, renderer, kubectl } = setup([], { databaseMode: "managed" });
  const database = makeDatabase(testContext().context);

  assert.equal(target.kind, "managed-services");

  await database.onCreate(target);
  await database.onPause(target);

  assert.deepEqual(renderer.renders.map((render) => render.templateDir), ["/lib/common/charts/external-name-svc"]);
  assert.deepEqual(kubectl.calls, []);
});

test("Database - a production environment deploys the managed instance", async () => {
  const { target, renderer } = setup([], { kind: "production" });
  const database = makeDatabase(testContext().context);

  await database.onCreate(target);

  assert.equal(target.kind, "managed-services");
  assert.deepEqual(renderer.renders.map((render) => render.templateDir), ["/lib/common/charts/external-name-svc"]);
  assert.equal(renderer.renders[0].context.version, "13");
});

test("Database - failed managed deploy has no pod diagnostics", async () => {
  const { target, helm, kubectl } = setup([], { databaseMode: "managed" });
  const database = makeDatabase(testContext().context);
  helm.failingUpgrades.add("postgresql-db-1");

  await assert.rejects(database.onCreate(target), (err: unknown) => {
    assert.ok(err instanceof ExecutionError);
    assert.equal(err.messageSafe, "PostgreSQL database main has failed to deploy");
    assert.equal(err.messageRaw, "release postgresql-db-1: timed out");
    return true;
  });
  assert.deepEqual(kubectl.calls, []);
});

test("Router - naming and domains", () => {
  const { context } = testContext();
  const { cluster } = testCluster(testContext());
  const router = makeRouter(context, cluster.tools.prober);

  assert.equal(router.sanitizedName, "router-main");
  assert.equal(router.helmReleaseName, "router-router-1");
  assert.equal(router.selector, "routerId=router-1");
  assert.equal(router.privatePort, undefined);
  assert.equal(router.startTimeoutInSeconds(), 300);
  assert.deepEqual(router.domains(), ["main.env-1.example.net", "www.example.com"]);
});

test("domainHash - 16 hex characters, stable per domain", () => {
  assert.match(domainHash("www.example.com"), /^[0-9a-f]{16}$/);
  assert.equal(domainHash("www.example.com"), domainHash("www.example.com"));
  assert.notEqual(domainHash("www.example.com"), domainHash("api.example.com"));
});

test("Router - routes only reach applications with a public port", async () => {
  const { context } = testContext();
  const web = makeApplication(context);
  const worker = makeApplication(context, {
    id: "app-2",
    name: "worker",
    ports: [{ id: "p2", port: 9000, publiclyAccessible: false }],
  });
  const { target, cluster } = setup([web, worker]);
  const router = makeRouter(context, cluster.tools.prober, {
    routes: [
      { path: "/", applicationName: "web" },
      { path: "/jobs", applicationName: "worker" },
      { path: "/old", applicationName: "missing" },
    ],
  });

  const values = await router.renderContext(target);

  assert.deepEqual(values.routes, [{ path: "/", application_name: "app-web", application_port: 8080 }]);
  assert.deepEqual(values.custom_domains, [{
    domain: "www.example.com",
    domain_hash: domainHash("www.example.com"),
    target_domain: "main.env-1.example.net",
  }]);
  assert.equal(values.router_default_domain_hash, domainHash("main.env-1.example.net"));
  assert.equal(values.spec_acme_server, ACME_STAGING_URL);
  assert.equal(values.metadata_annotations_cert_manager_cluster_issuer, "letsencrypt-staging");
  assert.equal(values.nginx_requests_memory, "256Mi");
  assert.equal(values.private_port, null);
});

test("Router - onCreateCheck accepts a matching CNAME", async () => {
  const harness = testContext();
  const { cluster } = testCluster(harness, {
    answers: { "CNAME www.example.com": ["main.env-1.example.net."] },
  });
  const router = makeRouter(harness.context, cluster.tools.prober);

  await router.onCreateCheck(deploymentTargetFor(cluster, makeEnvironment()));

  assert.deepEqual(harness.events.filter((event) => event.level === "warn"), []);
});

test("Router - onCreateCheck only warns on a mismatching CNAME", async () => {
  const harness = testContext();
  const { cluster } = testCluster(harness, {
    answers: { "CNAME www.example.com": ["cdn.example.org."] },
  });
  const router = makeRouter(harness.context, cluster.tools.prober);

  await router.onCreateCheck(deploymentTargetFor(cluster, makeEnvironment()));

  assert.deepEqual(
    harness.events.filter((event) => event.level === "warn").map((event) => event.message),
    ["Invalid CNAME for www.example.com. Might not be an issue if user is using a CDN."],
  );
});

test("Router - onCreate renders the provider's ingress chart", async () => {
  const { target, renderer, helm, cluster } = setup();
  const router = makeRouter(testContext().context, cluster.tools.prober);

  await router.onCreate(target);

  assert.equal(renderer.renders[0].templateDir, "/lib/digitalocean/charts/ingress-tls");
  assert.equal(renderer.renders[0].outputDir, "/workspace/exec-1/routers/router-1/chart");
  assert.equal(helm.upgrades[0].chart.name, "router-router-1");
});

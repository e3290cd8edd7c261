/**
 * @fileoverview Environment descriptors: YAML files describing the services
 * of an environment and the action to run on them.
 *
 * ```yaml
 * environment:
 *   id: env-1
 *   projectId: project-1
 *   organizationId: org-1
 *   kind: development
 *   action: create
 *   databaseMode: container
 * applications:
 *   - id: app-1
 *     name: web
 *     sizing: { totalCpus: 500m, cpuBurst: "1", totalRamInMib: 256 }
 *     image: { name: web, tag: 1.0.0, registryUrl: registry.local, commitId: a1b2c3d4e5 }
 *     ports: [{ id: p1, port: 8080, publiclyAccessible: true }]
 * ```
 *
 * An optional `failover` key holds a second descriptor of the same shape.
 *
 * @module EnvironmentLoader
 * @since 1.0.0
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ValidationError, describeError } from "../core/errors.ts";
import { Application } from "../core/service/application.ts";
import { Database } from "../core/service/database.ts";
import { Router } from "../core/service/router.ts";
import { Environment, type EnvironmentAction, type EnvironmentKind } from "../core/transaction/environment.ts";
import { DescriptorNode } from "./descriptor-node.ts";
import {
  actions,
  databaseEngines,
  type Action,
  type DatabaseEngine,
  type DatabaseMode,
  type Sizing,
} from "../types/service-types.ts";
import type { EngineContext } from "../core/context.ts";
import type { ReadinessProber } from "../core/dns/readiness-prober.ts";
import type { SupportedVersionLookup } from "../core/service/supported-versions.ts";

const environmentKinds: readonly EnvironmentKind[] = ["production", "development"];
const databaseModes: readonly DatabaseMode[] = ["managed", "container"];

/**
 * Builds environments, and the services in them, from descriptors.
 *
 * @example
 * ```typescript
 * const loader = new EnvironmentLoader(context, lookup, prober);
 * const environmentAction = await loader.load("./environments/staging.yaml");
 * transaction.deployEnvironment(cluster, environmentAction);
 * ```
 *
 * @since 1.0.0
 */
export class EnvironmentLoader {
  constructor(
    private readonly context: EngineContext,
    private readonly versions: SupportedVersionLookup,
    private readonly prober: ReadinessProber,
  ) {}

  async load(path: string): Promise<EnvironmentAction> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (err) {
      throw new ValidationError(`Unable to read environment descriptor ${path}`, describeError(err));
    }
    return this.parse(content);
  }

  parse(content: string): EnvironmentAction {
    let document: unknown;
    try {
      document = parse(content);
    } catch (err) {
      throw new ValidationError("Environment descriptor is not valid YAML", describeError(err));
    }

    const root = DescriptorNode.from(document, "", "environment descriptor");
    const environment = this.buildEnvironment(root);
    if (!root.has("failover")) {
      return { kind: "environment", environment };
    }
    return {
      kind: "environment-with-failover",
      environment,
      failover: this.buildEnvironment(root.child("failover")),
    };
  }

  private buildEnvironment(root: DescriptorNode): Environment {
    const node = root.child("environment");
    const id = node.string("id");
    const projectId = node.string("projectId");
    const kind = node.oneOf("kind", environmentKinds);
    const action: Action = node.oneOf("action", actions, "create");

    return new Environment({
      id,
      projectId,
      organizationId: node.string("organizationId"),
      kind,
      namespace: node.string("namespace", `${projectId}-${id}`),
      action,
      databaseMode: node.has("databaseMode") ? node.oneOf("databaseMode", databaseModes) : undefined,
      applications: root.list("applications").map((app) => this.buildApplication(app, action)),
      databases: root.list("databases").map((db) => this.buildDatabase(db, action)),
      routers: root.list("routers").map((router) => this.buildRouter(router, action)),
    });
  }

  private buildApplication(node: DescriptorNode, action: Action): Application {
    const image = node.child("image");
    return new Application(this.context, {
      id: node.string("id"),
      name: node.string("name"),
      action,
      sizing: readSizing(node.child("sizing")),
      image: {
        name: image.string("name"),
        tag: image.string("tag"),
        registryUrl: image.has("registryUrl") ? image.string("registryUrl") : "",
        registryName: image.has("registryName") ? image.string("registryName") : undefined,
        commitId: image.string("commitId"),
      },
      ports: node.list("ports").map((port) => ({
        id: port.string("id"),
        port: port.number("port"),
        publiclyAccessible: port.boolean("publiclyAccessible", false),
        name: port.has("name") ? port.string("name") : undefined,
      })),
      environmentVariables: node.list("environmentVariables").map((variable) => ({
        key: variable.string("key"),
        value: variable.has("value") ? variable.string("value") : "",
      })),
      storage: node.list("storage").map((storage) => ({
        id: storage.string("id"),
        name: storage.string("name"),
        sizeInGib: storage.number("sizeInGib"),
        mountPoint: storage.string("mountPoint"),
        snapshotRetentionInDays: storage.number("snapshotRetentionInDays", 0),
      })),
      startTimeoutInSeconds: node.has("startTimeoutInSeconds") ? node.number("startTimeoutInSeconds") : undefined,
    });
  }

  private buildDatabase(node: DescriptorNode, action: Action): Database {
    const engine: DatabaseEngine = node.oneOf("engine", databaseEngines);
    const options = node.child("options");
    return new Database(this.context, this.versions, {
      id: node.string("id"),
      name: node.string("name"),
      action,
      version: node.string("version"),
      engine,
      fqdn: node.string("fqdn"),
      fqdnId: node.string("fqdnId"),
      sizing: readSizing(node.child("sizing")),
      databaseName: node.has("databaseName") ? node.string("databaseName") : undefined,
      instanceType: node.has("instanceType") ? node.string("instanceType") : undefined,
      options: {
        login: options.string("login"),
        password: options.string("password"),
        host: options.string("host"),
        port: options.number("port"),
        diskSizeInGib: options.number("diskSizeInGib"),
        databaseDiskType: options.string("databaseDiskType"),
        publiclyAccessible: options.boolean("publiclyAccessible", false),
        activateHighAvailability: options.boolean("activateHighAvailability", false),
        activateBackups: options.boolean("activateBackups", false),
      },
    });
  }

  private buildRouter(node: DescriptorNode, action: Action): Router {
    return new Router(this.context, this.prober, {
      id: node.string("id"),
      name: node.string("name"),
      action,
      sizing: readSizing(node.child("sizing")),
      defaultDomain: node.string("defaultDomain"),
      customDomains: node.list("customDomains").map((custom) => ({
        domain: custom.string("domain"),
        targetDomain: custom.string("targetDomain"),
      })),
      routes: node.list("routes").map((route) => ({
        path: route.string("path"),
        applicationName: route.string("applicationName"),
      })),
      stickySessionsEnabled: node.boolean("stickySessionsEnabled", false),
    });
  }
}

function readSizing(node: DescriptorNode): Sizing {
  return {
    totalCpus: node.string("totalCpus"),
    cpuBurst: node.string("cpuBurst"),
    totalRamInMib: node.number("totalRamInMib"),
    minInstances: node.number("minInstances", 1),
    maxInstances: node.number("maxInstances", 1),
  };
}

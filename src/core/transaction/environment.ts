/**
 * @fileoverview A set of services deployed, paused or deleted together.
 *
 * @module Environment
 * @since 1.0.0
 */

import type { Application } from "../service/application.ts";
import type { Database } from "../service/database.ts";
import type { Router } from "../service/router.ts";
import type { Service } from "../service/service.ts";
import type { Action, DatabaseMode, LifecycleAction } from "../../types/service-types.ts";

export type EnvironmentKind = "production" | "development";

export interface EnvironmentFields {
  id: string;
  projectId: string;
  organizationId: string;
  kind: EnvironmentKind;
  namespace: string;
  action: Action;
  /** Defaults to `managed` in production and `container` elsewhere */
  databaseMode?: DatabaseMode;
  applications?: Application[];
  databases?: Database[];
  routers?: Router[];
}

/**
 * Services of one environment, grouped by kind.
 *
 * @example
 * ```typescript
 * const environment = new Environment({
 *   id: "env-1",
 *   projectId: "project-1",
 *   organizationId: "org-1",
 *   kind: "development",
 *   namespace: "project-1-env-1",
 *   action: "create",
 *   applications: [web],
 *   databases: [postgres],
 * });
 * environment.servicesInOrder("create"); // [postgres, web]
 * ```
 *
 * @since 1.0.0
 */
export class Environment {
  readonly id: string;
  readonly projectId: string;
  readonly organizationId: string;
  readonly kind: EnvironmentKind;
  readonly namespace: string;
  readonly action: Action;
  readonly databaseMode: DatabaseMode;
  readonly applications: readonly Application[];
  readonly databases: readonly Database[];
  readonly routers: readonly Router[];

  constructor(fields: EnvironmentFields) {
    this.id = fields.id;
    this.projectId = fields.projectId;
    this.organizationId = fields.organizationId;
    this.kind = fields.kind;
    this.namespace = fields.namespace;
    this.action = fields.action;
    this.databaseMode = fields.databaseMode ?? (fields.kind === "production" ? "managed" : "container");
    this.applications = [...(fields.applications ?? [])];
    this.databases = [...(fields.databases ?? [])];
    this.routers = [...(fields.routers ?? [])];
  }

  /**
   * Databases before the applications using them and routers last on
   * create; the reverse on pause and delete.
   */
  servicesInOrder(action: LifecycleAction): Service[] {
    if (action === "create") {
      return [...this.databases, ...this.applications, ...this.routers];
    }
    return [...this.routers, ...this.applications, ...this.databases];
  }

  findApplicationByName(name: string): Application | undefined {
    return this.applications.find((app) => app.name === name);
  }

  get isEmpty(): boolean {
    return this.applications.length + this.databases.length + this.routers.length === 0;
  }
}

/**
 * The environment to run, optionally with a fallback tried when the
 * primary one fails.
 */
export type EnvironmentAction =
  | { kind: "environment"; environment: Environment }
  | { kind: "environment-with-failover"; environment: Environment; failover: Environment };

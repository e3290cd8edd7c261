/**
 * @fileoverview Ingress router: HTTP routes to applications, TLS for the
 * default and custom domains.
 *
 * @module Router
 * @since 1.0.0
 */

import { createHash } from "node:crypto";
import { join } from "node:path";
import { ExecutionError, rawMessage } from "../errors.ts";
import { Logger } from "../../logger.ts";
import { chartInfo } from "../charts/chart-types.ts";
import { BaseService, cut, type ServiceFields } from "./service.ts";
import type { EngineContext } from "../context.ts";
import type { ReadinessProber } from "../dns/readiness-prober.ts";
import type { DeploymentTarget } from "../transaction/deployment-target.ts";
import type { CustomDomain, RenderContext, Route } from "../../types/service-types.ts";

export const ACME_STAGING_URL = "https://acme-staging-v02.api.letsencrypt.org/directory";
export const ACME_PRODUCTION_URL = "https://acme-v02.api.letsencrypt.org/directory";

export interface RouterFields extends Omit<ServiceFields, "version"> {
  defaultDomain: string;
  customDomains?: CustomDomain[];
  routes?: Route[];
  stickySessionsEnabled?: boolean;
}

/**
 * First 16 hex characters of the domain's SHA-1, used to name its
 * certificate resources.
 */
export function domainHash(domain: string): string {
  return createHash("sha1").update(domain).digest("hex").slice(0, 16);
}

/**
 * @example
 * ```typescript
 * const router = new Router(context, prober, {
 *   id: "router-1",
 *   name: "main",
 *   action: "create",
 *   sizing,
 *   defaultDomain: "main.env-1.example.net",
 *   customDomains: [{ domain: "www.example.com", targetDomain: "main.env-1.example.net" }],
 *   routes: [{ path: "/", applicationName: "web" }],
 * });
 * router.domains(); // ["main.env-1.example.net", "www.example.com"]
 * ```
 *
 * @since 1.0.0
 */
export class Router extends BaseService {
  readonly kind = "router";
  protected readonly namePrefix = "router";
  protected readonly structName = "Router";

  readonly defaultDomain: string;
  readonly customDomains: readonly CustomDomain[];
  readonly routes: readonly Route[];
  readonly stickySessionsEnabled: boolean;

  constructor(
    context: EngineContext,
    private readonly prober: ReadinessProber,
    fields: RouterFields,
  ) {
    super(context, { ...fields, version: "1" });
    this.defaultDomain = fields.defaultDomain;
    this.customDomains = [...(fields.customDomains ?? [])];
    this.routes = [...(fields.routes ?? [])];
    this.stickySessionsEnabled = fields.stickySessionsEnabled ?? false;
  }

  get privatePort(): undefined {
    return undefined;
  }

  get selector(): string {
    return `routerId=${this.id}`;
  }

  get helmReleaseName(): string {
    return cut(`router-${this.id}`);
  }

  isStateful(): boolean {
    return false;
  }

  startTimeoutInSeconds(): number {
    const { defaultStartTimeoutInSeconds, startTimeoutMultiplier } = this.context.config;
    return defaultStartTimeoutInSeconds * startTimeoutMultiplier;
  }

  /** Default domain first, then custom domains in declaration order. */
  domains(): string[] {
    return [this.defaultDomain, ...this.customDomains.map((custom) => custom.domain)];
  }

  async renderContext(target: DeploymentTarget): Promise<RenderContext> {
    const testCluster = this.context.isTestCluster;

    // Routes to unknown applications, or to applications without a public
    // port, are dropped.
    const routes = this.routes.flatMap((route) => {
      const application = target.environment.findApplicationByName(route.applicationName);
      const port = application?.privatePort;
      if (application === undefined || port === undefined) {
        return [];
      }
      return [{ path: route.path, application_name: application.sanitizedName, application_port: port }];
    });

    return {
      ...this.defaultRenderContext(target),
      routes,
      custom_domains: this.customDomains.map((custom) => ({
        domain: custom.domain,
        domain_hash: domainHash(custom.domain),
        target_domain: custom.targetDomain,
      })),
      router_default_domain: this.defaultDomain,
      router_default_domain_hash: domainHash(this.defaultDomain),
      spec_acme_server: testCluster ? ACME_STAGING_URL : ACME_PRODUCTION_URL,
      metadata_annotations_cert_manager_cluster_issuer: testCluster ? "letsencrypt-staging" : "letsencrypt-production",
      sticky_sessions_enabled: this.stickySessionsEnabled,
      nginx_requests_cpu: this.sizing.totalCpus,
      nginx_limit_cpu: this.sizing.cpuBurst,
      nginx_requests_memory: `${this.sizing.totalRamInMib}Mi`,
      nginx_limit_memory: `${this.sizing.totalRamInMib}Mi`,
      nginx_min_replicas: this.sizing.minInstances,
      nginx_max_replicas: this.sizing.maxInstances,
    };
  }

  /**
   * Warns about custom domains whose CNAME does not point at the expected
   * target. Never fails: a CDN in front of the domain hides the CNAME.
   */
  override async onCreateCheck(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateCheck", target);
    for (const custom of this.customDomains) {
      const resolved = await this.prober.checkCname(this.progressScope(), custom.domain, this.executionId);
      const cname = resolved.endsWith(".") ? resolved.slice(0, -1) : resolved;
      if (cname !== custom.targetDomain) {
        const message = `Invalid CNAME for ${custom.domain}. Might not be an issue if user is using a CDN.`;
        Logger.warning(message);
        this.notify("warn", message);
      }
    }
  }

  async onCreate(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreate", target);
    const { helm, renderer } = target.cluster.tools;

    const path = await renderer.render(
      join(this.context.libRootDir, target.cluster.provider.libDirectory, "charts", "ingress-tls"),
      join(this.workspaceDir(), "chart"),
      await this.renderContext(target),
    );

    try {
      await helm.upgrade(
        chartInfo({ name: this.helmReleaseName, path, namespace: target.environment.namespace }),
        { wait: true, timeoutInSeconds: this.startTimeoutInSeconds() },
      );
    } catch (err) {
      throw new ExecutionError(`Router ${this.name} has failed to deploy`, rawMessage(err));
    }
  }

  async onCreateError(target: DeploymentTarget): Promise<void> {
    this.printAction("onCreateError", target);
    await this.revertRelease(target);
  }

  /** Routers keep serving while paused. */
  async onPause(target: DeploymentTarget): Promise<void> {
    this.printAction("onPause", target);
  }

  async onPauseError(target: DeploymentTarget): Promise<void> {
    this.printAction("onPauseError", target);
  }

  async onDelete(target: DeploymentTarget): Promise<void> {
    this.printAction("onDelete", target);
    await this.guard(`Unable to delete router ${this.name}`, () =>
      target.cluster.tools.helm.uninstall(this.helmReleaseName, target.environment.namespace),
    );
  }

  async onDeleteError(target: DeploymentTarget): Promise<void> {
    this.printAction("onDeleteError", target);
  }
}

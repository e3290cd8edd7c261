/**
 * @fileoverview Best-effort DNS readiness checks.
 *
 * Propagation delays and CDN fronting are expected, so nothing here ever
 * fails: when a check cannot be confirmed within its budget a warning event
 * is sent and the input is returned unchanged.
 *
 * @module ReadinessProber
 * @since 1.0.0
 */

import { Logger } from "../../logger.ts";
import { ResourcePool, RetryPolicy, pollUntil, systemClock, type Clock } from "../retry/index.ts";
import type { ProgressBus } from "../progress/progress-bus.ts";
import type { ProgressLevel, ProgressScope } from "../progress/progress-types.ts";
import type { DnsCheckSettings } from "../../types/config-types.ts";
import type { DnsLookup } from "./dns-lookup.ts";

/**
 * Polls resolvers until a domain resolves, one resolver per attempt in
 * round-robin order.
 *
 * @example
 * ```typescript
 * const prober = new ReadinessProber(defaultDnsLookups(), bus, config.dns);
 * const target = await prober.checkCname(scope, "www.example.com", executionId);
 * ```
 *
 * @since 1.0.0
 */
export class ReadinessProber {
  private readonly resolvers: readonly DnsLookup[];

  constructor(
    resolvers: readonly DnsLookup[],
    private readonly progress: ProgressBus,
    private readonly settings: DnsCheckSettings,
    private readonly clock: Clock = systemClock,
  ) {
    if (resolvers.length === 0) {
      throw new Error("A readiness prober needs at least one resolver");
    }
    this.resolvers = [...resolvers];
  }

  /**
   * Resolves the CNAME record of `cname`. Returns the domain it points to,
   * or `cname` itself when no resolver confirmed it in time.
   */
  async checkCname(scope: ProgressScope, cname: string, executionId: string): Promise<string> {
    const notify = this.notifier(scope, executionId);
    const pool = new ResourcePool(this.resolvers);
    const { cnameCheckAttempts, cnameCheckDelayMs } = this.settings;

    notify("info", `Checking CNAME resolution of '${cname}'. Please wait, it can take some time...`);

    const outcome = await pollUntil({
      policy: RetryPolicy.fixed(cnameCheckDelayMs, cnameCheckAttempts),
      probe: async () => {
        const records = await pool.next().lookup(cname, "CNAME");
        return records[0] ?? "";
      },
      predicate: (domain) => domain !== "",
      onRetry: () => {
        notify(
          "info",
          `Cannot find domain under CNAME ${cname}. Retrying in ${formatSeconds(cnameCheckDelayMs)} seconds...`,
        );
      },
      clock: this.clock,
    });

    if (outcome.ok) {
      const domain = stripTrailingDot(outcome.value);
      notify("info", `Resolution of CNAME ${cname} found to ${domain}`);
      return domain;
    }

    notify(
      "warn",
      `Resolution of CNAME ${cname} failed. Please check that you have correctly configured your CNAME. If you are using a CDN you can forget this message`,
    );
    return cname;
  }

  /**
   * Waits for `domain` to resolve to an address (A, then AAAA on the same
   * resolver). Returns `domain` whatever the outcome.
   */
  async checkDomain(domain: string, executionId: string): Promise<string> {
    const notify = this.notifier({ kind: "environment", id: executionId }, executionId);
    const pool = new ResourcePool(this.resolvers);
    const { domainCheckAttempts, domainCheckDelayMs } = this.settings;

    notify("info", `Let's check domain resolution for '${domain}'. Please wait, it can take some time...`);

    const outcome = await pollUntil({
      policy: RetryPolicy.fixed(domainCheckDelayMs, domainCheckAttempts),
      probe: async () => {
        const resolver = pool.next();
        const ipv4 = await resolver.lookup(domain, "A").catch((): string[] => []);
        return ipv4.length > 0 ? ipv4 : resolver.lookup(domain, "AAAA");
      },
      predicate: (addresses) => addresses.length > 0,
      onRetry: () => {
        notify("info", `Domain resolution check for '${domain}' is still in progress...`);
      },
      clock: this.clock,
    });

    if (outcome.ok) {
      notify("info", `Domain ${domain} is ready! ⚡️`);
    } else {
      notify(
        "warn",
        `Unable to check domain availability for '${domain}'. It can be due to a too long domain propagation. Note: this is not critical.`,
      );
    }
    return domain;
  }

  /**
   * Checks each domain in turn.
   */
  async checkDomains(domains: readonly string[], executionId: string): Promise<string[]> {
    const checked: string[] = [];
    for (const domain of domains) {
      checked.push(await this.checkDomain(domain, executionId));
    }
    return checked;
  }

  private notifier(scope: ProgressScope, executionId: string): (level: ProgressLevel, message: string) => void {
    return (level, message) => {
      if (level === "warn") {
        Logger.warning(message);
      } else {
        Logger.debug(message);
      }
      this.progress.inProgress(scope, level, message, executionId);
    };
  }
}

function stripTrailingDot(domain: string): string {
  return domain.endsWith(".") ? domain.slice(0, -1) : domain;
}

function formatSeconds(ms: number): string {
  return String(ms / 1000);
}

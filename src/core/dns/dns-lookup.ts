import { Resolver } from "node:dns/promises";

export type DnsRecordType = "CNAME" | "A" | "AAAA";

/**
 * One resolver of the pool. Rejects when the name cannot be resolved.
 */
export interface DnsLookup {
  readonly name: string;
  lookup(domain: string, recordType: DnsRecordType): Promise<string[]>;
}

/**
 * `DnsLookup` backed by a `node:dns` resolver. Without servers it uses the
 * system configuration.
 */
export class NodeDnsLookup implements DnsLookup {
  private readonly resolver: Resolver;

  constructor(readonly name: string, servers?: string[], timeoutMs = 5000) {
    this.resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
    if (servers !== undefined) {
      this.resolver.setServers(servers);
    }
  }

  lookup(domain: string, recordType: DnsRecordType): Promise<string[]> {
    switch (recordType) {
      case "CNAME":
        return this.resolver.resolveCname(domain);
      case "A":
        return this.resolver.resolve4(domain);
      case "AAAA":
        return this.resolver.resolve6(domain);
    }
  }
}

/**
 * Google, Cloudflare and Quad9, then the system resolver.
 */
export function defaultDnsLookups(): DnsLookup[] {
  return [
    new NodeDnsLookup("google", ["8.8.8.8", "8.8.4.4"]),
    new NodeDnsLookup("cloudflare", ["1.1.1.1", "1.0.0.1"]),
    new NodeDnsLookup("quad9", ["9.9.9.9", "149.112.112.112"]),
    new NodeDnsLookup("system"),
  ];
}

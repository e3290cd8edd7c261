export { NodeDnsLookup, defaultDnsLookups, type DnsLookup, type DnsRecordType } from "./dns-lookup.ts";
export { ReadinessProber } from "./readiness-prober.ts";

/**
 * @fileoverview Cluster descriptors: identity, provider settings and the
 * credentials infrastructure charts need.
 *
 * @module ClusterLoader
 * @since 1.0.0
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ValidationError, describeError } from "../core/errors.ts";
import { ACME_PRODUCTION_URL, ACME_STAGING_URL } from "../core/service/router.ts";
import { DescriptorNode } from "./descriptor-node.ts";
import type { ClusterFields } from "../core/transaction/cluster.ts";
import type { EngineLocation } from "../core/charts/chart-catalog.ts";
import type { EngineConfig } from "../types/config-types.ts";

const DOCUMENT = "cluster descriptor";
const engineLocations: readonly EngineLocation[] = ["cluster", "external"];

/**
 * Parses a cluster descriptor. Feature flags and the test-cluster switch
 * come from the engine configuration, not from the descriptor.
 */
export function parseClusterDescriptor(content: string, config: EngineConfig): ClusterFields {
  let document: unknown;
  try {
    document = parse(content);
  } catch (err) {
    throw new ValidationError("Cluster descriptor is not valid YAML", describeError(err));
  }

  const root = DescriptorNode.from(document, "", DOCUMENT);
  const cluster = root.child("cluster");
  const provider = root.child("provider");
  const prerequisites = root.child("prerequisites");
  const agent = prerequisites.child("agent");
  const engine = prerequisites.child("engine");

  const id = cluster.string("id");
  const name = cluster.string("name");
  const region = cluster.string("region");
  const shortName = provider.string("shortName");
  const storageClassName = provider.string("storageClassName");

  const cloudflare = prerequisites.has("cloudflare") ? prerequisites.child("cloudflare") : undefined;

  return {
    id,
    name,
    region,
    infraConfigFile: cluster.string("infraConfigFile"),
    provider: {
      shortName,
      libDirectory: provider.string("libDirectory", shortName),
      storageClassName,
      registrySecretName: provider.has("registrySecretName") ? provider.string("registrySecretName") : undefined,
      extra: provider.stringMap("extra"),
    },
    prerequisites: {
      organizationId: prerequisites.string("organizationId"),
      clusterId: id,
      region,
      providerShortName: shortName,
      providerApiToken: prerequisites.string("providerApiToken"),
      storageClassName,
      features: { ...config.features },
      managedDnsHelmFormat: prerequisites.string("managedDnsHelmFormat"),
      managedDnsResolvers: prerequisites.string("managedDnsResolvers"),
      externalDnsProvider: prerequisites.string("externalDnsProvider"),
      dnsEmailReport: prerequisites.string("dnsEmailReport"),
      acmeUrl: prerequisites.string("acmeUrl", config.testCluster ? ACME_STAGING_URL : ACME_PRODUCTION_URL),
      cloudflare: cloudflare === undefined
        ? undefined
        : { email: cloudflare.string("email"), apiToken: cloudflare.string("apiToken") },
      registryDockerJsonConfig: prerequisites.string("registryDockerJsonConfig"),
      agent: {
        version: agent.string("version"),
        grpcUrl: agent.string("grpcUrl"),
        clusterToken: agent.string("clusterToken"),
      },
      engine: {
        version: engine.string("version"),
        location: engine.oneOf("location", engineLocations, "cluster"),
      },
    },
  };
}

export async function loadClusterDescriptor(path: string, config: EngineConfig): Promise<ClusterFields> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new ValidationError(`Unable to read cluster descriptor ${path}`, describeError(err));
  }
  return parseClusterDescriptor(content, config);
}

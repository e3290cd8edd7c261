/**
 * @fileoverview Catalog of the cluster infrastructure charts and their
 * installation levels.
 *
 * Level membership is fixed; feature flags only append optional charts to
 * the level they belong to. A chart reading state produced by another chart
 * always sits in a strictly later level than its producer.
 *
 * @module ChartCatalog
 * @since 1.0.0
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { UnrecoverableError } from "../errors.ts";
import { isRecord } from "../../utils/guards.ts";
import { chartInfo, type ChartInfo, type ChartSetValue, type Level } from "./chart-types.ts";
import type { FeatureFlags } from "../../types/config-types.ts";

export const ChartNamespaces = {
  KubeSystem: "kube-system",
  Prometheus: "prometheus",
  Logging: "logging",
  CertManager: "cert-manager",
  NginxIngress: "nginx-ingress",
  Engine: "fleetwright",
} as const;

/**
 * Outputs of the infrastructure provisioning step, read from its JSON file.
 */
export interface InfrastructureOutputs {
  loki_storage_config_access_id: string;
  loki_storage_config_secret_key: string;
  loki_storage_config_region: string;
  loki_storage_config_host: string;
  loki_storage_config_bucket_name: string;
}

/**
 * Where the deployment engine runs: inside the cluster it manages, or
 * elsewhere (its in-cluster release is then destroyed).
 */
export type EngineLocation = "cluster" | "external";

/**
 * Everything the catalog needs to know about the cluster being bootstrapped.
 */
export interface ChartPrerequisites {
  organizationId: string;
  clusterId: string;
  region: string;
  providerShortName: string;
  /** Token of the cloud provider API, handed to cluster daemons */
  providerApiToken: string;
  storageClassName: string;
  features: FeatureFlags;
  managedDnsHelmFormat: string;
  managedDnsResolvers: string;
  externalDnsProvider: string;
  dnsEmailReport: string;
  acmeUrl: string;
  cloudflare?: { email: string; apiToken: string };
  registryDockerJsonConfig: string;
  agent: { version: string; grpcUrl: string; clusterToken: string };
  engine: { version: string; location: EngineLocation };
}

/**
 * Reads and validates the infrastructure outputs. Nothing is built from a
 * file that is missing or malformed.
 */
export async function readInfrastructureOutputs(path: string): Promise<InfrastructureOutputs> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new UnrecoverableError(
      "Can't deploy helm chart as infrastructure config file has not been rendered. Are you running it in dry run mode?",
      err instanceof Error ? err.message : String(err),
    );
  }

  const safe = `Error while parsing infrastructure config file ${path}`;
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new UnrecoverableError(safe, err instanceof Error ? err.message : String(err));
  }
  if (!isInfrastructureOutputs(parsed)) {
    throw new UnrecoverableError(safe, "missing or non-string loki_storage_config_* field");
  }
  return parsed;
}

function isInfrastructureOutputs(value: unknown): value is InfrastructureOutputs {
  if (!isRecord(value)) return false;
  return [
    "loki_storage_config_access_id",
    "loki_storage_config_secret_key",
    "loki_storage_config_region",
    "loki_storage_config_host",
    "loki_storage_config_bucket_name",
  ].every((key) => typeof value[key] === "string");
}

function set(key: string, value: string): ChartSetValue {
  return { key, value };
}

function resources(prefix: string, cpuLimit: string, cpuRequest: string, memoryLimit: string, memoryRequest: string): ChartSetValue[] {
  const base = prefix === "" ? "resources" : `${prefix}.resources`;
  return [
    set(`${base}.limits.cpu`, cpuLimit),
    set(`${base}.requests.cpu`, cpuRequest),
    set(`${base}.limits.memory`, memoryLimit),
    set(`${base}.requests.memory`, memoryRequest),
  ];
}

/**
 * Builds the six installation levels of a cluster bootstrap.
 *
 * @param infraConfigFile - JSON outputs of the provisioning step
 * @param prerequisites - Cluster identity, feature flags and credentials
 * @param chartPrefix - Directory holding `charts/`, `common/charts/` and `chart_values/`
 * @throws {UnrecoverableError} When the outputs file is missing or invalid
 *
 * @example
 * ```typescript
 * const levels = await buildChartLevels("/tmp/infra.json", prerequisites, "./lib/do/bootstrap");
 * for (const level of levels) {
 *   console.log(level.map((chart) => chart.name));
 * }
 * ```
 */
export async function buildChartLevels(
  infraConfigFile: string,
  prerequisites: ChartPrerequisites,
  chartPrefix: string,
): Promise<Level[]> {
  const outputs = await readInfrastructureOutputs(infraConfigFile);
  const chartPath = (relative: string): string => join(chartPrefix, relative);
  const { features } = prerequisites;

  const prometheusInternalUrl = `http://prometheus-operated.${ChartNamespaces.Prometheus}.svc`;
  const lokiDnsPrefix = `loki.${ChartNamespaces.Logging}.svc`;

  const storageClass = chartInfo({
    name: "q-storageclass",
    path: chartPath("charts/q-storageclass"),
  });

  const coreDns = chartInfo({
    name: "coredns",
    path: chartPath("charts/coredns-config"),
    values: [
      set("managed_dns", prerequisites.managedDnsHelmFormat),
      set("managed_dns_resolvers", prerequisites.managedDnsResolvers),
    ],
  });

  const registrySecret = chartInfo({
    name: "container-registry-secret",
    path: chartPath("charts/container-registry-secret"),
    namespace: ChartNamespaces.KubeSystem,
    valuesFiles: [chartPath("chart_values/container-registry-secret.yaml")],
    values: [
      set("docker_json_config", Buffer.from(prerequisites.registryDockerJsonConfig).toString("base64")),
      set("secret_name", "container-registry-secret-for-cluster"),
      set("secret_namespace", ChartNamespaces.KubeSystem),
    ],
  });

  const certManager = chartInfo({
    name: "cert-manager",
    path: chartPath("common/charts/cert-manager"),
    namespace: ChartNamespaces.CertManager,
    values: [
      set("installCRDs", "true"),
      set("replicaCount", "1"),
      set("extraArgs", "{--dns01-recursive-nameservers-only,--dns01-recursive-nameservers=1.1.1.1:53\\,8.8.8.8:53}"),
      // Prometheus needs certificates from cert-manager, so cert-manager cannot be scraped yet.
      set("prometheus.servicemonitor.enabled", "false"),
      ...resources("", "200m", "100m", "1Gi", "1Gi"),
      ...resources("webhook", "200m", "50m", "128Mi", "128Mi"),
      ...resources("cainjector", "500m", "100m", "1Gi", "1Gi"),
    ],
  });

  const kubePrometheusStack = chartInfo({
    name: "kube-prometheus-stack",
    path: chartPath("common/charts/kube-prometheus-stack"),
    namespace: ChartNamespaces.Prometheus,
    timeoutInSeconds: 480,
    valuesFiles: [chartPath("chart_values/kube-prometheus-stack.yaml")],
    values: [
      set("installCRDs", "true"),
      set("nameOverride", "prometheus-operator"),
      set("fullnameOverride", "prometheus-operator"),
      set("prometheus.prometheusSpec.externalUrl", prometheusInternalUrl),
      ...resources("prometheus-node-exporter", "20m", "10m", "32Mi", "32Mi"),
      ...resources("prometheusOperator", "1", "500m", "1Gi", "1Gi"),
    ],
  });

  const promtail = chartInfo({
    name: "promtail",
    path: chartPath("common/charts/promtail"),
    // priorityClassName is only allowed in kube-system
    namespace: ChartNamespaces.KubeSystem,
    lastBreakingVersionRequiringRestart: "0.24.0",
    backupResources: ["daemonset"],
    values: [
      set("loki.serviceName", lokiDnsPrefix),
      set("priorityClassName", "system-node-critical"),
      ...resources("", "100m", "100m", "128Mi", "128Mi"),
    ],
  });

  const metricsServer = chartInfo({
    name: "metrics-server",
    path: chartPath("common/charts/metrics-server"),
    valuesFiles: [chartPath("chart_values/metrics-server.yaml")],
    values: resources("", "250m", "250m", "256Mi", "256Mi"),
  });

  const externalDns = chartInfo({
    name: "externaldns",
    path: chartPath("common/charts/external-dns"),
    valuesFiles: [chartPath("chart_values/external-dns.yaml")],
    values: resources("", "50m", "50m", "50Mi", "50Mi"),
  });

  const prometheusAdapter = chartInfo({
    name: "prometheus-adapter",
    path: chartPath("common/charts/prometheus-adapter"),
    namespace: ChartNamespaces.Prometheus,
    values: [
      set("metricsRelistInterval", "30s"),
      set("prometheus.url", prometheusInternalUrl),
      set("podDisruptionBudget.enabled", "true"),
      set("podDisruptionBudget.maxUnavailable", "1"),
      ...resources("", "100m", "100m", "384Mi", "384Mi"),
    ],
  });

  const kubeStateMetrics = chartInfo({
    name: "kube-state-metrics",
    path: chartPath("common/charts/kube-state-metrics"),
    namespace: ChartNamespaces.Prometheus,
    values: [
      set("prometheus.monitor.enabled", "true"),
      ...resources("", "75m", "75m", "256Mi", "256Mi"),
    ],
  });

  const loki = chartInfo({
    name: "loki",
    path: chartPath("common/charts/loki"),
    namespace: ChartNamespaces.Logging,
    valuesFiles: [chartPath("chart_values/loki.yaml")],
    values: [
      set("config.storage_config.aws.s3forcepathstyle", "true"),
      set("config.storage_config.aws.bucketnames", outputs.loki_storage_config_bucket_name),
      set("config.storage_config.aws.endpoint", outputs.loki_storage_config_host),
      set("config.storage_config.aws.region", outputs.loki_storage_config_region),
      set("config.storage_config.aws.access_key_id", outputs.loki_storage_config_access_id),
      set("config.storage_config.aws.secret_access_key", outputs.loki_storage_config_secret_key),
      set("config.storage_config.aws.sse_encryption", "false"),
      set("config.storage_config.aws.insecure", "false"),
      ...resources("", "100m", "100m", "2Gi", "1Gi"),
    ],
  });

  const nginxIngress = chartInfo({
    name: "nginx-ingress",
    path: chartPath("common/charts/ingress-nginx"),
    namespace: ChartNamespaces.NginxIngress,
    // The load balancer service can take a while to get an address.
    timeoutInSeconds: 800,
    valuesFiles: [chartPath("chart_values/nginx-ingress.yaml")],
    values: [
      ...resources("controller", "200m", "100m", "768Mi", "768Mi"),
      ...resources("defaultBackend", "20m", "10m", "32Mi", "32Mi"),
    ],
  });

  const pleco = chartInfo({
    name: "pleco",
    path: chartPath("common/charts/pleco"),
    valuesFiles: [chartPath(`chart_values/pleco-${prerequisites.providerShortName}.yaml`)],
    values: [
      set("environmentVariables.API_TOKEN", prerequisites.providerApiToken),
      set("environmentVariables.VOLUME_TIMEOUT", "168"),
      set("environmentVariables.PLECO_IDENTIFIER", prerequisites.clusterId),
      set("environmentVariables.LOG_LEVEL", "debug"),
    ],
  });

  const certManagerConfigs = chartInfo({
    name: "cert-manager-configs",
    path: chartPath("common/charts/cert-manager-configs"),
    namespace: ChartNamespaces.CertManager,
    values: [
      set("externalDnsProvider", prerequisites.externalDnsProvider),
      set("acme.letsEncrypt.emailReport", prerequisites.dnsEmailReport),
      set("acme.letsEncrypt.acmeUrl", prerequisites.acmeUrl),
      set("managedDns", prerequisites.managedDnsHelmFormat),
    ],
  });
  if (prerequisites.externalDnsProvider === "cloudflare" && prerequisites.cloudflare !== undefined) {
    certManagerConfigs.values.push(
      set("provider.cloudflare.apiToken", prerequisites.cloudflare.apiToken),
      set("provider.cloudflare.email", prerequisites.cloudflare.email),
    );
  }

  const clusterAgent = chartInfo({
    name: "cluster-agent",
    path: chartPath("common/charts/cluster-agent"),
    namespace: ChartNamespaces.Engine,
    values: [
      set("image.tag", prerequisites.agent.version),
      set("replicaCount", "1"),
      set("environmentVariables.GRPC_SERVER", prerequisites.agent.grpcUrl),
      set("environmentVariables.CLUSTER_TOKEN", prerequisites.agent.clusterToken),
      set("environmentVariables.CLUSTER_ID", prerequisites.clusterId),
      set("environmentVariables.ORGANIZATION_ID", prerequisites.organizationId),
      set("environmentVariables.LOKI_URL", `http://${lokiDnsPrefix}.cluster.local:3100`),
      ...resources("", "1", "200m", "500Mi", "500Mi"),
    ],
  });
  if (features.logHistoryEnabled) {
    clusterAgent.values.push(set("environmentVariables.FEATURES", "LogsHistory"));
  }

  const shellAgent = chartInfo({
    name: "shell-agent",
    path: chartPath("common/charts/shell-agent"),
    namespace: ChartNamespaces.Engine,
    values: [
      set("image.tag", prerequisites.agent.version),
      set("environmentVariables.GRPC_SERVER", prerequisites.agent.grpcUrl),
      set("environmentVariables.CLUSTER_TOKEN", prerequisites.agent.clusterToken),
      set("environmentVariables.CLUSTER_ID", prerequisites.clusterId),
      set("environmentVariables.ORGANIZATION_ID", prerequisites.organizationId),
      ...resources("", "1", "100m", "100Mi", "100Mi"),
    ],
  });

  const deploymentEngine = chartInfo({
    name: "deployment-engine",
    path: chartPath("common/charts/deployment-engine"),
    namespace: ChartNamespaces.Engine,
    action: prerequisites.engine.location === "cluster" ? "deploy" : "destroy",
    timeoutInSeconds: 900,
    values: [
      set("image.tag", prerequisites.engine.version),
      set("autoscaler.min_replicas", "2"),
      set("metrics.enabled", String(features.metricsHistoryEnabled)),
      set("volumes.storageClassName", prerequisites.storageClassName),
      set("environmentVariables.ORGANIZATION", prerequisites.organizationId),
      set("environmentVariables.CLOUD_PROVIDER", prerequisites.providerShortName),
      set("environmentVariables.REGION", prerequisites.region),
      ...resources("engine", "1", "500m", "512Mi", "512Mi"),
      ...resources("build", "1", "500m", "4Gi", "4Gi"),
    ],
  });

  const nodeRecycler = chartInfo({
    name: "node-recycler",
    path: chartPath("charts/node-recycler"),
    values: [
      set("environmentVariables.LOG_LEVEL", "debug"),
      set("environmentVariables.DELAY_NODE_CREATION", "5m"),
      set("environmentVariables.API_TOKEN", prerequisites.providerApiToken),
      set("environmentVariables.CLUSTER_ID", prerequisites.clusterId),
      set("enabledFeatures.disableDryRun", "true"),
    ],
  });

  const tokenRotate = chartInfo({
    name: "k8s-token-rotate",
    path: chartPath("charts/k8s-token-rotate"),
    values: [
      set("environmentVariables.API_TOKEN", prerequisites.providerApiToken),
      set("environmentVariables.REGION", prerequisites.region),
      set("environmentVariables.K8S_CLUSTER_ID", prerequisites.clusterId),
    ],
  });

  const grafana = chartInfo({
    name: "grafana",
    path: chartPath("common/charts/grafana"),
    namespace: ChartNamespaces.Prometheus,
    valuesFiles: [chartPath("chart_values/grafana.yaml")],
    yamlFilesContent: [
      {
        filename: "grafana_generated.yaml",
        yamlContent: grafanaDatasources(prometheusInternalUrl, loki),
      },
    ],
  });

  const level1: Level = [storageClass, coreDns];
  const level2: Level = [registrySecret, certManager];
  const level3: Level = [];
  const level4: Level = [metricsServer, externalDns];
  const level5: Level = [nginxIngress];
  const level6: Level = [certManagerConfigs, clusterAgent, shellAgent, deploymentEngine, nodeRecycler, tokenRotate];

  if (features.metricsHistoryEnabled) {
    level2.push(kubePrometheusStack);
    level4.push(prometheusAdapter, kubeStateMetrics);
  }
  if (features.logHistoryEnabled) {
    level3.push(promtail);
    level4.push(loki);
  }
  if (features.metricsHistoryEnabled || features.logHistoryEnabled) {
    level6.push(grafana);
  }
  if (!features.disablePleco) {
    level5.push(pleco);
  }

  return [level1, level2, level3, level4, level5, level6];
}

function grafanaDatasources(prometheusUrl: string, loki: ChartInfo): string {
  return [
    "datasources:",
    "  datasources.yaml:",
    "    apiVersion: 1",
    "    datasources:",
    "      - name: Prometheus",
    "        type: prometheus",
    `        url: "${prometheusUrl}:9090"`,
    "        access: proxy",
    "        isDefault: true",
    "      - name: Loki",
    "        type: loki",
    `        url: "http://${loki.name}.${loki.namespace}.svc:3100"`,
    "",
  ].join("\n");
}

/**
 * @fileoverview Kubernetes control-plane invocation.
 *
 * All operations use the kubectl CLI and work with any cluster the given
 * kubeconfig can reach.
 *
 * @module Kubectl
 * @since 1.0.0
 */

import { parse } from "yaml";
import { runCommand } from "./command-runner.ts";
import { isRecord } from "../utils/guards.ts";

export type ScalableKind = "deployment" | "statefulset";

/**
 * A secret as listed by `kubectl get secrets`, data already base64-decoded.
 */
export interface SecretItem {
  name: string;
  data: Record<string, string>;
}

export interface PodStatus {
  name: string;
  phase: string;
  ready: boolean;
  restarts: number;
  /** Waiting or termination reason of the first failing container */
  reason?: string;
}

/**
 * The control plane, as seen by the engine. Every method rejects with a
 * `CommandError` when the underlying call fails.
 */
export interface KubectlClient {
  apply(manifestPath: string): Promise<void>;
  /** YAML of every resource of `kind` in the namespace. */
  getResourceYaml(kind: string, namespace: string): Promise<string>;
  createSecretFromFile(namespace: string, name: string, key: string, filePath: string): Promise<void>;
  deleteSecret(namespace: string, name: string): Promise<void>;
  getSecrets(namespace: string): Promise<SecretItem[]>;
  scale(kind: ScalableKind, selector: string, namespace: string, replicas: number): Promise<void>;
  getPods(selector: string, namespace: string): Promise<PodStatus[]>;
  /** Idempotent: an existing namespace is left alone. */
  createNamespace(namespace: string): Promise<void>;
}

/**
 * `KubectlClient` driving the `kubectl` binary.
 *
 * @since 1.0.0
 */
export class KubectlCli implements KubectlClient {
  constructor(private readonly kubeconfigPath: string | null) {}

  async apply(manifestPath: string): Promise<void> {
    await this.run(["apply", "-f", manifestPath]);
  }

  getResourceYaml(kind: string, namespace: string): Promise<string> {
    return this.run(["get", kind, "--namespace", namespace, "--output", "yaml"]);
  }

  async createSecretFromFile(namespace: string, name: string, key: string, filePath: string): Promise<void> {
    await this.run([
      "create",
      "secret",
      "generic",
      name,
      "--namespace",
      namespace,
      `--from-file=${key}=${filePath}`,
    ]);
  }

  async deleteSecret(namespace: string, name: string): Promise<void> {
    await this.run(["delete", "secret", name, "--namespace", namespace, "--ignore-not-found"]);
  }

  async getSecrets(namespace: string): Promise<SecretItem[]> {
    const output = await this.run(["get", "secrets", "--namespace", namespace, "--output", "yaml"]);
    return parseSecretList(output);
  }

  async scale(kind: ScalableKind, selector: string, namespace: string, replicas: number): Promise<void> {
    await this.run(["scale", kind, "--namespace", namespace, "--selector", selector, `--replicas=${replicas}`]);
  }

  async getPods(selector: string, namespace: string): Promise<PodStatus[]> {
    const output = await this.run(["get", "pods", "--namespace", namespace, "--selector", selector, "--output", "yaml"]);
    return parsePodList(output);
  }

  async createNamespace(namespace: string): Promise<void> {
    const manifest = await this.run(["create", "namespace", namespace, "--dry-run=client", "--output", "yaml"]);
    await runCommand("kubectl", ["apply", "-f", "-"], { kubeconfigPath: this.kubeconfigPath, input: manifest });
  }

  private run(args: string[]): Promise<string> {
    return runCommand("kubectl", args, { kubeconfigPath: this.kubeconfigPath });
  }
}

function listItems(output: string): Record<string, unknown>[] {
  const list: unknown = parse(output);
  if (!isRecord(list) || !Array.isArray(list.items)) {
    return [];
  }
  return list.items.filter(isRecord);
}

function metadataName(item: Record<string, unknown>): string {
  const metadata = item.metadata;
  return isRecord(metadata) && typeof metadata.name === "string" ? metadata.name : "";
}

export function parseSecretList(output: string): SecretItem[] {
  return listItems(output).map((item) => {
    const data: Record<string, string> = {};
    if (isRecord(item.data)) {
      for (const [key, value] of Object.entries(item.data)) {
        if (typeof value === "string") {
          data[key] = Buffer.from(value, "base64").toString("utf8");
        }
      }
    }
    return { name: metadataName(item), data };
  });
}

export function parsePodList(output: string): PodStatus[] {
  return listItems(output).map((item) => {
    const status: Record<string, unknown> = isRecord(item.status) ? item.status : {};
    const containers: Record<string, unknown>[] = Array.isArray(status.containerStatuses) ? status.containerStatuses.filter(isRecord) : [];

    let reason: string | undefined;
    for (const container of containers) {
      const state: Record<string, unknown> = isRecord(container.state) ? container.state : {};
      for (const detail of [state.waiting, state.terminated]) {
        if (reason === undefined && isRecord(detail) && typeof detail.reason === "string") {
          reason = detail.reason;
        }
      }
    }

    const pod: PodStatus = {
      name: metadataName(item),
      phase: typeof status.phase === "string" ? status.phase : "Unknown",
      ready: containers.length > 0 && containers.every((container) => container.ready === true),
      restarts: containers.reduce(
        (sum, container) => sum + (typeof container.restartCount === "number" ? container.restartCount : 0),
        0,
      ),
    };
    return reason === undefined ? pod : { ...pod, reason };
  });
}

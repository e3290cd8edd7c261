import { readFile } from "node:fs/promises";
import { Logger } from "../logger.ts";
import { isPositiveNumber, isRecord } from "../utils/guards.ts";
import type { EngineConfig, FeatureFlags, DnsCheckSettings } from "../types/config-types.ts";

export const DEFAULT_CONFIG: EngineConfig = {
  libRootDir: "./lib",
  workspaceRootDir: "./.workspace",
  kubeconfigPath: null,
  defaultStartTimeoutInSeconds: 300,
  startTimeoutMultiplier: 1,
  testCluster: false,
  features: {
    logHistoryEnabled: false,
    metricsHistoryEnabled: false,
    disablePleco: false,
  },
  dns: {
    cnameCheckAttempts: 30,
    cnameCheckDelayMs: 5000,
    domainCheckAttempts: 100,
    domainCheckDelayMs: 3000,
  },
};

export class ConfigManager {
  private static instance: ConfigManager;
  private config: EngineConfig;
  static readonly CONFIG_FILE = "fleetwright.config.json";

  private constructor() {
    this.config = ConfigManager.defaults();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private static defaults(): EngineConfig {
    return {
      ...DEFAULT_CONFIG,
      features: { ...DEFAULT_CONFIG.features },
      dns: { ...DEFAULT_CONFIG.dns },
    };
  }

  /**
   * Loads the config file (a missing file means defaults), then applies
   * environment overrides. An unreadable or invalid file is an error: the
   * engine must not deploy with half a configuration.
   */
  async load(path: string = ConfigManager.CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): Promise<EngineConfig> {
    let loaded: unknown = {};
    try {
      const content = await readFile(path, "utf8");
      loaded = JSON.parse(content);
    } catch (err) {
      if (!isNotFound(err)) {
        throw new Error(
          `Failed to load config ${path}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      Logger.info(`No config file at ${path}, using defaults`);
    }

    if (!this.validateConfig(loaded)) {
      throw new Error(`Invalid config file structure: ${path}`);
    }

    const defaults = ConfigManager.defaults();
    const merged: EngineConfig = {
      ...defaults,
      ...loaded,
      features: { ...defaults.features, ...loaded.features },
      dns: { ...defaults.dns, ...loaded.dns },
    };

    this.config = this.applyEnvironment(merged, env);
    return this.config;
  }

  get(): EngineConfig {
    return this.config;
  }

  /** Restores defaults; used between tests. */
  reset(): void {
    this.config = ConfigManager.defaults();
  }

  private applyEnvironment(config: EngineConfig, env: NodeJS.ProcessEnv): EngineConfig {
    const result = { ...config };
    if (env.FLEETWRIGHT_LIB_ROOT) {
      result.libRootDir = env.FLEETWRIGHT_LIB_ROOT;
    }
    if (env.FLEETWRIGHT_WORKSPACE_ROOT) {
      result.workspaceRootDir = env.FLEETWRIGHT_WORKSPACE_ROOT;
    }
    if (env.KUBECONFIG) {
      result.kubeconfigPath = env.KUBECONFIG;
    }
    if (env.FLEETWRIGHT_TEST_CLUSTER !== undefined) {
      result.testCluster = env.FLEETWRIGHT_TEST_CLUSTER === "true";
    }
    return result;
  }

  private validateConfig(config: unknown): config is Partial<EngineConfig> {
    if (!isRecord(config)) return false;

    const { libRootDir, workspaceRootDir, kubeconfigPath, defaultStartTimeoutInSeconds, startTimeoutMultiplier, testCluster } = config;

    if (libRootDir !== undefined && typeof libRootDir !== "string") return false;
    if (workspaceRootDir !== undefined && typeof workspaceRootDir !== "string") return false;
    if (kubeconfigPath !== undefined && kubeconfigPath !== null && typeof kubeconfigPath !== "string") return false;
    if (defaultStartTimeoutInSeconds !== undefined && !isPositiveNumber(defaultStartTimeoutInSeconds)) return false;
    if (startTimeoutMultiplier !== undefined && !isPositiveNumber(startTimeoutMultiplier)) return false;
    if (testCluster !== undefined && typeof testCluster !== "boolean") return false;

    if (config.features !== undefined && !this.validateFeatures(config.features)) return false;
    if (config.dns !== undefined && !this.validateDns(config.dns)) return false;

    return true;
  }

  private validateFeatures(features: unknown): features is Partial<FeatureFlags> {
    if (!isRecord(features)) return false;
    return Object.entries(features).every(
      ([key, value]) => Object.hasOwn(DEFAULT_CONFIG.features, key) && typeof value === "boolean",
    );
  }

  /** Attempt counts are whole numbers, delays any positive duration. */
  private validateDns(dns: unknown): dns is Partial<DnsCheckSettings> {
    if (!isRecord(dns)) return false;
    return Object.entries(dns).every(([key, value]) => {
      if (!Object.hasOwn(DEFAULT_CONFIG.dns, key) || !isPositiveNumber(value)) return false;
      return !key.endsWith("Attempts") || Number.isInteger(value);
    });
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

#!/usr/bin/env -S npx tsx

import minimist from "minimist";
import inquirer from "inquirer";
import {
  Cluster,
  ConfigManager,
  EngineContext,
  EnvironmentLoader,
  FileTemplateRenderer,
  HelmCli,
  KubectlCli,
  Logger,
  ReadinessProber,
  TableSupportedVersionLookup,
  Transaction,
  defaultDnsLookups,
  describeError,
  loadClusterDescriptor,
  type EnvironmentAction,
  type TransactionResult,
} from "./src/index.ts";

const args = minimist(process.argv.slice(2), {
  string: ["cluster", "config"],
  boolean: ["help", "yes", "bootstrap", "debug"],
  alias: {
    h: "help",
    y: "yes",
    c: "cluster",
  },
});

const [command, descriptorPath] = args._.map(String);
const clusterPath = typeof args.cluster === "string" && args.cluster !== "" ? args.cluster : undefined;
const configPath = typeof args.config === "string" && args.config !== "" ? args.config : undefined;
const skipConfirmation = args.yes === true;
const bootstrapFirst = args.bootstrap === true;
if (args.debug === true) {
  Logger.enableDebug();
}

if (args.help === true || !command) {
  Logger.info(`
Usage: fleetwright <command> [environment.yaml] --cluster <cluster.yaml>

Commands:
  deploy <environment>  Deploy every service of an environment
  pause  <environment>  Scale the environment's workloads down to zero
  delete <environment>  Delete every service of an environment
  bootstrap             Install the cluster's infrastructure charts
  charts                List the infrastructure charts, level by level

Options:
  -c, --cluster         Cluster descriptor (required)
      --config          Engine configuration file (default: fleetwright.config.json)
      --bootstrap       Bootstrap the cluster before deploying
  -y, --yes             Do not ask for confirmation before deleting
      --debug           Print raw command output
`);
  process.exit(0);
}

function printResult(result: TransactionResult): void {
  switch (result.kind) {
    case "ok":
      Logger.success("Transaction committed");
      return;
    case "rollback":
      Logger.error(
        `Transaction rolled back${result.serviceId === undefined ? "" : ` after service ${result.serviceId}`}: ${result.cause.messageSafe}`,
      );
      for (const failure of result.compensationErrors) {
        Logger.warning(`Rollback step failed: ${failure.messageSafe}`);
      }
      process.exitCode = 1;
      return;
    case "unrecoverable":
      Logger.error(
        `Transaction failed${result.serviceId === undefined ? "" : ` on service ${result.serviceId}`}: ${result.cause.messageSafe}`,
      );
      process.exitCode = 1;
      return;
  }
}

async function confirmDeletion(environmentAction: EnvironmentAction): Promise<boolean> {
  if (skipConfirmation) {
    return true;
  }
  const { confirmed } = await inquirer.prompt([{
    type: "confirm",
    name: "confirmed",
    message: `Delete every service of environment ${environmentAction.environment.id}?`,
    default: false,
  }]);
  return confirmed === true;
}

async function main(): Promise<void> {
  const config = await ConfigManager.getInstance().load(configPath);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    Logger.warning("Cancelling after the current step...");
    controller.abort();
  });

  const context = new EngineContext(config);
  context.progress.subscribe((event) => {
    if (event.step !== "in-progress" && event.message !== undefined) {
      Logger.info(`[${event.scope.kind}] ${event.message}`);
    }
  });

  if (clusterPath === undefined) {
    Logger.error("A cluster descriptor is required (--cluster)");
    process.exit(1);
  }

  const prober = new ReadinessProber(defaultDnsLookups(), context.progress, config.dns, context.clock);
  const cluster = new Cluster(await loadClusterDescriptor(clusterPath, config), {
    helm: new HelmCli(config.kubeconfigPath, context.workspaceRootDir),
    kubectl: new KubectlCli(config.kubeconfigPath),
    renderer: new FileTemplateRenderer(),
    prober,
  });

  const loadEnvironment = async (): Promise<EnvironmentAction> => {
    if (!descriptorPath) {
      Logger.error(`Command ${command} needs an environment descriptor`);
      process.exit(1);
    }
    const versions = await TableSupportedVersionLookup.fromFile();
    return new EnvironmentLoader(context, versions, prober).load(descriptorPath);
  };

  const transaction = new Transaction(context, { signal: controller.signal });

  switch (command) {
    case "charts": {
      const levels = await cluster.chartLevels(context);
      levels.forEach((level, index) => {
        Logger.step(index + 1, levels.length, level.map((chart) => chart.name).join(", ") || "(empty)");
      });
      return;
    }

    case "bootstrap": {
      printResult(await transaction.createKubernetes(cluster).commit());
      return;
    }

    case "deploy": {
      const environmentAction = await loadEnvironment();
      if (bootstrapFirst) {
        transaction.createKubernetes(cluster);
      }
      printResult(await transaction.deployEnvironment(cluster, environmentAction).commit());
      return;
    }

    case "pause": {
      const environmentAction = await loadEnvironment();
      printResult(await transaction.pauseEnvironment(cluster, environmentAction).commit());
      return;
    }

    case "delete": {
      const environmentAction = await loadEnvironment();
      if (!(await confirmDeletion(environmentAction))) {
        Logger.info("Deletion cancelled");
        return;
      }
      printResult(await transaction.deleteEnvironment(cluster, environmentAction).commit());
      return;
    }

    default:
      Logger.error(`Unknown command: ${command}`);
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  Logger.error(`Error: ${describeError(error)}`);
  process.exit(1);
});

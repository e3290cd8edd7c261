/**
 * @fileoverview Installable unit (helm chart) type definitions.
 *
 * @module ChartTypes
 * @since 1.0.0
 */

export type ChartAction = "deploy" | "destroy";

/**
 * A `--set key=value` override.
 */
export interface ChartSetValue {
  key: string;
  value: string;
}

/**
 * Extra values file written next to the chart before install.
 */
export interface ChartValuesFileContent {
  filename: string;
  yamlContent: string;
}

/**
 * A chart to install (or destroy) on a cluster. `name` doubles as the helm
 * release name and is unique within one installation run.
 */
export interface ChartInfo {
  name: string;
  path: string;
  namespace: string;
  action: ChartAction;
  atomic: boolean;
  timeoutInSeconds: number;
  values: ChartSetValue[];
  valuesFiles: string[];
  yamlFilesContent: ChartValuesFileContent[];
  /**
   * Chart version from which an upgrade can no longer be done in place. When
   * crossed, `backupResources` are saved before the upgrade and restored
   * after it.
   */
  lastBreakingVersionRequiringRestart?: string;
  backupResources?: string[];
}

/**
 * Charts installable in any order relative to each other, strictly after
 * every chart of the previous levels.
 */
export type Level = ChartInfo[];

export const DEFAULT_CHART_TIMEOUT_IN_SECONDS = 300;

/**
 * Builds a chart with the defaults applied to everything not given.
 */
export function chartInfo(
  fields: Pick<ChartInfo, "name" | "path"> & Partial<ChartInfo>,
): ChartInfo {
  return {
    namespace: "default",
    action: "deploy",
    atomic: true,
    timeoutInSeconds: DEFAULT_CHART_TIMEOUT_IN_SECONDS,
    values: [],
    valuesFiles: [],
    yamlFilesContent: [],
    ...fields,
  };
}

export {
  ChartNamespaces,
  buildChartLevels,
  readInfrastructureOutputs,
  type ChartPrerequisites,
  type EngineLocation,
  type InfrastructureOutputs,
} from "./chart-catalog.ts";
export { ChartInstaller, type ChartInstallerOptions } from "./chart-installer.ts";
export {
  DEFAULT_CHART_TIMEOUT_IN_SECONDS,
  chartInfo,
  type ChartAction,
  type ChartInfo,
  type ChartSetValue,
  type ChartValuesFileContent,
  type Level,
} from "./chart-types.ts";

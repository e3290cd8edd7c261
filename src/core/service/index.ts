/**
 * @fileoverview Service lifecycle module exports.
 *
 * @since 1.0.0
 * @module ServiceModule
 */

export { Application, type ApplicationFields } from "./application.ts";
export { Database, type DatabaseFields } from "./database.ts";
export { ACME_PRODUCTION_URL, ACME_STAGING_URL, Router, domainHash, type RouterFields } from "./router.ts";
export {
  BaseService,
  cut,
  runCheckHook,
  runErrorHook,
  runMainHook,
  sanitizeName,
  type HookPhase,
  type Service,
  type ServiceFields,
} from "./service.ts";
export { PodHealthChecker, describePod } from "./health-checker.ts";
export { parseCpu, validateCpuAndBurst, type CpuLimits } from "./cpu.ts";
export {
  DEFAULT_SUPPORTED_VERSIONS_FILE,
  TableSupportedVersionLookup,
  generateSupportedVersions,
  parseVersionNumber,
  resolveSupportedVersion,
  type SupportedVersionLookup,
  type SupportedVersionsFile,
  type VersionRange,
} from "./supported-versions.ts";

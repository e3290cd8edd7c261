/**
 * @fileoverview Database engine version resolution.
 *
 * Which versions an engine supports is data: ranges and explicit maps read
 * from `data/supported-versions.json`, expanded into a lookup table from any
 * accepted spelling (`13`, `13.4`, `13.4.0`) to the exact version deployed.
 *
 * @module SupportedVersions
 * @since 1.0.0
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ValidationError } from "../errors.ts";
import { isRecord } from "../../utils/guards.ts";
import { databaseEngines, type DatabaseEngine, type DatabaseMode } from "../../types/service-types.ts";

export const DEFAULT_SUPPORTED_VERSIONS_FILE = fileURLToPath(
  new URL("../../../data/supported-versions.json", import.meta.url),
);

/**
 * Contiguous versions of one major. Without `updateMin`/`updateMax` only
 * `major.minor` versions exist.
 */
export interface VersionRange {
  major: number;
  minorMin: number;
  minorMax: number;
  updateMin?: number;
  updateMax?: number;
  suffix?: string;
}

export interface EngineVersionTable {
  /** Engine name used in error messages */
  label: string;
  ranges?: VersionRange[];
  versions?: Record<string, string>;
}

export type SupportedVersionsFile = Record<DatabaseMode, Partial<Record<DatabaseEngine, EngineVersionTable>>>;

/**
 * A requested version split into its parts. Versions like `6.x` are not
 * semver, hence the strings.
 */
export interface VersionNumber {
  major: string;
  minor?: string;
  patch?: string;
  suffix?: string;
}

/**
 * Answers which exact version of an engine to deploy for a requested one.
 */
export interface SupportedVersionLookup {
  /** Throws a `ValidationError` when the version is not supported. */
  resolve(engine: DatabaseEngine, mode: DatabaseMode, requestedVersion: string): string;
}

export function parseVersionNumber(version: string): VersionNumber {
  if (version.trim() === "") {
    throw new ValidationError("version cannot be empty");
  }

  const [major, minor, patch, ...rest] = version.split(".").map((part) => part.trim());
  const parsed: VersionNumber = { major: major.replaceAll("v", "") };
  if (minor !== undefined) parsed.minor = minor.replaceAll("+", "");
  if (patch !== undefined) parsed.patch = patch;
  if (rest.length > 0) parsed.suffix = rest.join(".");
  return parsed;
}

/**
 * Expands a range into every accepted spelling. The bare major and every
 * `major.minor` point at the latest version they cover.
 *
 * @example
 * ```typescript
 * generateSupportedVersions({ major: 8, minorMin: 0, minorMax: 0, updateMin: 11, updateMax: 12 });
 * // { "8.0.11": "8.0.11", "8.0.12": "8.0.12", "8.0": "8.0.12", "8": "8.0.12" }
 * ```
 */
export function generateSupportedVersions(range: VersionRange): Record<string, string> {
  const { major, minorMin, minorMax, updateMin, updateMax } = range;
  const suffix = range.suffix ?? "";
  const versions: Record<string, string> = {};

  if (updateMin !== undefined && updateMax !== undefined) {
    for (let minor = minorMin; minor <= minorMax; minor++) {
      for (let update = updateMin; update <= updateMax; update++) {
        versions[`${major}.${minor}.${update}`] = `${major}.${minor}.${update}${suffix}`;
      }
      versions[`${major}.${minor}`] = `${major}.${minor}.${updateMax}${suffix}`;
    }
    versions[`${major}`] = `${major}.${minorMax}.${updateMax}${suffix}`;
    return versions;
  }

  for (let minor = minorMin; minor <= minorMax; minor++) {
    versions[`${major}.${minor}`] = `${major}.${minor}${suffix}`;
  }
  versions[`${major}`] = `${major}.${minorMax}${suffix}`;
  return versions;
}

/**
 * Picks the deployed version for a requested one: an exact patch when one is
 * given, else the latest of the requested minor, else of the major.
 */
export function resolveSupportedVersion(
  label: string,
  supported: Record<string, string>,
  requestedVersion: string,
): string {
  const version = parseVersionNumber(requestedVersion);
  const key = version.patch !== undefined && version.minor !== undefined
    ? `${version.major}.${version.minor}.${version.patch}`
    : version.minor !== undefined
      ? `${version.major}.${version.minor}`
      : version.major;

  if (!Object.hasOwn(supported, key)) {
    throw new ValidationError(`${label} ${requestedVersion} version is not supported`);
  }
  return supported[key];
}

/**
 * `SupportedVersionLookup` over an in-memory table.
 *
 * @example
 * ```typescript
 * const lookup = await TableSupportedVersionLookup.fromFile();
 * lookup.resolve("postgresql", "container", "13"); // "13.4.0"
 * ```
 *
 * @since 1.0.0
 */
export class TableSupportedVersionLookup implements SupportedVersionLookup {
  private readonly expanded = new Map<string, { label: string; versions: Record<string, string> }>();

  constructor(table: SupportedVersionsFile) {
    for (const mode of ["managed", "container"] as const) {
      for (const engine of databaseEngines) {
        const entry = table[mode][engine];
        if (entry === undefined) continue;
        const versions: Record<string, string> = {};
        for (const range of entry.ranges ?? []) {
          Object.assign(versions, generateSupportedVersions(range));
        }
        Object.assign(versions, entry.versions ?? {});
        this.expanded.set(`${mode}/${engine}`, { label: entry.label, versions });
      }
    }
  }

  static async fromFile(path: string = DEFAULT_SUPPORTED_VERSIONS_FILE): Promise<TableSupportedVersionLookup> {
    const content: unknown = JSON.parse(await readFile(path, "utf8"));
    if (!isSupportedVersionsFile(content)) {
      throw new Error(`Invalid supported versions file: ${path}`);
    }
    return new TableSupportedVersionLookup(content);
  }

  resolve(engine: DatabaseEngine, mode: DatabaseMode, requestedVersion: string): string {
    const entry = this.expanded.get(`${mode}/${engine}`);
    if (entry === undefined) {
      throw new ValidationError(`${engine} is not available as a ${mode} database`);
    }
    return resolveSupportedVersion(entry.label, entry.versions, requestedVersion);
  }
}

function isVersionRange(value: unknown): value is VersionRange {
  if (!isRecord(value)) return false;
  const { major, minorMin, minorMax, updateMin, updateMax, suffix } = value;
  return Number.isInteger(major) && Number.isInteger(minorMin) && Number.isInteger(minorMax)
    && (updateMin === undefined || Number.isInteger(updateMin))
    && (updateMax === undefined || Number.isInteger(updateMax))
    && (suffix === undefined || typeof suffix === "string");
}

function isEngineVersionTable(value: unknown): value is EngineVersionTable {
  if (!isRecord(value) || typeof value.label !== "string") return false;
  if (value.ranges !== undefined && !(Array.isArray(value.ranges) && value.ranges.every(isVersionRange))) {
    return false;
  }
  const versions = value.versions;
  return versions === undefined
    || (isRecord(versions) && Object.values(versions).every((version) => typeof version === "string"));
}

function isSupportedVersionsFile(value: unknown): value is SupportedVersionsFile {
  if (!isRecord(value)) return false;
  return (["managed", "container"] as const).every((mode) => {
    const engines = value[mode];
    return isRecord(engines)
      && Object.entries(engines).every(
        ([engine, table]) => databaseEngines.some((known) => known === engine) && isEngineVersionTable(table),
      );
  });
}

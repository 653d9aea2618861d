import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PROJECT_ROOT = path.resolve(__dirname, "..", "..");

export const DEFAULT_METRICS_CONFIG_PATH = path.join(PROJECT_ROOT, "config", "metrics.json");
export const DEFAULT_LICENSES_PATH = path.join(PROJECT_ROOT, "config", "licenses.json");

export const METRIC_GROUP_NAMES = [
  "has_file",
  "has_dir",
  "license",
  "test_engine",
  "shebang",
  "dunder_future",
  "lines_of_code",
  "requirements",
  "python_style",
] as const;

export type MetricGroupName = (typeof METRIC_GROUP_NAMES)[number];

export interface LicenseRule {
  name: string;
  patterns: string[];
}

export interface MetricsConfig {
  groups: MetricGroupName[];
  typicalFiles: string[];
  typicalDirs: string[];
  licenseFiles: string[];
  testEngines: string[];
  testEngineHintFiles: string[];
  lineCountExtensions: string[];
  maxLineLength: number;
  ignore: string[];
  licenses: LicenseRule[];
}

function isMetricGroupName(value: unknown): value is MetricGroupName {
  return METRIC_GROUP_NAMES.some((name) => name === value);
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`${source}: '${key}' must be an array of strings`);
  }
  return value;
}

function readLicenseRules(raw: unknown, source: string): LicenseRule[] {
  if (!Array.isArray(raw)) {
    throw new Error(`${source}: license table must be a JSON array`);
  }
  return raw.map((entry: unknown, index) => {
    if (
      typeof entry !== "object" ||
      entry === null ||
      !("name" in entry) ||
      typeof entry.name !== "string" ||
      !("patterns" in entry) ||
      !Array.isArray(entry.patterns) ||
      !entry.patterns.every((pattern: unknown) => typeof pattern === "string")
    ) {
      throw new Error(`${source}: license entry #${index} needs a 'name' and a 'patterns' string array`);
    }
    const patterns: string[] = entry.patterns.map((pattern: string) => pattern.toLowerCase());
    return { name: entry.name, patterns };
  });
}

export function parseMetricsConfig(raw: unknown, licenses: LicenseRule[], source = "metrics config"): MetricsConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${source}: must be a JSON object`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const groups = readStringList(record, "groups", source);
  const unknownGroups = groups.filter((group) => !isMetricGroupName(group));
  if (unknownGroups.length > 0) {
    throw new Error(
      `${source}: unknown metric group(s) ${unknownGroups.join(", ")}. Known groups: ${METRIC_GROUP_NAMES.join(", ")}`
    );
  }

  const maxLineLength = record.maxLineLength;
  if (typeof maxLineLength !== "number" || !Number.isInteger(maxLineLength) || maxLineLength <= 0) {
    throw new Error(`${source}: 'maxLineLength' must be a positive integer`);
  }

  return {
    groups: groups.filter(isMetricGroupName),
    typicalFiles: readStringList(record, "typicalFiles", source),
    typicalDirs: readStringList(record, "typicalDirs", source).map((dir) => dir.replace(/\/+$/, "")),
    licenseFiles: readStringList(record, "licenseFiles", source),
    testEngines: readStringList(record, "testEngines", source),
    testEngineHintFiles: readStringList(record, "testEngineHintFiles", source),
    lineCountExtensions: readStringList(record, "lineCountExtensions", source).map((ext) =>
      ext.replace(/^\./, "").toLowerCase()
    ),
    maxLineLength,
    ignore: readStringList(record, "ignore", source),
    licenses,
  };
}

export async function loadMetricsConfig(
  configPath: string = DEFAULT_METRICS_CONFIG_PATH,
  licensesPath: string = DEFAULT_LICENSES_PATH
): Promise<MetricsConfig> {
  const resolvedConfig = path.resolve(configPath);
  const resolvedLicenses = path.resolve(licensesPath);
  for (const filePath of [resolvedConfig, resolvedLicenses]) {
    if (!(await fs.pathExists(filePath))) {
      throw new Error(`Configuration file not found: ${filePath}`);
    }
  }
  const licenses = readLicenseRules(await fs.readJson(resolvedLicenses), resolvedLicenses);
  return parseMetricsConfig(await fs.readJson(resolvedConfig), licenses, resolvedConfig);
}

export function selectGroups(config: MetricsConfig, only?: string): MetricGroupName[] {
  if (!only) {
    return config.groups;
  }
  return config.groups.filter((group) => group.includes(only));
}

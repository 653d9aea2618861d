import type { MetricGroupName, MetricsConfig } from "../config";
import { countShebangs, dunderFuture } from "./headers";
import { hasTypicalDirs, hasTypicalFiles } from "./layout";
import { inferLicense } from "./license";
import { countLinesOfCode } from "./lines";
import { pythonStyle } from "./python-style";
import { inferRequirements } from "./requirements";
import { loadProjectTree } from "./sources";
import { detectTestEngine } from "./test-engine";
import type { MetricGroup, StyleMetrics } from "./types";

export const METRIC_GROUPS: Record<MetricGroupName, MetricGroup> = {
  has_file: hasTypicalFiles,
  has_dir: hasTypicalDirs,
  license: inferLicense,
  test_engine: detectTestEngine,
  shebang: countShebangs,
  dunder_future: dunderFuture,
  lines_of_code: countLinesOfCode,
  requirements: inferRequirements,
  python_style: pythonStyle,
};

export function sortMetrics(metrics: StyleMetrics): StyleMetrics {
  return Object.fromEntries(Object.entries(metrics).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export async function analyzeProject(
  root: string,
  config: MetricsConfig,
  groups: MetricGroupName[] = config.groups
): Promise<StyleMetrics> {
  const tree = await loadProjectTree(root, config.ignore);
  const metrics: StyleMetrics = {};
  for (const group of groups) {
    Object.assign(metrics, await METRIC_GROUPS[group](tree, config));
  }
  return sortMetrics(metrics);
}

export type { MetricValue, StyleMetrics } from "./types";

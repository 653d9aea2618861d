import type { MetricsConfig } from "../config";

export type MetricValue = number | string | boolean;

export type StyleMetrics = Record<string, MetricValue>;

export interface PythonSource {
  path: string;
  text: string;
}

export interface ProjectTree {
  root: string;
  files: string[];
  pythonSources: PythonSource[];
}

export type MetricGroup = (tree: ProjectTree, config: MetricsConfig) => Promise<StyleMetrics>;

export function percent(part: number, total: number): number {
  return total > 0 ? Math.trunc((100 * part) / total) : 0;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

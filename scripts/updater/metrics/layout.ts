import path from "node:path";
import fs from "fs-extra";

import { errorCode } from "./sources";
import type { MetricGroup, StyleMetrics } from "./types";

async function isKind(target: string, kind: "file" | "dir"): Promise<boolean> {
  try {
    const stat = await fs.stat(target);
    return kind === "file" ? stat.isFile() : stat.isDirectory();
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

export const hasTypicalFiles: MetricGroup = async (tree, config) => {
  const metrics: StyleMetrics = {};
  for (const file of config.typicalFiles) {
    metrics[`file:${file}`] = (await isKind(path.join(tree.root, file), "file")) ? 1 : 0;
  }
  return metrics;
};

export const hasTypicalDirs: MetricGroup = async (tree, config) => {
  const metrics: StyleMetrics = {};
  for (const dir of config.typicalDirs) {
    metrics[`dir:${dir}/`] = (await isKind(path.join(tree.root, dir), "dir")) ? 1 : 0;
  }
  return metrics;
};

import path from "node:path";
import fs from "fs-extra";

import { AnalysisError, describeError } from "../../shared/errors";
import { errorCode } from "./sources";
import type { MetricGroup, StyleMetrics } from "./types";

const NEWLINE = 0x0a;

// raw bytes, so any encoding is accepted
export function countBufferLines(buffer: Buffer): number {
  if (buffer.length === 0) {
    return 0;
  }
  let lines = 0;
  for (const byte of buffer) {
    if (byte === NEWLINE) {
      lines += 1;
    }
  }
  return buffer[buffer.length - 1] === NEWLINE ? lines : lines + 1;
}

export const countLinesOfCode: MetricGroup = async (tree, config) => {
  const extensions = new Set(config.lineCountExtensions);
  const totals = new Map<string, number>();

  for (const file of tree.files) {
    const extension = path.extname(file).slice(1).toLowerCase();
    if (!extension || !extensions.has(extension)) {
      continue;
    }
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(path.join(tree.root, file));
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        continue;
      }
      throw new AnalysisError(`Cannot read ${file}: ${describeError(error)}`, { cause: error });
    }
    const key = `lines_of:${extension}`;
    totals.set(key, (totals.get(key) ?? 0) + countBufferLines(buffer));
  }

  const metrics: StyleMetrics = Object.fromEntries(totals);
  return metrics;
};

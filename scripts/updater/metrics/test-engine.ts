import path from "node:path";

import { readTextIfFile } from "./sources";
import type { MetricGroup } from "./types";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export const detectTestEngine: MetricGroup = async (tree, config) => {
  const matchers = config.testEngines.map((engine) => ({
    engine,
    pattern: new RegExp(`\\b${escapeRegExp(engine)}`, "i"),
  }));
  const hits = new Map<string, number>();

  for (const fileName of config.testEngineHintFiles) {
    const text = await readTextIfFile(path.join(tree.root, fileName));
    if (text === null) {
      continue;
    }
    for (const { engine, pattern } of matchers) {
      if (pattern.test(text)) {
        hits.set(engine, (hits.get(engine) ?? 0) + 1);
      }
    }
  }

  let best = "";
  let bestCount = 0;
  for (const engine of config.testEngines) {
    const count = hits.get(engine) ?? 0;
    if (count > bestCount) {
      best = engine;
      bestCount = count;
    }
  }
  return { test_engine: best };
};

import { percent, type MetricGroup, type StyleMetrics } from "./types";

const INTERPRETER = /python[0-9.]*/i;

export const countShebangs: MetricGroup = async (tree) => {
  const interpreters = new Map<string, number>();
  let withShebang = 0;

  for (const source of tree.pythonSources) {
    if (!source.text.startsWith("#!")) {
      continue;
    }
    withShebang += 1;
    const firstLine = source.text.split("\n", 1)[0];
    const match = INTERPRETER.exec(firstLine);
    if (match) {
      const key = `shebang:${match[0].toLowerCase()}`;
      interpreters.set(key, (interpreters.get(key) ?? 0) + 1);
    }
  }

  const metrics: StyleMetrics = Object.fromEntries(interpreters);
  metrics.shebangs_pct = percent(withShebang, tree.pythonSources.length);
  return metrics;
};

export const dunderFuture: MetricGroup = async (tree) => {
  const found = tree.pythonSources.filter((source) => source.text.includes("from __future__ import")).length;
  return { dunder_future_pct: percent(found, tree.pythonSources.length) };
};

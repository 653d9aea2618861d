import path from "node:path";

import type { LicenseRule } from "../config";
import { readTextIfFile } from "./sources";
import type { MetricGroup } from "./types";

export function normalizeLicenseText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

// rules are ordered most specific first
export function identifyLicense(text: string, rules: LicenseRule[]): string | null {
  const normalized = normalizeLicenseText(text);
  const rule = rules.find((candidate) => candidate.patterns.every((pattern) => normalized.includes(pattern)));
  return rule?.name ?? null;
}

export const inferLicense: MetricGroup = async (tree, config) => {
  for (const fileName of config.licenseFiles) {
    const text = await readTextIfFile(path.join(tree.root, fileName));
    if (text === null) {
      continue;
    }
    const license = identifyLicense(text, config.licenses);
    if (license) {
      return { license };
    }
    console.warn(`⚠️  Unknown license in ${path.join(tree.root, fileName)}`);
  }
  return { license: "" };
};

import path from "node:path";
import { parse as parseToml, TomlError } from "smol-toml";

import { describeError } from "../../shared/errors";
import { normalizePackageName } from "../../shared/project";
import { readTextIfFile } from "./sources";
import type { MetricGroup } from "./types";

const REQUIREMENT_NAME = /^([A-Za-z0-9][A-Za-z0-9._-]*)/;
const REQUIREMENTS_FILE = /^(?:.*[-_])?requirements(?:[-_].*)?\.txt$/i;

export function requirementName(line: string): string | null {
  const withoutComment = line.split("#", 1)[0].trim();
  if (!withoutComment || withoutComment.startsWith("-") || withoutComment.includes("://")) {
    return null;
  }
  const match = REQUIREMENT_NAME.exec(withoutComment);
  return match ? normalizePackageName(match[1]) : null;
}

export function parseRequirementsTxt(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(requirementName)
    .filter((name): name is string => name !== null);
}

function readStringArray(text: string, fromIndex: number): string[] {
  const values: string[] = [];
  let quote: string | null = null;
  let current = "";
  for (let index = fromIndex; index < text.length; index += 1) {
    const char = text[index];
    if (quote) {
      if (char === "\\") {
        current += text[index + 1] ?? "";
        index += 1;
      } else if (char === quote) {
        values.push(current);
        quote = null;
        current = "";
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "#") {
      const lineEnd = text.indexOf("\n", index);
      index = lineEnd === -1 ? text.length : lineEnd;
    } else if (char === "]") {
      break;
    }
  }
  return values;
}

export function parseSetupCfg(text: string): string[] {
  const names: string[] = [];
  const lines = text.split(/\r?\n/);
  let section = "";
  for (let index = 0; index < lines.length; index += 1) {
    const sectionHeader = /^\[([^\]]+)\]\s*$/.exec(lines[index]);
    if (sectionHeader) {
      section = sectionHeader[1].trim();
      continue;
    }
    const header = /^install_requires\s*=\s*(.*)$/.exec(lines[index]);
    if (section !== "options" || !header) {
      continue;
    }
    const values = [header[1]];
    for (index += 1; index < lines.length && /^\s+\S/.test(lines[index]); index += 1) {
      values.push(lines[index]);
    }
    index -= 1;
    for (const value of values) {
      for (const part of value.split(";")[0].split(",")) {
        const name = requirementName(part);
        if (name) {
          names.push(name);
        }
      }
    }
  }
  return names;
}

type TomlTable = ReturnType<typeof parseToml>;

function tableAt(root: TomlTable, keys: string[]): TomlTable | null {
  let current: TomlTable = root;
  for (const key of keys) {
    const next = current[key];
    if (typeof next !== "object" || next === null || Array.isArray(next) || next instanceof Date) {
      return null;
    }
    current = next;
  }
  return current;
}

// PEP 621 `project.dependencies`, plus Poetry's dependency table.
export function parsePyprojectDependencies(text: string): string[] {
  const document = parseToml(text);
  const names: string[] = [];

  const dependencies = tableAt(document, ["project"])?.dependencies;
  if (Array.isArray(dependencies)) {
    for (const entry of dependencies) {
      const name = typeof entry === "string" ? requirementName(entry) : null;
      if (name) {
        names.push(name);
      }
    }
  }

  const poetry = tableAt(document, ["tool", "poetry", "dependencies"]);
  for (const key of Object.keys(poetry ?? {})) {
    const name = key.toLowerCase() === "python" ? null : requirementName(key);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

export function parseSetupPy(text: string): string[] {
  const match = /install_requires\s*=\s*\[/.exec(text);
  if (!match) {
    return [];
  }
  return readStringArray(text, match.index + match[0].length)
    .map(requirementName)
    .filter((name): name is string => name !== null);
}

export const inferRequirements: MetricGroup = async (tree) => {
  const names = new Set<string>();
  const add = (found: string[]) => found.forEach((name) => names.add(name));

  const topLevel = tree.files.filter((file) => !file.includes("/"));
  for (const file of topLevel.filter((candidate) => REQUIREMENTS_FILE.test(candidate))) {
    const text = await readTextIfFile(path.join(tree.root, file));
    if (text !== null) {
      add(parseRequirementsTxt(text));
    }
  }

  const parsers: Array<[string, (text: string) => string[]]> = [
    ["setup.cfg", parseSetupCfg],
    ["setup.py", parseSetupPy],
    ["pyproject.toml", parsePyprojectDependencies],
  ];
  for (const [file, parse] of parsers) {
    const text = await readTextIfFile(path.join(tree.root, file));
    if (text === null) {
      continue;
    }
    try {
      add(parse(text));
    } catch (error) {
      if (!(error instanceof TomlError)) {
        throw error;
      }
      console.warn(`⚠️  Ignoring ${file} of ${tree.root}: ${describeError(error)}`);
    }
  }

  const sorted = Array.from(names).sort();
  return { requirements: sorted.join(","), requirements_count: sorted.length };
};

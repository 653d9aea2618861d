import { constants } from "node:fs";
import path from "node:path";
import fs from "fs-extra";

import { PersistenceError, describeError } from "../shared/errors";
import { sortMetrics, type StyleMetrics } from "./metrics";
import type { ProjectDocument, WriteOutcome } from "./types";

function isMetricValue(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toDocument(raw: unknown): ProjectDocument | null {
  if (typeof raw !== "object" || raw === null) {
    return null;
  }
  if (!("project" in raw) || typeof raw.project !== "string" || !("metrics" in raw)) {
    return null;
  }
  const { metrics } = raw;
  if (typeof metrics !== "object" || metrics === null || Array.isArray(metrics)) {
    return null;
  }
  const values: StyleMetrics = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (isMetricValue(value)) {
      values[key] = value;
    }
  }
  const commit = "commit" in raw && typeof raw.commit === "string" ? raw.commit : null;
  const date = "date" in raw && typeof raw.date === "string" ? raw.date : null;
  return { project: raw.project, commit, date, metrics: values };
}

export async function readDocument(filePath: string): Promise<ProjectDocument | null> {
  if (!(await fs.pathExists(filePath))) {
    return null;
  }
  try {
    const document = toDocument(await fs.readJson(filePath));
    if (!document) {
      console.warn(`⚠️  Ignoring malformed document ${filePath}`);
    }
    return document;
  } catch (error) {
    console.warn(`⚠️  Ignoring unreadable document ${filePath}: ${describeError(error)}`);
    return null;
  }
}

export function serializeDocument(document: ProjectDocument): string {
  const ordered: ProjectDocument = {
    project: document.project,
    commit: document.commit,
    date: document.date,
    metrics: sortMetrics(document.metrics),
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

export function mergeDocuments(previous: ProjectDocument | null, next: ProjectDocument): ProjectDocument {
  if (!previous) {
    return next;
  }
  if (previous.project !== next.project) {
    console.warn(`⚠️  Replacing document of ${previous.project} found at the path of ${next.project}`);
    return next;
  }
  return { ...next, metrics: sortMetrics({ ...previous.metrics, ...next.metrics }) };
}

// temporary file + rename; identical content is left untouched
export async function writeDocument(filePath: string, document: ProjectDocument): Promise<WriteOutcome> {
  const content = serializeDocument(document);
  const temporaryPath = `${filePath}.${process.pid}.tmp`;
  let staged = false;
  try {
    if ((await fs.pathExists(filePath)) && (await fs.readFile(filePath, "utf8")) === content) {
      return "unchanged";
    }
    await fs.ensureDir(path.dirname(filePath));
    staged = true;
    await fs.writeFile(temporaryPath, content, "utf8");
    await fs.move(temporaryPath, filePath, { overwrite: true });
    return "written";
  } catch (error) {
    if (staged) {
      await fs.remove(temporaryPath);
    }
    throw new PersistenceError(`Cannot write ${filePath}: ${describeError(error)}`, { cause: error });
  }
}

export async function prepareDataDir(dataDir: string): Promise<void> {
  try {
    await fs.ensureDir(dataDir);
    await fs.access(dataDir, constants.W_OK);
  } catch (error) {
    throw new PersistenceError(`Data directory ${dataDir} is not writable: ${describeError(error)}`, {
      cause: error,
    });
  }
}

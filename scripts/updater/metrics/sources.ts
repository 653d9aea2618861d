import { isUtf8 } from "node:buffer";
import path from "node:path";
import fs from "fs-extra";
import { glob } from "glob";

import { AnalysisError, describeError } from "../../shared/errors";
import type { ProjectTree, PythonSource } from "./types";

export function errorCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

async function readPythonSource(root: string, relativePath: string): Promise<PythonSource | null> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(path.join(root, relativePath));
  } catch (error) {
    // Dangling symlinks are common in clones and carry no source.
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw new AnalysisError(`Cannot read ${relativePath}: ${describeError(error)}`, { cause: error });
  }
  if (!isUtf8(buffer)) {
    throw new AnalysisError(`${relativePath} is not valid UTF-8`);
  }
  return { path: relativePath, text: buffer.toString("utf8").replace(/^\uFEFF/, "") };
}

export async function loadProjectTree(root: string, ignore: string[]): Promise<ProjectTree> {
  const files = (
    await glob("**/*", { cwd: root, nodir: true, dot: true, ignore, posix: true })
  ).sort();

  const pythonSources: PythonSource[] = [];
  for (const file of files) {
    if (!file.endsWith(".py")) {
      continue;
    }
    const source = await readPythonSource(root, file);
    if (source) {
      pythonSources.push(source);
    }
  }

  if (pythonSources.length === 0) {
    throw new AnalysisError("no Python source files");
  }

  return { root, files, pythonSources };
}

export async function readTextIfFile(filePath: string): Promise<string | null> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return null;
    }
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
  return fs.readFile(filePath, "utf8");
}

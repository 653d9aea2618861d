import path from "node:path";
import fs from "fs-extra";

import type { RepositoryLocation } from "./project";

// either the root holding host directories or one host directory itself
function isHostName(name: string): boolean {
  return name.includes(".") && !name.startsWith(".");
}

export function documentPath(dataDir: string, location: RepositoryLocation): string {
  const root = path.resolve(dataDir);
  const base = path.basename(root) === location.host ? root : path.join(root, location.host);
  return path.join(base, location.owner, `${location.name}.json`);
}

async function listDirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();
}

export async function listDocumentedProjects(dataDir: string): Promise<RepositoryLocation[]> {
  const root = path.resolve(dataDir);
  if (!(await fs.pathExists(root))) {
    throw new Error(`Data directory not found: ${root}`);
  }

  const hostDirs = isHostName(path.basename(root))
    ? [{ host: path.basename(root), dir: root }]
    : (await listDirectories(root)).filter(isHostName).map((host) => ({ host, dir: path.join(root, host) }));

  const projects: RepositoryLocation[] = [];
  for (const { host, dir } of hostDirs) {
    for (const owner of await listDirectories(dir)) {
      const entries = await fs.readdir(path.join(dir, owner), { withFileTypes: true });
      const names = entries
        .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
        .map((entry) => entry.name.slice(0, -".json".length))
        .sort();
      for (const name of names) {
        projects.push({ host, owner, name });
      }
    }
  }
  return projects;
}

import path from "node:path";
import fs from "fs-extra";

import type { RepositoryLocation } from "../shared/project";

async function listVisibleDirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();
}

export async function listProjects(clonesDir: string): Promise<RepositoryLocation[]> {
  if (!(await fs.pathExists(clonesDir))) {
    throw new Error(`Clones directory not found: ${clonesDir}`);
  }
  const projects: RepositoryLocation[] = [];
  for (const host of await listVisibleDirectories(clonesDir)) {
    for (const owner of await listVisibleDirectories(path.join(clonesDir, host))) {
      for (const name of await listVisibleDirectories(path.join(clonesDir, host, owner))) {
        projects.push({ host, owner, name });
      }
    }
  }
  return projects;
}

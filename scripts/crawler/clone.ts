import path from "node:path";
import fs from "fs-extra";

import { CloneError, describeError } from "../shared/errors";
import type { GitRunner } from "../shared/git";

export type CloneOutcome = "cloned" | "updated";

export interface CloneOptions {
  timeoutMs?: number;
  debug?: boolean;
}

export async function cloneOrUpdate(
  git: GitRunner,
  cloneUrl: string,
  clonePath: string,
  options: CloneOptions = {}
): Promise<CloneOutcome> {
  if (await fs.pathExists(clonePath)) {
    if (await fs.pathExists(path.join(clonePath, ".git"))) {
      if (options.debug) {
        console.log(`[git] pull --ff-only ${clonePath}`);
      }
      try {
        await git(["-C", clonePath, "pull", "--ff-only", "--quiet"], { timeoutMs: options.timeoutMs });
      } catch (error) {
        throw new CloneError(`Update of ${clonePath} failed: ${describeError(error)}`, { cause: error });
      }
      return "updated";
    }
    console.warn(`⚠️  ${clonePath} is not a git checkout, cloning it again`);
    await fs.remove(clonePath);
  }

  await fs.ensureDir(path.dirname(clonePath));
  if (options.debug) {
    console.log(`[git] clone ${cloneUrl} ${clonePath}`);
  }
  try {
    await git(["clone", "--quiet", cloneUrl, clonePath], { timeoutMs: options.timeoutMs });
  } catch (error) {
    await fs.remove(clonePath);
    throw new CloneError(`Clone of ${cloneUrl} failed: ${describeError(error)}`, { cause: error });
  }
  return "cloned";
}

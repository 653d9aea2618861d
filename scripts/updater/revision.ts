import path from "node:path";
import fs from "fs-extra";

import { AnalysisError, describeError } from "../shared/errors";
import { checkout, listCommits, readHeadRevision, type GitRunner } from "../shared/git";
import type { RevisionMode } from "./types";

export interface AnalyzedRevision<T> {
  commit: string | null;
  date: string | null;
  result: T;
}

export interface RevisionOptions {
  mode: RevisionMode;
  recordedCommit?: string | null;
  pickCommit?: (commits: string[]) => string;
  debug?: boolean;
}

export function pickRandomCommit(commits: string[]): string {
  return commits[Math.floor(Math.random() * commits.length)];
}

async function currentRef(git: GitRunner, repoPath: string): Promise<string> {
  const { stdout: branch } = await git(["-C", repoPath, "rev-parse", "--abbrev-ref", "HEAD"]);
  if (branch.trim() !== "HEAD") {
    return branch.trim();
  }
  const { stdout: commit } = await git(["-C", repoPath, "rev-parse", "HEAD"]);
  return commit.trim();
}

async function targetCommit(
  git: GitRunner,
  repoPath: string,
  head: string,
  options: RevisionOptions
): Promise<string> {
  if (options.mode === "random") {
    const commits = await listCommits(git, repoPath, head);
    if (commits.length === 0) {
      throw new AnalysisError(`${repoPath} has no commits`);
    }
    return (options.pickCommit ?? pickRandomCommit)(commits);
  }
  if (options.mode === "recorded" && options.recordedCommit) {
    return options.recordedCommit;
  }
  return head;
}

// the original checkout is restored whatever the outcome
export async function withRevision<T>(
  git: GitRunner,
  repoPath: string,
  options: RevisionOptions,
  analyze: () => Promise<T>
): Promise<AnalyzedRevision<T>> {
  if (!(await fs.pathExists(path.join(repoPath, ".git")))) {
    if (options.mode !== "head") {
      console.warn(`⚠️  ${repoPath} is not a git checkout; analysing the tree as it is`);
    }
    return { commit: null, date: null, result: await analyze() };
  }

  const head = await readHeadRevision(git, repoPath);
  const target = await targetCommit(git, repoPath, head.commit, options);
  if (target === head.commit) {
    return { ...head, result: await analyze() };
  }

  const original = await currentRef(git, repoPath);
  if (options.debug) {
    console.log(`[${repoPath}] [revision] checking out ${target} (was ${original})`);
  }
  await checkout(git, repoPath, target).catch((error: unknown) => {
    throw new AnalysisError(`Cannot check out ${target}: ${describeError(error)}`, { cause: error });
  });
  try {
    const revision = await readHeadRevision(git, repoPath);
    return { ...revision, result: await analyze() };
  } finally {
    await checkout(git, repoPath, original);
  }
}

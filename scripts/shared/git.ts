import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const DEFAULT_GIT_TIMEOUT_MS = 10 * 60 * 1000;
const MAX_BUFFER = 16 * 1024 * 1024;

export interface GitRunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface GitOutput {
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<GitOutput>;

export class GitError extends Error {
  readonly args: string[];
  readonly stderr: string;

  constructor(args: string[], stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim().split("\n").pop() ?? "";
    super(`git ${args.join(" ")} failed${detail ? `: ${detail}` : ""}`, options);
    this.name = "GitError";
    this.args = args;
    this.stderr = stderr;
  }
}

function readStderr(error: unknown): string {
  if (error && typeof error === "object" && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string") {
      return stderr;
    }
    if (Buffer.isBuffer(stderr)) {
      return stderr.toString("utf8");
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export const runGit: GitRunner = async (args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync("git", args, {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
      maxBuffer: MAX_BUFFER,
      env: {
        ...process.env,
        GIT_TERMINAL_PROMPT: "0",
        GIT_ASKPASS: "/bin/true",
      },
    });
    return { stdout, stderr };
  } catch (error) {
    throw new GitError(args, readStderr(error), { cause: error });
  }
};

export interface RevisionInfo {
  commit: string;
  date: string;
}

export async function readHeadRevision(git: GitRunner, repoPath: string): Promise<RevisionInfo> {
  const { stdout: commit } = await git(["-C", repoPath, "rev-parse", "HEAD"]);
  const { stdout: date } = await git(["-C", repoPath, "show", "-s", "--format=%cI", "HEAD"]);
  return { commit: commit.trim(), date: date.trim() };
}

export async function listCommits(git: GitRunner, repoPath: string, from: string): Promise<string[]> {
  const { stdout } = await git(["-C", repoPath, "rev-list", from]);
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function checkout(git: GitRunner, repoPath: string, revision: string): Promise<void> {
  await git(["-C", repoPath, "checkout", "--quiet", "--force", revision]);
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { CloneError } from "../shared/errors";
import { GitError, type GitRunOptions } from "../shared/git";
import { cloneOrUpdate } from "./clone";

const URL = "https://github.com/owner/project.git";

describe("cloneOrUpdate", () => {
  let tmpDir: string;
  let clonePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "pystyle-clone-"));
    clonePath = path.join(tmpDir, "github.com", "owner", "project");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tmpDir);
  });

  it("clones a missing checkout", async () => {
    const git = vi.fn(async (args: string[], _options?: GitRunOptions) => {
      await fs.ensureDir(path.join(args[3], ".git"));
      return { stdout: "", stderr: "" };
    });

    await expect(cloneOrUpdate(git, URL, clonePath, { timeoutMs: 5000 })).resolves.toBe("cloned");
    expect(git).toHaveBeenCalledWith(["clone", "--quiet", URL, clonePath], { timeoutMs: 5000 });
  });

  it("pulls an existing checkout instead of cloning again", async () => {
    await fs.ensureDir(path.join(clonePath, ".git"));
    await fs.outputFile(path.join(clonePath, "setup.py"), "");
    const git = vi.fn(async (_args: string[], _options?: GitRunOptions) => ({ stdout: "", stderr: "" }));

    await expect(cloneOrUpdate(git, URL, clonePath)).resolves.toBe("updated");
    expect(git).toHaveBeenCalledTimes(1);
    expect(git.mock.calls[0][0]).toEqual(["-C", clonePath, "pull", "--ff-only", "--quiet"]);
    expect(await fs.pathExists(path.join(clonePath, "setup.py"))).toBe(true);
  });

  it("keeps the checkout when the pull fails", async () => {
    await fs.ensureDir(path.join(clonePath, ".git"));
    const git = vi.fn(async (args: string[], _options?: GitRunOptions) => {
      throw new GitError(args, "fatal: Not possible to fast-forward, aborting.\n");
    });

    const attempt = cloneOrUpdate(git, URL, clonePath);

    await expect(attempt).rejects.toBeInstanceOf(CloneError);
    await expect(attempt).rejects.toThrow(
      `Update of ${clonePath} failed: git -C ${clonePath} pull --ff-only --quiet failed: fatal: Not possible to fast-forward, aborting.`
    );
    expect(await fs.pathExists(path.join(clonePath, ".git"))).toBe(true);
  });

  it("removes a partial directory when the clone fails", async () => {
    const git = vi.fn(async (args: string[], _options?: GitRunOptions) => {
      await fs.ensureDir(args[3]);
      throw new GitError(args, "fatal: repository not found\n");
    });

    await expect(cloneOrUpdate(git, URL, clonePath)).rejects.toThrow(`Clone of ${URL} failed`);
    expect(await fs.pathExists(clonePath)).toBe(false);
  });

  it("replaces a directory that is not a git checkout", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await fs.outputFile(path.join(clonePath, "stale.txt"), "left over");
    const git = vi.fn(async (_args: string[], _options?: GitRunOptions) => ({ stdout: "", stderr: "" }));

    await expect(cloneOrUpdate(git, URL, clonePath)).resolves.toBe("cloned");
    expect(await fs.pathExists(path.join(clonePath, "stale.txt"))).toBe(false);
  });
});

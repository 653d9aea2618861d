import { describe, it, expect, vi } from "vitest";
import type { Octokit } from "@octokit/rest";
import { ResolutionError } from "../shared/errors";
import { createGithubVerifier } from "./github";

function fakeOctokit(get: (params: { owner: string; repo: string }) => Promise<unknown>) {
  return { repos: { get: vi.fn(get) } } as unknown as Octokit;
}

const location = { host: "github.com", owner: "owner", name: "project" };

describe("createGithubVerifier", () => {
  it("returns the canonical location and default branch", async () => {
    const verify = createGithubVerifier(
      fakeOctokit(async () => ({
        data: {
          private: false,
          full_name: "renamed/project",
          html_url: "https://github.com/renamed/project",
          default_branch: "main",
        },
      }))
    );

    await expect(verify(location)).resolves.toEqual({
      location: { host: "github.com", owner: "renamed", name: "project" },
      defaultBranch: "main",
    });
  });

  it("rejects private repositories", async () => {
    const verify = createGithubVerifier(
      fakeOctokit(async () => ({
        data: {
          private: true,
          full_name: "owner/project",
          html_url: "https://github.com/owner/project",
          default_branch: "main",
        },
      }))
    );

    await expect(verify(location)).rejects.toThrow("Repository owner/project is private");
  });

  it("maps missing repositories and API failures to resolution errors", async () => {
    const missing = createGithubVerifier(
      fakeOctokit(async () => {
        throw Object.assign(new Error("Not Found"), { status: 404 });
      })
    );
    const failing = createGithubVerifier(
      fakeOctokit(async () => {
        throw Object.assign(new Error("Server Error"), { status: 500 });
      })
    );

    await expect(missing(location)).rejects.toThrow("Repository owner/project not found");
    await expect(failing(location)).rejects.toBeInstanceOf(ResolutionError);
    await expect(failing(location)).rejects.toThrow("GitHub lookup for owner/project failed: Server Error");
  });

  it("refuses hosts other than GitHub", async () => {
    const verify = createGithubVerifier(fakeOctokit(async () => ({ data: {} })));

    await expect(verify({ host: "gitlab.com", owner: "owner", name: "project" })).rejects.toThrow(
      "Cannot verify repositories hosted on gitlab.com"
    );
  });
});

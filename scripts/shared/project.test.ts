import { describe, it, expect } from "vitest";
import path from "node:path";
import {
  clonePathFor,
  normalizePackageName,
  parseGithubUrl,
  projectKey,
  toCloneUrl,
  toRepositoryUrl,
} from "./project";

describe("parseGithubUrl", () => {
  it("extracts owner and name from project URLs", () => {
    expect(parseGithubUrl("https://github.com/psf/requests")).toEqual({
      host: "github.com",
      owner: "psf",
      name: "requests",
    });
    expect(parseGithubUrl("http://www.github.com/pallets/flask.git")).toEqual({
      host: "github.com",
      owner: "pallets",
      name: "flask",
    });
    expect(parseGithubUrl("https://github.com/owner/project/tree/main/docs")?.name).toBe("project");
  });

  it("rejects non-project URLs", () => {
    expect(parseGithubUrl("https://gitlab.com/owner/project")).toBeNull();
    expect(parseGithubUrl("https://github.com/owner")).toBeNull();
    expect(parseGithubUrl("https://github.com/sponsors/someone")).toBeNull();
    expect(parseGithubUrl("https://github.com/owner/..")).toBeNull();
  });
});

describe("project keys and paths", () => {
  const location = { host: "github.com", owner: "owner", name: "project" };

  it("builds URLs, keys and clone paths from one location", () => {
    expect(toRepositoryUrl(location)).toBe("https://github.com/owner/project");
    expect(toCloneUrl(location)).toBe("https://github.com/owner/project.git");
    expect(projectKey(location)).toBe("github.com/owner/project");
    expect(clonePathFor("/clones", location)).toBe(path.join("/clones", "github.com", "owner", "project"));
  });
});

describe("normalizePackageName", () => {
  it("lowercases and collapses separators", () => {
    expect(normalizePackageName("Zope.Interface")).toBe("zope-interface");
    expect(normalizePackageName("typing__extensions")).toBe("typing-extensions");
    expect(normalizePackageName(" Django ")).toBe("django");
  });
});

import path from "node:path";

export interface RepositoryLocation {
  host: string;
  owner: string;
  name: string;
}

const SAFE_SEGMENT = /^[A-Za-z0-9_.-]+$/;
const GITHUB_PROJECT_URL = /^https?:\/\/(?:www\.)?github\.com\/([^/\s?#]+)\/([^/\s?#]+)/i;

// Path segments under github.com/<owner>/ that are not repositories.
const RESERVED_OWNERS = new Set(["sponsors", "orgs", "features", "marketplace", "topics", "about"]);

export function parseGithubUrl(url: string): RepositoryLocation | null {
  const match = GITHUB_PROJECT_URL.exec(url.trim());
  if (!match) {
    return null;
  }
  const owner = match[1];
  const name = match[2].replace(/\.git$/i, "");
  if (!isSafeSegment(owner) || !isSafeSegment(name) || RESERVED_OWNERS.has(owner.toLowerCase())) {
    return null;
  }
  return { host: "github.com", owner, name };
}

function isSafeSegment(segment: string): boolean {
  return SAFE_SEGMENT.test(segment) && segment !== "." && segment !== "..";
}

export function toRepositoryUrl(location: RepositoryLocation): string {
  return `https://${location.host}/${location.owner}/${location.name}`;
}

export function toCloneUrl(location: RepositoryLocation): string {
  return `${toRepositoryUrl(location)}.git`;
}

export function projectKey(location: RepositoryLocation): string {
  return `${location.host}/${location.owner}/${location.name}`;
}

export function clonePathFor(clonesDir: string, location: RepositoryLocation): string {
  return path.join(clonesDir, location.host, location.owner, location.name);
}

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

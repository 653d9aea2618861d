import { ResolutionError, describeError } from "../shared/errors";
import { parseGithubUrl, toRepositoryUrl } from "../shared/project";
import { fetchJson, HttpStatusError, type FetchOptions } from "./fetch";

const PYPI_JSON_API = "https://pypi.org/pypi";

// project_urls labels that usually point at the source repository, best first.
const SOURCE_LABEL_HINTS = ["source", "repository", "code", "github", "homepage", "home"];

interface PackageInfo {
  projectUrls: Array<[string, string]>;
  homePage: string | null;
  downloadUrl: string | null;
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

export function readPackageInfo(payload: unknown): PackageInfo {
  if (typeof payload !== "object" || payload === null || !("info" in payload)) {
    throw new Error("PyPI response has no 'info' object");
  }
  const { info } = payload;
  if (typeof info !== "object" || info === null) {
    throw new Error("PyPI response has no 'info' object");
  }

  const projectUrls: Array<[string, string]> = [];
  const rawUrls = "project_urls" in info ? info.project_urls : null;
  if (typeof rawUrls === "object" && rawUrls !== null) {
    for (const [label, url] of Object.entries(rawUrls)) {
      const value = asString(url);
      if (value) {
        projectUrls.push([label, value]);
      }
    }
  }

  return {
    projectUrls,
    homePage: "home_page" in info ? asString(info.home_page) : null,
    downloadUrl: "download_url" in info ? asString(info.download_url) : null,
  };
}

function labelRank(label: string): number {
  const normalized = label.toLowerCase();
  const index = SOURCE_LABEL_HINTS.findIndex((hint) => normalized.includes(hint));
  return index === -1 ? SOURCE_LABEL_HINTS.length : index;
}

export function findRepositoryUrl(info: PackageInfo): string | null {
  const ranked = [...info.projectUrls].sort(
    ([a], [b]) => labelRank(a) - labelRank(b) || (a < b ? -1 : a > b ? 1 : 0)
  );
  const candidates = [...ranked.map(([, url]) => url), info.homePage, info.downloadUrl];
  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const location = parseGithubUrl(candidate);
    if (location) {
      return toRepositoryUrl(location);
    }
  }
  return null;
}

export async function resolveRepositoryUrl(
  packageName: string,
  options: FetchOptions = {}
): Promise<string | null> {
  const url = `${PYPI_JSON_API}/${encodeURIComponent(packageName)}/json`;
  let payload: unknown;
  try {
    payload = await fetchJson(url, options);
  } catch (error) {
    if (error instanceof HttpStatusError && error.status === 404) {
      throw new ResolutionError(`PyPI has no project named '${packageName}'`, { cause: error });
    }
    throw new ResolutionError(`PyPI metadata for '${packageName}' unavailable: ${describeError(error)}`, {
      cause: error,
    });
  }
  return findRepositoryUrl(readPackageInfo(payload));
}

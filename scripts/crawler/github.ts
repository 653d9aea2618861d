import { Octokit } from "@octokit/rest";

import { ResolutionError, describeError } from "../shared/errors";
import { parseGithubUrl, type RepositoryLocation } from "../shared/project";
import { RateLimiter } from "./rate-limiter";
import type { RepositoryVerifier } from "./types";

export function createOctokit(token: string | undefined, rateLimiter: RateLimiter): Octokit {
  const octokit = new Octokit(token ? { auth: token } : {});
  octokit.hook.before("request", async () => {
    await rateLimiter.throttle();
  });
  octokit.hook.after("request", (response) => {
    rateLimiter.record(response.headers);
  });
  return octokit;
}

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

export function createGithubVerifier(octokit: Octokit, debug = false): RepositoryVerifier {
  return async (location: RepositoryLocation) => {
    if (location.host !== "github.com") {
      throw new ResolutionError(`Cannot verify repositories hosted on ${location.host}`);
    }

    const slug = `${location.owner}/${location.name}`;
    const { data } = await octokit.repos
      .get({ owner: location.owner, repo: location.name })
      .catch((error: unknown) => {
        const status = statusOf(error);
        if (status === 404 || status === 451) {
          throw new ResolutionError(`Repository ${slug} not found`, { cause: error });
        }
        throw new ResolutionError(`GitHub lookup for ${slug} failed: ${describeError(error)}`, { cause: error });
      });

    if (data.private) {
      throw new ResolutionError(`Repository ${data.full_name} is private`);
    }

    const canonical = parseGithubUrl(data.html_url) ?? location;
    if (debug && (canonical.owner !== location.owner || canonical.name !== location.name)) {
      console.log(`[github] ${slug} moved to ${canonical.owner}/${canonical.name}`);
    }

    return { location: canonical, defaultBranch: data.default_branch };
  };
}

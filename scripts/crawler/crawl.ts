import { constants } from "node:fs";
import fs from "fs-extra";

import { listDocumentedProjects } from "../shared/data-layout";
import { PystyleError, ResolutionError, describeError } from "../shared/errors";
import type { GitRunner } from "../shared/git";
import { runPool } from "../shared/pool";
import {
  clonePathFor,
  parseGithubUrl,
  projectKey,
  toCloneUrl,
  toRepositoryUrl,
} from "../shared/project";
import { cloneOrUpdate } from "./clone";
import type {
  CrawlResult,
  CrawlStatus,
  FeedEntry,
  ProjectRecord,
  RepositoryResolver,
  RepositoryVerifier,
} from "./types";

export interface CrawlDependencies {
  git: GitRunner;
  resolveRepository: RepositoryResolver;
  verifyRepository?: RepositoryVerifier;
}

export interface CrawlOptions {
  clonesDir: string;
  concurrency: number;
  gitTimeoutMs?: number;
  debug?: boolean;
  progress?: boolean;
}

export function projectsFromFeed(entries: FeedEntry[]): ProjectRecord[] {
  return entries.map((entry) => ({ name: entry.name }));
}

export function projectFromRepositoryUrl(url: string): ProjectRecord {
  const location = parseGithubUrl(url);
  if (!location) {
    throw new Error(`Not a GitHub project URL: ${url}`);
  }
  return { name: projectKey(location), repositoryUrl: toRepositoryUrl(location) };
}

export async function projectsFromDataDir(dataDir: string): Promise<ProjectRecord[]> {
  const locations = await listDocumentedProjects(dataDir);
  return locations.map((location) => ({
    name: projectKey(location),
    repositoryUrl: toRepositoryUrl(location),
  }));
}

export async function prepareClonesDir(clonesDir: string): Promise<void> {
  await fs.ensureDir(clonesDir);
  await fs.access(clonesDir, constants.W_OK);
}

interface Attempt {
  repository: string | null;
}

async function crawlProject(
  project: ProjectRecord,
  deps: CrawlDependencies,
  options: CrawlOptions,
  claimed: Set<string>,
  attempt: Attempt
): Promise<CrawlResult> {
  const repositoryUrl = project.repositoryUrl ?? (await deps.resolveRepository(project.name));
  if (!repositoryUrl) {
    return { project: project.name, repository: null, status: "skipped", reason: "no GitHub repository found" };
  }
  attempt.repository = repositoryUrl;

  let location = parseGithubUrl(repositoryUrl);
  if (!location) {
    throw new ResolutionError(`Invalid repository URL: ${repositoryUrl}`);
  }
  attempt.repository = projectKey(location);
  if (deps.verifyRepository) {
    ({ location } = await deps.verifyRepository(location));
  }

  const key = projectKey(location);
  attempt.repository = key;
  if (claimed.has(key)) {
    return { project: project.name, repository: key, status: "skipped", reason: "repository already crawled in this run" };
  }
  claimed.add(key);

  const outcome = await cloneOrUpdate(deps.git, toCloneUrl(location), clonePathFor(options.clonesDir, location), {
    timeoutMs: options.gitTimeoutMs,
    debug: options.debug,
  });
  return { project: project.name, repository: key, status: outcome };
}

export async function crawlProjects(
  projects: ProjectRecord[],
  deps: CrawlDependencies,
  options: CrawlOptions
): Promise<CrawlResult[]> {
  const claimed = new Set<string>();

  return runPool(
    projects,
    async (project, index) => {
      if (options.progress || options.debug) {
        console.log(`[${index + 1}/${projects.length}] Crawling ${project.name}…`);
      }
      const attempt: Attempt = { repository: project.repositoryUrl ?? null };
      try {
        const result = await crawlProject(project, deps, options, claimed, attempt);
        if (result.status === "skipped") {
          console.log(`⏭️  Skipping ${project.name}: ${result.reason}`);
        } else if (options.progress || options.debug) {
          console.log(`✓ ${project.name} ${result.status} (${result.repository})`);
        }
        return result;
      } catch (error) {
        const status: CrawlStatus = error instanceof ResolutionError ? "skipped" : "failed";
        const label = error instanceof PystyleError ? `[${error.stage}] ` : "";
        if (status === "skipped") {
          console.log(`⏭️  Skipping ${project.name}: ${label}${describeError(error)}`);
        } else {
          console.error(`❌ Failed to crawl ${project.name}: ${label}${describeError(error)}`);
          if (options.debug && error instanceof Error) {
            console.error(error.stack);
          }
        }
        return {
          project: project.name,
          repository: attempt.repository,
          status,
          reason: describeError(error),
        };
      }
    },
    options.concurrency
  );
}

export function countByStatus(results: CrawlResult[]): Record<CrawlStatus, number> {
  const counts: Record<CrawlStatus, number> = { cloned: 0, updated: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

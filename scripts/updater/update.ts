import { documentPath } from "../shared/data-layout";
import { AnalysisError, PystyleError, describeError } from "../shared/errors";
import type { GitRunner } from "../shared/git";
import { runPool } from "../shared/pool";
import { clonePathFor, projectKey, type RepositoryLocation } from "../shared/project";
import type { MetricGroupName, MetricsConfig } from "./config";
import { analyzeProject } from "./metrics";
import { listProjects } from "./projects";
import { withRevision } from "./revision";
import { mergeDocuments, prepareDataDir, readDocument, writeDocument } from "./store";
import type { ProjectDocument, RevisionMode, UpdateResult, UpdateStatus } from "./types";

export interface UpdateDependencies {
  git: GitRunner;
  pickCommit?: (commits: string[]) => string;
}

export interface UpdateOptions {
  clonesDir: string;
  dataDir: string;
  config: MetricsConfig;
  groups: MetricGroupName[];
  merge: boolean;
  partial?: boolean;
  revision: RevisionMode;
  concurrency: number;
  debug?: boolean;
  progress?: boolean;
}

export async function updateProject(
  location: RepositoryLocation,
  deps: UpdateDependencies,
  options: UpdateOptions
): Promise<UpdateResult> {
  const key = projectKey(location);
  const target = documentPath(options.dataDir, location);
  const previous =
    options.merge || options.partial || options.revision === "recorded" ? await readDocument(target) : null;

  if (options.partial && !previous) {
    return { project: key, status: "skipped", reason: "no existing document to merge into" };
  }
  if (options.revision === "recorded" && !previous?.commit) {
    return { project: key, status: "skipped", reason: "no recorded commit" };
  }

  const analyzed = await withRevision(
    deps.git,
    clonePathFor(options.clonesDir, location),
    {
      mode: options.revision,
      recordedCommit: previous?.commit,
      pickCommit: deps.pickCommit,
      debug: options.debug,
    },
    () => analyzeProject(clonePathFor(options.clonesDir, location), options.config, options.groups)
  );

  const document: ProjectDocument = {
    project: key,
    commit: analyzed.commit,
    date: analyzed.date,
    metrics: analyzed.result,
  };
  const merged = options.merge || options.partial ? mergeDocuments(previous, document) : document;
  const status = await writeDocument(target, merged);
  if (options.debug) {
    console.log(`[${key}] [persistence] ${status} ${target}`);
  }
  return { project: key, status };
}

export async function updateProjects(deps: UpdateDependencies, options: UpdateOptions): Promise<UpdateResult[]> {
  const projects = await listProjects(options.clonesDir);
  await prepareDataDir(options.dataDir);

  return runPool(
    projects,
    async (location, index) => {
      const key = projectKey(location);
      if (options.progress || options.debug) {
        console.log(`[${index + 1}/${projects.length}] Updating ${key}…`);
      }
      try {
        const result = await updateProject(location, deps, options);
        if (result.status === "skipped") {
          console.log(`⏭️  Skipping ${key}: ${result.reason}`);
        }
        return result;
      } catch (error) {
        const status: UpdateStatus = error instanceof AnalysisError ? "skipped" : "failed";
        const label = error instanceof PystyleError ? `[${error.stage}] ` : "";
        if (status === "skipped") {
          console.log(`⏭️  Skipping ${key}: ${label}${describeError(error)}`);
        } else {
          console.error(`❌ Failed to update ${key}: ${label}${describeError(error)}`);
          if (options.debug && error instanceof Error) {
            console.error(error.stack);
          }
        }
        return { project: key, status, reason: describeError(error) };
      }
    },
    options.concurrency
  );
}

export function countByStatus(results: UpdateResult[]): Record<UpdateStatus, number> {
  const counts: Record<UpdateStatus, number> = { written: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

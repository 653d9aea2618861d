#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import path from "node:path";
import Table from "cli-table3";

import { describeError } from "../shared/errors";
import { runGit } from "../shared/git";
import { envPositiveInt, parsePositiveInt } from "../shared/pool";
import {
  countByStatus,
  crawlProjects,
  prepareClonesDir,
  projectFromRepositoryUrl,
  projectsFromDataDir,
  projectsFromFeed,
} from "./crawl";
import { collectFeedEntries } from "./feed";
import { DEFAULT_TIMEOUT_MS } from "./fetch";
import { createGithubVerifier, createOctokit } from "./github";
import { resolveRepositoryUrl } from "./pypi";
import { RateLimiter } from "./rate-limiter";
import { DEFAULT_FEEDS, type CrawlResult, type ProjectRecord } from "./types";

const CACHE_DIR_NAME = ".pystyle-cache";

const program = new Command();

program
  .name("pystyle-crawl")
  .description("Discover Python projects from PyPI and clone or update their git repositories")
  .argument("<clones-dir>", "Directory to store git clones (created if missing)")
  .option(
    "--feed <url>",
    "RSS feed to read package names from (can be repeated; default: PyPI updates and packages feeds)",
    (value, previous: string[] = []) => {
      previous.push(value);
      return previous;
    }
  )
  .option("--repository <url>", "Crawl a single repository, e.g. https://github.com/owner/project")
  .option("--pypi-project <name>", "Crawl a single PyPI project")
  .option("--reclone <data-dir>", "Clone every project that has a document in the given data directory")
  .option("--refresh", "Ignore cached feed responses")
  .option("--verify", "Check repositories through the GitHub API before cloning (default when GITHUB_TOKEN is set)")
  .option("--no-verify", "Never call the GitHub API")
  .option(
    "--concurrency <number>",
    "Number of projects to crawl in parallel",
    parsePositiveInt("--concurrency"),
    envPositiveInt("CRAWLER_CONCURRENCY", 1)
  )
  .option("--timeout <ms>", "HTTP request timeout in milliseconds", parsePositiveInt("--timeout"), DEFAULT_TIMEOUT_MS)
  .option("--git-timeout <ms>", "Timeout for a single git clone or pull", parsePositiveInt("--git-timeout"))
  .option("-f, --format <type>", "Summary format: table or json", "table")
  .option("--debug", "Enable verbose logging")
  .parse(process.argv);

function outputResults(results: CrawlResult[], format: string) {
  if (format === "json") {
    console.log(JSON.stringify({ results, counts: countByStatus(results) }, null, 2));
    return;
  }

  const table = new Table({ head: ["Project", "Repository", "Status", "Reason"] });
  for (const result of results) {
    table.push([result.project, result.repository ?? "", result.status, result.reason ?? ""]);
  }
  console.log(table.toString());

  const counts = countByStatus(results);
  console.log(
    `\n✅ Crawl complete: ${counts.cloned} cloned, ${counts.updated} updated, ${counts.skipped} skipped, ${counts.failed} failed`
  );
}

async function run() {
  const [clonesArg] = program.args;
  const options = program.opts<{
    feed?: string[];
    repository?: string;
    pypiProject?: string;
    reclone?: string;
    refresh?: boolean;
    verify?: boolean;
    concurrency: number;
    timeout: number;
    gitTimeout?: number;
    format: string;
    debug?: boolean;
  }>();

  const exclusive = [options.repository, options.pypiProject, options.reclone].filter(Boolean);
  if (exclusive.length > 1) {
    throw new Error("--repository, --pypi-project and --reclone are mutually exclusive");
  }
  if (options.format !== "table" && options.format !== "json") {
    throw new Error(`Unknown format '${options.format}'. Use table or json.`);
  }

  const debug = Boolean(options.debug);
  const clonesDir = path.resolve(clonesArg);
  await prepareClonesDir(clonesDir);

  const fetchOptions = { timeoutMs: options.timeout };

  let projects: ProjectRecord[];
  if (options.repository) {
    projects = [projectFromRepositoryUrl(options.repository)];
  } else if (options.pypiProject) {
    projects = [{ name: options.pypiProject }];
  } else if (options.reclone) {
    projects = await projectsFromDataDir(options.reclone);
  } else {
    const feeds = options.feed ?? DEFAULT_FEEDS;
    const entries = await collectFeedEntries(feeds, {
      ...fetchOptions,
      cacheDir: path.join(clonesDir, CACHE_DIR_NAME),
      forceRefresh: Boolean(options.refresh),
      debug,
    });
    console.log(`ℹ️  ${entries.length} packages found in ${feeds.length} feed(s)`);
    projects = projectsFromFeed(entries);
  }

  const token = process.env.GITHUB_TOKEN;
  const shouldVerify = options.verify ?? Boolean(token);
  const verifyRepository = shouldVerify
    ? createGithubVerifier(createOctokit(token, new RateLimiter()), debug)
    : undefined;

  if (debug) {
    console.log(`ℹ️  Debug mode enabled (concurrency=${options.concurrency}, verify=${shouldVerify})`);
  }

  const results = await crawlProjects(
    projects,
    {
      git: runGit,
      resolveRepository: (name) => resolveRepositoryUrl(name, fetchOptions),
      verifyRepository,
    },
    {
      clonesDir,
      concurrency: options.concurrency,
      gitTimeoutMs: options.gitTimeout,
      debug,
      progress: process.env.PYSTYLE_PROGRESS === "true",
    }
  );

  outputResults(results, options.format);
}

run().catch((error) => {
  console.error("\n❌ Crawler failed:", describeError(error));
  process.exit(1);
});

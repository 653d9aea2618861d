#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import path from "node:path";
import Table from "cli-table3";

import { describeError } from "../shared/errors";
import { runGit } from "../shared/git";
import { envPositiveInt, parsePositiveInt } from "../shared/pool";
import { DEFAULT_METRICS_CONFIG_PATH, loadMetricsConfig, selectGroups } from "./config";
import type { RevisionMode, UpdateResult } from "./types";
import { countByStatus, updateProjects } from "./update";

const program = new Command();

program
  .name("pystyle-update")
  .description("Compute style metrics for every local clone and write one JSON document per project")
  .argument("<clones-dir>", "Directory holding <host>/<owner>/<repo> clones")
  .argument("<data-dir>", "Directory receiving <host>/<owner>/<repo>.json documents (created if missing)")
  .option("--only <pattern>", "Only run metric groups whose name contains the pattern; results are merged")
  .option("--merge", "Keep metrics of existing documents that this run does not compute")
  .option("--metrics-config <path>", "Metric configuration file", DEFAULT_METRICS_CONFIG_PATH)
  .option("--random-commit", "Analyse a random commit of each history, then restore the original checkout")
  .option("--recorded-commit", "Reanalyse the commit recorded in each existing document")
  .option(
    "--concurrency <number>",
    "Number of projects to analyse in parallel",
    parsePositiveInt("--concurrency"),
    envPositiveInt("UPDATER_CONCURRENCY", 1)
  )
  .option("-f, --format <type>", "Summary format: table or json", "table")
  .option("--debug", "Enable verbose logging")
  .parse(process.argv);

function outputResults(results: UpdateResult[], format: string) {
  const counts = countByStatus(results);
  if (format === "json") {
    console.log(JSON.stringify({ results, counts }, null, 2));
    return;
  }

  const notable = results.filter((result) => result.status === "skipped" || result.status === "failed");
  if (notable.length > 0) {
    const table = new Table({ head: ["Project", "Status", "Reason"] });
    for (const result of notable) {
      table.push([result.project, result.status, result.reason ?? ""]);
    }
    console.log(table.toString());
  }

  console.log(
    `\n✅ Update complete: ${counts.written} written, ${counts.unchanged} unchanged, ${counts.skipped} skipped, ${counts.failed} failed`
  );
}

async function run() {
  const [clonesArg, dataArg] = program.args;
  const options = program.opts<{
    only?: string;
    merge?: boolean;
    metricsConfig: string;
    randomCommit?: boolean;
    recordedCommit?: boolean;
    concurrency: number;
    format: string;
    debug?: boolean;
  }>();

  if (options.randomCommit && options.recordedCommit) {
    throw new Error("--random-commit and --recorded-commit are mutually exclusive");
  }
  if (options.format !== "table" && options.format !== "json") {
    throw new Error(`Unknown format '${options.format}'. Use table or json.`);
  }

  const config = await loadMetricsConfig(options.metricsConfig);
  const groups = selectGroups(config, options.only);
  if (groups.length === 0) {
    throw new Error(`No metric group matches '${options.only}'. Enabled groups: ${config.groups.join(", ")}`);
  }

  const revision: RevisionMode = options.randomCommit ? "random" : options.recordedCommit ? "recorded" : "head";
  const debug = Boolean(options.debug);
  if (debug) {
    console.log(`ℹ️  Metric groups: ${groups.join(", ")} (revision=${revision}, concurrency=${options.concurrency})`);
  }

  const results = await updateProjects(
    { git: runGit },
    {
      clonesDir: path.resolve(clonesArg),
      dataDir: path.resolve(dataArg),
      config,
      groups,
      merge: Boolean(options.merge),
      partial: options.only !== undefined,
      revision,
      concurrency: options.concurrency,
      debug,
      progress: process.env.PYSTYLE_PROGRESS === "true",
    }
  );

  outputResults(results, options.format);
}

run().catch((error) => {
  console.error("\n❌ Updater failed:", describeError(error));
  process.exit(1);
});

import type { ChalkInstance } from "chalk";
import Table from "cli-table3";
import { Command } from "commander";

import type { AggregatedDataset } from "../../aggregate/types.js";
import { type MinerConfig, createEventBus } from "../../core/index.js";
import { runMiningPipeline } from "../../pipeline/pipeline.js";
import { writeDataset } from "../../pipeline/output.js";
import {
  attachWarningLogger,
  createSpinner,
  createUi,
  formatFraction,
  formatInteger,
  getGlobalOptions,
  loadCliConfig,
  parseInteger,
  prefixed,
} from "../helpers.js";

export interface MineCommandOptions {
  repo?: string;
  branch?: string;
  output?: string;
  remote: boolean;
  cache: boolean;
  github?: string;
  maxPages?: number;
  deadline?: number;
  history: boolean;
}

export function createMineCommand(): Command {
  const command = new Command("mine");

  command
    .description("Extract history, analyze sources, collect GitHub activity and write the dataset")
    .option("--repo <path>", "Repository to mine")
    .option("--branch <name>", "Branch or ref to treat as HEAD")
    .option("--output <path>", "Where to write the dataset JSON")
    .option("--github <owner/name>", "GitHub repository (defaults to the origin remote)")
    .option("--max-pages <n>", "Maximum pages per remote resource", parseInteger)
    .option("--deadline <ms>", "Abort remote collection after this many milliseconds", parseInteger)
    .option("--no-remote", "Skip GitHub collection")
    .option("--no-cache", "Ignore and do not write the cache")
    .option("--no-history", "Analyze HEAD only, without per-revision complexity")
    .action(async (options: MineCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const suppress = globalOptions.json || globalOptions.quiet;

      const config = applyOverrides(await loadCliConfig(globalOptions.config), options);
      const events = createEventBus();
      const suppressedWarnings = attachWarningLogger(events, ui, globalOptions);

      const spinner = createSpinner(suppress, "Mining repository...");
      events.on("history:extracted", ({ count, reusedFromCache }) => {
        if (spinner) spinner.text = `History: ${formatInteger(count)} commits (${formatInteger(reusedFromCache)} cached)`;
      });
      events.on("remote:collected", ({ collection }) => {
        if (spinner) spinner.text = `Collected ${formatInteger(collection.items.length)} ${collection.resource}`;
      });
      events.on("analysis:progress", ({ completed, total }) => {
        if (spinner) spinner.text = `Analyzing sources ${completed}/${total}`;
      });

      let dataset: AggregatedDataset;
      try {
        ({ dataset } = await runMiningPipeline(config, { events }));
      } catch (error) {
        spinner?.fail("Mining failed");
        throw error;
      }

      const outputPath = await writeDataset(config.output.path, dataset);
      spinner?.succeed(`Dataset written to ${outputPath}`);

      if (globalOptions.json) {
        console.log(JSON.stringify({ output: outputPath, ...summarize(dataset) }, null, 2));
        return;
      }

      if (globalOptions.quiet) {
        return;
      }

      console.log(renderSummary(dataset, ui));
      const suppressed = suppressedWarnings();
      if (suppressed > 0) {
        console.log(ui.gray(prefixed(`${suppressed} more warning(s); rerun with --verbose to see them.`)));
      }
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ repo-miner mine
  $ repo-miner mine --repo ../service --output out/service.json
  $ repo-miner mine --github owner/repo --max-pages 5
  $ repo-miner mine --no-remote --json`,
  );

  return command;
}

// ── Helpers ───────────────────────────────────────────────────

export function applyOverrides(config: MinerConfig, options: MineCommandOptions): MinerConfig {
  const [owner, name] = options.github?.split("/") ?? [];

  return {
    ...config,
    repository: {
      ...config.repository,
      path: options.repo ?? config.repository.path,
      branch: options.branch ?? config.repository.branch,
    },
    remote: {
      ...config.remote,
      enabled: config.remote.enabled && options.remote,
      owner: owner || config.remote.owner,
      name: name || config.remote.name,
      maxPages: options.maxPages ?? config.remote.maxPages,
      deadlineMs: options.deadline ?? config.remote.deadlineMs,
    },
    cache: { ...config.cache, enabled: config.cache.enabled && options.cache },
    analysis: { ...config.analysis, history: config.analysis.history && options.history },
    output: { path: options.output ?? config.output.path },
  };
}

function summarize(dataset: AggregatedDataset): Record<string, unknown> {
  const { report } = dataset;
  return {
    commits: dataset.commits.length,
    files: dataset.files.length,
    definitions: dataset.definitions.length,
    remote: dataset.remote?.summary ?? null,
    skippedCommits: report.skippedCommits.length,
    truncatedResources: report.truncatedResources,
    parseFailures: report.parseFailures.length,
    inconsistencies: report.inconsistencies.length,
    completeness: report.completeness,
  };
}

function renderSummary(dataset: AggregatedDataset, ui: ChalkInstance): string {
  const { report } = dataset;
  const table = new Table({ head: ["Source", "Items", "Gaps", "Complete"] });

  table.push([
    "history",
    `${formatInteger(dataset.commits.length)} commits`,
    `${formatInteger(report.skippedCommits.length)} skipped`,
    formatFraction(report.completeness.history),
  ]);
  table.push([
    "structure",
    `${formatInteger(dataset.definitions.length)} definitions`,
    `${formatInteger(report.parseFailures.length)} parse failures`,
    formatFraction(report.completeness.structure),
  ]);

  for (const entry of dataset.remote?.summary ?? []) {
    table.push([
      entry.resource,
      `${formatInteger(entry.itemCount)} items`,
      entry.truncated ? ui.yellow(entry.failure?.code ?? "truncated") : "-",
      entry.truncated ? ui.yellow("partial") : ui.green("complete"),
    ]);
  }

  const lines = [table.toString()];
  if (report.inconsistencies.length > 0) {
    lines.push(ui.yellow(prefixed(`${report.inconsistencies.length} inconsistency(ies) recorded in the report.`)));
  }
  return lines.join("\n");
}

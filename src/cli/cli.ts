import { readFileSync } from "node:fs";

import { Command } from "commander";

import { isRecord } from "../core/utils.js";
import { createCacheCommand } from "./commands/cache.js";
import { createMineCommand } from "./commands/mine.js";

export interface GlobalCliOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

export const DEFAULT_CONFIG_FILE = "repo-miner.config.json";

function registerCommands(program: Command): void {
  program.addCommand(createMineCommand());
  program.addCommand(createCacheCommand());
}

function readPackageVersion(): string {
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
    return isRecord(manifest) && typeof manifest.version === "string" ? manifest.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export function createCliProgram(): Command {
  const program = new Command();
  program
    .name("repo-miner")
    .description("Mine a git repository's history, structure and GitHub activity into one dataset")
    .version(readPackageVersion())
    .option("--config <path>", "Config file path (.json, .js or .mjs)", DEFAULT_CONFIG_FILE)
    .option("--verbose", "Print every warning", false)
    .option("--quiet", "Suppress non-error output", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  registerCommands(program);

  program.addHelpText(
    "after",
    `\nGetting Started:\n  $ repo-miner mine                 Mine the repository in the current directory\n  $ repo-miner mine --repo ../app   Mine another checkout\n  $ repo-miner cache clear          Drop every cached entry\n`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCliProgram();
  await program.parseAsync([...argv]);
}

import { Command } from "commander";

import { FileCacheStore } from "../../cache/file-cache-store.js";
import { createSpinner, createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";

export function createCacheCommand(): Command {
  const command = new Command("cache").description("Manage the on-disk cache");

  command
    .command("clear")
    .description("Remove every cached history, remote and analysis entry")
    .option("--dir <path>", "Cache directory (defaults to cache.directory from config)")
    .action(async (options: { dir?: string }, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions.config);
      const directory = options.dir ?? config.cache.directory;

      const spinner = createSpinner(globalOptions.json || globalOptions.quiet, `Clearing ${directory}...`);
      await new FileCacheStore({ directory }).clear();
      spinner?.succeed(`Cleared ${directory}`);

      if (globalOptions.json) {
        console.log(JSON.stringify({ cleared: directory }));
      } else if (globalOptions.verbose) {
        console.log(ui.gray(`Cache directory: ${directory}`));
      }
    });

  return command;
}

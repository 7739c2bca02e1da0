import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Command } from "commander";
import ora, { type Ora } from "ora";

import type { MinerEventBus } from "../core/event-bus.js";
import { type MinerConfig, loadConfig } from "../core/index.js";
import { DEFAULT_CONFIG_FILE, type GlobalCliOptions } from "./cli.js";
import { loadConfigFile } from "./config-loader.js";

const LOG_PREFIX = "[repo-miner]";

// ── Global options ──────────────────────────────────────────

export function getGlobalOptions(command: Command): Required<GlobalCliOptions> {
  const options = command.optsWithGlobals<GlobalCliOptions>();

  return {
    config: options.config ?? DEFAULT_CONFIG_FILE,
    verbose: options.verbose === true,
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
}

// ── UI helpers ──────────────────────────────────────────────

export function createUi(options: Required<GlobalCliOptions>): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = options.color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * Creates a spinner when output is interactive (non-JSON / non-quiet).
 * Pass `true` to suppress the spinner.
 */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

export function prefixed(message: string): string {
  return `${LOG_PREFIX} ${message}`;
}

/**
 * Prints pipeline warnings. Without `verbose` only the first warning of
 * each error code is shown, followed by a count at the end.
 */
export function attachWarningLogger(
  events: MinerEventBus,
  ui: ChalkInstance,
  options: Required<GlobalCliOptions>,
): () => number {
  const seenCodes = new Set<string>();
  let suppressed = 0;

  events.on("warning", ({ error }) => {
    if (options.quiet || options.json) return;
    if (!options.verbose && seenCodes.has(error.code)) {
      suppressed += 1;
      return;
    }
    seenCodes.add(error.code);
    console.warn(ui.yellow(prefixed(`${error.code}: ${error.message}`)));
  });

  events.on("cache:corrupt-entry", ({ key, reason }) => {
    if (options.verbose && !options.json) {
      console.warn(ui.yellow(prefixed(`Discarded cache entry ${key} (${reason})`)));
    }
  });

  return () => suppressed;
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected an integer but received "${value}".`);
  }

  return parsed;
}

// ── Formatting helpers ──────────────────────────────────────

export function formatInteger(value: number): string {
  return new Intl.NumberFormat("en-US").format(value);
}

export function formatFraction(value: number | null): string {
  return value === null ? "n/a" : `${(value * 100).toFixed(1)}%`;
}

// ── Config helpers ──────────────────────────────────────────

/** The config file when present, defaults otherwise. */
export async function loadCliConfig(configPath: string): Promise<MinerConfig> {
  return (await loadConfigFile(configPath)) ?? loadConfig({});
}

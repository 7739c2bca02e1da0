import { constants as fsConstants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { type MinerConfig, configError, isRecord, loadConfig } from "../core/index.js";

export interface ConfigLoaderOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Loads `configPath` when it exists. JSON files are parsed; `.js` and
 * `.mjs` modules are imported and their default export (or `config`
 * export) is used. A missing file yields `null`; an unreadable or invalid
 * one throws `CONFIG_INVALID`.
 */
export async function loadConfigFile(
  configPath: string,
  options: ConfigLoaderOptions = {},
): Promise<MinerConfig | null> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);
  if (!(await pathExists(absolutePath))) {
    return null;
  }

  let candidate: unknown;
  try {
    candidate = await readCandidate(absolutePath);
  } catch (error) {
    throw configError("CONFIG_INVALID", `Failed to load config at ${configPath}`, {
      context: { path: absolutePath, message: error instanceof Error ? error.message : String(error) },
      cause: error,
    });
  }

  return loadConfig(candidate, { env: options.env });
}

async function readCandidate(absolutePath: string): Promise<unknown> {
  const extension = extname(absolutePath).toLowerCase();
  if (extension === ".json") {
    const parsed: unknown = JSON.parse(await readFile(absolutePath, "utf8"));
    return parsed;
  }

  if (extension === ".js" || extension === ".mjs") {
    return importCandidate(`${pathToFileURL(absolutePath).href}?t=${Date.now()}`);
  }

  throw new Error(`Unsupported config extension "${extension}". Use .json, .js or .mjs.`);
}

async function importCandidate(moduleSpecifier: string): Promise<unknown> {
  const imported: unknown = await import(moduleSpecifier);
  if (!isRecord(imported)) {
    return imported;
  }
  return imported.default ?? imported.config ?? imported;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

import { resolve } from "node:path";

import PQueue from "p-queue";

import { aggregate } from "../aggregate/aggregator.js";
import type { AggregatedDataset } from "../aggregate/types.js";
import { analyzeFile } from "../analysis/source-analyzer.js";
import { FileAnalysisSchema } from "../analysis/schema.js";
import { FileCacheStore } from "../cache/file-cache-store.js";
import { analysisKey } from "../cache/keys.js";
import { type CacheStore, readCached } from "../cache/types.js";
import type { MinerConfig } from "../core/config.js";
import { analysisError, remoteError } from "../core/errors.js";
import type { MinerEventBus } from "../core/event-bus.js";
import type {
  FileAnalysis,
  HistoryResult,
  RemoteCollection,
  RevisionAnalysis,
  StructureResults,
} from "../core/types.js";
import { compareStrings, toErrorMessage } from "../core/utils.js";
import { HistoryExtractor, collectHistory } from "../history/extractor.js";
import { GitRepository } from "../history/git-repository.js";
import { RemoteCollector, type Sleep } from "../remote/collector.js";
import { GitHubPageFetcher } from "../remote/github-page-fetcher.js";
import { parseGitHubRemoteUrl, toRepoSlug } from "../remote/repo-coordinates.js";
import type { PageFetcher, RepoCoordinates } from "../remote/types.js";

export interface PipelineDependencies {
  repository?: GitRepository;
  /** `null` disables caching regardless of config. */
  cache?: CacheStore | null;
  fetcher?: PageFetcher;
  events?: MinerEventBus;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface PipelineResult {
  dataset: AggregatedDataset;
  history: HistoryResult;
  remote: RemoteCollection[] | null;
  structure: StructureResults;
}

/**
 * Mines one repository end to end. History and remote collection run
 * concurrently; per-file analysis runs on a bounded queue afterwards.
 * Only `REPOSITORY_UNAVAILABLE` and configuration errors escape.
 */
export async function runMiningPipeline(
  config: MinerConfig,
  dependencies: PipelineDependencies = {},
): Promise<PipelineResult> {
  const { events } = dependencies;
  const repoPath = resolve(config.repository.path);
  const repository = dependencies.repository ?? new GitRepository(repoPath, config.repository.branch);
  await repository.open();

  const cache =
    dependencies.cache !== undefined
      ? (dependencies.cache ?? undefined)
      : config.cache.enabled
        ? new FileCacheStore({ directory: config.cache.directory, events })
        : undefined;

  const coordinates = config.remote.enabled ? await resolveRepoCoordinates(config, repository, events) : undefined;

  const historyTask = collectHistory({
    extractor: new HistoryExtractor(repository, events),
    repoId: repoPath,
    cache,
    ttlMs: config.cache.historyTtlMs,
    events,
  });

  const remoteTask: Promise<RemoteCollection[] | null> = coordinates
    ? new RemoteCollector({
        fetcher: dependencies.fetcher ?? new GitHubPageFetcher({ repo: coordinates, token: config.remote.token }),
        repoSlug: toRepoSlug(coordinates),
        cache,
        cacheTtlMs: config.cache.remoteTtlMs,
        perPage: config.remote.perPage,
        maxPages: config.remote.maxPages,
        maxRetries: config.remote.maxRetries,
        maxRetryWaitMs: config.remote.maxRetryWaitMs,
        deadlineMs: config.remote.deadlineMs,
        signal: dependencies.signal,
        sleep: dependencies.sleep,
        events,
      }).collectAll(config.remote.resources)
    : Promise.resolve(null);

  const [history, remote] = await Promise.all([historyTask, remoteTask]);
  const structure = await analyzeStructure({ repository, history, config, cache, events });

  const dataset = aggregate({
    repository: {
      path: repoPath,
      owner: coordinates?.owner ?? null,
      name: coordinates?.name ?? null,
    },
    history,
    remote,
    structure,
    options: { bestEffortCorrelation: config.correlation.bestEffort },
  });

  return { dataset, history, remote, structure };
}

async function resolveRepoCoordinates(
  config: MinerConfig,
  repository: GitRepository,
  events?: MinerEventBus,
): Promise<RepoCoordinates | undefined> {
  if (config.remote.owner && config.remote.name) {
    return { owner: config.remote.owner, name: config.remote.name };
  }

  const remoteUrl = await repository.readRemoteUrl();
  const coordinates = remoteUrl ? parseGitHubRemoteUrl(remoteUrl) : undefined;
  if (!coordinates) {
    events?.emit("warning", {
      error: remoteError("REMOTE_REQUEST_FAILED", "No GitHub remote found; skipping remote collection.", {
        severity: "warning",
        context: { remoteUrl: remoteUrl ?? null },
      }),
    });
  }
  return coordinates;
}

// ── Structure ────────────────────────────────────────────────

export interface AnalyzeStructureOptions {
  repository: GitRepository;
  history: HistoryResult;
  config: MinerConfig;
  cache?: CacheStore;
  events?: MinerEventBus;
}

interface AnalysisTask {
  revision: string;
  path: string;
}

/**
 * Analyzes every source file at HEAD and, when `analysis.history` is on,
 * each source file as it stood after every commit that changed it.
 * Identical `(revision, path)` pairs are analyzed once.
 */
export async function analyzeStructure(options: AnalyzeStructureOptions): Promise<StructureResults> {
  const { repository, history, config, cache, events } = options;
  const head = history.headHash;
  if (!head) {
    return { snapshot: [], revisions: [] };
  }

  const matches = (path: string): boolean =>
    isAnalyzablePath(path, config.analysis.extensions, config.analysis.exclude);

  const snapshotPaths = (await repository.listTrackedFiles(head)).filter(matches).sort(compareStrings);
  const revisionTasks: AnalysisTask[] = [];
  if (config.analysis.history) {
    for (const commit of history.commits) {
      for (const delta of commit.deltas) {
        if (delta.changeType !== "deleted" && !delta.binary && matches(delta.path)) {
          revisionTasks.push({ revision: commit.hash, path: delta.path });
        }
      }
    }
  }

  const queue = new PQueue({ concurrency: config.analysis.concurrency });
  const inFlight = new Map<string, Promise<FileAnalysis | undefined>>();
  let completed = 0;

  const schedule = (task: AnalysisTask): Promise<FileAnalysis | undefined> => {
    const key = analysisKey(task.revision, task.path);
    const existing = inFlight.get(key);
    if (existing) {
      return existing;
    }

    const pending = queue
      .add(() => analyzeRevision(task, repository, cache, config.cache.analysisTtlMs, events), {
        throwOnTimeout: true,
      })
      .then((analysis) => {
        completed += 1;
        events?.emit("analysis:progress", { completed, total: inFlight.size });
        return analysis;
      });
    inFlight.set(key, pending);
    return pending;
  };

  const [snapshotResults, revisionResults] = await Promise.all([
    Promise.all(snapshotPaths.map((path) => schedule({ revision: head, path }))),
    Promise.all(revisionTasks.map((task) => schedule(task))),
  ]);

  const snapshot = snapshotResults.filter((analysis): analysis is FileAnalysis => analysis !== undefined);
  const revisions: RevisionAnalysis[] = [];
  revisionResults.forEach((analysis, index) => {
    const task = revisionTasks[index];
    if (analysis && task) {
      revisions.push({ commitHash: task.revision, analysis });
    }
  });

  return { snapshot, revisions };
}

async function analyzeRevision(
  task: AnalysisTask,
  repository: GitRepository,
  cache: CacheStore | undefined,
  ttlMs: number | null,
  events?: MinerEventBus,
): Promise<FileAnalysis | undefined> {
  const key = analysisKey(task.revision, task.path);
  if (cache) {
    const cached = await readCached(cache, key, FileAnalysisSchema, events);
    if (cached.hit) {
      return cached.value;
    }
  }

  let bytes: Uint8Array;
  try {
    bytes = await repository.readFileAt(task.revision, task.path);
  } catch (error) {
    events?.emit("warning", {
      error: analysisError("PARSE_FAILED", `Cannot read ${task.path} at ${task.revision}.`, {
        severity: "warning",
        context: { path: task.path, revision: task.revision, message: toErrorMessage(error) },
        cause: error,
      }),
    });
    return undefined;
  }

  const analysis = analyzeFile(task.path, bytes);
  if (analysis.status === "parse-failed") {
    events?.emit("analysis:parse-failed", {
      path: analysis.path,
      revision: task.revision,
      reason: analysis.reason,
    });
  }

  if (cache) {
    await cache.put(key, analysis, ttlMs);
  }
  return analysis;
}

/**
 * `extensions` are matched as suffixes. An `exclude` entry ending in `/`
 * excludes that directory at any depth; any other entry is matched as a
 * path suffix.
 */
export function isAnalyzablePath(
  path: string,
  extensions: readonly string[],
  exclude: readonly string[],
): boolean {
  const lower = path.toLowerCase();
  if (!extensions.some((extension) => lower.endsWith(extension.toLowerCase()))) {
    return false;
  }

  return !exclude.some((pattern) => {
    const normalized = pattern.toLowerCase();
    if (normalized.endsWith("/")) {
      return lower.startsWith(normalized) || lower.includes(`/${normalized}`);
    }
    return lower.endsWith(normalized);
  });
}

import type {
  CommitRecord,
  ContributorItem,
  FileAnalysis,
  ImportReference,
  IssueItem,
  PullItem,
  RemoteCollection,
} from "../core/types.js";
import { compareStrings, uniqueSorted } from "../core/utils.js";
import { buildGraph } from "../graph/dependency-graph.js";
import { correlateBestEffort, correlateExact } from "./correlation.js";
import {
  classifyCommitMessage,
  classifyMessagePattern,
  extractIssueReferences,
} from "./message-classifier.js";
import {
  type AggregateInput,
  type AggregatedDataset,
  type AuthorSummary,
  type CommitCategory,
  type Completeness,
  DATASET_SCHEMA_VERSION,
  type DatasetCommit,
  type DatasetDefinition,
  type DependencySection,
  type FileStatus,
  type FileSummary,
  type Inconsistency,
  type MessagePattern,
  type ParseFailureEntry,
  type RemoteSection,
} from "./types.js";

const HEAD_REVISION = "HEAD";

/**
 * Joins history, remote items and structure into one dataset. Pure: the
 * same input always yields an equal dataset, and nothing missing from the
 * input is filled in.
 */
export function aggregate(input: AggregateInput): AggregatedDataset {
  const commits = uniqueCommits(input.history.commits);
  const commitIndex = new Map(commits.map((commit, index): [string, number] => [commit.hash, index]));
  const headRevision = input.history.headHash ?? HEAD_REVISION;
  const inconsistencies: Inconsistency[] = [];

  const snapshot = new Map<string, FileAnalysis>();
  for (const analysis of input.structure.snapshot) {
    snapshot.set(analysis.path, analysis);
  }

  const series = new Map<string, Array<{ index: number; commit: string; totalComplexity: number }>>();
  const parseFailures: ParseFailureEntry[] = [];

  for (const analysis of input.structure.snapshot) {
    if (analysis.status === "parse-failed") {
      parseFailures.push({
        path: analysis.path,
        revision: headRevision,
        reason: analysis.reason,
        message: analysis.message,
      });
    }
  }

  for (const { commitHash, analysis } of input.structure.revisions) {
    const index = commitIndex.get(commitHash);
    if (index === undefined) {
      inconsistencies.push({
        code: "AGGREGATION_INCONSISTENCY",
        kind: "unknown-commit",
        message: `Structure for ${analysis.path} refers to commit ${commitHash}, which is not in the history.`,
        commit: commitHash,
        path: analysis.path,
        reference: null,
      });
      continue;
    }

    if (analysis.status === "parse-failed") {
      // The HEAD revision of a file is also in the snapshot.
      if (!(commitHash === headRevision && snapshot.get(analysis.path)?.status === "parse-failed")) {
        parseFailures.push({
          path: analysis.path,
          revision: commitHash,
          reason: analysis.reason,
          message: analysis.message,
        });
      }
      continue;
    }

    const points = series.get(analysis.path) ?? [];
    points.push({ index, commit: commitHash, totalComplexity: analysis.metrics.totalComplexity });
    series.set(analysis.path, points);
  }

  const remote = buildRemoteSection(input.remote);
  const issues = remote?.issues ?? [];
  const pulls = remote?.pulls ?? [];

  const exact = correlateExact(commits, issues, pulls);
  const referencesResolvable =
    input.remote?.some((collection) => collection.resource === "issues" || collection.resource === "pulls") ?? false;
  if (referencesResolvable) {
    for (const { commit, reference } of exact.unresolved) {
      inconsistencies.push({
        code: "AGGREGATION_INCONSISTENCY",
        kind: "unresolved-reference",
        message: `Commit ${commit} references #${reference}, which no collected issue or pull request matches.`,
        commit,
        path: null,
        reference,
      });
    }
  }

  const bestEffort =
    input.options?.bestEffortCorrelation === false ? [] : correlateBestEffort(commits, pulls, exact.correlations);

  return {
    schemaVersion: DATASET_SCHEMA_VERSION,
    repository: { ...input.repository, headHash: input.history.headHash },
    commits: commits.map(toDatasetCommit),
    files: buildFileSummaries(commits, snapshot, series),
    definitions: collectDefinitions(input.structure.snapshot),
    dependencies: buildDependencySection(input.structure.snapshot),
    remote,
    correlations: { exact: exact.correlations, bestEffort },
    authors: summarizeAuthors(commits),
    messages: summarizeMessages(commits),
    report: {
      skippedCommits: [...input.history.skipped],
      truncatedResources: (input.remote ?? [])
        .filter((collection) => collection.truncated)
        .map((collection) => collection.resource)
        .sort(compareStrings),
      parseFailures: parseFailures.sort(
        (a, b) => compareStrings(a.path, b.path) || compareStrings(a.revision, b.revision),
      ),
      inconsistencies,
      completeness: computeCompleteness(input, commits.length),
    },
  };
}

function uniqueCommits(commits: readonly CommitRecord[]): CommitRecord[] {
  const seen = new Set<string>();
  return commits.filter((commit) => {
    if (seen.has(commit.hash)) return false;
    seen.add(commit.hash);
    return true;
  });
}

function toDatasetCommit(commit: CommitRecord): DatasetCommit {
  return {
    ...commit,
    category: classifyCommitMessage(commit.message),
    pattern: classifyMessagePattern(commit.message),
    referencedIssues: extractIssueReferences(commit.message),
  };
}

interface FileAccumulator {
  status: FileStatus;
  changeCount: number;
  linesAdded: number;
  linesRemoved: number;
  authors: Set<string>;
  firstCommit: string | null;
  lastCommit: string | null;
}

/** Replays deltas in history order; presence at HEAD overrides the replay. */
function buildFileSummaries(
  commits: readonly CommitRecord[],
  snapshot: ReadonlyMap<string, FileAnalysis>,
  series: ReadonlyMap<string, Array<{ index: number; commit: string; totalComplexity: number }>>,
): FileSummary[] {
  const files = new Map<string, FileAccumulator>();
  const entryFor = (path: string): FileAccumulator => {
    let entry = files.get(path);
    if (!entry) {
      entry = {
        status: "present",
        changeCount: 0,
        linesAdded: 0,
        linesRemoved: 0,
        authors: new Set(),
        firstCommit: null,
        lastCommit: null,
      };
      files.set(path, entry);
    }
    return entry;
  };

  for (const commit of commits) {
    const author = `${commit.author.name} <${commit.author.email}>`;
    for (const delta of commit.deltas) {
      if (delta.oldPath !== undefined && delta.changeType === "renamed") {
        entryFor(delta.oldPath).status = "deleted";
      }

      const entry = entryFor(delta.path);
      entry.status = delta.changeType === "deleted" ? "deleted" : "present";
      entry.changeCount += 1;
      entry.linesAdded += delta.linesAdded;
      entry.linesRemoved += delta.linesRemoved;
      entry.authors.add(author);
      entry.firstCommit ??= commit.hash;
      entry.lastCommit = commit.hash;
    }
  }

  for (const path of snapshot.keys()) {
    entryFor(path).status = "present";
  }

  return [...files.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([path, entry]): FileSummary => {
      const points = [...(series.get(path) ?? [])].sort((a, b) => a.index - b.index);
      const analysis = snapshot.get(path);
      return {
        path,
        status: entry.status,
        changeCount: entry.changeCount,
        linesAdded: entry.linesAdded,
        linesRemoved: entry.linesRemoved,
        authors: uniqueSorted(entry.authors),
        firstCommit: entry.firstCommit,
        lastCommit: entry.lastCommit,
        complexitySeries: points.map((point) => point.totalComplexity),
        seriesCommits: points.map((point) => point.commit),
        metrics: analysis?.status === "ok" ? analysis.metrics : null,
        parseFailed: analysis?.status === "parse-failed",
      };
    });
}

/** HEAD only: a file deleted from the tree contributes no definitions. */
function collectDefinitions(snapshot: readonly FileAnalysis[]): DatasetDefinition[] {
  const definitions: DatasetDefinition[] = [];
  for (const analysis of snapshot) {
    for (const definition of analysis.definitions) {
      definitions.push({ ...definition, path: analysis.path });
    }
  }

  return definitions.sort(
    (a, b) =>
      compareStrings(a.path, b.path) ||
      a.startLine - b.startLine ||
      compareStrings(a.qualifiedName, b.qualifiedName),
  );
}

function buildDependencySection(snapshot: readonly FileAnalysis[]): DependencySection {
  const graph = buildGraph(
    new Map(snapshot.map((analysis): [string, ImportReference[]] => [analysis.path, analysis.imports])),
  );
  const fanIn: Record<string, number> = {};
  const fanOut: Record<string, number> = {};
  for (const node of graph.internalNodes()) {
    fanIn[node] = graph.fanIn(node);
    fanOut[node] = graph.fanOut(node);
  }

  return {
    nodes: graph.internalNodes(),
    edges: graph.edges(),
    externals: graph.externalNodes(),
    cycles: graph.cycles(),
    fanIn,
    fanOut,
  };
}

function buildRemoteSection(collections: RemoteCollection[] | null): RemoteSection | null {
  if (!collections) {
    return null;
  }

  const issues = new Map<number, IssueItem>();
  const pulls = new Map<number, PullItem>();
  const contributors = new Map<number, ContributorItem>();

  for (const collection of collections) {
    for (const item of collection.items) {
      switch (item.kind) {
        case "issue":
          issues.set(item.id, item);
          break;
        case "pull":
          pulls.set(item.id, item);
          break;
        case "contributor":
          contributors.set(item.id, item);
          break;
      }
    }
  }

  const byId = (a: { id: number }, b: { id: number }): number => a.id - b.id;
  return {
    summary: collections
      .map((collection) => ({
        resource: collection.resource,
        itemCount: collection.items.length,
        pagesFetched: collection.pagesFetched,
        pagesFromCache: collection.pagesFromCache,
        duplicateCount: collection.duplicateCount,
        truncated: collection.truncated,
        failure: collection.failure,
      }))
      .sort((a, b) => compareStrings(a.resource, b.resource)),
    issues: [...issues.values()].sort(byId),
    pulls: [...pulls.values()].sort(byId),
    contributors: [...contributors.values()].sort(byId),
  };
}

/** One entry per distinct name and email pair; identities are not merged. */
function summarizeAuthors(commits: readonly CommitRecord[]): AuthorSummary[] {
  const authors = new Map<string, AuthorSummary>();

  for (const commit of commits) {
    const key = `${commit.author.name}\u0000${commit.author.email}`;
    const summary = authors.get(key);
    if (!summary) {
      authors.set(key, {
        name: commit.author.name,
        email: commit.author.email,
        commits: 1,
        linesAdded: commit.stats.linesAdded,
        linesRemoved: commit.stats.linesRemoved,
        firstCommitAt: commit.timestamp,
        lastCommitAt: commit.timestamp,
      });
      continue;
    }

    summary.commits += 1;
    summary.linesAdded += commit.stats.linesAdded;
    summary.linesRemoved += commit.stats.linesRemoved;
    if (commit.timestamp < summary.firstCommitAt) summary.firstCommitAt = commit.timestamp;
    if (commit.timestamp > summary.lastCommitAt) summary.lastCommitAt = commit.timestamp;
  }

  return [...authors.values()].sort(
    (a, b) => compareStrings(a.name, b.name) || compareStrings(a.email, b.email),
  );
}

function summarizeMessages(commits: readonly CommitRecord[]): AggregatedDataset["messages"] {
  const categories: Record<CommitCategory, number> = {
    feat: 0,
    fix: 0,
    docs: 0,
    refactor: 0,
    test: 0,
    chore: 0,
    style: 0,
    perf: 0,
    merge: 0,
    other: 0,
  };
  const patterns: Record<MessagePattern, number> = {
    conventional: 0,
    imperative: 0,
    "with-issue": 0,
    merge: 0,
    other: 0,
  };

  for (const commit of commits) {
    categories[classifyCommitMessage(commit.message)] += 1;
    patterns[classifyMessagePattern(commit.message)] += 1;
  }

  return { categories, patterns };
}

function computeCompleteness(input: AggregateInput, commitCount: number): Completeness {
  const attempted = commitCount + input.history.skipped.length;
  const collections = input.remote ?? [];
  const snapshot = input.structure.snapshot;

  return {
    history: attempted === 0 ? null : commitCount / attempted,
    remote:
      collections.length === 0
        ? null
        : collections.filter((collection) => !collection.truncated).length / collections.length,
    structure:
      snapshot.length === 0
        ? null
        : snapshot.filter((analysis) => analysis.status === "ok").length / snapshot.length,
  };
}

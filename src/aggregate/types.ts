import type {
  CommitRecord,
  ContributorItem,
  Definition,
  FileMetrics,
  HistoryResult,
  IssueItem,
  ParseFailureReason,
  PullItem,
  RemoteCollection,
  RemoteFailure,
  RemoteResource,
  SkippedCommit,
  StructureResults,
} from "../core/types.js";
import type { DependencyEdge } from "../graph/dependency-graph.js";

export const DATASET_SCHEMA_VERSION = 1;

export const COMMIT_CATEGORIES = [
  "feat",
  "fix",
  "docs",
  "refactor",
  "test",
  "chore",
  "style",
  "perf",
  "merge",
  "other",
] as const;

export type CommitCategory = (typeof COMMIT_CATEGORIES)[number];

export const MESSAGE_PATTERNS = ["conventional", "imperative", "with-issue", "merge", "other"] as const;

export type MessagePattern = (typeof MESSAGE_PATTERNS)[number];

export interface RepositoryInfo {
  path: string;
  owner: string | null;
  name: string | null;
}

export interface AggregateInput {
  repository: RepositoryInfo;
  history: HistoryResult;
  /** `null` when remote collection was disabled. */
  remote: RemoteCollection[] | null;
  structure: StructureResults;
  options?: AggregateOptions;
}

export interface AggregateOptions {
  /** Include author/time correlations between commits and pull requests. */
  bestEffortCorrelation?: boolean;
}

export interface DatasetCommit extends CommitRecord {
  category: CommitCategory;
  pattern: MessagePattern;
  referencedIssues: number[];
}

export type FileStatus = "present" | "deleted";

export interface FileSummary {
  path: string;
  status: FileStatus;
  changeCount: number;
  linesAdded: number;
  linesRemoved: number;
  /** `name <email>`, sorted. */
  authors: string[];
  firstCommit: string | null;
  lastCommit: string | null;
  /** `totalComplexity` of each analyzed revision, oldest first. */
  complexitySeries: number[];
  /** Commit of each `complexitySeries` entry. */
  seriesCommits: string[];
  /** At HEAD; `null` when absent there or unparsable. */
  metrics: FileMetrics | null;
  parseFailed: boolean;
}

export interface DatasetDefinition extends Definition {
  path: string;
}

export interface DependencySection {
  nodes: string[];
  edges: DependencyEdge[];
  externals: string[];
  cycles: string[][];
  fanIn: Record<string, number>;
  fanOut: Record<string, number>;
}

export interface RemoteSummaryEntry {
  resource: RemoteResource;
  itemCount: number;
  pagesFetched: number;
  pagesFromCache: number;
  duplicateCount: number;
  truncated: boolean;
  failure: RemoteFailure | null;
}

export interface RemoteSection {
  summary: RemoteSummaryEntry[];
  issues: IssueItem[];
  pulls: PullItem[];
  contributors: ContributorItem[];
}

export interface ExactCorrelation {
  commit: string;
  itemKind: "issue" | "pull";
  itemId: number;
  match: "exact";
}

export interface BestEffortCorrelation {
  commit: string;
  pullId: number;
  via: "login" | "email";
  match: "best-effort";
}

export interface Correlations {
  exact: ExactCorrelation[];
  bestEffort: BestEffortCorrelation[];
}

export interface AuthorSummary {
  name: string;
  email: string;
  commits: number;
  linesAdded: number;
  linesRemoved: number;
  firstCommitAt: string;
  lastCommitAt: string;
}

export interface ParseFailureEntry {
  path: string;
  revision: string;
  reason: ParseFailureReason;
  message: string;
}

export type InconsistencyKind = "unknown-commit" | "unresolved-reference";

export interface Inconsistency {
  code: "AGGREGATION_INCONSISTENCY";
  kind: InconsistencyKind;
  message: string;
  commit: string;
  path: string | null;
  reference: number | null;
}

/** Fractions in [0, 1]; `null` when the source produced nothing to measure. */
export interface Completeness {
  history: number | null;
  remote: number | null;
  structure: number | null;
}

export interface DatasetReport {
  skippedCommits: SkippedCommit[];
  truncatedResources: RemoteResource[];
  parseFailures: ParseFailureEntry[];
  inconsistencies: Inconsistency[];
  completeness: Completeness;
}

export interface AggregatedDataset {
  schemaVersion: typeof DATASET_SCHEMA_VERSION;
  repository: RepositoryInfo & { headHash: string | null };
  commits: DatasetCommit[];
  files: FileSummary[];
  definitions: DatasetDefinition[];
  dependencies: DependencySection;
  remote: RemoteSection | null;
  correlations: Correlations;
  authors: AuthorSummary[];
  messages: {
    categories: Record<CommitCategory, number>;
    patterns: Record<MessagePattern, number>;
  };
  report: DatasetReport;
}

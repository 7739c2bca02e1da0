// ── History ──────────────────────────────────────────────────

export type ChangeType = "added" | "modified" | "deleted" | "renamed";

export interface AuthorIdentity {
  name: string;
  email: string;
}

export interface FileDelta {
  /** Path relative to the repository root at this revision. */
  path: string;
  /** Only present on renames. */
  oldPath?: string;
  linesAdded: number;
  linesRemoved: number;
  changeType: ChangeType;
  binary: boolean;
}

export interface CommitStats {
  filesChanged: number;
  linesAdded: number;
  linesRemoved: number;
  netLines: number;
}

export interface CommitRecord {
  hash: string;
  parents: string[];
  author: AuthorIdentity;
  /** UTC, ISO-8601. */
  timestamp: string;
  message: string;
  deltas: FileDelta[];
  stats: CommitStats;
}

export interface SkippedCommit {
  hash: string;
  reason: string;
}

export interface HistoryResult {
  /** Oldest first. */
  commits: CommitRecord[];
  skipped: SkippedCommit[];
  headHash: string | null;
  reusedFromCache: number;
}

// ── Remote ───────────────────────────────────────────────────

export const REMOTE_RESOURCES = ["issues", "pulls", "contributors"] as const;

export type RemoteResource = (typeof REMOTE_RESOURCES)[number];

export interface IssueItem {
  kind: "issue";
  id: number;
  title: string;
  state: "open" | "closed";
  author: string;
  createdAt: string;
  closedAt: string | null;
  labels: string[];
}

export interface PullItem {
  kind: "pull";
  id: number;
  title: string;
  state: "open" | "closed" | "merged";
  author: string;
  createdAt: string;
  closedAt: string | null;
  mergedAt: string | null;
  labels: string[];
}

export interface ContributorItem {
  kind: "contributor";
  id: number;
  login: string;
  contributions: number;
}

export type RemoteItem = IssueItem | PullItem | ContributorItem;

export interface RemoteFailure {
  code: string;
  message: string;
  page: number;
}

export interface RemoteCollection {
  resource: RemoteResource;
  items: RemoteItem[];
  pagesFetched: number;
  pagesFromCache: number;
  duplicateCount: number;
  truncated: boolean;
  failure: RemoteFailure | null;
}

// ── Structure ────────────────────────────────────────────────

export type DefinitionKind = "function" | "class" | "method";

export interface Definition {
  /** `<module path>:<scope.path>`, e.g. `src/server:Server.start`. */
  qualifiedName: string;
  name: string;
  kind: DefinitionKind;
  startLine: number;
  endLine: number;
  parameterCount: number;
  decorators: string[];
  complexity: number;
  maintainability: number;
  linesOfCode: number;
}

export type ImportKind = "static" | "re-export" | "require" | "dynamic" | "import-equals";

export interface ImportReference {
  specifier: string;
  kind: ImportKind;
  typeOnly: boolean;
  line: number;
}

export interface LineCounts {
  total: number;
  code: number;
  comment: number;
  blank: number;
}

export interface FileMetrics {
  lines: LineCounts;
  totalComplexity: number;
  maxComplexity: number;
  averageMaintainability: number | null;
}

export type ParseFailureReason = "syntax" | "encoding";

export interface AnalyzedFile {
  status: "ok";
  path: string;
  definitions: Definition[];
  imports: ImportReference[];
  metrics: FileMetrics;
}

export interface ParseFailedFile {
  status: "parse-failed";
  path: string;
  reason: ParseFailureReason;
  message: string;
  definitions: [];
  imports: [];
}

export type FileAnalysis = AnalyzedFile | ParseFailedFile;

export interface RevisionAnalysis {
  commitHash: string;
  analysis: FileAnalysis;
}

export interface StructureResults {
  /** Files as they exist at `headHash`. */
  snapshot: FileAnalysis[];
  /** Files as they existed after each commit that touched them. */
  revisions: RevisionAnalysis[];
}

import type {
  AnalyzedFile,
  CommitRecord,
  Definition,
  FileDelta,
  ImportReference,
  IssueItem,
  ParseFailedFile,
  PullItem,
  RemoteCollection,
  RemoteItem,
  RemoteResource,
} from "../../src/core/types.js";

export interface CommitFixture {
  hash: string;
  message?: string;
  timestamp?: string;
  author?: { name: string; email: string };
  deltas?: Array<Partial<FileDelta> & { path: string }>;
}

export function makeCommit(fixture: CommitFixture): CommitRecord {
  const deltas: FileDelta[] = (fixture.deltas ?? []).map((delta) => ({
    linesAdded: 0,
    linesRemoved: 0,
    changeType: "modified",
    binary: false,
    ...delta,
  }));
  const linesAdded = deltas.reduce((sum, delta) => sum + delta.linesAdded, 0);
  const linesRemoved = deltas.reduce((sum, delta) => sum + delta.linesRemoved, 0);

  return {
    hash: fixture.hash,
    parents: [],
    author: fixture.author ?? { name: "Ada Lovelace", email: "ada@example.com" },
    timestamp: fixture.timestamp ?? "2024-01-01T00:00:00.000Z",
    message: fixture.message ?? "update",
    deltas,
    stats: { filesChanged: deltas.length, linesAdded, linesRemoved, netLines: linesAdded - linesRemoved },
  };
}

export function makeDefinition(name: string, overrides: Partial<Definition> = {}): Definition {
  return {
    qualifiedName: `mod:${name}`,
    name,
    kind: "function",
    startLine: 1,
    endLine: 3,
    parameterCount: 0,
    decorators: [],
    complexity: 1,
    maintainability: 90,
    linesOfCode: 3,
    ...overrides,
  };
}

export function okAnalysis(
  path: string,
  totalComplexity: number,
  options: { definitions?: Definition[]; imports?: string[] } = {},
): AnalyzedFile {
  const imports: ImportReference[] = (options.imports ?? []).map((specifier, index) => ({
    specifier,
    kind: "static",
    typeOnly: false,
    line: index + 1,
  }));

  return {
    status: "ok",
    path,
    definitions: options.definitions ?? [],
    imports,
    metrics: {
      lines: { total: 3, code: 3, comment: 0, blank: 0 },
      totalComplexity,
      maxComplexity: totalComplexity,
      averageMaintainability: null,
    },
  };
}

export function failedAnalysis(path: string, message = "line 1: Expression expected."): ParseFailedFile {
  return { status: "parse-failed", path, reason: "syntax", message, definitions: [], imports: [] };
}

export function makeIssue(id: number, overrides: Partial<IssueItem> = {}): IssueItem {
  return {
    kind: "issue",
    id,
    title: `Issue ${id}`,
    state: "open",
    author: "octocat",
    createdAt: "2024-01-01T00:00:00.000Z",
    closedAt: null,
    labels: [],
    ...overrides,
  };
}

export function makePull(id: number, overrides: Partial<PullItem> = {}): PullItem {
  return {
    kind: "pull",
    id,
    title: `Pull ${id}`,
    state: "open",
    author: "octocat",
    createdAt: "2024-01-01T00:00:00.000Z",
    closedAt: null,
    mergedAt: null,
    labels: [],
    ...overrides,
  };
}

export function makeCollection(
  resource: RemoteResource,
  items: RemoteItem[],
  overrides: Partial<RemoteCollection> = {},
): RemoteCollection {
  return {
    resource,
    items,
    pagesFetched: 1,
    pagesFromCache: 0,
    duplicateCount: 0,
    truncated: false,
    failure: null,
    ...overrides,
  };
}

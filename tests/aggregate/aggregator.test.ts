import { describe, expect, it } from "vitest";

import { aggregate } from "../../src/aggregate/aggregator.js";
import { serializeDataset, stableStringify } from "../../src/aggregate/serialize.js";
import type { AggregateInput } from "../../src/aggregate/types.js";
import {
  failedAnalysis,
  makeCollection,
  makeCommit,
  makeDefinition,
  makeIssue,
  makePull,
  okAnalysis,
} from "../helpers/fixtures.js";

const REPOSITORY = { path: "/work/demo", owner: "octo", name: "demo" };

/** x.ts is added in A, changed in B and deleted in C. */
function addChangeDeleteInput(): AggregateInput {
  return {
    repository: REPOSITORY,
    history: {
      commits: [
        makeCommit({
          hash: "aaaaaaa",
          message: "feat: add x",
          timestamp: "2024-01-01T00:00:00.000Z",
          deltas: [{ path: "x.ts", changeType: "added", linesAdded: 5 }],
        }),
        makeCommit({
          hash: "bbbbbbb",
          message: "fix: branch in x",
          timestamp: "2024-01-02T00:00:00.000Z",
          deltas: [{ path: "x.ts", changeType: "modified", linesAdded: 3, linesRemoved: 1 }],
        }),
        makeCommit({
          hash: "ccccccc",
          message: "chore: drop x",
          timestamp: "2024-01-03T00:00:00.000Z",
          deltas: [{ path: "x.ts", changeType: "deleted", linesRemoved: 7 }],
        }),
      ],
      skipped: [],
      headHash: "ccccccc",
      reusedFromCache: 0,
    },
    remote: null,
    structure: {
      snapshot: [],
      revisions: [
        { commitHash: "bbbbbbb", analysis: okAnalysis("x.ts", 2, { definitions: [makeDefinition("x")] }) },
        { commitHash: "aaaaaaa", analysis: okAnalysis("x.ts", 1, { definitions: [makeDefinition("x")] }) },
      ],
    },
  };
}

describe("aggregate", () => {
  it("keeps the history of a deleted file without its definitions", () => {
    const dataset = aggregate(addChangeDeleteInput());

    expect(dataset.commits).toHaveLength(3);
    expect(dataset.definitions).toEqual([]);
    expect(dataset.files).toEqual([
      {
        path: "x.ts",
        status: "deleted",
        changeCount: 3,
        linesAdded: 8,
        linesRemoved: 8,
        authors: ["Ada Lovelace <ada@example.com>"],
        firstCommit: "aaaaaaa",
        lastCommit: "ccccccc",
        complexitySeries: [1, 2],
        seriesCommits: ["aaaaaaa", "bbbbbbb"],
        metrics: null,
        parseFailed: false,
      },
    ]);
    expect(dataset.repository).toEqual({ ...REPOSITORY, headHash: "ccccccc" });
  });

  it("classifies commits and counts categories and patterns", () => {
    const dataset = aggregate(addChangeDeleteInput());

    expect(dataset.commits.map((commit) => [commit.category, commit.pattern])).toEqual([
      ["feat", "conventional"],
      ["fix", "conventional"],
      ["chore", "conventional"],
    ]);
    expect(dataset.messages.categories).toMatchObject({ feat: 1, fix: 1, chore: 1, other: 0 });
    expect(dataset.messages.patterns.conventional).toBe(3);
  });

  it("keeps every commit's net delta equal to added minus removed", () => {
    const dataset = aggregate(addChangeDeleteInput());

    for (const commit of dataset.commits) {
      expect(commit.stats.netLines).toBe(commit.stats.linesAdded - commit.stats.linesRemoved);
    }
    const fileAdded = dataset.files.reduce((sum, file) => sum + file.linesAdded, 0);
    const commitAdded = dataset.commits.reduce((sum, commit) => sum + commit.stats.linesAdded, 0);
    expect(fileAdded).toBe(commitAdded);
  });

  it("serializes equal input to identical bytes", () => {
    const first = serializeDataset(aggregate(addChangeDeleteInput()));
    const second = serializeDataset(aggregate(addChangeDeleteInput()));

    expect(first).toBe(second);
    expect(first.endsWith("}\n")).toBe(true);
  });

  it("does not depend on the order remote collections arrive in", () => {
    const issues = makeCollection("issues", [makeIssue(2), makeIssue(1)], { truncated: true });
    const pulls = makeCollection("pulls", [makePull(3)], { truncated: true });
    const base = addChangeDeleteInput();

    const forward = serializeDataset(aggregate({ ...base, remote: [issues, pulls] }));
    const backward = serializeDataset(aggregate({ ...base, remote: [pulls, issues] }));

    expect(forward).toBe(backward);
    expect(aggregate({ ...base, remote: [pulls, issues] }).report.truncatedResources).toEqual(["issues", "pulls"]);
  });

  it("lists parse failures and contributes no definitions for them", () => {
    const input = addChangeDeleteInput();
    input.structure = {
      snapshot: [okAnalysis("src/a.ts", 1, { definitions: [makeDefinition("a")] }), failedAnalysis("src/bad.ts")],
      revisions: [{ commitHash: "aaaaaaa", analysis: failedAnalysis("src/bad.ts") }],
    };

    const dataset = aggregate(input);

    expect(dataset.report.parseFailures).toEqual([
      { path: "src/bad.ts", revision: "aaaaaaa", reason: "syntax", message: "line 1: Expression expected." },
      { path: "src/bad.ts", revision: "ccccccc", reason: "syntax", message: "line 1: Expression expected." },
    ]);
    expect(dataset.definitions.map((definition) => definition.path)).toEqual(["src/a.ts"]);
    expect(dataset.files.find((file) => file.path === "src/bad.ts")).toMatchObject({
      status: "present",
      parseFailed: true,
      metrics: null,
      changeCount: 0,
    });
    expect(dataset.report.completeness.structure).toBe(0.5);
  });

  it("reports structure for commits missing from the history", () => {
    const input = addChangeDeleteInput();
    input.structure.revisions.push({ commitHash: "deadbee", analysis: okAnalysis("x.ts", 9) });

    const dataset = aggregate(input);

    expect(dataset.report.inconsistencies).toEqual([
      {
        code: "AGGREGATION_INCONSISTENCY",
        kind: "unknown-commit",
        message: "Structure for x.ts refers to commit deadbee, which is not in the history.",
        commit: "deadbee",
        path: "x.ts",
        reference: null,
      },
    ]);
    expect(dataset.files[0]?.complexitySeries).toEqual([1, 2]);
  });

  it("marks the old path of a rename as deleted", () => {
    const input = addChangeDeleteInput();
    input.history.commits = [
      makeCommit({ hash: "1111111", deltas: [{ path: "old.ts", changeType: "added", linesAdded: 2 }] }),
      makeCommit({
        hash: "2222222",
        deltas: [{ path: "new.ts", oldPath: "old.ts", changeType: "renamed", linesAdded: 1 }],
      }),
    ];
    input.history.headHash = "2222222";
    input.structure = { snapshot: [okAnalysis("new.ts", 1)], revisions: [] };

    const files = aggregate(input).files;

    expect(files.map((file) => [file.path, file.status, file.changeCount])).toEqual([
      ["new.ts", "present", 1],
      ["old.ts", "deleted", 1],
    ]);
  });

  it("builds the dependency section from HEAD imports", () => {
    const input = addChangeDeleteInput();
    input.structure = {
      snapshot: [okAnalysis("src/a.ts", 1, { imports: ["./b.js", "zod"] }), okAnalysis("src/b.ts", 1)],
      revisions: [],
    };

    expect(aggregate(input).dependencies).toEqual({
      nodes: ["src/a.ts", "src/b.ts"],
      edges: [
        { source: "src/a.ts", target: "external:zod" },
        { source: "src/a.ts", target: "src/b.ts" },
      ],
      externals: ["external:zod"],
      cycles: [],
      fanIn: { "src/a.ts": 0, "src/b.ts": 1 },
      fanOut: { "src/a.ts": 2, "src/b.ts": 0 },
    });
  });

  it("summarizes authors per name and email", () => {
    const input = addChangeDeleteInput();
    input.history.commits.push(
      makeCommit({
        hash: "ddddddd",
        timestamp: "2023-12-31T00:00:00.000Z",
        author: { name: "Ada Lovelace", email: "ada@work.example" },
        deltas: [{ path: "y.ts", linesAdded: 4 }],
      }),
    );

    expect(aggregate(input).authors).toEqual([
      {
        name: "Ada Lovelace",
        email: "ada@example.com",
        commits: 3,
        linesAdded: 8,
        linesRemoved: 8,
        firstCommitAt: "2024-01-01T00:00:00.000Z",
        lastCommitAt: "2024-01-03T00:00:00.000Z",
      },
      {
        name: "Ada Lovelace",
        email: "ada@work.example",
        commits: 1,
        linesAdded: 4,
        linesRemoved: 0,
        firstCommitAt: "2023-12-31T00:00:00.000Z",
        lastCommitAt: "2023-12-31T00:00:00.000Z",
      },
    ]);
  });

  it("deduplicates repeated commits and reports history completeness", () => {
    const input = addChangeDeleteInput();
    const first = input.history.commits[0];
    if (first) input.history.commits.push(first);
    input.history.skipped = [{ hash: "eeeeeee", reason: "bad object" }];

    const dataset = aggregate(input);

    expect(dataset.commits).toHaveLength(3);
    expect(dataset.report.skippedCommits).toEqual([{ hash: "eeeeeee", reason: "bad object" }]);
    expect(dataset.report.completeness).toEqual({ history: 0.75, remote: null, structure: null });
  });
});

describe("aggregate correlations", () => {
  function correlationInput(): AggregateInput {
    return {
      repository: REPOSITORY,
      history: {
        commits: [
          makeCommit({
            hash: "c1c1c1c",
            message: "fix: crash on start (#10)",
            timestamp: "2024-01-02T00:00:00.000Z",
            author: { name: "octocat", email: "octocat@example.com" },
          }),
          makeCommit({
            hash: "c2c2c2c",
            message: "add feature",
            timestamp: "2024-01-03T00:00:00.000Z",
            author: { name: "Mona Lisa", email: "1234+mona@users.noreply.github.com" },
          }),
          makeCommit({
            hash: "c3c3c3c",
            message: "refs #99",
            timestamp: "2024-02-01T00:00:00.000Z",
            author: { name: "Someone", email: "someone@example.com" },
          }),
        ],
        skipped: [],
        headHash: "c3c3c3c",
        reusedFromCache: 0,
      },
      remote: [
        makeCollection("issues", [makeIssue(10)]),
        makeCollection("pulls", [
          makePull(20, {
            author: "mona",
            state: "merged",
            mergedAt: "2024-01-05T00:00:00.000Z",
            closedAt: "2024-01-05T00:00:00.000Z",
          }),
          makePull(21),
        ], { truncated: true, failure: { code: "REMOTE_REQUEST_FAILED", message: "boom", page: 2 } }),
      ],
      structure: { snapshot: [], revisions: [] },
    };
  }

  it("links commits to referenced issues exactly", () => {
    expect(aggregate(correlationInput()).correlations.exact).toEqual([
      { commit: "c1c1c1c", itemKind: "issue", itemId: 10, match: "exact" },
    ]);
  });

  it("guesses pull request authorship by login or noreply email within the open window", () => {
    expect(aggregate(correlationInput()).correlations.bestEffort).toEqual([
      { commit: "c2c2c2c", pullId: 20, via: "email", match: "best-effort" },
      { commit: "c1c1c1c", pullId: 21, via: "login", match: "best-effort" },
    ]);
  });

  it("omits best-effort correlations when disabled", () => {
    const input = { ...correlationInput(), options: { bestEffortCorrelation: false } };

    expect(aggregate(input).correlations.bestEffort).toEqual([]);
  });

  it("reports references nothing resolves and truncated resources", () => {
    const dataset = aggregate(correlationInput());

    expect(dataset.report.inconsistencies).toEqual([
      {
        code: "AGGREGATION_INCONSISTENCY",
        kind: "unresolved-reference",
        message: "Commit c3c3c3c references #99, which no collected issue or pull request matches.",
        commit: "c3c3c3c",
        path: null,
        reference: 99,
      },
    ]);
    expect(dataset.report.truncatedResources).toEqual(["pulls"]);
    expect(dataset.report.completeness.remote).toBe(0.5);
    expect(dataset.remote?.summary.map((entry) => [entry.resource, entry.itemCount, entry.truncated])).toEqual([
      ["issues", 1, false],
      ["pulls", 2, true],
    ]);
  });

  it("does not report unresolved references without remote data", () => {
    const dataset = aggregate({ ...correlationInput(), remote: null });

    expect(dataset.remote).toBeNull();
    expect(dataset.report.inconsistencies).toEqual([]);
    expect(dataset.correlations).toEqual({ exact: [], bestEffort: [] });
  });
});

describe("stableStringify", () => {
  it("sorts keys at every depth and drops undefined values", () => {
    expect(stableStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: undefined } }, 0)).toBe(
      '{"a":{"d":[{"y":2,"z":1}]},"b":1}',
    );
  });
});

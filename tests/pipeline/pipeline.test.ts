import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("simple-git", async () => {
  const { fakeSimpleGit } = await import("../helpers/fake-git.js");
  return { simpleGit: vi.fn(fakeSimpleGit) };
});

import { loadConfig } from "../../src/core/config.js";
import { createEventBus } from "../../src/core/event-bus.js";
import type { RemoteResource } from "../../src/core/types.js";
import { writeDataset } from "../../src/pipeline/output.js";
import { isAnalyzablePath, runMiningPipeline } from "../../src/pipeline/pipeline.js";
import type { FetchPageOptions, PageFetcher, PageResponse } from "../../src/remote/types.js";
import { type FakeCommit, setFakeRepository } from "../helpers/fake-git.js";
import { makeIssue } from "../helpers/fixtures.js";

const MATH_V1 = "export function add(a: number, b: number) {\n  return a + b;\n}\n";
const MATH_V2 = [
  'import { clamp } from "./util.js";',
  "",
  "export function add(a: number, b: number) {",
  "  if (a < 0) return clamp(b);",
  "  return a + b;",
  "}",
  "",
].join("\n");
const UTIL = "export const clamp = (n: number) => (n > 0 ? n : 0);\n";

function demoCommits(): FakeCommit[] {
  return [
    {
      hash: "1111111",
      message: "feat: add math (#1)",
      timestamp: "2024-01-01T00:00:00Z",
      changes: [{ status: "A", path: "src/math.ts", added: 3 }],
      tree: { "src/math.ts": MATH_V1 },
    },
    {
      hash: "2222222",
      message: "fix: guard add",
      timestamp: "2024-01-02T00:00:00Z",
      changes: [
        { status: "A", path: "README.md", added: 1 },
        { status: "A", path: "src/broken.ts", added: 1 },
        { status: "M", path: "src/math.ts", added: 3, removed: 0 },
        { status: "A", path: "src/util.ts", added: 1 },
      ],
      tree: {
        "README.md": "# demo\n",
        "node_modules/pkg/index.js": "module.exports = 1;\n",
        "src/broken.ts": "const x = ;\n",
        "src/math.ts": MATH_V2,
        "src/util.ts": UTIL,
      },
    },
  ];
}

class IssuesFetcher implements PageFetcher {
  public readonly calls: RemoteResource[] = [];

  public async fetchPage(resource: RemoteResource, _page: number, _options: FetchPageOptions): Promise<PageResponse> {
    this.calls.push(resource);
    return { status: "ok", items: resource === "issues" ? [makeIssue(1)] : [], hasMore: false };
  }
}

function demoConfig(overrides: Record<string, unknown> = {}) {
  return loadConfig(
    {
      repository: { path: "/work/demo" },
      remote: { owner: "octo", name: "demo", resources: ["issues"] },
      ...overrides,
    },
    { env: {} },
  );
}

describe("runMiningPipeline", () => {
  beforeEach(() => {
    setFakeRepository({ commits: demoCommits() });
  });

  it("joins history, remote items and structure into one dataset", async () => {
    const fetcher = new IssuesFetcher();

    const { dataset } = await runMiningPipeline(demoConfig(), { cache: null, fetcher });

    expect(fetcher.calls).toEqual(["issues"]);
    expect(dataset.repository).toEqual({ path: "/work/demo", owner: "octo", name: "demo", headHash: "2222222" });
    expect(dataset.commits.map((commit) => commit.hash)).toEqual(["1111111", "2222222"]);
    expect(dataset.files.map((file) => [file.path, file.complexitySeries])).toEqual([
      ["README.md", []],
      ["src/broken.ts", []],
      ["src/math.ts", [1, 2]],
      ["src/util.ts", [2]],
    ]);
    expect(dataset.definitions.map((definition) => definition.qualifiedName)).toEqual([
      "src/math:add",
      "src/util:clamp",
    ]);
    expect(dataset.dependencies.edges).toEqual([{ source: "src/math.ts", target: "src/util.ts" }]);
    expect(dataset.correlations.exact).toEqual([
      { commit: "1111111", itemKind: "issue", itemId: 1, match: "exact" },
    ]);
    expect(dataset.report.parseFailures).toEqual([
      { path: "src/broken.ts", revision: "2222222", reason: "syntax", message: expect.stringMatching(/^line 1: /) },
    ]);
    expect(dataset.report.completeness).toEqual({ history: 1, remote: 1, structure: 2 / 3 });
  });

  it("skips revision analysis when history analysis is off", async () => {
    const { dataset, structure } = await runMiningPipeline(demoConfig({ analysis: { history: false } }), {
      cache: null,
      fetcher: new IssuesFetcher(),
    });

    expect(structure.revisions).toEqual([]);
    expect(structure.snapshot.map((analysis) => analysis.path)).toEqual([
      "src/broken.ts",
      "src/math.ts",
      "src/util.ts",
    ]);
    expect(dataset.files.find((file) => file.path === "src/math.ts")?.complexitySeries).toEqual([]);
  });

  it("leaves the remote section empty when remote collection is disabled", async () => {
    const fetcher = new IssuesFetcher();

    const { dataset } = await runMiningPipeline(demoConfig({ remote: { enabled: false } }), { cache: null, fetcher });

    expect(fetcher.calls).toEqual([]);
    expect(dataset.remote).toBeNull();
    expect(dataset.report.completeness.remote).toBeNull();
  });

  it("warns and continues without remote data when origin is not on GitHub", async () => {
    setFakeRepository({ commits: demoCommits(), remoteUrl: "/srv/git/demo.git" });
    const events = createEventBus();
    const warnings = vi.fn();
    events.on("warning", warnings);

    const { dataset } = await runMiningPipeline(
      loadConfig({ repository: { path: "/work/demo" } }, { env: {} }),
      { cache: null, fetcher: new IssuesFetcher(), events },
    );

    expect(dataset.remote).toBeNull();
    expect(dataset.repository.owner).toBeNull();
    expect(warnings).toHaveBeenCalledTimes(1);
    expect(warnings.mock.calls[0]?.[0]).toMatchObject({ error: { code: "REMOTE_REQUEST_FAILED" } });
  });

  it("resolves coordinates from the origin remote", async () => {
    setFakeRepository({ commits: demoCommits(), remoteUrl: "git@github.com:octo/demo.git" });

    const { dataset } = await runMiningPipeline(
      loadConfig({ repository: { path: "/work/demo" }, remote: { resources: ["issues"] } }, { env: {} }),
      { cache: null, fetcher: new IssuesFetcher() },
    );

    expect(dataset.repository).toMatchObject({ owner: "octo", name: "demo" });
    expect(dataset.remote?.issues.map((item) => item.id)).toEqual([1]);
  });

  it("fails with REPOSITORY_UNAVAILABLE outside a repository", async () => {
    setFakeRepository({ commits: [], notARepository: true });

    await expect(runMiningPipeline(demoConfig(), { cache: null, fetcher: new IssuesFetcher() })).rejects.toMatchObject(
      { code: "REPOSITORY_UNAVAILABLE" },
    );
  });
});

describe("isAnalyzablePath", () => {
  const extensions = [".ts", ".tsx"];
  const exclude = ["node_modules/", "dist/", ".d.ts"];

  it("matches extensions case-insensitively", () => {
    expect(isAnalyzablePath("src/App.TSX", extensions, exclude)).toBe(true);
    expect(isAnalyzablePath("README.md", extensions, exclude)).toBe(false);
  });

  it("excludes directories at any depth and suffixes", () => {
    expect(isAnalyzablePath("node_modules/x/index.ts", extensions, exclude)).toBe(false);
    expect(isAnalyzablePath("packages/a/dist/index.ts", extensions, exclude)).toBe(false);
    expect(isAnalyzablePath("src/types.d.ts", extensions, exclude)).toBe(false);
    expect(isAnalyzablePath("src/distance.ts", extensions, exclude)).toBe(true);
  });
});

describe("writeDataset", () => {
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "repo-miner-output-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes the serialized dataset and leaves no temp files", async () => {
    setFakeRepository({ commits: demoCommits() });
    const { dataset } = await runMiningPipeline(demoConfig({ remote: { enabled: false } }), { cache: null });
    const target = join(tempDir, "out", "dataset.json");

    const written = await writeDataset(target, dataset);

    expect(written).toBe(target);
    const parsed: unknown = JSON.parse(await readFile(target, "utf8"));
    expect(parsed).toMatchObject({ schemaVersion: 1, repository: { headHash: "2222222" } });
    expect(await readdir(join(tempDir, "out"))).toEqual(["dataset.json"]);
  });
});

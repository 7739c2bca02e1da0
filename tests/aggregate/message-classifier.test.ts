import { describe, expect, it } from "vitest";

import {
  classifyCommitMessage,
  classifyMessagePattern,
  extractIssueReferences,
  isMergeMessage,
} from "../../src/aggregate/message-classifier.js";

describe("classifyCommitMessage", () => {
  it.each([
    ["feat(parser): support decorators", "feat"],
    ["fix!: drop node 18", "fix"],
    ["ci: cache dependencies", "chore"],
    ["Merge pull request #12 from octo/topic", "merge"],
    ["Merge branch 'main' into topic", "merge"],
    ["Fix crash when the log is empty", "fix"],
    ["Update README", "docs"],
    ["Speed up parser", "perf"],
    ["unknown: thing", "other"],
    ["wip", "other"],
  ])("%s -> %s", (message, category) => {
    expect(classifyCommitMessage(message)).toBe(category);
  });

  it("looks at the subject line only", () => {
    expect(classifyCommitMessage("Tidy things\n\nThis fixes a bug.")).toBe("other");
  });
});

describe("classifyMessagePattern", () => {
  it.each([
    ["Merge pull request #12 from octo/topic", "merge"],
    ["feat: add parser", "conventional"],
    ["Update README (#3)", "with-issue"],
    ["Remove dead code", "imperative"],
    ["Removed dead code", "other"],
  ])("%s -> %s", (message, pattern) => {
    expect(classifyMessagePattern(message)).toBe(pattern);
  });
});

describe("extractIssueReferences", () => {
  it("returns sorted unique positive references", () => {
    expect(extractIssueReferences("see #5, #2 and #5; not &#7 or abc#9 or #0")).toEqual([2, 5]);
    expect(extractIssueReferences("#4 at the start\nand (#8) in the body")).toEqual([4, 8]);
  });
});

describe("isMergeMessage", () => {
  it("matches merge subjects", () => {
    expect(isMergeMessage("Merge remote-tracking branch 'origin/main'")).toBe(true);
    expect(isMergeMessage("Merged the branches")).toBe(false);
  });
});

import type { CommitCategory, MessagePattern } from "./types.js";

const CONVENTIONAL_PATTERN = /^(?<type>[a-z]+)(?:\([^)]*\))?!?:\s/i;
const MERGE_PATTERN = /^Merge (?:branch|pull request|remote-tracking branch|tag|commit)\b/;
const ISSUE_REFERENCE_PATTERN = /(?:^|[^\w&])#(\d+)\b/g;

const CONVENTIONAL_TYPES: Record<string, CommitCategory> = {
  feat: "feat",
  feature: "feat",
  fix: "fix",
  bugfix: "fix",
  hotfix: "fix",
  docs: "docs",
  doc: "docs",
  refactor: "refactor",
  test: "test",
  tests: "test",
  chore: "chore",
  build: "chore",
  ci: "chore",
  deps: "chore",
  style: "style",
  perf: "perf",
};

/** Checked in order; the first keyword found in the subject decides. */
const KEYWORD_CATEGORIES: ReadonlyArray<readonly [RegExp, CommitCategory]> = [
  [/\b(fix(es|ed)?|bug|hotfix|patch|resolve[sd]?|crash)\b/i, "fix"],
  [/\b(add(s|ed)?|implement(s|ed)?|introduce[sd]?|feature|support)\b/i, "feat"],
  [/\b(docs?|readme|documentation|changelog|comments?)\b/i, "docs"],
  [/\b(refactor(s|ed)?|restructure[sd]?|clean ?up|rename[sd]?|simplif(y|ies|ied))\b/i, "refactor"],
  [/\b(tests?|specs?|coverage)\b/i, "test"],
  [/\b(perf|performance|optimi[sz]e[sd]?|speed ?up|faster)\b/i, "perf"],
  [/\b(format(ting)?|lint|whitespace|style)\b/i, "style"],
  [/\b(bump(s|ed)?|deps|dependenc(y|ies)|release|version|ci|build|chore)\b/i, "chore"],
];

const IMPERATIVE_VERBS = new Set([
  "add",
  "allow",
  "avoid",
  "bump",
  "change",
  "clean",
  "convert",
  "create",
  "disable",
  "drop",
  "enable",
  "ensure",
  "fix",
  "handle",
  "implement",
  "improve",
  "make",
  "move",
  "refactor",
  "remove",
  "rename",
  "replace",
  "revert",
  "simplify",
  "support",
  "update",
  "use",
]);

function subjectOf(message: string): string {
  return message.split("\n", 1)[0]?.trim() ?? "";
}

export function isMergeMessage(message: string): boolean {
  return MERGE_PATTERN.test(subjectOf(message));
}

export function classifyCommitMessage(message: string): CommitCategory {
  const subject = subjectOf(message);

  const conventional = subject.match(CONVENTIONAL_PATTERN)?.groups?.type?.toLowerCase();
  const mapped = conventional ? CONVENTIONAL_TYPES[conventional] : undefined;
  if (mapped) {
    return mapped;
  }

  if (isMergeMessage(message)) {
    return "merge";
  }

  for (const [pattern, category] of KEYWORD_CATEGORIES) {
    if (pattern.test(subject)) {
      return category;
    }
  }

  return "other";
}

export function classifyMessagePattern(message: string): MessagePattern {
  const subject = subjectOf(message);
  if (isMergeMessage(message)) return "merge";
  if (CONVENTIONAL_PATTERN.test(subject)) return "conventional";
  if (extractIssueReferences(message).length > 0) return "with-issue";

  const firstWord = subject.split(/\s+/, 1)[0]?.toLowerCase() ?? "";
  if (IMPERATIVE_VERBS.has(firstWord)) return "imperative";
  return "other";
}

/** `#12` style references anywhere in the message, sorted and unique. */
export function extractIssueReferences(message: string): number[] {
  const references = new Set<number>();
  for (const match of message.matchAll(ISSUE_REFERENCE_PATTERN)) {
    const value = Number.parseInt(match[1] ?? "", 10);
    if (Number.isSafeInteger(value) && value > 0) {
      references.add(value);
    }
  }
  return [...references].sort((a, b) => a - b);
}

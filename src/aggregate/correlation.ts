import type { CommitRecord, IssueItem, PullItem } from "../core/types.js";
import { compareStrings } from "../core/utils.js";
import { extractIssueReferences } from "./message-classifier.js";
import type { BestEffortCorrelation, ExactCorrelation } from "./types.js";

const UNKNOWN_AUTHOR = "unknown";

export interface ExactCorrelationResult {
  correlations: ExactCorrelation[];
  /** References no collected issue or pull request resolves. */
  unresolved: Array<{ commit: string; reference: number }>;
}

/** Commit messages naming `#n` joined to the issue or pull request `n`. */
export function correlateExact(
  commits: readonly CommitRecord[],
  issues: readonly IssueItem[],
  pulls: readonly PullItem[],
): ExactCorrelationResult {
  const issueIds = new Set(issues.map((issue) => issue.id));
  const pullIds = new Set(pulls.map((pull) => pull.id));
  const correlations: ExactCorrelation[] = [];
  const unresolved: ExactCorrelationResult["unresolved"] = [];

  for (const commit of commits) {
    for (const reference of extractIssueReferences(commit.message)) {
      if (issueIds.has(reference)) {
        correlations.push({ commit: commit.hash, itemKind: "issue", itemId: reference, match: "exact" });
      } else if (pullIds.has(reference)) {
        correlations.push({ commit: commit.hash, itemKind: "pull", itemId: reference, match: "exact" });
      } else {
        unresolved.push({ commit: commit.hash, reference });
      }
    }
  }

  return { correlations, unresolved };
}

/**
 * Commits whose author plausibly is a pull request's author, made while
 * the pull request was open. Identity is guessed from the git author name
 * or the email local part; this is a heuristic and reported as such.
 */
export function correlateBestEffort(
  commits: readonly CommitRecord[],
  pulls: readonly PullItem[],
  exact: readonly ExactCorrelation[],
): BestEffortCorrelation[] {
  const exactPairs = new Set(
    exact.filter((entry) => entry.itemKind === "pull").map((entry) => `${entry.commit}#${entry.itemId}`),
  );
  const correlations: BestEffortCorrelation[] = [];

  for (const pull of pulls) {
    const login = pull.author.toLowerCase();
    if (login === UNKNOWN_AUTHOR) continue;

    const openedAt = Date.parse(pull.createdAt);
    const endedAt = Date.parse(pull.mergedAt ?? pull.closedAt ?? "");
    const windowEnd = Number.isNaN(endedAt) ? Number.POSITIVE_INFINITY : endedAt;

    for (const commit of commits) {
      const committedAt = Date.parse(commit.timestamp);
      if (Number.isNaN(committedAt) || committedAt < openedAt || committedAt > windowEnd) continue;
      if (exactPairs.has(`${commit.hash}#${pull.id}`)) continue;

      const via = matchAuthor(login, commit.author.name, commit.author.email);
      if (via) {
        correlations.push({ commit: commit.hash, pullId: pull.id, via, match: "best-effort" });
      }
    }
  }

  return correlations.sort((a, b) => a.pullId - b.pullId || compareStrings(a.commit, b.commit));
}

function matchAuthor(login: string, name: string, email: string): BestEffortCorrelation["via"] | undefined {
  if (name.trim().toLowerCase() === login) {
    return "login";
  }

  const localPart = email.toLowerCase().split("@", 1)[0] ?? "";
  // GitHub noreply addresses look like `12345+login@users.noreply.github.com`.
  const noreplyLogin = localPart.includes("+") ? localPart.slice(localPart.indexOf("+") + 1) : localPart;
  if (localPart === login || noreplyLogin === login) {
    return "email";
  }

  return undefined;
}

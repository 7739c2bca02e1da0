import type { ContributorItem, IssueItem, PullItem } from "../core/types.js";
import { asNumber, asString, isRecord, toUtcIso, uniqueSorted } from "../core/utils.js";

const UNKNOWN_AUTHOR = "unknown";

/** Pull requests also come back from the issues endpoint; those are dropped here. */
export function normalizeIssue(raw: unknown): IssueItem | undefined {
  if (!isRecord(raw) || raw.pull_request !== undefined) {
    return undefined;
  }

  const id = asNumber(raw.number);
  const createdAt = readTimestamp(raw.created_at);
  if (id === undefined || createdAt === null) {
    return undefined;
  }

  return {
    kind: "issue",
    id,
    title: asString(raw.title)?.trim() ?? "",
    state: raw.state === "closed" ? "closed" : "open",
    author: readLogin(raw.user),
    createdAt,
    closedAt: readTimestamp(raw.closed_at),
    labels: normalizeLabels(raw.labels),
  };
}

export function normalizePull(raw: unknown): PullItem | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const id = asNumber(raw.number);
  const createdAt = readTimestamp(raw.created_at);
  if (id === undefined || createdAt === null) {
    return undefined;
  }

  const mergedAt = readTimestamp(raw.merged_at);
  return {
    kind: "pull",
    id,
    title: asString(raw.title)?.trim() ?? "",
    state: mergedAt !== null ? "merged" : raw.state === "closed" ? "closed" : "open",
    author: readLogin(raw.user),
    createdAt,
    closedAt: readTimestamp(raw.closed_at),
    mergedAt,
    labels: normalizeLabels(raw.labels),
  };
}

/** Anonymous contributors have no user id and are skipped. */
export function normalizeContributor(raw: unknown): ContributorItem | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const id = asNumber(raw.id);
  const login = asString(raw.login);
  if (id === undefined || !login) {
    return undefined;
  }

  return {
    kind: "contributor",
    id,
    login,
    contributions: asNumber(raw.contributions) ?? 0,
  };
}

export function normalizeLabels(rawLabels: unknown): string[] {
  if (!Array.isArray(rawLabels)) {
    return [];
  }

  const labels: string[] = [];
  for (const rawLabel of rawLabels) {
    const name = typeof rawLabel === "string" ? rawLabel : isRecord(rawLabel) ? asString(rawLabel.name) : undefined;
    const trimmed = name?.trim();
    if (trimmed) {
      labels.push(trimmed);
    }
  }

  return uniqueSorted(labels);
}

function readLogin(user: unknown): string {
  if (!isRecord(user)) {
    return UNKNOWN_AUTHOR;
  }
  return asString(user.login) || UNKNOWN_AUTHOR;
}

function readTimestamp(value: unknown): string | null {
  const raw = asString(value);
  if (!raw) {
    return null;
  }
  return toUtcIso(raw) ?? null;
}

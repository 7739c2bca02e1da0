import { Octokit } from "@octokit/rest";

import type { RemoteItem, RemoteResource } from "../core/types.js";
import { asNumber, isRecord } from "../core/utils.js";
import { normalizeContributor, normalizeIssue, normalizePull } from "./normalize.js";
import type { FetchPageOptions, PageFetcher, PageResponse, RepoCoordinates } from "./types.js";

const DEFAULT_RATE_LIMIT_WAIT_MS = 60_000;
const MIN_RATE_LIMIT_WAIT_MS = 1_000;

export interface GitHubPageFetcherOptions {
  repo: RepoCoordinates;
  token?: string;
  now?: () => number;
}

interface RawPage {
  data: unknown[];
  link: string | undefined;
}

/**
 * `PageFetcher` backed by the GitHub REST API. Pages are 1-based, as in
 * the API itself.
 */
export class GitHubPageFetcher implements PageFetcher {
  private readonly octokit: Octokit;
  private readonly now: () => number;

  public constructor(private readonly options: GitHubPageFetcherOptions) {
    this.octokit = new Octokit({
      auth: options.token ?? process.env.GITHUB_TOKEN,
      userAgent: "repo-miner",
    });
    this.now = options.now ?? Date.now;
  }

  public async fetchPage(
    resource: RemoteResource,
    page: number,
    options: FetchPageOptions,
  ): Promise<PageResponse> {
    let raw: RawPage;
    try {
      raw = await this.request(resource, page, options);
    } catch (error) {
      const retryAfterMs = readRateLimitHint(error, this.now());
      if (retryAfterMs !== undefined) {
        return { status: "rate-limited", retryAfterMs };
      }
      throw error;
    }

    return {
      status: "ok",
      items: normalizePage(resource, raw.data),
      hasMore: hasNextPage(raw.link),
    };
  }

  private async request(
    resource: RemoteResource,
    page: number,
    options: FetchPageOptions,
  ): Promise<RawPage> {
    const params = {
      owner: this.options.repo.owner,
      repo: this.options.repo.name,
      per_page: options.perPage,
      page,
      request: { signal: options.signal },
    };

    switch (resource) {
      case "issues": {
        const response = await this.octokit.issues.listForRepo({
          ...params,
          state: "all",
          sort: "created",
          direction: "asc",
        });
        return { data: response.data, link: response.headers.link };
      }
      case "pulls": {
        const response = await this.octokit.pulls.list({
          ...params,
          state: "all",
          sort: "created",
          direction: "asc",
        });
        return { data: response.data, link: response.headers.link };
      }
      case "contributors": {
        const response = await this.octokit.repos.listContributors({ ...params, anon: "false" });
        // An empty repository answers 204 with no body.
        return { data: Array.isArray(response.data) ? response.data : [], link: response.headers.link };
      }
    }
  }
}

function normalizePage(resource: RemoteResource, data: unknown[]): RemoteItem[] {
  const normalize =
    resource === "issues" ? normalizeIssue : resource === "pulls" ? normalizePull : normalizeContributor;

  const items: RemoteItem[] = [];
  for (const entry of data) {
    const item = normalize(entry);
    if (item) {
      items.push(item);
    }
  }
  return items;
}

export function hasNextPage(link: string | undefined): boolean {
  if (!link) {
    return false;
  }
  return link.split(",").some((part) => /rel="next"/.test(part));
}

/**
 * A 403 or 429 becomes a rate-limit hint when it carries `retry-after`
 * or reports an exhausted quota. Other errors yield `undefined`.
 */
export function readRateLimitHint(error: unknown, now: number): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  const status = asNumber(error.status);
  if (status !== 403 && status !== 429) {
    return undefined;
  }

  const response = error.response;
  const headers = isRecord(response) && isRecord(response.headers) ? response.headers : {};

  const retryAfter = readNumericHeader(headers["retry-after"]);
  if (retryAfter !== undefined) {
    return Math.max(0, retryAfter * 1_000);
  }

  if (String(headers["x-ratelimit-remaining"]) === "0") {
    const reset = readNumericHeader(headers["x-ratelimit-reset"]);
    if (reset === undefined) {
      return DEFAULT_RATE_LIMIT_WAIT_MS;
    }
    return Math.max(MIN_RATE_LIMIT_WAIT_MS, reset * 1_000 - now);
  }

  return undefined;
}

function readNumericHeader(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

import { setTimeout as delay } from "node:timers/promises";

import { remotePageKey } from "../cache/keys.js";
import { type CacheStore, readCached } from "../cache/types.js";
import { MinerError, remoteError } from "../core/errors.js";
import type { MinerEventBus } from "../core/event-bus.js";
import type { RemoteCollection, RemoteFailure, RemoteItem, RemoteResource } from "../core/types.js";
import { normalizeRemoteError } from "./normalize-error.js";
import { CachedPageSchema } from "./schema.js";
import type { PageFetcher, PageResponse, PageResult } from "./types.js";

const BACKOFF_BASE_MS = 1_000;
const BACKOFF_MAX_MS = 30_000;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RemoteCollectorOptions {
  fetcher: PageFetcher;
  /** `owner/name`; namespaces the page cache. */
  repoSlug: string;
  cache?: CacheStore;
  cacheTtlMs?: number | null;
  perPage?: number;
  maxPages?: number;
  maxRetries?: number;
  maxRetryWaitMs?: number;
  deadlineMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  events?: MinerEventBus;
}

export interface CollectOptions {
  signal?: AbortSignal;
}

export function calculateBackoff(attempt: number): number {
  return Math.min(BACKOFF_BASE_MS * 2 ** attempt, BACKOFF_MAX_MS);
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Paginates remote resources through a `PageFetcher`. Rate-limit hints and
 * transient failures are retried up to `maxRetries` per page; anything that
 * still fails ends the resource early with the pages collected so far.
 */
export class RemoteCollector {
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly maxRetries: number;
  private readonly maxRetryWaitMs: number;
  private readonly sleep: Sleep;

  public constructor(private readonly options: RemoteCollectorOptions) {
    this.perPage = options.perPage ?? 100;
    this.maxPages = options.maxPages ?? 50;
    this.maxRetries = options.maxRetries ?? 3;
    this.maxRetryWaitMs = options.maxRetryWaitMs ?? 120_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * One page, from the cache when possible. Throws a `MinerError` once
   * retries are exhausted, on a permanent failure, or when `signal` aborts.
   */
  public async fetchPage(
    resource: RemoteResource,
    page: number,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<PageResult> {
    const { cache, events, fetcher } = this.options;
    const key = remotePageKey(this.options.repoSlug, resource, page);

    if (cache) {
      const cached = await readCached(cache, key, CachedPageSchema, events);
      if (cached.hit) {
        events?.emit("remote:page-fetched", {
          resource,
          page,
          items: cached.value.items.length,
          cached: true,
        });
        return { items: cached.value.items, hasMore: cached.value.hasMore, fromCache: true };
      }
    }

    for (let attempt = 0; ; attempt += 1) {
      throwIfAborted(signal, resource, page);

      let response: PageResponse;
      try {
        response = await fetcher.fetchPage(resource, page, { perPage: this.perPage, signal });
      } catch (error) {
        if (signal.aborted) {
          throw deadlineError(resource, page, error);
        }

        const normalized = normalizeRemoteError(error, { resource, page, attempt });
        if (normalized.classification === "aborted" || normalized.classification === "permanent") {
          throw normalized.error;
        }
        if (attempt >= this.maxRetries) {
          throw normalized.error;
        }

        const delayMs = Math.min(calculateBackoff(attempt), this.maxRetryWaitMs);
        events?.emit("remote:retrying", { resource, page, delayMs, attempt: attempt + 1 });
        await this.wait(delayMs, signal, resource, page);
        continue;
      }

      if (response.status === "rate-limited") {
        if (attempt >= this.maxRetries) {
          throw remoteError(
            "RATE_LIMIT_EXCEEDED",
            `Rate limit persisted after ${this.maxRetries} retries on ${resource} page ${page}.`,
            { context: { resource, page, retryAfterMs: response.retryAfterMs } },
          );
        }

        const delayMs = Math.min(Math.max(0, response.retryAfterMs), this.maxRetryWaitMs);
        events?.emit("remote:rate-limited", {
          resource,
          page,
          retryAfterMs: delayMs,
          attempt: attempt + 1,
        });
        await this.wait(delayMs, signal, resource, page);
        continue;
      }

      if (cache) {
        await cache.put(
          key,
          { items: response.items, hasMore: response.hasMore },
          this.options.cacheTtlMs ?? null,
        );
      }
      events?.emit("remote:page-fetched", {
        resource,
        page,
        items: response.items.length,
        cached: false,
      });
      return { items: response.items, hasMore: response.hasMore, fromCache: false };
    }
  }

  /**
   * Pages through `resource` until the remote reports no more pages or
   * `maxPages` is reached. Never throws: failures surface as `truncated`
   * with the earlier pages kept. Ids seen on an earlier page are replaced
   * by the later copy.
   */
  public async collectResource(
    resource: RemoteResource,
    options: CollectOptions = {},
  ): Promise<RemoteCollection> {
    const scope = createAbortScope([this.options.signal, options.signal], this.options.deadlineMs);
    const byId = new Map<number, RemoteItem>();
    let duplicateCount = 0;
    let pagesFetched = 0;
    let pagesFromCache = 0;
    let failure: RemoteFailure | null = null;
    let exhausted = false;

    try {
      for (let page = 1; page <= this.maxPages; page += 1) {
        let result: PageResult;
        try {
          result = await this.fetchPage(resource, page, scope.signal);
        } catch (error) {
          failure = toFailure(error, resource, page);
          break;
        }

        pagesFetched += 1;
        if (result.fromCache) pagesFromCache += 1;

        for (const item of result.items) {
          if (byId.has(item.id)) duplicateCount += 1;
          byId.set(item.id, item);
        }

        if (!result.hasMore) {
          exhausted = true;
          break;
        }
      }
    } finally {
      scope.dispose();
    }

    const collection: RemoteCollection = {
      resource,
      items: [...byId.values()].sort((a, b) => a.id - b.id),
      pagesFetched,
      pagesFromCache,
      duplicateCount,
      truncated: failure !== null || !exhausted,
      failure,
    };
    this.options.events?.emit("remote:collected", { collection });
    return collection;
  }

  /** Resources are collected concurrently and independently. */
  public async collectAll(
    resources: readonly RemoteResource[],
    options: CollectOptions = {},
  ): Promise<RemoteCollection[]> {
    return Promise.all(resources.map((resource) => this.collectResource(resource, options)));
  }

  private async wait(
    ms: number,
    signal: AbortSignal,
    resource: RemoteResource,
    page: number,
  ): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      throw deadlineError(resource, page, error);
    }
    throwIfAborted(signal, resource, page);
  }
}

function throwIfAborted(signal: AbortSignal, resource: RemoteResource, page: number): void {
  if (signal.aborted) {
    throw deadlineError(resource, page, signal.reason);
  }
}

function deadlineError(resource: RemoteResource, page: number, cause: unknown): MinerError {
  return remoteError("DEADLINE_EXCEEDED", `Collection of ${resource} stopped at page ${page}.`, {
    context: { resource, page },
    cause,
  });
}

function toFailure(error: unknown, resource: RemoteResource, page: number): RemoteFailure {
  const normalized = error instanceof MinerError ? error : normalizeRemoteError(error, { resource, page }).error;
  return { code: normalized.code, message: normalized.message, page };
}

interface AbortScope {
  signal: AbortSignal;
  dispose(): void;
}

/** One signal that aborts when any parent aborts or the deadline passes. */
function createAbortScope(
  parents: ReadonlyArray<AbortSignal | undefined>,
  deadlineMs: number | undefined,
): AbortScope {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener("abort", onAbort));
  }

  if (deadlineMs !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => controller.abort(new Error(`Deadline of ${deadlineMs}ms exceeded`)), deadlineMs);
    timer.unref();
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

import type { RemoteItem, RemoteResource } from "../core/types.js";

export interface FetchPageOptions {
  perPage: number;
  signal?: AbortSignal;
}

/**
 * What a remote answers for one page. A rate-limited answer carries the
 * delay the server asked for; every other failure is thrown.
 */
export type PageResponse =
  | { status: "ok"; items: RemoteItem[]; hasMore: boolean }
  | { status: "rate-limited"; retryAfterMs: number };

export interface PageFetcher {
  fetchPage(resource: RemoteResource, page: number, options: FetchPageOptions): Promise<PageResponse>;
}

export interface PageResult {
  items: RemoteItem[];
  hasMore: boolean;
  fromCache: boolean;
}

export interface RepoCoordinates {
  owner: string;
  name: string;
}

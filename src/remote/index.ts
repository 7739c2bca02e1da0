export {
  type CollectOptions,
  RemoteCollector,
  type RemoteCollectorOptions,
  type Sleep,
  calculateBackoff,
} from "./collector.js";
export {
  GitHubPageFetcher,
  type GitHubPageFetcherOptions,
  hasNextPage,
  readRateLimitHint,
} from "./github-page-fetcher.js";
export { normalizeContributor, normalizeIssue, normalizeLabels, normalizePull } from "./normalize.js";
export {
  type NormalizedRemoteError,
  type RemoteErrorClass,
  normalizeRemoteError,
} from "./normalize-error.js";
export { parseGitHubRemoteUrl, toRepoSlug } from "./repo-coordinates.js";
export { CachedPageSchema, RemoteItemSchema } from "./schema.js";
export type {
  FetchPageOptions,
  PageFetcher,
  PageResponse,
  PageResult,
  RepoCoordinates,
} from "./types.js";

import type { RemoteResource } from "../core/types.js";

/**
 * Cache keys follow `<namespace>:v<version>:<discriminators>`. Bump the
 * version whenever the cached value's shape changes; old entries then
 * simply stop being read.
 */
const HISTORY_VERSION = 1;
const REMOTE_VERSION = 1;
const ANALYSIS_VERSION = 1;

export function historyHeadKey(repoId: string): string {
  return `history:v${HISTORY_VERSION}:${repoId}:head`;
}

export function historyCommitsKey(repoId: string, headHash: string): string {
  return `history:v${HISTORY_VERSION}:${repoId}:commits:${headHash}`;
}

export function remotePageKey(repoSlug: string, resource: RemoteResource, page: number): string {
  return `remote:v${REMOTE_VERSION}:${repoSlug.toLowerCase()}:${resource}:page:${page}`;
}

export function analysisKey(revision: string, path: string): string {
  return `analysis:v${ANALYSIS_VERSION}:${revision}:${path}`;
}

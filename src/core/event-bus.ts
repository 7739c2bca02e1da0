import { EventEmitter } from "eventemitter3";

import type { MinerError } from "./errors.js";
import type { RemoteCollection, RemoteResource, SkippedCommit } from "./types.js";

export interface MinerEvents {
  "history:commit-skipped": { skipped: SkippedCommit };
  "history:extracted": { count: number; reusedFromCache: number; headHash: string | null };
  "history:cache-discarded": { cachedHead: string; reason: string };
  "remote:page-fetched": { resource: RemoteResource; page: number; items: number; cached: boolean };
  "remote:rate-limited": { resource: RemoteResource; page: number; retryAfterMs: number; attempt: number };
  "remote:retrying": { resource: RemoteResource; page: number; delayMs: number; attempt: number };
  "remote:collected": { collection: RemoteCollection };
  "analysis:parse-failed": { path: string; revision: string; reason: string };
  "analysis:progress": { completed: number; total: number };
  "cache:corrupt-entry": { key: string; reason: string };
  warning: { error: MinerError };
}

type MinerEventArgs = {
  [K in keyof MinerEvents]: [payload: MinerEvents[K]];
};

export type MinerEventBus = EventEmitter<MinerEventArgs>;

export function createEventBus(): MinerEventBus {
  return new EventEmitter<MinerEventArgs>();
}

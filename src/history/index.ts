export { GitRepository } from "./git-repository.js";
export {
  COMMIT_HEADER_FORMAT,
  MalformedGitOutputError,
  buildFileDeltas,
  computeCommitStats,
  parseCommitHeader,
  parseNameStatus,
  parseNumstat,
} from "./git-output.js";
export {
  type CollectHistoryOptions,
  type ExtractOptions,
  HistoryExtractor,
  collectHistory,
} from "./extractor.js";
export { type CachedHistory, CachedHistorySchema, CommitRecordSchema } from "./schema.js";

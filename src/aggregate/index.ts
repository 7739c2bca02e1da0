export { aggregate } from "./aggregator.js";
export { type ExactCorrelationResult, correlateBestEffort, correlateExact } from "./correlation.js";
export {
  classifyCommitMessage,
  classifyMessagePattern,
  extractIssueReferences,
  isMergeMessage,
} from "./message-classifier.js";
export { serializeDataset, stableStringify } from "./serialize.js";
export * from "./types.js";

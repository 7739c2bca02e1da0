export { analyzeFile, modulePathOf } from "./source-analyzer.js";
export {
  classComplexity,
  countDecisionPoints,
  functionComplexity,
  isDecisionPoint,
  isDefinitionNode,
} from "./complexity.js";
export { type LineKind, classifyLines, summarizeLines } from "./line-counter.js";
export { commentRatio, maintainabilityIndex, roundTo2 } from "./maintainability.js";
export { DefinitionSchema, FileAnalysisSchema, ImportReferenceSchema } from "./schema.js";

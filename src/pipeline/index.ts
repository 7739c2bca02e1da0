export {
  type AnalyzeStructureOptions,
  type PipelineDependencies,
  type PipelineResult,
  analyzeStructure,
  isAnalyzablePath,
  runMiningPipeline,
} from "./pipeline.js";
export { writeDataset } from "./output.js";

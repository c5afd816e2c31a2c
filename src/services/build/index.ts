export {
  BuildPipeline,
  clinicPagePath,
  outputPaths,
  type BuildOptions,
  type BuildProgress,
  type BuildSummary,
} from "./pipeline.js";
export { Staging } from "./staging.js";

export { PipelineRequestSchema, validatePipelineRequest } from "./request.js";
export type {
  PipelineRequest,
  PipelineRequestInput,
  RequestViolation,
  ValidateRequestResult,
} from "./request.js";

export { runPipeline, runPipelineFromSource } from "./run.js";
export type { PipelineLogger, PipelineOptions, ForecastResult, PipelineResult } from "./run.js";

// stage libraries, re-exported for callers that want one entry point
export * from "../../numeric/src/index.js";
export * from "../../history/src/index.js";
export * from "../../forecast/src/index.js";
export * from "../../policy/src/index.js";
export * from "../../replenish/src/index.js";
export * from "../../explain/src/index.js";

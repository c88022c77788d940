export {
  runPipeline,
  validateProfile,
  validateSettings,
  type PipelineDeps,
  type PipelineRequest,
  type PipelineResult,
} from "./orchestrator";

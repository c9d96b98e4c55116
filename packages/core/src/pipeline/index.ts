export { DeployPipeline, defaultCommitMessage } from './deploy-pipeline.js';
export {
  PIPELINE_PHASES,
  type PipelinePhase,
  type DeployRequest,
  type DeployPipelineDeps,
  type DeployPipelineConfig,
  type PipelineEvents,
} from './types.js';

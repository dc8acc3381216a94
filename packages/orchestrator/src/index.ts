export {
  StageRunner,
  callWithTimeout,
  type StageResult,
  type StageStatus,
  type StageCall,
  type StageRunnerOptions,
} from './stage-runner.js';
export {
  PipelineRun,
  type SlotPayloads,
  type SceneSlots,
  type RunFailure,
  type RunStatus,
  type SceneProgress,
  type SlotState,
} from './run-state.js';
export {
  PipelineOrchestrator,
  defaultOutputFilename,
  type PipelineOrchestratorOptions,
  type PipelineOutcome,
  type StartedRun,
} from './pipeline.js';
export { createDashboard, type RunService } from './dashboard.js';
export { parseCliArgs, renderTransitionTable, renderWarnings, saveProject, type CliOptions } from './report.js';

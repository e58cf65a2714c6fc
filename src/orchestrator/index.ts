/**
 * Central export point for orchestrator modules
 */

export {
  type OrchestratorConfig,
  type PipelineDependencies,
  SnapshotOrchestrator
} from './snapshot-orchestrator';
export {
  type ApiEndpoints,
  createBackfillDependencies,
  createPipelineDependencies,
  createPipelineRunner,
  type PipelineContext,
  type PipelineRunner,
  toRetryPolicy
} from './pipeline';
export { type BackfillDay, type BackfillDependencies, type BackfillSummary, runBackfill } from './backfill';

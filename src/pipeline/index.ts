// ============================================================================
// Pipeline Module — Barrel Export
// ============================================================================

export type { PipelineState, PipelineStage, RunOptions, PipelineDeps, RunSummary } from './types.js';
export { runPipeline, selectCategories, DISPATCH_CONCURRENCY } from './orchestrator.js';
export { formatRunSummary } from './summary.js';

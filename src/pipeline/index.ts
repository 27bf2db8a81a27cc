/**
 * Pipeline Module
 *
 * @module pipeline
 */

export { runPipeline, type PipelineOptions } from './runner.js';
export type {
  Logger,
  PhaseReporter,
  StageContext,
  SearchStageResult,
  EnrichmentStageResult,
  CourtTotals,
  RunSummary,
} from './types.js';

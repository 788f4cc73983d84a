/**
 * Barrel Export für alle Repository-Module
 */

// Prediction Ledger
export {
  PredictionRepository,
  rowToPrediction,
  windowFrom,
  windowTo,
  type PredictionRepositoryOptions,
} from './predictions.js';

// Outcomes
export {
  OutcomeRepository,
  checkOutcomeTiming,
  rowToOutcome,
  type OutcomeInsertResult,
  type OutcomeRepositoryOptions,
} from './outcomes.js';

// ModelBundle Registry
export { ModelBundleRepository, rowToBundle } from './modelBundles.js';

// Pipeline Runs
export {
  PipelineRunRepository,
  type PipelineRun,
  type PipelineStage,
} from './pipelineRuns.js';

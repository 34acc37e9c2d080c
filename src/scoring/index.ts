/**
 * Scoring engine: category averages in, verdict and insights out.
 * Everything here is synchronous and free of I/O.
 */

export {
  CATEGORY_LABELS,
  CATEGORY_NAMES,
  SUB_SCORE_FIELDS,
  categoryAverage,
  clampSubScore,
  computeCategoryAverages,
  createScoreSet,
  isCategoryName,
  subScoreSchema,
  type CategoryAverages,
  type CategoryName,
  type CategoryScores,
  type CategoryScoreSet,
} from './categories.js';

export {
  DEFAULT_SCORING_CONFIG,
  QA_LEVELS,
  VERDICTS,
  validateScoringConfig,
  type CategoryWeight,
  type InsightThresholds,
  type LevelThreshold,
  type QALevel,
  type RequirementSet,
  type ScoringConfig,
  type Verdict,
} from './config.js';

export { ConfigurationError, InvariantViolation } from './errors.js';
export { createSignals, type RepositorySignals, type SignalsInput } from './signals.js';
export { aggregateScore, createScoreAggregator, type ScoreAggregator } from './aggregate.js';
export { classifyLevel, createLevelClassifier, type LevelClassifier } from './level.js';
export { createVerdictEngine, decideVerdict, type VerdictDecision, type VerdictEngine } from './verdict.js';
export {
  INSIGHT_LABELS,
  createInsightExtractor,
  extractInsights,
  type InsightExtractor,
  type Insights,
} from './insights.js';

export {
  buildOutcome,
  createScoringEngine,
  outcomeToRecord,
  type EvaluationOutcome,
  type EvaluationResult,
  type OutcomeRecord,
  type ScoringEngine,
} from './outcome.js';

export {
  SCORE_BUCKETS,
  bucketFor,
  mostCommon,
  partitionResults,
  summarize,
  summaryToRecord,
  type BatchSummary,
  type FailureSummary,
  type ScoreBucket,
} from './summary.js';

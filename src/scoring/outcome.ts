import {
  CATEGORY_NAMES,
  SUB_SCORE_FIELDS,
  computeCategoryAverages,
  type CategoryName,
  type CategoryScores,
} from './categories.js';
import { createScoreAggregator, type ScoreAggregator } from './aggregate.js';
import { DEFAULT_SCORING_CONFIG, validateScoringConfig, type QALevel, type ScoringConfig, type Verdict } from './config.js';
import { createInsightExtractor, type InsightExtractor } from './insights.js';
import { createLevelClassifier, type LevelClassifier } from './level.js';
import type { RepositorySignals } from './signals.js';
import { createVerdictEngine, type VerdictEngine } from './verdict.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EvaluationOutcome {
  readonly categories: CategoryScores;
  readonly categoryAverages: Readonly<Record<CategoryName, number>>;
  readonly signals: RepositorySignals;
  readonly overallScore: number;
  readonly level: QALevel;
  readonly verdict: Verdict;
  readonly verdictReason: string;
  readonly strengths: readonly string[];
  readonly improvementAreas: readonly string[];
}

/** One batch entry. Exactly one of outcome / error is set; an entry with error is a failure record. */
export interface EvaluationResult {
  readonly url: string;
  readonly outcome?: EvaluationOutcome;
  readonly error?: string;
}

export interface ScoringEngine {
  readonly config: ScoringConfig;
  readonly aggregate: ScoreAggregator;
  readonly classify: LevelClassifier;
  readonly decide: VerdictEngine;
  readonly extract: InsightExtractor;
}

// ============================================================================
// ENGINE
// ============================================================================

export function createScoringEngine(config: ScoringConfig = DEFAULT_SCORING_CONFIG): ScoringEngine {
  const validated = validateScoringConfig(config);
  return {
    config: validated,
    aggregate: createScoreAggregator(validated),
    classify: createLevelClassifier(validated),
    decide: createVerdictEngine(validated),
    extract: createInsightExtractor(validated),
  };
}

/**
 * Score, classify, decide, then extract insights. The outcome is built in
 * one step once every input is known and is frozen afterwards.
 */
export function buildOutcome(
  categories: CategoryScores,
  signals: RepositorySignals,
  engine: ScoringEngine
): EvaluationOutcome {
  const categoryAverages = Object.freeze(computeCategoryAverages(categories));
  const overallScore = engine.aggregate(categoryAverages);
  const level = engine.classify(overallScore);
  const { verdict, reason } = engine.decide(categoryAverages, overallScore, signals);
  const { strengths, improvements } = engine.extract(categoryAverages, signals);

  return Object.freeze({
    categories: Object.freeze({ ...categories }),
    categoryAverages,
    signals,
    overallScore,
    level,
    verdict,
    verdictReason: reason,
    strengths: Object.freeze([...strengths]),
    improvementAreas: Object.freeze([...improvements]),
  });
}

// ============================================================================
// EXPORT
// ============================================================================

export interface OutcomeRecord {
  url: string;
  commitCount?: number;
  primaryLanguage?: string;
  testFileCount?: number;
  totalFileCount?: number;
  testFrameworks?: string[];
  hasCiConfig?: boolean;
  categories?: Record<CategoryName, Record<string, number>>;
  categoryAverages?: Record<CategoryName, number>;
  overallScore?: number;
  level?: QALevel;
  verdict?: Verdict;
  verdictReason?: string;
  strengths?: string[];
  improvementAreas?: string[];
  error?: string;
}

function exportCategories(categories: CategoryScores): Record<CategoryName, Record<string, number>> {
  const exported: Record<CategoryName, Record<string, number>> = {
    test_automation: {},
    ci_pipeline: {},
    quality_process: {},
    technical_skills: {},
    repository_structure: {},
  };

  for (const category of CATEGORY_NAMES) {
    for (const field of SUB_SCORE_FIELDS[category]) {
      exported[category][field] = categories[category].scores[field] ?? 0;
    }
  }
  return exported;
}

/** Plain, JSON-ready view of a result: all fields by name, sub-scores nested per category. */
export function outcomeToRecord(result: EvaluationResult): OutcomeRecord {
  const record: OutcomeRecord = { url: result.url };
  const outcome = result.outcome;

  if (outcome) {
    record.commitCount = outcome.signals.commitCount;
    record.primaryLanguage = outcome.signals.primaryLanguage;
    record.testFileCount = outcome.signals.testFileCount;
    record.totalFileCount = outcome.signals.totalFileCount;
    record.testFrameworks = [...outcome.signals.testFrameworks];
    record.hasCiConfig = outcome.signals.hasCiConfig;
    record.categories = exportCategories(outcome.categories);
    record.categoryAverages = { ...outcome.categoryAverages };
    record.overallScore = outcome.overallScore;
    record.level = outcome.level;
    record.verdict = outcome.verdict;
    record.verdictReason = outcome.verdictReason;
    record.strengths = [...outcome.strengths];
    record.improvementAreas = [...outcome.improvementAreas];
  }

  if (result.error !== undefined) {
    record.error = result.error;
  }

  return record;
}

import { CATEGORY_NAMES, isCategoryName, type CategoryName } from './categories.js';
import { ConfigurationError } from './errors.js';

export const QA_LEVELS = ['Beginner', 'Intermediate', 'Advanced', 'Expert'] as const;
export type QALevel = (typeof QA_LEVELS)[number];

export const VERDICTS = ['PASS', 'CONDITIONAL_PASS', 'FAIL'] as const;
export type Verdict = (typeof VERDICTS)[number];

export interface CategoryWeight {
  readonly category: CategoryName;
  readonly weight: number;
}

export interface LevelThreshold {
  readonly level: QALevel;
  readonly min: number;
}

export interface RequirementSet {
  readonly minTestFiles: number;
  readonly minCommitCount: number;
  readonly requiredCategories: readonly CategoryName[];
  readonly minCategoryScore: number;
}

export interface InsightThresholds {
  /** Category average at or above this is a strength. */
  readonly strength: number;
  /** Category average below this is an improvement area. */
  readonly improvement: number;
  /** Test files / total files above this is a strength. */
  readonly highTestRatio: number;
  readonly multipleFrameworks: number;
  readonly lowCommitCount: number;
  readonly activeCommitCount: number;
}

export interface ScoringConfig {
  /** Summed in this order. Must total 1.0. */
  readonly weights: readonly CategoryWeight[];
  readonly levels: readonly LevelThreshold[];
  readonly verdictThresholds: { readonly pass: number; readonly conditionalPass: number };
  readonly requirements: { readonly PASS: RequirementSet; readonly CONDITIONAL_PASS: RequirementSet };
  readonly insights: InsightThresholds;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: [
    { category: 'test_automation', weight: 0.3 },
    { category: 'technical_skills', weight: 0.25 },
    { category: 'quality_process', weight: 0.25 },
    { category: 'ci_pipeline', weight: 0.2 },
  ],
  levels: [
    { level: 'Expert', min: 85 },
    { level: 'Advanced', min: 70 },
    { level: 'Intermediate', min: 50 },
    { level: 'Beginner', min: 0 },
  ],
  verdictThresholds: { pass: 70, conditionalPass: 50 },
  requirements: {
    PASS: {
      minTestFiles: 5,
      minCommitCount: 10,
      requiredCategories: ['test_automation', 'repository_structure'],
      minCategoryScore: 6.0,
    },
    CONDITIONAL_PASS: {
      minTestFiles: 3,
      minCommitCount: 5,
      requiredCategories: ['test_automation'],
      minCategoryScore: 4.0,
    },
  },
  insights: {
    strength: 7.5,
    improvement: 5.0,
    highTestRatio: 0.3,
    multipleFrameworks: 2,
    lowCommitCount: 5,
    activeCommitCount: 50,
  },
};

const WEIGHT_TOLERANCE = 1e-9;

function checkCategory(name: string, where: string): void {
  if (!isCategoryName(name)) {
    throw new ConfigurationError(
      `${where} references unknown category "${name}" (tracked: ${CATEGORY_NAMES.join(', ')})`
    );
  }
}

function checkRequirementSet(name: string, set: RequirementSet): void {
  if (set.minTestFiles < 0 || set.minCommitCount < 0 || set.minCategoryScore < 0) {
    throw new ConfigurationError(`Requirement set ${name} has a negative minimum`);
  }
  for (const category of set.requiredCategories) {
    checkCategory(category, `Requirement set ${name}`);
  }
}

/**
 * Reject configurations the engine cannot honour. Called once when an
 * engine is constructed, never per repository.
 */
export function validateScoringConfig(config: ScoringConfig): ScoringConfig {
  if (config.weights.length === 0) {
    throw new ConfigurationError('At least one category weight is required');
  }

  const weighted = new Set<string>();
  let total = 0;
  for (const { category, weight } of config.weights) {
    checkCategory(category, 'Weight table');
    if (weighted.has(category)) {
      throw new ConfigurationError(`Weight table lists "${category}" twice`);
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(`Weight for "${category}" must be a non-negative number, got ${weight}`);
    }
    weighted.add(category);
    total += weight;
  }
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`Category weights must sum to 1.0, got ${total}`);
  }

  if (!config.levels.some(threshold => threshold.min === 0)) {
    throw new ConfigurationError('Level thresholds need an entry at 0 so every score has a level');
  }
  if (config.levels.some(threshold => threshold.min < 0 || threshold.min > 100)) {
    throw new ConfigurationError('Level thresholds must lie within 0-100');
  }

  const byRank = [...config.levels].sort((a, b) => QA_LEVELS.indexOf(a.level) - QA_LEVELS.indexOf(b.level));
  for (let i = 1; i < byRank.length; i++) {
    const lower = byRank[i - 1];
    const higher = byRank[i];
    if (!lower || !higher) continue;
    if (lower.level === higher.level) {
      throw new ConfigurationError(`Level thresholds list "${higher.level}" twice`);
    }
    if (higher.min <= lower.min) {
      throw new ConfigurationError(
        `Level "${higher.level}" (${higher.min}) must start above "${lower.level}" (${lower.min})`
      );
    }
  }

  const { pass, conditionalPass } = config.verdictThresholds;
  if (conditionalPass > pass) {
    throw new ConfigurationError(
      `Conditional pass threshold (${conditionalPass}) is above the pass threshold (${pass})`
    );
  }

  checkRequirementSet('PASS', config.requirements.PASS);
  checkRequirementSet('CONDITIONAL_PASS', config.requirements.CONDITIONAL_PASS);

  if (config.insights.improvement > config.insights.strength) {
    throw new ConfigurationError('Improvement threshold must not exceed the strength threshold');
  }

  return config;
}

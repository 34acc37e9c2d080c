import { z } from 'zod';

// ============================================================================
// CATEGORY MODEL
// ============================================================================

/** Fixed iteration order: insights and reports walk categories in this order. */
export const CATEGORY_NAMES = [
  'test_automation',
  'ci_pipeline',
  'quality_process',
  'technical_skills',
  'repository_structure',
] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

export const SUB_SCORE_FIELDS: Readonly<Record<CategoryName, readonly string[]>> = {
  test_automation: [
    'test_coverage_score',
    'test_organization_score',
    'framework_usage_score',
    'assertion_quality_score',
    'test_data_management_score',
  ],
  ci_pipeline: [
    'pipeline_configuration_score',
    'automated_testing_integration_score',
    'deployment_automation_score',
    'pipeline_efficiency_score',
    'environment_management_score',
  ],
  quality_process: [
    'testing_strategy_score',
    'bug_tracking_score',
    'code_review_process_score',
    'documentation_quality_score',
    'collaboration_score',
  ],
  technical_skills: [
    'test_design_patterns_score',
    'api_testing_score',
    'ui_testing_score',
    'performance_testing_score',
    'security_testing_score',
  ],
  repository_structure: [
    'project_structure_score',
    'test_structure_score',
    'configuration_management_score',
    'dependency_management_score',
    'version_control_practices_score',
  ],
};

export const CATEGORY_LABELS: Readonly<Record<CategoryName, string>> = {
  test_automation: 'Test Automation',
  ci_pipeline: 'CI Pipeline',
  quality_process: 'Quality Process',
  technical_skills: 'Technical Skills',
  repository_structure: 'Repository Structure',
};

export const SUB_SCORE_MIN = 0;
export const SUB_SCORE_MAX = 10;

export interface CategoryScoreSet {
  readonly category: CategoryName;
  /** Every field of SUB_SCORE_FIELDS[category], each an integer in [0, 10]. */
  readonly scores: Readonly<Record<string, number>>;
}

export type CategoryScores = { readonly [C in CategoryName]: CategoryScoreSet };

/** Averages keyed by category. Partial so callers tracking fewer categories can be checked at runtime. */
export type CategoryAverages = Readonly<Partial<Record<CategoryName, number>>>;

export function isCategoryName(value: string): value is CategoryName {
  return CATEGORY_NAMES.some(name => name === value);
}

export function clampSubScore(value: number): number {
  return Math.min(SUB_SCORE_MAX, Math.max(SUB_SCORE_MIN, Math.round(value)));
}

/**
 * A single sub-score as it arrives from the judge: anything non-numeric
 * becomes 0, numbers are rounded and clamped to [0, 10].
 */
export const subScoreSchema = z.coerce.number().finite().catch(0).transform(clampSubScore);

export function createScoreSet(
  category: CategoryName,
  raw: Readonly<Record<string, unknown>> = {}
): CategoryScoreSet {
  const scores: Record<string, number> = {};
  for (const field of SUB_SCORE_FIELDS[category]) {
    scores[field] = subScoreSchema.parse(raw[field]);
  }
  return Object.freeze({ category, scores: Object.freeze(scores) });
}

export function categoryAverage(set: CategoryScoreSet): number {
  const fields = SUB_SCORE_FIELDS[set.category];
  let sum = 0;
  for (const field of fields) {
    sum += set.scores[field] ?? 0;
  }
  return sum / fields.length;
}

export function computeCategoryAverages(scores: CategoryScores): Readonly<Record<CategoryName, number>> {
  return {
    test_automation: categoryAverage(scores.test_automation),
    ci_pipeline: categoryAverage(scores.ci_pipeline),
    quality_process: categoryAverage(scores.quality_process),
    technical_skills: categoryAverage(scores.technical_skills),
    repository_structure: categoryAverage(scores.repository_structure),
  };
}

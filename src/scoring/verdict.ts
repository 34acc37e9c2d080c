import type { CategoryAverages } from './categories.js';
import { validateScoringConfig, type RequirementSet, type ScoringConfig, type Verdict } from './config.js';
import { ConfigurationError } from './errors.js';
import type { RepositorySignals } from './signals.js';

export interface VerdictDecision {
  readonly verdict: Verdict;
  readonly reason: string;
}

export type VerdictEngine = (
  averages: CategoryAverages,
  overallScore: number,
  signals: RepositorySignals
) => VerdictDecision;

/**
 * Requirement checks in fixed order. Each failure yields one reason.
 */
function unmetRequirements(
  requirements: RequirementSet,
  averages: CategoryAverages,
  signals: RepositorySignals
): string[] {
  const reasons: string[] = [];

  if (signals.testFileCount < requirements.minTestFiles) {
    reasons.push(`Insufficient test files (${signals.testFileCount} < ${requirements.minTestFiles})`);
  }

  if (signals.commitCount < requirements.minCommitCount) {
    reasons.push(`Insufficient commit history (${signals.commitCount} < ${requirements.minCommitCount})`);
  }

  for (const category of requirements.requiredCategories) {
    const average = averages[category];
    if (average === undefined) {
      throw new ConfigurationError(`Required category "${category}" is not among the tracked category averages`);
    }
    if (average < requirements.minCategoryScore) {
      reasons.push(`Low ${category} score (${average.toFixed(1)})`);
    }
  }

  return reasons;
}

export function decideVerdict(
  averages: CategoryAverages,
  overallScore: number,
  signals: RepositorySignals,
  config: ScoringConfig
): VerdictDecision {
  const { pass, conditionalPass } = config.verdictThresholds;

  if (overallScore < conditionalPass) {
    return {
      verdict: 'FAIL',
      reason: `Overall QA score (${overallScore}) is below minimum threshold`,
    };
  }

  const startsAtPass = overallScore >= pass;
  const requirements = startsAtPass ? config.requirements.PASS : config.requirements.CONDITIONAL_PASS;
  const reasons = unmetRequirements(requirements, averages, signals);

  // Any unmet requirement downgrades PASS once; CONDITIONAL_PASS never drops further here
  const verdict: Verdict = startsAtPass && reasons.length === 0 ? 'PASS' : 'CONDITIONAL_PASS';

  if (reasons.length === 0) {
    return {
      verdict,
      reason: verdict === 'PASS'
        ? `Strong QA skills demonstrated across all areas (Score: ${overallScore})`
        : `Good QA foundation with room for improvement (Score: ${overallScore})`,
    };
  }

  return {
    verdict,
    reason: `${reasons.join('; ')} (Score: ${overallScore})`,
  };
}

export function createVerdictEngine(config: ScoringConfig): VerdictEngine {
  const validated = validateScoringConfig(config);
  return (averages, overallScore, signals) => decideVerdict(averages, overallScore, signals, validated);
}

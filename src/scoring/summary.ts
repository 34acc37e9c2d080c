import type { QALevel, Verdict } from './config.js';
import { InvariantViolation } from './errors.js';
import type { EvaluationOutcome, EvaluationResult } from './outcome.js';

export const SCORE_BUCKETS = [
  { label: 'Expert (85-100)', min: 85 },
  { label: 'Advanced (70-84)', min: 70 },
  { label: 'Intermediate (50-69)', min: 50 },
  { label: 'Beginner (0-49)', min: Number.NEGATIVE_INFINITY },
] as const;

export type ScoreBucket = (typeof SCORE_BUCKETS)[number]['label'];

const TOP_LIMIT = 5;

export interface FailureSummary {
  readonly url: string;
  readonly error: string;
}

export interface BatchSummary {
  readonly totalRepositories: number;
  readonly successfulEvaluations: number;
  readonly failedEvaluations: number;
  readonly successRate: number;
  readonly averageScore: number;
  readonly scoreDistribution: Readonly<Record<ScoreBucket, number>>;
  readonly levelDistribution: Readonly<Partial<Record<QALevel, number>>>;
  readonly verdictDistribution: Readonly<Partial<Record<Verdict, number>>>;
  readonly commonStrengths: readonly string[];
  readonly commonImprovementAreas: readonly string[];
  readonly topFrameworks: readonly string[];
  readonly failures: readonly FailureSummary[];
}

interface Partitioned {
  successes: EvaluationOutcome[];
  failures: FailureSummary[];
}

/** Split entries by discriminant; an entry with both or neither breaks the contract. */
export function partitionResults(results: readonly EvaluationResult[]): Partitioned {
  const successes: EvaluationOutcome[] = [];
  const failures: FailureSummary[] = [];

  results.forEach((result, index) => {
    const hasOutcome = result.outcome !== undefined;
    const hasError = result.error !== undefined;

    if (hasOutcome === hasError) {
      throw new InvariantViolation(
        `Result #${index} (${result.url}) must carry exactly one of outcome or error, found ${hasOutcome ? 'both' : 'neither'}`
      );
    }
    if (result.outcome) {
      successes.push(result.outcome);
    } else if (result.error !== undefined) {
      failures.push({ url: result.url, error: result.error });
    }
  });

  return { successes, failures };
}

export function bucketFor(score: number): ScoreBucket {
  for (const bucket of SCORE_BUCKETS) {
    if (score >= bucket.min) return bucket.label;
  }
  return 'Beginner (0-49)';
}

/** Labels by descending frequency; ties keep first-seen order. */
export function mostCommon(items: Iterable<string>, limit = TOP_LIMIT): string[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so Map insertion order breaks ties
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([label]) => label);
}

function countBy<K extends string>(keys: readonly K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const key of keys) {
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

export function summarize(results: readonly EvaluationResult[]): BatchSummary {
  const { successes, failures } = partitionResults(results);
  const total = results.length;

  const scoreDistribution: Record<ScoreBucket, number> = {
    'Expert (85-100)': 0,
    'Advanced (70-84)': 0,
    'Intermediate (50-69)': 0,
    'Beginner (0-49)': 0,
  };
  let scoreSum = 0;
  for (const outcome of successes) {
    scoreDistribution[bucketFor(outcome.overallScore)] += 1;
    scoreSum += outcome.overallScore;
  }

  return {
    totalRepositories: total,
    successfulEvaluations: successes.length,
    failedEvaluations: failures.length,
    successRate: total > 0 ? successes.length / total : 0,
    averageScore: successes.length > 0 ? scoreSum / successes.length : 0,
    scoreDistribution,
    levelDistribution: countBy(successes.map(outcome => outcome.level)),
    verdictDistribution: countBy(successes.map(outcome => outcome.verdict)),
    commonStrengths: mostCommon(successes.flatMap(outcome => outcome.strengths)),
    commonImprovementAreas: mostCommon(successes.flatMap(outcome => outcome.improvementAreas)),
    topFrameworks: mostCommon(successes.flatMap(outcome => outcome.signals.testFrameworks)),
    failures,
  };
}

/** JSON-ready copy, safe to hand to any reporter. */
export function summaryToRecord(summary: BatchSummary): Record<string, unknown> {
  return {
    totalRepositories: summary.totalRepositories,
    successfulEvaluations: summary.successfulEvaluations,
    failedEvaluations: summary.failedEvaluations,
    successRate: summary.successRate,
    averageScore: summary.averageScore,
    scoreDistribution: { ...summary.scoreDistribution },
    levelDistribution: { ...summary.levelDistribution },
    verdictDistribution: { ...summary.verdictDistribution },
    commonStrengths: [...summary.commonStrengths],
    commonImprovementAreas: [...summary.commonImprovementAreas],
    topFrameworks: [...summary.topFrameworks],
    failures: summary.failures.map(failure => ({ ...failure })),
  };
}

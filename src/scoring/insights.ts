import { CATEGORY_LABELS, CATEGORY_NAMES, type CategoryAverages } from './categories.js';
import { validateScoringConfig, type InsightThresholds, type ScoringConfig } from './config.js';
import type { RepositorySignals } from './signals.js';

export const INSIGHT_LABELS = {
  noTestFiles: 'Test Coverage - No test files found',
  highTestRatio: 'High Test Coverage Ratio',
  multipleFrameworks: 'Multiple Testing Frameworks',
  noFrameworks: 'Testing Framework Usage',
  fewCommits: 'Version Control Practices',
  activeHistory: 'Active Development History',
} as const;

export interface Insights {
  readonly strengths: readonly string[];
  readonly improvements: readonly string[];
}

export type InsightExtractor = (averages: CategoryAverages, signals: RepositorySignals) => Insights;

export function extractInsights(
  averages: CategoryAverages,
  signals: RepositorySignals,
  thresholds: InsightThresholds
): Insights {
  const strengths: string[] = [];
  const improvements: string[] = [];

  for (const category of CATEGORY_NAMES) {
    const average = averages[category];
    if (average === undefined) continue;

    if (average >= thresholds.strength) {
      strengths.push(CATEGORY_LABELS[category]);
    } else if (average < thresholds.improvement) {
      improvements.push(CATEGORY_LABELS[category]);
    }
  }

  if (signals.testFileCount === 0) {
    improvements.push(INSIGHT_LABELS.noTestFiles);
  } else if (
    signals.totalFileCount > 0 &&
    signals.testFileCount / signals.totalFileCount > thresholds.highTestRatio
  ) {
    strengths.push(INSIGHT_LABELS.highTestRatio);
  }

  const frameworkCount = signals.testFrameworks.length;
  if (frameworkCount >= thresholds.multipleFrameworks) {
    strengths.push(INSIGHT_LABELS.multipleFrameworks);
  } else if (frameworkCount === 0) {
    improvements.push(INSIGHT_LABELS.noFrameworks);
  }

  if (signals.commitCount < thresholds.lowCommitCount) {
    improvements.push(INSIGHT_LABELS.fewCommits);
  } else if (signals.commitCount > thresholds.activeCommitCount) {
    strengths.push(INSIGHT_LABELS.activeHistory);
  }

  return { strengths, improvements };
}

export function createInsightExtractor(config: ScoringConfig): InsightExtractor {
  const { insights } = validateScoringConfig(config);
  return (averages, signals) => extractInsights(averages, signals, insights);
}

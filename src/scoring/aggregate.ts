import type { CategoryAverages } from './categories.js';
import { validateScoringConfig, type ScoringConfig } from './config.js';
import { ConfigurationError } from './errors.js';

export type ScoreAggregator = (averages: CategoryAverages) => number;

/**
 * Weighted sum of 0-10 category averages, scaled to 0-100 and truncated.
 * Categories without a weight do not contribute.
 */
export function aggregateScore(averages: CategoryAverages, weights: ScoringConfig['weights']): number {
  let weighted = 0;
  for (const { category, weight } of weights) {
    const average = averages[category];
    if (average === undefined) {
      throw new ConfigurationError(`Missing average for weighted category "${category}"`);
    }
    weighted += average * weight;
  }
  return Math.trunc(weighted * 10);
}

export function createScoreAggregator(config: ScoringConfig): ScoreAggregator {
  const { weights } = validateScoringConfig(config);
  return averages => aggregateScore(averages, weights);
}

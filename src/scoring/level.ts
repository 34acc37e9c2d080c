import { validateScoringConfig, type LevelThreshold, type QALevel, type ScoringConfig } from './config.js';

export type LevelClassifier = (overallScore: number) => QALevel;

/** Highest threshold the score meets wins; boundaries belong to the higher level. */
export function classifyLevel(overallScore: number, levels: readonly LevelThreshold[]): QALevel {
  const descending = [...levels].sort((a, b) => b.min - a.min);
  for (const { level, min } of descending) {
    if (overallScore >= min) return level;
  }
  // validateScoringConfig guarantees a 0 threshold, so only negative scores land here
  return descending[descending.length - 1]?.level ?? 'Beginner';
}

export function createLevelClassifier(config: ScoringConfig): LevelClassifier {
  const descending = [...validateScoringConfig(config).levels].sort((a, b) => b.min - a.min);
  return score => classifyLevel(score, descending);
}

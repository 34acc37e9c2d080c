import { logger } from '../logger.js';

/** Structural facts about a repository, independent of the judge. */
export interface RepositorySignals {
  readonly commitCount: number;
  readonly primaryLanguage: string;
  readonly testFileCount: number;
  readonly totalFileCount: number;
  /** Unique, lower-cased, first-seen order. */
  readonly testFrameworks: readonly string[];
  readonly hasCiConfig: boolean;
}

export interface SignalsInput {
  commitCount: number;
  primaryLanguage?: string;
  testFileCount: number;
  totalFileCount: number;
  testFrameworks?: Iterable<string>;
  hasCiConfig?: boolean;
}

function toCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

function normalizeFrameworks(frameworks: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const name of frameworks) {
    const normalized = name.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

/**
 * Normalize raw scan output into signals. A test count larger than the
 * total file count is inconsistent and is treated as zero.
 */
export function createSignals(input: SignalsInput): RepositorySignals {
  const totalFileCount = toCount(input.totalFileCount);
  let testFileCount = toCount(input.testFileCount);

  if (testFileCount > totalFileCount) {
    logger.warn('Inconsistent signals: more test files than files, treating test count as 0', {
      testFileCount,
      totalFileCount,
    });
    testFileCount = 0;
  }

  return Object.freeze({
    commitCount: toCount(input.commitCount),
    primaryLanguage: input.primaryLanguage?.trim() || 'unknown',
    testFileCount,
    totalFileCount,
    testFrameworks: Object.freeze(normalizeFrameworks(input.testFrameworks ?? [])),
    hasCiConfig: input.hasCiConfig ?? false,
  });
}

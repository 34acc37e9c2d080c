/**
 * Shared builders for tests: outcomes, scans and fake pipeline collaborators.
 */
import {
  SUB_SCORE_FIELDS,
  computeCategoryAverages,
  createScoreSet,
  createScoringEngine,
  createSignals,
  type CategoryName,
  type CategoryScores,
  type EvaluationOutcome,
  type QALevel,
  type ScoringEngine,
  type SignalsInput,
  type Verdict,
} from '../scoring/index.js';
import type { EvaluationDeps } from '../evaluate.js';
import type { RepositoryScan } from '../scanner.js';

/** Every sub-score of every category set to the given value (or per-category values). */
export function uniformScores(value: number | Partial<Record<CategoryName, number>>): CategoryScores {
  const valueFor = (category: CategoryName): number =>
    typeof value === 'number' ? value : value[category] ?? 0;

  const build = (category: CategoryName) => {
    const raw: Record<string, number> = {};
    for (const field of SUB_SCORE_FIELDS[category]) raw[field] = valueFor(category);
    return createScoreSet(category, raw);
  };

  return {
    test_automation: build('test_automation'),
    ci_pipeline: build('ci_pipeline'),
    quality_process: build('quality_process'),
    technical_skills: build('technical_skills'),
    repository_structure: build('repository_structure'),
  };
}

export function signals(overrides: Partial<SignalsInput> = {}) {
  return createSignals({
    commitCount: 20,
    primaryLanguage: 'python',
    testFileCount: 10,
    totalFileCount: 100,
    testFrameworks: ['pytest'],
    hasCiConfig: true,
    ...overrides,
  });
}

export interface FakeOutcomeInput {
  overallScore: number;
  level: QALevel;
  verdict: Verdict;
  strengths?: string[];
  improvementAreas?: string[];
  signals?: Partial<SignalsInput>;
}

export function emptyCategoryScores(): CategoryScores {
  return uniformScores(0);
}

/** Hand-built outcome for aggregation tests; scores are not derived from categories. */
export function fakeOutcome(input: FakeOutcomeInput): EvaluationOutcome {
  const categories = emptyCategoryScores();
  return {
    categories,
    categoryAverages: computeCategoryAverages(categories),
    signals: signals(input.signals),
    overallScore: input.overallScore,
    level: input.level,
    verdict: input.verdict,
    verdictReason: '',
    strengths: input.strengths ?? [],
    improvementAreas: input.improvementAreas ?? [],
  };
}

export function fakeScan(overrides: Partial<RepositoryScan> = {}): RepositoryScan {
  const files = Array.from({ length: 10 }, (_, i) => `/nonexistent/repo/file${i}.py`);
  return {
    root: '/nonexistent/repo',
    files,
    testFiles: files.slice(0, 6),
    ciFiles: [],
    qaConfigFiles: [],
    manifests: [],
    readme: null,
    primaryLanguage: 'python',
    testFrameworks: ['pytest'],
    ...overrides,
  };
}

export interface FakeDepsLog {
  cloned: string[];
  cleaned: string[];
  judged: CategoryName[];
}

export interface FakeDepsOptions {
  engine?: ScoringEngine;
  score?: number;
  commitCount?: number;
  scan?: RepositoryScan;
  /** Throw from clone for these URLs */
  cloneFailures?: Record<string, Error>;
  /** Throw from the judge for every category */
  judgeError?: Error;
  /** Delay clone by this many ms per URL */
  cloneDelays?: Record<string, number>;
}

export function fakeDeps(options: FakeDepsOptions = {}): { deps: EvaluationDeps; log: FakeDepsLog } {
  const log: FakeDepsLog = { cloned: [], cleaned: [], judged: [] };
  const score = options.score ?? 8;

  const deps: EvaluationDeps = {
    clone: async url => {
      const delay = options.cloneDelays?.[url] ?? 0;
      if (delay > 0) await new Promise(resolve => setTimeout(resolve, delay));
      log.cloned.push(url);
      const failure = options.cloneFailures?.[url];
      if (failure) throw failure;
      return `/tmp/fake-clone-${log.cloned.length}`;
    },
    cleanup: path => {
      log.cleaned.push(path);
    },
    scan: () => options.scan ?? fakeScan(),
    commitCount: () => options.commitCount ?? 20,
    commitHistory: () => [],
    judge: async category => {
      log.judged.push(category);
      if (options.judgeError) throw options.judgeError;
      const raw: Record<string, number> = {};
      for (const field of SUB_SCORE_FIELDS[category]) raw[field] = score;
      return createScoreSet(category, raw);
    },
    engine: options.engine ?? createScoringEngine(),
  };

  return { deps, log };
}

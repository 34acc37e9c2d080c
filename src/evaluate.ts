/**
 * Evaluation pipeline: clone, scan, judge, score, clean up.
 * Collaborators are injected so the pipeline runs without git or a network.
 */

import { cloneRepo, cleanupClone, getCommitCount, getCommitHistory, type CloneOptions, type CommitInfo } from './git.js';
import { createAiJudge, judgeRepository, type Judge } from './judge.js';
import { logger } from './logger.js';
import { createChat } from './providers.js';
import { scanRepository, toSignals, type RepositoryScan } from './scanner.js';
import { redactCredentials } from './security.js';
import type { EvalConfig } from './config.js';
import {
  ConfigurationError,
  buildOutcome,
  createScoringEngine,
  type EvaluationResult,
  type ScoringEngine,
} from './scoring/index.js';

export { buildOutcome, createScoringEngine };

export interface EvaluationDeps {
  clone: (url: string, options: CloneOptions) => Promise<string>;
  cleanup: (path: string) => void;
  scan: (root: string) => RepositoryScan;
  commitCount: (root: string) => number;
  commitHistory: (root: string, max: number) => CommitInfo[];
  judge: Judge;
  engine: ScoringEngine;
}

export interface EvaluateOptions {
  /** Shallow clone (default). A full clone gives an exact commit count. */
  shallow?: boolean;
  depth?: number;
  keepClone?: boolean;
  token?: string;
}

export interface BatchOptions extends EvaluateOptions {
  concurrency?: number;
  continueOnError?: boolean;
  /** Called as each repository finishes, in completion order */
  onResult?: (result: EvaluationResult, index: number) => void;
}

const COMMIT_HISTORY_MAX = 50;

export function defaultDependencies(config: EvalConfig, engine: ScoringEngine = createScoringEngine()): EvaluationDeps {
  return {
    clone: cloneRepo,
    cleanup: cleanupClone,
    scan: scanRepository,
    commitCount: getCommitCount,
    commitHistory: getCommitHistory,
    judge: createAiJudge(createChat(config)),
    engine,
  };
}

// ============================================================================
// SINGLE REPOSITORY
// ============================================================================

/**
 * Evaluate one repository. Collaborator failures become a failure record;
 * a ConfigurationError is rethrown.
 */
export async function evaluateRepository(
  url: string,
  deps: EvaluationDeps,
  options: EvaluateOptions = {}
): Promise<EvaluationResult> {
  const { shallow = true, depth, keepClone = false, token } = options;
  let clonePath: string | null = null;

  try {
    logger.step('clone', { url: redactCredentials(url) });
    clonePath = await deps.clone(url, { shallow, depth, token });

    logger.step('scan', { path: clonePath });
    const scan = deps.scan(clonePath);
    const commits = deps.commitHistory(clonePath, COMMIT_HISTORY_MAX);
    const signals = toSignals(scan, deps.commitCount(clonePath));

    const categories = await judgeRepository(deps.judge, { scan, commits });
    const outcome = buildOutcome(categories, signals, deps.engine);

    logger.info('Repository evaluated', {
      url: redactCredentials(url),
      score: outcome.overallScore,
      verdict: outcome.verdict,
    });
    return { url, outcome };
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;

    const message = redactCredentials(error instanceof Error ? error.message : String(error));
    logger.error('Evaluation failed', error, { url: redactCredentials(url) });
    return { url, error: message };
  } finally {
    if (clonePath && !keepClone) {
      try {
        deps.cleanup(clonePath);
      } catch (error) {
        logger.warn('Could not remove clone', { path: clonePath, error: String(error) });
      }
    } else if (clonePath) {
      logger.info('Clone kept', { path: clonePath });
    }
  }
}

// ============================================================================
// BATCH
// ============================================================================

/**
 * Evaluate many repositories with at most `concurrency` in flight.
 * Results keep input order. With continueOnError false the first failure
 * stops the batch and is thrown.
 */
export async function batchEvaluate(
  urls: readonly string[],
  deps: EvaluationDeps,
  options: BatchOptions = {}
): Promise<EvaluationResult[]> {
  const { concurrency = 1, continueOnError = true, onResult, ...evaluateOptions } = options;
  const limit = Math.max(1, Math.floor(concurrency));
  const results: EvaluationResult[] = new Array(urls.length);
  const state: { next: number; stopped: Error | null } = { next: 0, stopped: null };

  async function worker(): Promise<void> {
    while (state.next < urls.length && !state.stopped) {
      const index = state.next++;
      const url = urls[index];
      if (url === undefined) return;

      logger.info(`Evaluating ${index + 1}/${urls.length}`, { url: redactCredentials(url) });
      const result = await evaluateRepository(url, deps, evaluateOptions);
      results[index] = result;
      onResult?.(result, index);

      if (result.error !== undefined && !continueOnError) {
        state.stopped = new Error(`Evaluation of ${redactCredentials(url)} failed: ${result.error}`);
      }
    }
  }

  const workers = Array.from({ length: Math.min(limit, urls.length) }, () => worker());
  await Promise.all(workers);

  if (state.stopped) throw state.stopped;
  return results;
}

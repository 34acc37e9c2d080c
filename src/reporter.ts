/**
 * Report files (JSON, CSV, plain-text summary) and re-loading of saved
 * JSON results.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { logger } from './logger.js';
import {
  QA_LEVELS,
  SCORE_BUCKETS,
  VERDICTS,
  computeCategoryAverages,
  createScoreSet,
  createSignals,
  outcomeToRecord,
  summarize,
  type BatchSummary,
  type CategoryName,
  type CategoryScores,
  type EvaluationOutcome,
  type EvaluationResult,
} from './scoring/index.js';

export const REPORT_FILES = {
  json: 'qa_results.json',
  csv: 'qa_results.csv',
  summary: 'summary.txt',
} as const;

export const CSV_HEADER = [
  'url',
  'overall_qa_maturity_score',
  'qa_level',
  'final_verdict',
  'primary_language',
  'test_file_count',
  'total_file_count',
  'commit_count',
  'test_frameworks',
  'error_message',
] as const;

// ============================================================================
// FORMATTERS
// ============================================================================

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function csvRow(result: EvaluationResult): string {
  const outcome = result.outcome;
  if (!outcome) {
    return [quote(result.url), '', '', '', '', '', '', '', '', quote(result.error ?? '')].join(',');
  }

  const { signals } = outcome;
  return [
    quote(result.url),
    String(outcome.overallScore),
    quote(outcome.level),
    quote(outcome.verdict),
    quote(signals.primaryLanguage),
    String(signals.testFileCount),
    String(signals.totalFileCount),
    String(signals.commitCount),
    quote(signals.testFrameworks.join(';')),
    quote(''),
  ].join(',');
}

export function formatCsv(results: readonly EvaluationResult[]): string {
  return [CSV_HEADER.join(','), ...results.map(csvRow)].join('\n');
}

export function formatJson(results: readonly EvaluationResult[]): string {
  return JSON.stringify(results.map(outcomeToRecord), null, 2);
}

export function formatSummaryText(summary: BatchSummary): string {
  const lines = [
    'QA Repository Evaluation Summary',
    '='.repeat(40),
    '',
    `Total repositories: ${summary.totalRepositories}`,
    `Successful evaluations: ${summary.successfulEvaluations}`,
    `Failed evaluations: ${summary.failedEvaluations}`,
    `Success rate: ${(summary.successRate * 100).toFixed(1)}%`,
  ];

  if (summary.successfulEvaluations > 0) {
    lines.push(`Average QA score: ${summary.averageScore.toFixed(1)}/100`);

    lines.push('', 'Score Distribution:');
    for (const { label } of SCORE_BUCKETS) {
      const count = summary.scoreDistribution[label];
      if (count > 0) lines.push(`  ${label}: ${count}`);
    }
  }

  const verdicts = VERDICTS.filter(verdict => summary.verdictDistribution[verdict] !== undefined);
  if (verdicts.length > 0) {
    lines.push('', 'Verdict Distribution:');
    for (const verdict of verdicts) {
      lines.push(`  ${verdict}: ${summary.verdictDistribution[verdict] ?? 0}`);
    }
  }

  if (summary.failures.length > 0) {
    lines.push('', 'Failed Evaluations:');
    for (const failure of summary.failures) {
      lines.push(`  ${failure.url}: ${failure.error}`);
    }
  }

  return lines.join('\n');
}

// ============================================================================
// WRITE
// ============================================================================

/**
 * Write the three report files into outputDir and return their paths.
 */
export async function writeReports(results: readonly EvaluationResult[], outputDir: string): Promise<string[]> {
  mkdirSync(outputDir, { recursive: true });

  const files: Array<[string, string]> = [
    [join(outputDir, REPORT_FILES.json), formatJson(results)],
    [join(outputDir, REPORT_FILES.csv), formatCsv(results)],
    [join(outputDir, REPORT_FILES.summary), formatSummaryText(summarize(results))],
  ];

  for (const [path, content] of files) {
    await writeFileAtomic(path, content);
  }

  logger.info('Reports written', { outputDir, files: files.length });
  return files.map(([path]) => path);
}

// ============================================================================
// LOAD
// ============================================================================

export const outcomeRecordSchema = z.object({
  url: z.string(),
  commitCount: z.number().optional(),
  primaryLanguage: z.string().optional(),
  testFileCount: z.number().optional(),
  totalFileCount: z.number().optional(),
  testFrameworks: z.array(z.string()).optional(),
  hasCiConfig: z.boolean().optional(),
  categories: z.record(z.record(z.unknown())).optional(),
  overallScore: z.number().int().min(0).max(100).optional(),
  level: z.enum(QA_LEVELS).optional(),
  verdict: z.enum(VERDICTS).optional(),
  verdictReason: z.string().optional(),
  strengths: z.array(z.string()).optional(),
  improvementAreas: z.array(z.string()).optional(),
  error: z.string().optional(),
});

export const resultRecordsSchema = z.array(outcomeRecordSchema);

export type SavedRecord = z.infer<typeof outcomeRecordSchema>;

function restoreCategories(saved: SavedRecord['categories']): CategoryScores {
  const pick = (name: CategoryName) => createScoreSet(name, saved?.[name] ?? {});
  return {
    test_automation: pick('test_automation'),
    ci_pipeline: pick('ci_pipeline'),
    quality_process: pick('quality_process'),
    technical_skills: pick('technical_skills'),
    repository_structure: pick('repository_structure'),
  };
}

function restoreOutcome(record: SavedRecord): EvaluationOutcome | undefined {
  const { overallScore, level, verdict } = record;
  if (overallScore === undefined || level === undefined || verdict === undefined) {
    return undefined;
  }

  const categories = restoreCategories(record.categories);
  return Object.freeze({
    categories,
    categoryAverages: Object.freeze(computeCategoryAverages(categories)),
    signals: createSignals({
      commitCount: record.commitCount ?? 0,
      primaryLanguage: record.primaryLanguage,
      testFileCount: record.testFileCount ?? 0,
      totalFileCount: record.totalFileCount ?? 0,
      testFrameworks: record.testFrameworks ?? [],
      hasCiConfig: record.hasCiConfig ?? false,
    }),
    overallScore,
    level,
    verdict,
    verdictReason: record.verdictReason ?? '',
    strengths: Object.freeze([...(record.strengths ?? [])]),
    improvementAreas: Object.freeze([...(record.improvementAreas ?? [])]),
  });
}

/**
 * Turn a saved record back into a result. Scores are taken as saved,
 * not recomputed. A record with both or neither of outcome and error is
 * passed through as such, so summarize rejects it.
 */
export function recordToResult(record: SavedRecord): EvaluationResult {
  const outcome = restoreOutcome(record);
  return {
    url: record.url,
    ...(outcome ? { outcome } : {}),
    ...(record.error !== undefined ? { error: record.error } : {}),
  };
}

export function parseSavedResults(raw: unknown): EvaluationResult[] {
  return resultRecordsSchema.parse(raw).map(recordToResult);
}

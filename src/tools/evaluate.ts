import { z } from 'zod';
import { getApiKeyEnvVar, hasApiKey, loadConfig } from '../config.js';
import { batchEvaluate, defaultDependencies, evaluateRepository, type EvaluationDeps } from '../evaluate.js';
import { ConfigurationError, outcomeToRecord, summarize, summaryToRecord, type OutcomeRecord } from '../scoring/index.js';

export function toolDependencies(): EvaluationDeps {
  const config = loadConfig();
  if (!hasApiKey(config)) {
    throw new ConfigurationError(`No API key configured for ${config.provider}. Set ${getApiKeyEnvVar(config.provider)}.`);
  }
  return defaultDependencies(config);
}

function githubToken(): string | undefined {
  return loadConfig().githubToken;
}

// Tool: qa_evaluate - score one repository
export const evaluateSchema = z.object({
  url: z.string().min(1).describe('Clone URL of the repository'),
  shallow: z.boolean().optional().describe('Shallow clone (default true); false gives an exact commit count'),
});

export type EvaluateInput = z.infer<typeof evaluateSchema>;

export async function evaluate(input: EvaluateInput, deps: EvaluationDeps = toolDependencies()): Promise<OutcomeRecord> {
  const result = await evaluateRepository(input.url, deps, {
    shallow: input.shallow ?? true,
    token: githubToken(),
  });
  return outcomeToRecord(result);
}

// Tool: qa_batch - score several repositories and summarize
export const batchSchema = z.object({
  urls: z.array(z.string().min(1)).min(1).describe('Clone URLs, evaluated in order'),
  shallow: z.boolean().optional().describe('Shallow clone (default true)'),
  concurrency: z.number().int().min(1).max(8).optional().describe('Repositories evaluated in parallel (default 1)'),
});

export type BatchInput = z.infer<typeof batchSchema>;

export interface BatchOutput {
  results: OutcomeRecord[];
  summary: Record<string, unknown>;
}

export async function batch(input: BatchInput, deps: EvaluationDeps = toolDependencies()): Promise<BatchOutput> {
  const results = await batchEvaluate(input.urls, deps, {
    shallow: input.shallow ?? true,
    concurrency: input.concurrency ?? 1,
    token: githubToken(),
  });
  return {
    results: results.map(outcomeToRecord),
    summary: summaryToRecord(summarize(results)),
  };
}

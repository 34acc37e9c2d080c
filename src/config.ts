import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { logger } from './logger.js';
import {
  CATEGORY_NAMES,
  DEFAULT_SCORING_CONFIG,
  QA_LEVELS,
  validateScoringConfig,
  ConfigurationError,
  type ScoringConfig,
} from './scoring/index.js';

// ============================================================================
// PROVIDER CONFIG
// ============================================================================

export const AI_PROVIDERS = ['openai', 'azure', 'anthropic'] as const;
export type AIProvider = (typeof AI_PROVIDERS)[number];

const providerSchema = z.enum(AI_PROVIDERS);

export const evalConfigSchema = z.object({
  provider: providerSchema.default('openai'),
  openaiApiKey: z.string().optional(),
  azureApiKey: z.string().optional(),
  azureEndpoint: z.string().url().optional(),
  azureDeployment: z.string().optional(),
  azureApiVersion: z.string().optional(),
  anthropicApiKey: z.string().optional(),
  model: z.string().optional(),
  githubToken: z.string().optional(),
});

export type EvalConfig = z.infer<typeof evalConfigSchema>;

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env.QA_EVAL_CONFIG_DIR || join(homedir(), '.qa-eval');
  return join(dir, 'config.json');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EvalConfig {
  const configFile = getConfigPath(env);
  let fileConfig: EvalConfig = evalConfigSchema.parse({});

  if (existsSync(configFile)) {
    try {
      const parsed = evalConfigSchema.safeParse(JSON.parse(readFileSync(configFile, 'utf-8')));
      if (parsed.success) {
        fileConfig = parsed.data;
      } else {
        logger.warn('Ignoring invalid config file', { path: configFile, issues: parsed.error.issues.length });
      }
    } catch (error) {
      logger.warn('Could not read config file, using defaults', { path: configFile, error: String(error) });
    }
  }

  // Environment wins over the file
  const envProvider = providerSchema.safeParse(env.QA_EVAL_PROVIDER);
  return {
    ...fileConfig,
    provider: envProvider.success ? envProvider.data : fileConfig.provider,
    openaiApiKey: env.OPENAI_API_KEY || fileConfig.openaiApiKey,
    azureApiKey: env.AZURE_OPENAI_API_KEY || fileConfig.azureApiKey,
    azureEndpoint: env.AZURE_OPENAI_ENDPOINT || fileConfig.azureEndpoint,
    azureDeployment: env.AZURE_OPENAI_DEPLOYMENT || fileConfig.azureDeployment,
    azureApiVersion: env.AZURE_OPENAI_API_VERSION || fileConfig.azureApiVersion,
    anthropicApiKey: env.ANTHROPIC_API_KEY || fileConfig.anthropicApiKey,
    model: env.QA_EVAL_MODEL || fileConfig.model,
    githubToken: env.GITHUB_TOKEN || fileConfig.githubToken,
  };
}

export function getProviderApiKey(config: EvalConfig, provider: AIProvider = config.provider): string | undefined {
  switch (provider) {
    case 'openai': return config.openaiApiKey;
    case 'azure': return config.azureApiKey;
    case 'anthropic': return config.anthropicApiKey;
  }
}

export function hasApiKey(config: EvalConfig): boolean {
  return !!getProviderApiKey(config);
}

export function getApiKeyEnvVar(provider: AIProvider): string {
  switch (provider) {
    case 'openai': return 'OPENAI_API_KEY';
    case 'azure': return 'AZURE_OPENAI_API_KEY';
    case 'anthropic': return 'ANTHROPIC_API_KEY';
  }
}

// Get provider display info
export function getProviderInfo(provider: AIProvider): { name: string; model: string } {
  switch (provider) {
    case 'openai':
      return { name: 'OpenAI', model: 'gpt-4o-mini' };
    case 'azure':
      return { name: 'Azure OpenAI', model: 'gpt-4o-mini' };
    case 'anthropic':
      return { name: 'Anthropic', model: 'claude-3-5-haiku-latest' };
  }
}

export function getModel(config: EvalConfig): string {
  return config.model || getProviderInfo(config.provider).model;
}

// ============================================================================
// SCORING CONFIG
// ============================================================================

const categorySchema = z.enum(CATEGORY_NAMES);

const requirementOverrideSchema = z.object({
  minTestFiles: z.number().int().nonnegative().optional(),
  minCommitCount: z.number().int().nonnegative().optional(),
  requiredCategories: z.array(categorySchema).optional(),
  minCategoryScore: z.number().min(0).max(10).optional(),
}).strict();

export const scoringOverrideSchema = z.object({
  weights: z.record(categorySchema, z.number().nonnegative()).optional(),
  levels: z.record(z.enum(QA_LEVELS), z.number().int().min(0).max(100)).optional(),
  verdictThresholds: z.object({
    pass: z.number().int().min(0).max(100).optional(),
    conditionalPass: z.number().int().min(0).max(100).optional(),
  }).strict().optional(),
  requirements: z.object({
    PASS: requirementOverrideSchema.optional(),
    CONDITIONAL_PASS: requirementOverrideSchema.optional(),
  }).strict().optional(),
  insights: z.object({
    strength: z.number().optional(),
    improvement: z.number().optional(),
    highTestRatio: z.number().optional(),
    multipleFrameworks: z.number().int().optional(),
    lowCommitCount: z.number().int().optional(),
    activeCommitCount: z.number().int().optional(),
  }).strict().optional(),
}).strict();

export type ScoringOverride = z.infer<typeof scoringOverrideSchema>;

/**
 * Merge partial overrides over a base config. A weights override replaces
 * the whole weight table (summed in category order); other sections merge per field.
 */
export function mergeScoringConfig(base: ScoringConfig, override: ScoringOverride): ScoringConfig {
  const weights = override.weights
    ? CATEGORY_NAMES.flatMap(category => {
        const weight = override.weights?.[category];
        return weight === undefined ? [] : [{ category, weight }];
      })
    : base.weights;

  const levels = override.levels
    ? base.levels.map(threshold => ({ ...threshold, min: override.levels?.[threshold.level] ?? threshold.min }))
    : base.levels;

  return {
    weights,
    levels,
    verdictThresholds: { ...base.verdictThresholds, ...override.verdictThresholds },
    requirements: {
      PASS: { ...base.requirements.PASS, ...override.requirements?.PASS },
      CONDITIONAL_PASS: { ...base.requirements.CONDITIONAL_PASS, ...override.requirements?.CONDITIONAL_PASS },
    },
    insights: { ...base.insights, ...override.insights },
  };
}

/**
 * Load scoring overrides from a JSON file and validate the result.
 * Without a path the defaults are returned.
 */
export function loadScoringConfig(path?: string): ScoringConfig {
  if (!path) return DEFAULT_SCORING_CONFIG;

  if (!existsSync(path)) {
    throw new ConfigurationError(`Scoring config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Scoring config ${path} is not valid JSON: ${String(error)}`);
  }

  const parsed = scoringOverrideSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Scoring config ${path} is invalid${issue ? `: ${issue.path.join('.') || '(root)'} ${issue.message}` : ''}`
    );
  }

  return validateScoringConfig(mergeScoringConfig(DEFAULT_SCORING_CONFIG, parsed.data));
}

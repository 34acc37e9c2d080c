import { existsSync, readFileSync } from 'fs';
import { execFileSync } from 'child_process';
import { resolve } from 'path';
import { getModel, getApiKeyEnvVar, getProviderInfo, hasApiKey, loadConfig, loadScoringConfig, type EvalConfig } from './config.js';
import { batchEvaluate, defaultDependencies, evaluateRepository, type EvaluationDeps } from './evaluate.js';
import { logger, setLogLevel } from './logger.js';
import { parseSavedResults, writeReports } from './reporter.js';
import { stripControlChars } from './security.js';
import {
  ConfigurationError,
  SCORE_BUCKETS,
  VERDICTS,
  createScoringEngine,
  summarize,
  type BatchSummary,
  type EvaluationResult,
  type ScoringEngine,
} from './scoring/index.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const red = '\x1b[31m';
const green = '\x1b[32m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';

export type CLIResult = 'handled' | 'server';

/** Bad arguments: exit code 2 with a help hint */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Any other command failure: exit code 1 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export interface CLIOverrides {
  env?: NodeJS.ProcessEnv;
  /** Replaces the git/AI collaborators, e.g. with fakes */
  deps?: (engine: ScoringEngine) => EvaluationDeps;
}

function box(content: string, width = 50): string {
  const lines = content.split('\n');
  const top = `┌${'─'.repeat(width - 2)}┐`;
  const bottom = `└${'─'.repeat(width - 2)}┘`;
  const padded = lines.map(l => {
    const stripped = l.replace(/\x1b\[[0-9;]*m/g, '');
    const padding = width - 4 - stripped.length;
    return `│ ${l}${' '.repeat(Math.max(0, padding))} │`;
  });
  return [top, ...padded, bottom].join('\n');
}

function scoreBar(score: number, max: number, width = 20): string {
  const filled = Math.round((Math.min(score, max) / max) * width);
  return `${green}${'█'.repeat(filled)}${dim}${'░'.repeat(width - filled)}${reset}`;
}

const VERDICT_COLORS: Record<string, string> = {
  PASS: green,
  CONDITIONAL_PASS: yellow,
  FAIL: red,
};

export function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: String(error) });
  }
  return '0.0.0';
}

export function showHelp(): void {
  console.log(`
${bold}${cyan}qa-eval${reset} - QA maturity scoring for source repositories

${bold}Usage:${reset}
  qa-eval evaluate <url>        Evaluate one repository
  qa-eval batch <file>          Evaluate every URL in a file (one per line, # comments)
  qa-eval summary <json>        Summarize a saved qa_results.json
  qa-eval check                 Check API key, git and provider setup
  qa-eval server                Start MCP server (stdio)
  qa-eval version               Show version
  qa-eval help                  Show this help

${bold}Options:${reset}
  --full                        Full clone instead of shallow (exact commit count)
  --keep-clone                  Leave the cloned repository on disk
  --scoring <file>              JSON overrides for weights and thresholds
  --output <dir>                Report directory for batch (default: qa_reports)
  --concurrency <n>             Repositories evaluated in parallel (default: 1)
  --stop-on-error               Abort the batch on the first failure
  --verbose                     Debug logging on stderr

${bold}Environment:${reset}
  QA_EVAL_PROVIDER              openai | azure | anthropic
  OPENAI_API_KEY, AZURE_OPENAI_API_KEY, ANTHROPIC_API_KEY
  GITHUB_TOKEN                  Private repositories and higher API limits
  QA_EVAL_LOG_LEVEL             debug | info | warn | error
`);
}

// ============================================================================
// ARGUMENTS
// ============================================================================

export interface CLIOptions {
  positionals: string[];
  full: boolean;
  keepClone: boolean;
  stopOnError: boolean;
  verbose: boolean;
  concurrency: number;
  output: string;
  scoring?: string;
}

export function parseOptions(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    positionals: [],
    full: false,
    keepClone: false,
    stopOnError: false,
    verbose: false,
    concurrency: 1,
    output: 'qa_reports',
  };

  const takeValue = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--full':
        options.full = true;
        break;
      case '--keep-clone':
        options.keepClone = true;
        break;
      case '--stop-on-error':
        options.stopOnError = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--output':
        options.output = takeValue(arg, i++);
        break;
      case '--scoring':
        options.scoring = takeValue(arg, i++);
        break;
      case '--concurrency': {
        const value = Number(takeValue(arg, i++));
        if (!Number.isInteger(value) || value < 1) {
          throw new UsageError('--concurrency must be a positive integer');
        }
        options.concurrency = value;
        break;
      }
      default:
        if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`);
        options.positionals.push(arg);
    }
  }

  return options;
}

/** URLs one per line; blank lines and # comments are skipped. */
export function readRepoUrls(path: string): string[] {
  if (!existsSync(path)) {
    throw new CommandError(`Repository list not found: ${path}`);
  }

  const urls = readFileSync(path, 'utf-8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));

  if (urls.length === 0) {
    throw new CommandError(`No repository URLs in ${path}`);
  }
  return urls;
}

// ============================================================================
// DISPLAY
// ============================================================================

export function printResult(result: EvaluationResult): void {
  const url = stripControlChars(result.url);
  console.log('');

  const outcome = result.outcome;
  if (!outcome) {
    console.log(box(`${red}${bold}EVALUATION FAILED${reset}`));
    console.log(`\n  ${url}`);
    console.log(`  ${red}${stripControlChars(result.error ?? 'unknown error')}${reset}\n`);
    return;
  }

  const color = VERDICT_COLORS[outcome.verdict] ?? reset;
  console.log(box(`${bold}QA MATURITY${reset}  ${scoreBar(outcome.overallScore, 100)}  ${outcome.overallScore}/100`));
  console.log(`\n  ${bold}${url}${reset}`);
  console.log(`  Level:   ${bold}${outcome.level}${reset}`);
  console.log(`  Verdict: ${color}${bold}${outcome.verdict}${reset}`);
  console.log(`  ${dim}${outcome.verdictReason}${reset}\n`);

  console.log(`  ${dim}CATEGORIES${reset}`);
  for (const [category, average] of Object.entries(outcome.categoryAverages)) {
    console.log(`    ${category.padEnd(22)} ${scoreBar(average, 10, 10)} ${average.toFixed(1)}`);
  }

  const { signals } = outcome;
  console.log(`\n  ${dim}SIGNALS${reset}`);
  console.log(`    Language:   ${signals.primaryLanguage}`);
  console.log(`    Test files: ${signals.testFileCount} of ${signals.totalFileCount}`);
  console.log(`    Commits:    ${signals.commitCount}`);
  console.log(`    Frameworks: ${signals.testFrameworks.join(', ') || 'none'}`);
  console.log(`    CI config:  ${signals.hasCiConfig ? 'yes' : 'no'}`);

  if (outcome.strengths.length > 0) {
    console.log(`\n  ${green}Strengths${reset}`);
    for (const item of outcome.strengths) console.log(`    + ${item}`);
  }
  if (outcome.improvementAreas.length > 0) {
    console.log(`\n  ${yellow}Improvement areas${reset}`);
    for (const item of outcome.improvementAreas) console.log(`    - ${item}`);
  }
  console.log('');
}

export function printSummary(summary: BatchSummary): void {
  console.log('');
  console.log(box(`${bold}BATCH SUMMARY${reset}  ${summary.successfulEvaluations}/${summary.totalRepositories} evaluated`));
  console.log('');
  console.log(`  Success rate:  ${(summary.successRate * 100).toFixed(1)}%`);
  if (summary.successfulEvaluations > 0) {
    console.log(`  Average score: ${summary.averageScore.toFixed(1)}/100`);
  }

  console.log(`\n  ${dim}SCORES${reset}`);
  for (const { label } of SCORE_BUCKETS) {
    console.log(`    ${label.padEnd(22)} ${summary.scoreDistribution[label]}`);
  }

  const verdicts = VERDICTS.filter(verdict => summary.verdictDistribution[verdict] !== undefined);
  if (verdicts.length > 0) {
    console.log(`\n  ${dim}VERDICTS${reset}`);
    for (const verdict of verdicts) {
      console.log(`    ${VERDICT_COLORS[verdict] ?? ''}${verdict.padEnd(22)}${reset} ${summary.verdictDistribution[verdict] ?? 0}`);
    }
  }

  if (summary.commonStrengths.length > 0) {
    console.log(`\n  ${green}Common strengths:${reset} ${summary.commonStrengths.join(', ')}`);
  }
  if (summary.commonImprovementAreas.length > 0) {
    console.log(`  ${yellow}Common gaps:${reset} ${summary.commonImprovementAreas.join(', ')}`);
  }
  if (summary.topFrameworks.length > 0) {
    console.log(`  ${cyan}Top frameworks:${reset} ${summary.topFrameworks.join(', ')}`);
  }

  if (summary.failures.length > 0) {
    console.log(`\n  ${red}FAILED${reset}`);
    for (const failure of summary.failures) {
      console.log(`    ${stripControlChars(failure.url)}: ${dim}${stripControlChars(failure.error)}${reset}`);
    }
  }
  console.log('');
}

// ============================================================================
// COMMANDS
// ============================================================================

function resolveDeps(options: CLIOptions, config: EvalConfig, overrides: CLIOverrides): EvaluationDeps {
  if (options.verbose) setLogLevel('debug');
  const engine = createScoringEngine(loadScoringConfig(options.scoring));
  if (overrides.deps) return overrides.deps(engine);

  if (!hasApiKey(config)) {
    throw new ConfigurationError(`No API key configured for ${config.provider}. Set ${getApiKeyEnvVar(config.provider)}.`);
  }
  return defaultDependencies(config, engine);
}

async function runEvaluate(options: CLIOptions, overrides: CLIOverrides): Promise<void> {
  const url = options.positionals[0];
  if (!url) throw new UsageError('evaluate needs a repository URL');

  const config = loadConfig(overrides.env);
  const deps = resolveDeps(options, config, overrides);
  const result = await evaluateRepository(url, deps, {
    shallow: !options.full,
    keepClone: options.keepClone,
    token: config.githubToken,
  });

  printResult(result);
  if (result.error !== undefined) process.exitCode = 1;
}

async function runBatch(options: CLIOptions, overrides: CLIOverrides): Promise<void> {
  const file = options.positionals[0];
  if (!file) throw new UsageError('batch needs a file of repository URLs');

  const urls = readRepoUrls(file);
  const config = loadConfig(overrides.env);
  const deps = resolveDeps(options, config, overrides);

  console.log(`\n  Evaluating ${bold}${urls.length}${reset} repositories...`);
  const results = await batchEvaluate(urls, deps, {
    shallow: !options.full,
    keepClone: options.keepClone,
    token: config.githubToken,
    concurrency: options.concurrency,
    continueOnError: !options.stopOnError,
    onResult: (result, index) => {
      const status = result.outcome
        ? `${VERDICT_COLORS[result.outcome.verdict] ?? ''}${result.outcome.verdict}${reset} ${result.outcome.overallScore}`
        : `${red}ERROR${reset}`;
      console.log(`  [${index + 1}/${urls.length}] ${stripControlChars(result.url)} ${status}`);
    },
  });

  printSummary(summarize(results));

  const files = await writeReports(results, resolve(options.output));
  console.log(`  ${bold}Reports:${reset}`);
  for (const path of files) console.log(`    ${dim}${path}${reset}`);
  console.log('');
}

function runSummary(options: CLIOptions): void {
  const file = options.positionals[0];
  if (!file) throw new UsageError('summary needs a qa_results.json file');
  if (!existsSync(file)) throw new CommandError(`Results file not found: ${file}`);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new CommandError(`${file} is not valid JSON: ${String(error)}`);
  }

  printSummary(summarize(parseSavedResultsSafe(raw, file)));
}

function parseSavedResultsSafe(raw: unknown, file: string): EvaluationResult[] {
  try {
    return parseSavedResults(raw);
  } catch (error) {
    throw new CommandError(`${file} does not look like a qa_results.json report: ${String(error)}`);
  }
}

function isGitAvailable(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'ignore' });
    return true;
  } catch (error) {
    logger.debug('git not found', { error: String(error) });
    return false;
  }
}

function runCheck(overrides: CLIOverrides): void {
  const config = loadConfig(overrides.env);
  const info = getProviderInfo(config.provider);
  const keyOk = hasApiKey(config);
  const gitOk = isGitAvailable();

  const mark = (ok: boolean) => (ok ? `${green}[x]${reset}` : `${red}[ ]${reset}`);

  console.log('');
  console.log(box(`${bold}ENVIRONMENT CHECK${reset}`));
  console.log('');
  console.log(`  Provider: ${bold}${info.name}${reset} ${dim}(${getModel(config)})${reset}`);
  console.log(`  ${mark(keyOk)} API key ${keyOk ? '' : `${dim}- set ${getApiKeyEnvVar(config.provider)}${reset}`}`);
  console.log(`  ${mark(gitOk)} git on PATH`);
  console.log(`  ${mark(!!config.githubToken)} GitHub token ${dim}(optional)${reset}`);
  console.log('');

  if (!keyOk || !gitOk) process.exitCode = 1;
}

/**
 * Dispatch a command. Sets process.exitCode: 2 for usage errors, 1 for
 * configuration or command failures.
 */
export async function runCLI(args: string[], overrides: CLIOverrides = {}): Promise<CLIResult> {
  const command = args[0];

  try {
    switch (command) {
      case 'evaluate':
        await runEvaluate(parseOptions(args.slice(1)), overrides);
        return 'handled';

      case 'batch':
        await runBatch(parseOptions(args.slice(1)), overrides);
        return 'handled';

      case 'summary':
        runSummary(parseOptions(args.slice(1)));
        return 'handled';

      case 'check':
        runCheck(overrides);
        return 'handled';

      case 'server':
        return 'server';

      case 'version':
      case '--version':
      case '-v':
        console.log(getVersion());
        return 'handled';

      case 'help':
      case '--help':
      case '-h':
      case undefined:
        showHelp();
        return 'handled';

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\nRun: qa-eval help`);
      process.exitCode = 2;
    } else if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      process.exitCode = 1;
    } else {
      logger.error('Command failed', error);
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
    return 'handled';
  }
}

/**
 * AI judge: builds per-category content from a scanned repository,
 * asks the model for sub-scores and parses the JSON it returns.
 */

import { relative } from 'path';
import { z } from 'zod';
import { logger } from './logger.js';
import { getCategoryPrompt } from './prompts.js';
import type { ChatFn } from './providers.js';
import { readText, type RepositoryScan } from './scanner.js';
import { LIMITS, limitLength } from './security.js';
import type { CommitInfo } from './git.js';
import {
  CATEGORY_NAMES,
  createScoreSet,
  type CategoryName,
  type CategoryScores,
  type CategoryScoreSet,
} from './scoring/index.js';

export class JudgeError extends Error {
  constructor(message: string, readonly category?: CategoryName) {
    super(message);
    this.name = 'JudgeError';
  }
}

export type Judge = (category: CategoryName, content: string) => Promise<CategoryScoreSet>;

export interface JudgeContext {
  scan: RepositoryScan;
  commits: readonly CommitInfo[];
}

const TRUNCATION_MARKER = '\n... (truncated)';

// ============================================================================
// CONTENT BUILDERS
// ============================================================================

function rel(scan: RepositoryScan, file: string): string {
  return relative(scan.root, file);
}

function fileSection(scan: RepositoryScan, file: string, maxLength?: number): string {
  const content = readText(file);
  const body = maxLength === undefined ? content : limitLength(content, maxLength, TRUNCATION_MARKER);
  return `\n--- ${rel(scan, file)} ---\n${body}`;
}

/** Indented directory tree of the scanned files. */
export function renderTree(scan: RepositoryScan): string {
  const lines: string[] = [];
  const seen = new Set<string>();

  for (const file of scan.files) {
    const parts = rel(scan, file).split(/[\\/]/);
    for (let depth = 0; depth < parts.length; depth++) {
      const key = parts.slice(0, depth + 1).join('/');
      if (seen.has(key)) continue;
      seen.add(key);
      const isDir = depth < parts.length - 1;
      lines.push(`${'  '.repeat(depth)}${parts[depth]}${isDir ? '/' : ''}`);
    }
  }

  return lines.join('\n');
}

/**
 * Tree plus file contents. Reading stops once the content cap is reached;
 * binary files are skipped.
 */
export function buildOverview(scan: RepositoryScan): string {
  const tree = limitLength(renderTree(scan), LIMITS.TREE_MAX_LENGTH, TRUNCATION_MARKER);
  const sections: string[] = [];
  let length = 0;

  for (const file of scan.files) {
    if (length > LIMITS.CONTENT_MAX_LENGTH) break;
    const remaining = LIMITS.CONTENT_MAX_LENGTH - length + 1;
    const content = readText(file, remaining);
    if (content.includes('\u0000')) continue;
    const section = `\n--- ${rel(scan, file)} ---\n${content}`;
    length += section.length + (sections.length > 0 ? 1 : 0);
    sections.push(section);
  }

  return [
    'REPOSITORY STRUCTURE:',
    tree,
    '\nREPOSITORY CONTENT:',
    limitLength(sections.join('\n'), LIMITS.CONTENT_MAX_LENGTH, TRUNCATION_MARKER),
  ].join('\n');
}

export function buildTestAutomationContent(scan: RepositoryScan): string {
  const parts = [`Found ${scan.testFiles.length} test files:`];
  for (const file of scan.testFiles.slice(0, LIMITS.MAX_TEST_FILES)) {
    parts.push(fileSection(scan, file, LIMITS.TEST_FILE_MAX_LENGTH));
  }

  parts.push(`\n\nQA Configuration files found: ${scan.qaConfigFiles.length}`);
  for (const file of scan.qaConfigFiles) {
    parts.push(fileSection(scan, file, LIMITS.CONFIG_FILE_MAX_LENGTH));
  }

  return parts.join('\n');
}

export function buildCiPipelineContent(scan: RepositoryScan): string {
  const parts = [`Found ${scan.ciFiles.length} CI/CD files:`];
  for (const file of scan.ciFiles) {
    parts.push(fileSection(scan, file));
  }
  if (scan.ciFiles.length === 0) {
    parts.push('No CI/CD configuration files found.');
  }
  return parts.join('\n');
}

export function buildQualityProcessContent(
  scan: RepositoryScan,
  commits: readonly CommitInfo[],
  overview = buildOverview(scan)
): string {
  const recent = commits.slice(0, LIMITS.MAX_COMMITS);
  return [
    'REPOSITORY OVERVIEW:',
    limitLength(overview, LIMITS.OVERVIEW_MAX_LENGTH, TRUNCATION_MARKER),
    scan.readme
      ? `\n\nREADME:${fileSection(scan, scan.readme, LIMITS.README_MAX_LENGTH)}`
      : '\n\nREADME: none found',
    `\n\nCOMMIT HISTORY (${recent.length} recent commits):`,
    JSON.stringify(recent, null, 2),
  ].join('\n');
}

export function buildTechnicalSkillsContent(scan: RepositoryScan, overview = buildOverview(scan)): string {
  return overview;
}

export function buildRepositoryStructureContent(scan: RepositoryScan, commits: readonly CommitInfo[]): string {
  const parts = [
    'REPOSITORY STRUCTURE:',
    limitLength(renderTree(scan), LIMITS.TREE_MAX_LENGTH, TRUNCATION_MARKER),
    `\n\nDependency manifests found: ${scan.manifests.length}`,
  ];
  for (const file of scan.manifests) {
    parts.push(fileSection(scan, file, LIMITS.CONFIG_FILE_MAX_LENGTH));
  }

  const authors = new Set(commits.map(commit => commit.author)).size;
  parts.push(`\n\nCOMMIT SUMMARY: ${commits.length} commits sampled, ${authors} authors`);
  for (const commit of commits.slice(0, LIMITS.MAX_COMMITS)) {
    parts.push(`- ${commit.message} (${commit.filesChanged} files)`);
  }

  return parts.join('\n');
}

/** `overview` is shared by the categories that embed the whole repository. */
export function buildCategoryContent(category: CategoryName, context: JudgeContext, overview?: string): string {
  switch (category) {
    case 'test_automation':
      return buildTestAutomationContent(context.scan);
    case 'ci_pipeline':
      return buildCiPipelineContent(context.scan);
    case 'quality_process':
      return buildQualityProcessContent(context.scan, context.commits, overview ?? buildOverview(context.scan));
    case 'technical_skills':
      return buildTechnicalSkillsContent(context.scan, overview ?? buildOverview(context.scan));
    case 'repository_structure':
      return buildRepositoryStructureContent(context.scan, context.commits);
  }
}

// ============================================================================
// RESPONSE PARSING
// ============================================================================

const payloadSchema = z.record(z.unknown());

const FENCE_REGEX = /```[\w-]*\s*([\s\S]*?)```/g;

/** Balanced {...} starting at `start`, skipping braces inside strings. */
function balancedObjectAt(source: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }
  return null;
}

function parsesToObject(candidate: string): boolean {
  try {
    return payloadSchema.safeParse(JSON.parse(candidate)).success;
  } catch {
    return false;
  }
}

/**
 * First JSON object in the reply. Fenced blocks are searched in order, then
 * the raw text. When nothing parses, the first balanced candidate is returned
 * so the caller can report it as malformed.
 */
export function extractJsonObject(text: string): string | null {
  const sources = [...Array.from(text.matchAll(FENCE_REGEX), match => match[1] ?? ''), text];
  let firstCandidate: string | null = null;

  for (const source of sources) {
    for (let start = source.indexOf('{'); start !== -1; start = source.indexOf('{', start + 1)) {
      const candidate = balancedObjectAt(source, start);
      if (candidate === null) continue;
      if (parsesToObject(candidate)) return candidate;
      if (firstCandidate === null) firstCandidate = candidate;
    }
  }
  return firstCandidate;
}

export function parseJudgeResponse(category: CategoryName, text: string): CategoryScoreSet {
  const json = extractJsonObject(text);
  if (!json) {
    throw new JudgeError(`No JSON object in ${category} response`, category);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new JudgeError(`Malformed JSON in ${category} response: ${String(error)}`, category);
  }

  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new JudgeError(`Expected a JSON object in ${category} response`, category);
  }
  return createScoreSet(category, parsed.data);
}

// ============================================================================
// JUDGE
// ============================================================================

export function createAiJudge(chat: ChatFn): Judge {
  return async (category, content) => {
    let response: string;
    try {
      const reply = await chat(content, { systemPrompt: getCategoryPrompt(category) });
      response = reply.content;
      logger.debug('Judge replied', { category, model: reply.model, outputTokens: reply.outputTokens });
    } catch (error) {
      throw new JudgeError(
        `AI call failed for ${category}: ${error instanceof Error ? error.message : String(error)}`,
        category
      );
    }

    if (!response.trim()) {
      throw new JudgeError(`Empty ${category} response`, category);
    }
    return parseJudgeResponse(category, response);
  };
}

/** Judge every category in order, one call at a time. */
export async function judgeRepository(judge: Judge, context: JudgeContext): Promise<CategoryScores> {
  const scores: Partial<Record<CategoryName, CategoryScoreSet>> = {};
  const overview = buildOverview(context.scan);

  for (const category of CATEGORY_NAMES) {
    logger.step(`judge ${category}`);
    scores[category] = await judge(category, buildCategoryContent(category, context, overview));
  }

  const { test_automation, ci_pipeline, quality_process, technical_skills, repository_structure } = scores;
  if (!test_automation || !ci_pipeline || !quality_process || !technical_skills || !repository_structure) {
    throw new JudgeError('Judge did not score every category');
  }
  return { test_automation, ci_pipeline, quality_process, technical_skills, repository_structure };
}

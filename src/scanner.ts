/**
 * Static repository scanning: test files, CI config, QA tool config,
 * primary language and test frameworks.
 */

import { closeSync, openSync, readdirSync, readFileSync, readSync, statSync, type Dirent } from 'fs';
import { join, relative, basename, extname, sep } from 'path';
import { z } from 'zod';
import { logger } from './logger.js';
import { createSignals, type RepositorySignals } from './scoring/index.js';

// ============================================================================
// PATTERNS
// ============================================================================

const patternsSchema = z.object({
  ciPatterns: z.array(z.string()),
  qaConfigPatterns: z.array(z.string()),
  languages: z.record(z.array(z.string())),
  frameworks: z.record(z.array(z.string())),
  manifestFiles: z.array(z.string()),
  manifestExtensions: z.array(z.string()),
  readmeNames: z.array(z.string()),
});

export type ScanPatterns = z.infer<typeof patternsSchema>;

let cachedPatterns: ScanPatterns | null = null;

export function loadPatterns(): ScanPatterns {
  if (!cachedPatterns) {
    const raw = readFileSync(new URL('../data/patterns.json', import.meta.url), 'utf-8');
    cachedPatterns = patternsSchema.parse(JSON.parse(raw));
  }
  return cachedPatterns;
}

export const TEST_FILE_REGEX = /test|spec|__tests__|\.test\.|\.spec\./i;

const IGNORED_DIRS = new Set(['.git', 'node_modules']);
const MAX_READ_BYTES = 1024 * 1024;
const FRAMEWORK_SAMPLE_TEST_FILES = 10;

// ============================================================================
// FILE WALK
// ============================================================================

/**
 * All regular files under root, skipping VCS metadata and installed dependencies.
 */
export function listFiles(root: string): string[] {
  const files: string[] = [];

  function walk(dir: string): void {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug('Skipping unreadable directory', { dir, error: String(error) });
      return;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) walk(path);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  }

  walk(root);
  return files.sort();
}

/**
 * Read a text file, or '' when it is unreadable or too large.
 * With `maxBytes` only the head of the file is read.
 */
export function readText(path: string, maxBytes?: number): string {
  try {
    const size = statSync(path).size;
    if (size > MAX_READ_BYTES) return '';
    if (maxBytes === undefined || size <= maxBytes) return readFileSync(path, 'utf-8');

    const buffer = Buffer.alloc(maxBytes);
    const fd = openSync(path, 'r');
    try {
      const bytesRead = readSync(fd, buffer, 0, maxBytes, 0);
      return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
      closeSync(fd);
    }
  } catch (error) {
    logger.debug('Could not read file', { path, error: String(error) });
    return '';
  }
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

// ============================================================================
// DETECTORS
// ============================================================================

export function detectTestFiles(files: readonly string[]): string[] {
  return files.filter(file => TEST_FILE_REGEX.test(basename(file)));
}

export function detectCiFiles(root: string, files: readonly string[]): string[] {
  const { ciPatterns } = loadPatterns();
  return files.filter(file => {
    const rel = toPosix(relative(root, file));
    return ciPatterns.some(pattern =>
      pattern.endsWith('/') ? rel.startsWith(pattern) : rel === pattern
    );
  });
}

export function detectQaConfigFiles(files: readonly string[]): string[] {
  const patterns = loadPatterns().qaConfigPatterns.map(pattern => pattern.toLowerCase());
  return files.filter(file => {
    const name = basename(file).toLowerCase();
    return patterns.some(pattern => name.includes(pattern));
  });
}

/** Language with the most files by extension; table order breaks ties. */
export function detectPrimaryLanguage(files: readonly string[]): string {
  const { languages } = loadPatterns();
  let best = 'unknown';
  let bestCount = 0;

  for (const [language, extensions] of Object.entries(languages)) {
    const count = files.filter(file => extensions.includes(extname(file).toLowerCase())).length;
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }

  return best;
}

export function detectReadme(root: string, files: readonly string[]): string | null {
  const topLevel = files.filter(file => relative(root, file) === basename(file));

  for (const name of loadPatterns().readmeNames) {
    const match = topLevel.find(file => basename(file) === name);
    if (match) return match;
  }
  return topLevel.find(file => basename(file).toLowerCase().startsWith('readme')) ?? null;
}

function isManifest(file: string): boolean {
  const { manifestFiles, manifestExtensions } = loadPatterns();
  return manifestFiles.includes(basename(file)) || manifestExtensions.includes(extname(file).toLowerCase());
}

export function detectManifests(files: readonly string[]): string[] {
  return files.filter(isManifest);
}

/**
 * Keyword search for the language's test frameworks across dependency
 * manifests and a sample of test files.
 */
export function detectTestFrameworks(
  files: readonly string[],
  language: string,
  testFiles: readonly string[]
): string[] {
  const candidates = loadPatterns().frameworks[language];
  if (!candidates) return [];

  const sources = [...detectManifests(files), ...testFiles.slice(0, FRAMEWORK_SAMPLE_TEST_FILES)];
  const content = sources.map(readText).join('\n').toLowerCase();

  return candidates.filter(framework => content.includes(framework.toLowerCase()));
}

// ============================================================================
// SCAN
// ============================================================================

export interface RepositoryScan {
  readonly root: string;
  readonly files: readonly string[];
  readonly testFiles: readonly string[];
  readonly ciFiles: readonly string[];
  readonly qaConfigFiles: readonly string[];
  readonly manifests: readonly string[];
  readonly readme: string | null;
  readonly primaryLanguage: string;
  readonly testFrameworks: readonly string[];
}

export function scanRepository(root: string): RepositoryScan {
  const files = listFiles(root);
  const testFiles = detectTestFiles(files);
  const primaryLanguage = detectPrimaryLanguage(files);

  const scan: RepositoryScan = {
    root,
    files,
    testFiles,
    ciFiles: detectCiFiles(root, files),
    qaConfigFiles: detectQaConfigFiles(files),
    manifests: detectManifests(files),
    readme: detectReadme(root, files),
    primaryLanguage,
    testFrameworks: detectTestFrameworks(files, primaryLanguage, testFiles),
  };

  logger.debug('Repository scanned', {
    files: files.length,
    testFiles: testFiles.length,
    ciFiles: scan.ciFiles.length,
    language: primaryLanguage,
  });

  return scan;
}

export function toSignals(scan: RepositoryScan, commitCount: number): RepositorySignals {
  return createSignals({
    commitCount,
    primaryLanguage: scan.primaryLanguage,
    testFileCount: scan.testFiles.length,
    totalFileCount: scan.files.length,
    testFrameworks: scan.testFrameworks,
    hasCiConfig: scan.ciFiles.length > 0,
  });
}

/**
 * Tests for static repository scanning
 */
import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, relative } from 'path';
import {
  detectCiFiles,
  detectPrimaryLanguage,
  detectTestFrameworks,
  listFiles,
  readText,
  scanRepository,
  toSignals,
  type RepositoryScan,
} from '../scanner.js';

const FIXTURE: Record<string, string> = {
  'package.json': JSON.stringify({ name: 'demo', devDependencies: { jest: '^29.0.0', cypress: '^13.0.0' } }),
  'src/app.ts': 'export const answer = 42;\n',
  'src/util.ts': 'export function add(a: number, b: number) { return a + b; }\n',
  'src/app.test.ts': "import { it } from 'vitest';\nit('works', () => {});\n",
  'tests/e2e.spec.ts': "describe('e2e', () => {});\n",
  '.github/workflows/ci.yml': 'on: [push]\n',
  'jest.config.js': 'module.exports = {};\n',
  'README.md': '# Demo\n',
  'node_modules/pkg/index.test.js': 'ignored\n',
  '.git/config': '[core]\n',
};

describe('Repository scanner', () => {
  let root: string;
  let scan: RepositoryScan;

  before(() => {
    root = mkdtempSync(join(tmpdir(), 'qa-eval-scan-'));
    for (const [path, content] of Object.entries(FIXTURE)) {
      const full = join(root, path);
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, content);
    }
    scan = scanRepository(root);
  });

  after(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const rel = (files: readonly string[]) => files.map(file => relative(root, file));

  it('lists files sorted, skipping .git and node_modules', () => {
    assert.deepStrictEqual(rel(listFiles(root)), [
      '.github/workflows/ci.yml',
      'README.md',
      'jest.config.js',
      'package.json',
      'src/app.test.ts',
      'src/app.ts',
      'src/util.ts',
      'tests/e2e.spec.ts',
    ]);
  });

  it('finds test files by name', () => {
    assert.deepStrictEqual(rel(scan.testFiles), ['src/app.test.ts', 'tests/e2e.spec.ts']);
  });

  it('finds CI and QA tool configuration', () => {
    assert.deepStrictEqual(rel(scan.ciFiles), ['.github/workflows/ci.yml']);
    assert.deepStrictEqual(rel(scan.qaConfigFiles), ['jest.config.js']);
  });

  it('detects language, README and manifests', () => {
    assert.strictEqual(scan.primaryLanguage, 'typescript');
    assert.strictEqual(scan.readme, join(root, 'README.md'));
    assert.deepStrictEqual(rel(scan.manifests), ['package.json']);
  });

  it('detects frameworks from manifests and test files in table order', () => {
    assert.deepStrictEqual(scan.testFrameworks, ['jest', 'cypress', 'vitest']);
  });

  it('turns the scan into signals', () => {
    const signals = toSignals(scan, 12);
    assert.strictEqual(signals.testFileCount, 2);
    assert.strictEqual(signals.totalFileCount, 8);
    assert.strictEqual(signals.commitCount, 12);
    assert.strictEqual(signals.hasCiConfig, true);
  });

  it('returns an empty string for unreadable files', () => {
    assert.strictEqual(readText(join(root, 'missing.txt')), '');
  });

  it('reads only the head of a file when a byte limit is given', () => {
    assert.strictEqual(readText(join(root, 'README.md'), 3), '# D');
    assert.strictEqual(readText(join(root, 'README.md'), 100), '# Demo\n');
  });
});

describe('Scanner detectors', () => {
  it('picks the language with the most files, table order on ties', () => {
    assert.strictEqual(detectPrimaryLanguage(['a.py', 'b.py', 'c.js']), 'python');
    assert.strictEqual(detectPrimaryLanguage(['a.java', 'b.py']), 'python');
    assert.strictEqual(detectPrimaryLanguage(['README.md']), 'unknown');
  });

  it('matches CI files at the repository root only', () => {
    const root = '/repo';
    const files = ['/repo/.gitlab-ci.yml', '/repo/sub/.gitlab-ci.yml', '/repo/.circleci/config.yml'];
    assert.deepStrictEqual(detectCiFiles(root, files), ['/repo/.gitlab-ci.yml', '/repo/.circleci/config.yml']);
  });

  it('knows no frameworks for an unlisted language', () => {
    assert.deepStrictEqual(detectTestFrameworks([], 'cobol', []), []);
  });
});

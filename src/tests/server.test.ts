import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { createServer, wrapTool } from '../server.js';
import { batch, evaluate, evaluateSchema, summarize } from '../tools/index.js';
import { outcomeToRecord } from '../scoring/index.js';
import { fakeDeps, fakeOutcome } from './fixtures.js';

describe('MCP Server', () => {
  let dir: string;
  let previousConfigDir: string | undefined;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'qa-eval-server-'));
    previousConfigDir = process.env.QA_EVAL_CONFIG_DIR;
    process.env.QA_EVAL_CONFIG_DIR = dir;
  });

  after(() => {
    if (previousConfigDir === undefined) delete process.env.QA_EVAL_CONFIG_DIR;
    else process.env.QA_EVAL_CONFIG_DIR = previousConfigDir;
    rmSync(dir, { recursive: true, force: true });
  });

  describe('createServer', () => {
    it('registers the tools without throwing', () => {
      assert.doesNotThrow(() => createServer());
    });
  });

  describe('wrapTool', () => {
    it('returns the result as JSON text', async () => {
      const handler = wrapTool('echo', (args: { value: number }) => ({ doubled: args.value * 2 }));
      const response = await handler({ value: 21 });
      assert.strictEqual(response.isError, undefined);
      assert.strictEqual(response.content[0]?.text, JSON.stringify({ doubled: 42 }, null, 2));
    });

    it('reports thrown errors as tool errors', async () => {
      const handler = wrapTool('explode', async (_args: { value: number }) => {
        throw new Error('boom');
      });
      const response = await handler({ value: 1 });
      assert.strictEqual(response.isError, true);
      assert.strictEqual(response.content[0]?.text, '{"error":"boom"}');
    });
  });

  describe('tools', () => {
    it('validates evaluate input', () => {
      assert.strictEqual(evaluateSchema.safeParse({ url: '' }).success, false);
      assert.strictEqual(evaluateSchema.safeParse({ url: 'https://github.com/acme/app' }).success, true);
    });

    it('evaluates a repository into a record', async () => {
      const record = await evaluate({ url: 'https://github.com/acme/app' }, fakeDeps().deps);
      assert.strictEqual(record.url, 'https://github.com/acme/app');
      assert.strictEqual(record.overallScore, 80);
      assert.strictEqual(record.verdict, 'PASS');
    });

    it('evaluates a batch with a summary', async () => {
      const { deps } = fakeDeps({ cloneFailures: { 'https://github.com/acme/b': new Error('denied') } });
      const output = await batch({ urls: ['https://github.com/acme/a', 'https://github.com/acme/b'] }, deps);

      assert.strictEqual(output.results.length, 2);
      assert.strictEqual(output.results[1]?.error, 'denied');
      assert.strictEqual(output.summary.totalRepositories, 2);
      assert.strictEqual(output.summary.successRate, 0.5);
    });

    it('summarizes saved records', () => {
      const record = outcomeToRecord({
        url: 'https://github.com/acme/a',
        outcome: fakeOutcome({ overallScore: 90, level: 'Expert', verdict: 'PASS' }),
      });
      const summary = summarize({ results: [record, { url: 'https://github.com/acme/b', error: 'denied' }] });

      assert.strictEqual(summary.averageScore, 90);
      assert.deepStrictEqual(summary.verdictDistribution, { PASS: 1 });
    });
  });
});

/**
 * Tests for the stderr logger
 */
import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { logger, resolveLogLevel, setLogLevel } from '../logger.js';

describe('Logger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    mock.method(console, 'error', (line: unknown) => {
      lines.push(String(line));
    });
  });

  afterEach(() => {
    mock.restoreAll();
    setLogLevel(resolveLogLevel());
  });

  it('drops messages below the current level', () => {
    setLogLevel('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('careful', { n: 1 });
    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0]?.includes('[QA-EVAL] WARN \x1b[0m careful'));
    assert.ok(lines[0]?.endsWith('\x1b[2m{"n":1}\x1b[0m'));
  });

  it('includes the error message for errors', () => {
    setLogLevel('debug');
    logger.error('failed', new Error('boom'), { url: 'https://example.com/r.git' });
    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0]?.includes('"url":"https://example.com/r.git","error":"boom"'));
  });

  it('stringifies non-Error values', () => {
    setLogLevel('error');
    logger.error('failed', 'plain');
    assert.ok(lines[0]?.includes('{"error":"plain"}'));
  });

  it('logs steps at info and tool calls at debug', () => {
    setLogLevel('info');
    logger.step('scan', { files: 3 });
    logger.tool('qa_evaluate', { url: 'x' });
    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0]?.includes('INFO \x1b[0m scan'));
  });

  describe('resolveLogLevel', () => {
    it('reads the environment', () => {
      assert.strictEqual(resolveLogLevel({}), 'info');
      assert.strictEqual(resolveLogLevel({ QA_EVAL_DEBUG: '1' }), 'debug');
      assert.strictEqual(resolveLogLevel({ QA_EVAL_LOG_LEVEL: 'WARN' }), 'warn');
      assert.strictEqual(resolveLogLevel({ QA_EVAL_LOG_LEVEL: 'loud' }), 'info');
    });
  });
});

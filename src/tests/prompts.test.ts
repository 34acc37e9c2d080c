/**
 * Tests for judge prompts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { getCategoryPrompt } from '../prompts.js';
import { CATEGORY_NAMES, SUB_SCORE_FIELDS } from '../scoring/index.js';

describe('getCategoryPrompt', () => {
  it('asks for every sub-score field of the category', () => {
    for (const category of CATEGORY_NAMES) {
      const prompt = getCategoryPrompt(category);
      for (const field of SUB_SCORE_FIELDS[category]) {
        assert.ok(prompt.includes(`- ${field} (0-10): `), `${category} criteria list ${field}`);
        assert.ok(prompt.includes(`"${field}": <integer 0-10>,`), `${category} shape lists ${field}`);
      }
      assert.ok(prompt.includes('"reasoning": "<short justification>"'));
    }
  });

  it('tells the CI judge to score zero without CI files', () => {
    const prompt = getCategoryPrompt('ci_pipeline');
    assert.ok(prompt.startsWith('You are a senior DevOps engineer assessing the CI/CD configuration'));
    assert.ok(prompt.includes('If no CI/CD files are present, score every field 0.'));
  });

  it('omits the note line where a category has none', () => {
    const prompt = getCategoryPrompt('test_automation');
    assert.ok(prompt.includes('weigh the size and stack of the project.\n\nRespond with ONLY a JSON object'));
  });
});

/**
 * Tests for the category score model
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CATEGORY_NAMES,
  SUB_SCORE_FIELDS,
  categoryAverage,
  clampSubScore,
  computeCategoryAverages,
  createScoreSet,
  isCategoryName,
} from '../scoring/index.js';
import { emptyCategoryScores } from './fixtures.js';

describe('Category model', () => {
  it('tracks five categories with five sub-scores each', () => {
    assert.deepStrictEqual([...CATEGORY_NAMES], [
      'test_automation',
      'ci_pipeline',
      'quality_process',
      'technical_skills',
      'repository_structure',
    ]);
    for (const category of CATEGORY_NAMES) {
      assert.strictEqual(SUB_SCORE_FIELDS[category].length, 5);
    }
  });

  it('recognizes category names', () => {
    assert.strictEqual(isCategoryName('ci_pipeline'), true);
    assert.strictEqual(isCategoryName('ci'), false);
    assert.strictEqual(isCategoryName(''), false);
  });

  describe('createScoreSet', () => {
    it('defaults missing sub-scores to 0', () => {
      const set = createScoreSet('ci_pipeline');
      assert.deepStrictEqual({ ...set.scores }, {
        pipeline_configuration_score: 0,
        automated_testing_integration_score: 0,
        deployment_automation_score: 0,
        pipeline_efficiency_score: 0,
        environment_management_score: 0,
      });
    });

    it('coerces, rounds and clamps raw values', () => {
      const set = createScoreSet('test_automation', {
        test_coverage_score: '7',
        test_organization_score: 'abc',
        framework_usage_score: 42,
        assertion_quality_score: -3,
        test_data_management_score: 6.5,
      });
      assert.deepStrictEqual({ ...set.scores }, {
        test_coverage_score: 7,
        test_organization_score: 0,
        framework_usage_score: 10,
        assertion_quality_score: 0,
        test_data_management_score: 7,
      });
    });

    it('treats null and undefined as 0', () => {
      const set = createScoreSet('technical_skills', { api_testing_score: null, ui_testing_score: undefined });
      assert.strictEqual(set.scores.api_testing_score, 0);
      assert.strictEqual(set.scores.ui_testing_score, 0);
    });

    it('drops fields that do not belong to the category', () => {
      const set = createScoreSet('quality_process', { reasoning: 'fine', api_testing_score: 9 });
      assert.strictEqual('reasoning' in set.scores, false);
      assert.strictEqual('api_testing_score' in set.scores, false);
    });

    it('freezes the set', () => {
      const set = createScoreSet('repository_structure', { project_structure_score: 5 });
      assert.ok(Object.isFrozen(set));
      assert.ok(Object.isFrozen(set.scores));
    });
  });

  describe('clampSubScore', () => {
    it('keeps the range 0..10', () => {
      assert.strictEqual(clampSubScore(10.6), 10);
      assert.strictEqual(clampSubScore(10.4), 10);
      assert.strictEqual(clampSubScore(3.2), 3);
      assert.strictEqual(clampSubScore(-7), 0);
    });
  });

  describe('averages', () => {
    it('is the mean of the five sub-scores', () => {
      const set = createScoreSet('test_automation', {
        test_coverage_score: 10,
        test_organization_score: 8,
        framework_usage_score: 6,
        assertion_quality_score: 4,
        test_data_management_score: 2,
      });
      assert.strictEqual(categoryAverage(set), 6);
    });

    it('computes one average per category', () => {
      const averages = computeCategoryAverages(emptyCategoryScores());
      assert.deepStrictEqual({ ...averages }, {
        test_automation: 0,
        ci_pipeline: 0,
        quality_process: 0,
        technical_skills: 0,
        repository_structure: 0,
      });
    });
  });
});

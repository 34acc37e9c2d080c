/**
 * System prompts for the judge, one per category.
 * Each asks for a bare JSON object with the category's sub-score fields.
 */

import { SUB_SCORE_FIELDS, type CategoryName } from './scoring/index.js';

interface CategoryBrief {
  role: string;
  subject: string;
  criteria: Record<string, string>;
  note?: string;
}

const BRIEFS: Record<CategoryName, CategoryBrief> = {
  test_automation: {
    role: 'a senior QA engineer',
    subject: 'the test automation in this repository',
    criteria: {
      test_coverage_score: 'Breadth of functionality under test, including edge and error cases, and the mix of unit, integration and end-to-end tests.',
      test_organization_score: 'Directory layout, naming conventions and grouping of test suites.',
      framework_usage_score: 'Use of framework features such as fixtures, parameterization and mocking, and sound framework configuration.',
      assertion_quality_score: 'Specific, meaningful assertions with useful failure messages.',
      test_data_management_score: 'Fixtures, factories and mocks; isolation and cleanup of test data; stubbing of external dependencies.',
    },
  },
  ci_pipeline: {
    role: 'a senior DevOps engineer',
    subject: 'the CI/CD configuration of this repository',
    criteria: {
      pipeline_configuration_score: 'Structure and maintainability of the pipeline and its triggers (push, pull request, schedule).',
      automated_testing_integration_score: 'Whether tests run in the pipeline on the right events, reliably.',
      deployment_automation_score: 'Automated deployment, staged environments and rollback.',
      pipeline_efficiency_score: 'Parallel jobs, caching and overall speed.',
      environment_management_score: 'Separation of environments and handling of secrets and environment config.',
    },
    note: 'If no CI/CD files are present, score every field 0.',
  },
  quality_process: {
    role: 'a QA manager',
    subject: 'the quality assurance process visible in this repository',
    criteria: {
      testing_strategy_score: 'A coherent testing strategy suited to the project.',
      bug_tracking_score: 'Evidence of systematic issue tracking and resolution.',
      code_review_process_score: 'Review practice as seen in pull requests and commit messages.',
      documentation_quality_score: 'QA documentation: README setup, test procedures, contribution guidelines.',
      collaboration_score: 'QA integrated with development workflow and shared knowledge.',
    },
    note: 'Base every score on evidence in the content provided.',
  },
  technical_skills: {
    role: 'a QA architect',
    subject: 'the technical testing skills shown in this repository',
    criteria: {
      test_design_patterns_score: 'Patterns such as Page Object or Builder, reusable test code, absence of anti-patterns.',
      api_testing_score: 'Validation of requests, responses, status codes and data integrity.',
      ui_testing_score: 'Stable, maintainable UI tests with suitable tools.',
      performance_testing_score: 'Load, stress or benchmark testing.',
      security_testing_score: 'Security checks such as dependency scanning, auth tests or input fuzzing.',
    },
  },
  repository_structure: {
    role: 'a senior software engineer',
    subject: 'the structure and hygiene of this repository',
    criteria: {
      project_structure_score: 'Clear, conventional source layout.',
      test_structure_score: 'Tests placed and separated consistently from source.',
      configuration_management_score: 'Tool and environment configuration kept explicit and versioned.',
      dependency_management_score: 'Declared, pinned or locked dependencies.',
      version_control_practices_score: 'Commit granularity and message quality.',
    },
  },
};

export function getCategoryPrompt(category: CategoryName): string {
  const brief = BRIEFS[category];
  const fields = SUB_SCORE_FIELDS[category];

  const criteria = fields
    .map(field => `- ${field} (0-10): ${brief.criteria[field] ?? ''}`)
    .join('\n');

  const shape = [
    '{',
    ...fields.map(field => `  "${field}": <integer 0-10>,`),
    '  "reasoning": "<short justification>"',
    '}',
  ].join('\n');

  return `You are ${brief.role} assessing ${brief.subject}.

Score each dimension from 0 (absent) to 10 (exemplary):
${criteria}

Judge practical QA skill rather than code style, and weigh the size and stack of the project.${brief.note ? `\n${brief.note}` : ''}

Respond with ONLY a JSON object of this shape:
${shape}`;
}

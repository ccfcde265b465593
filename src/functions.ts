/**
 * Function definitions offered to the model for structured output.
 *
 * Each definition mirrors the zod payload schema of the same stage in
 * `schemas.ts`; the zod side is what the response is validated against.
 */

import type { FunctionDefinition, JsonSchema } from './types.js';

const STRING_LIST: JsonSchema = { type: 'array', items: { type: 'string' } };

const SEVERITY: JsonSchema = {
  type: 'string',
  enum: ['critical', 'high', 'medium', 'low'],
};

const BUG: JsonSchema = {
  type: 'object',
  properties: {
    description: { type: 'string', description: 'Short statement of the defect' },
    cause: { type: 'string', description: 'Technical cause' },
    severity: SEVERITY,
    location: { type: 'string', description: 'File, function or line where it shows' },
    impact: { type: 'string', description: 'Effect on the system' },
    remediation: { type: 'string', description: 'Concrete steps to fix it' },
  },
  required: ['description', 'severity', 'impact', 'remediation'],
};

const BUG_LIST: JsonSchema = {
  type: 'array',
  items: BUG,
  description: 'Defects that violate the requirements. Empty when there are none.',
};

export const REQUIREMENTS_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'requirements_analysis',
  description: 'Structured analysis of software requirements',
  parameters: {
    type: 'object',
    properties: {
      summary: { type: 'string' },
      functional_requirements: STRING_LIST,
      non_functional_requirements: STRING_LIST,
      issues: { ...STRING_LIST, description: 'Ambiguities, contradictions and gaps' },
      bugs: BUG_LIST,
      recommendations: STRING_LIST,
    },
    required: ['summary', 'functional_requirements', 'issues', 'recommendations'],
  },
};

export const CODE_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'code_analysis',
  description: 'Structured analysis of source code against its requirements',
  parameters: {
    type: 'object',
    properties: {
      summary: { type: 'string' },
      quality_rating: { type: 'number', description: 'Code quality from 0 to 10' },
      strengths: STRING_LIST,
      weaknesses: STRING_LIST,
      bugs: BUG_LIST,
      recommendations: STRING_LIST,
    },
    required: ['summary', 'bugs', 'recommendations'],
  },
};

export const TEST_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'test_analysis',
  description: 'Structured analysis of test cases and their requirement coverage',
  parameters: {
    type: 'object',
    properties: {
      summary: { type: 'string' },
      coverage_percentage: { type: 'number', description: 'Requirement coverage from 0 to 100' },
      testing_gaps: STRING_LIST,
      bugs: BUG_LIST,
      recommendations: STRING_LIST,
    },
    required: ['summary', 'testing_gaps', 'recommendations'],
  },
};

export const DOCUMENTATION_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'documentation_analysis',
  description: 'Structured analysis of documentation completeness and accuracy',
  parameters: {
    type: 'object',
    properties: {
      summary: { type: 'string' },
      completeness: { type: 'number', description: 'Completeness from 0 to 10' },
      gaps: STRING_LIST,
      bugs: BUG_LIST,
      recommendations: STRING_LIST,
    },
    required: ['summary', 'gaps', 'recommendations'],
  },
};

export const SECURITY_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'security_analysis',
  description: 'Security review of source code',
  parameters: {
    type: 'object',
    properties: {
      vulnerabilities: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            type: { type: 'string', description: 'Vulnerability class' },
            severity: SEVERITY,
            description: { type: 'string' },
            location: { type: 'string' },
            code_snippet: { type: 'string' },
            mitigation: { type: 'string' },
            cwe_id: { type: 'string', description: 'CWE identifier, e.g. CWE-79' },
          },
          required: ['type', 'severity', 'description'],
        },
      },
      overall_security_score: { type: 'number', description: 'Security score from 0 to 10' },
      recommendations: STRING_LIST,
    },
    required: ['vulnerabilities', 'overall_security_score'],
  },
};

export const BUG_ANALYSIS_FUNCTION: FunctionDefinition = {
  name: 'bug_analysis',
  description: 'Consolidated list of defects found across all analyses',
  parameters: {
    type: 'object',
    properties: {
      bug_count: { type: 'integer', description: 'Number of defects listed in bugs' },
      bugs: BUG_LIST,
      summary: { type: 'string', description: 'Explanation of the defects found, or why there are none' },
    },
    required: ['bug_count', 'bugs'],
  },
};

export const REPORT_SYNTHESIS_FUNCTION: FunctionDefinition = {
  name: 'report_synthesis',
  description: 'Final compliance report',
  parameters: {
    type: 'object',
    properties: {
      final_report: { type: 'string', description: 'Narrative report for the reader' },
      recommendations: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            text: { type: 'string' },
            priority: { type: 'string', enum: ['high', 'medium', 'low'] },
            priority_level: { type: 'integer', description: 'Numeric priority, 1 is the most urgent' },
            category: { type: 'string', description: 'Performance, Security, Quality or Best Practice' },
            affected_requirements: { ...STRING_LIST, description: 'Requirements the recommendation concerns' },
            affected_code: { ...STRING_LIST, description: 'Functions, files or lines it concerns' },
          },
          required: ['text'],
        },
      },
    },
    required: ['final_report'],
  },
};

import type { z } from 'zod';
import {
  BUG_ANALYSIS_FUNCTION,
  CODE_ANALYSIS_FUNCTION,
  DOCUMENTATION_ANALYSIS_FUNCTION,
  REPORT_SYNTHESIS_FUNCTION,
  REQUIREMENTS_ANALYSIS_FUNCTION,
  SECURITY_ANALYSIS_FUNCTION,
  TEST_ANALYSIS_FUNCTION,
} from './functions.js';
import { SYSTEM_PROMPTS } from './prompts.js';
import {
  bugAnalysisPayloadSchema,
  codePayloadSchema,
  documentationPayloadSchema,
  reportPayloadSchema,
  requirementsPayloadSchema,
  securityPayloadSchema,
  testPayloadSchema,
} from './schemas.js';
import type { AnalysisBundle, FunctionDefinition, StageName, StageResult } from './types.js';

export interface StageDescriptor {
  name: StageName;
  /** Function offered to the model; its name is the schema name extraction expects. */
  definition: FunctionDefinition;
  schema: z.ZodType<unknown, z.ZodTypeDef, unknown>;
  systemPrompt: string;
  enabled?: (bundle: AnalysisBundle) => boolean;
  /** Build the user message from the bundle and the results recorded so far. */
  buildInput: (bundle: AnalysisBundle, prior: readonly StageResult[]) => string;
}

export const STAGE_LABELS: Record<StageName, string> = {
  requirements: 'Requirements analysis',
  code: 'Code analysis',
  tests: 'Test analysis',
  documentation: 'Documentation analysis',
  security: 'Security analysis',
  bugs: 'Bug synthesis',
  report: 'Report synthesis',
};

function section(title: string, body: string): string {
  const trimmed = body.trim();
  return `## ${title}\n${trimmed === '' ? '(not provided)' : trimmed}`;
}

function codeSection(code: string): string {
  return code.trim() === '' ? section('Code', '') : `## Code\n\`\`\`\n${code.trim()}\n\`\`\``;
}

/** Render a recorded stage as prose for later stages. */
export function renderStageContext(record: StageResult | undefined): string {
  if (record === undefined) return '(not run)';
  const { result } = record;
  switch (result.kind) {
    case 'structured':
      return JSON.stringify(result.payload, null, 2);
    case 'text':
      return result.text;
    case 'failure':
      return `(unavailable: ${result.reason})`;
  }
}

function priorSections(prior: readonly StageResult[], stages: readonly StageName[]): string[] {
  return stages
    .map((stage) => prior.find((record) => record.stage === stage))
    .filter((record): record is StageResult => record !== undefined)
    .map((record) => section(STAGE_LABELS[record.stage], renderStageContext(record)));
}

/**
 * Pipeline order: requirements, code, tests, documentation, [security], bugs, report.
 */
export const ANALYSIS_STAGES: readonly StageDescriptor[] = [
  {
    name: 'requirements',
    definition: REQUIREMENTS_ANALYSIS_FUNCTION,
    schema: requirementsPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.requirements,
    buildInput: (bundle) => section('Requirements', bundle.requirements),
  },
  {
    name: 'code',
    definition: CODE_ANALYSIS_FUNCTION,
    schema: codePayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.code,
    buildInput: (bundle) => [section('Requirements', bundle.requirements), codeSection(bundle.code)].join('\n\n'),
  },
  {
    name: 'tests',
    definition: TEST_ANALYSIS_FUNCTION,
    schema: testPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.tests,
    buildInput: (bundle) =>
      [section('Requirements', bundle.requirements), section('Test cases', bundle.tests)].join('\n\n'),
  },
  {
    name: 'documentation',
    definition: DOCUMENTATION_ANALYSIS_FUNCTION,
    schema: documentationPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.documentation,
    buildInput: (bundle) =>
      [section('Documentation', bundle.documentation), codeSection(bundle.code)].join('\n\n'),
  },
  {
    name: 'security',
    definition: SECURITY_ANALYSIS_FUNCTION,
    schema: securityPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.security,
    enabled: (bundle) => bundle.flags.analyzeSecurity,
    buildInput: (bundle) => codeSection(bundle.code),
  },
  {
    name: 'bugs',
    definition: BUG_ANALYSIS_FUNCTION,
    schema: bugAnalysisPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.bugs,
    buildInput: (bundle, prior) =>
      [
        section('Requirements', bundle.requirements),
        ...priorSections(prior, ['requirements', 'code', 'tests', 'documentation']),
      ].join('\n\n'),
  },
  {
    name: 'report',
    definition: REPORT_SYNTHESIS_FUNCTION,
    schema: reportPayloadSchema,
    systemPrompt: SYSTEM_PROMPTS.report,
    buildInput: (bundle, prior) =>
      [
        section('Requirements', bundle.requirements),
        ...priorSections(prior, ['requirements', 'code', 'tests', 'documentation', 'security', 'bugs']),
      ].join('\n\n'),
  },
];

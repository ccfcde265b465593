import { z } from 'zod';
import type { Severity } from './types.js';

// --- Wire ---

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.number(),
}).passthrough();

const functionCallSchema = z.object({
  name: z.string(),
  // Some gateway builds send arguments already decoded.
  arguments: z
    .union([z.string(), z.record(z.unknown())])
    .transform((args) => (typeof args === 'string' ? args : JSON.stringify(args))),
});

const messageSchema = z.object({
  role: z.string().optional().default('assistant'),
  content: z.string().nullish().transform((content) => content ?? undefined),
  function_call: functionCallSchema.nullish().transform((call) => call ?? undefined),
});

const choiceSchema = z.object({
  index: z.number().int().optional().default(0),
  finish_reason: z.enum(['stop', 'function_call', 'length', 'error']).catch('error'),
  message: messageSchema.nullish().transform((message) => message ?? { role: 'assistant' }),
});

export const rawResponseSchema = z.object({
  choices: z.array(choiceSchema).optional().default([]),
  model: z.string().optional(),
}).passthrough();

// --- Shared payload pieces ---

const SEVERITY_ALIASES: Record<string, Severity> = {
  critical: 'critical',
  blocker: 'critical',
  'критическая': 'critical',
  high: 'high',
  major: 'high',
  'высокая': 'high',
  medium: 'medium',
  moderate: 'medium',
  'средняя': 'medium',
  low: 'low',
  minor: 'low',
  info: 'low',
  'низкая': 'low',
};

export function normalizeSeverity(raw: string): Severity {
  return SEVERITY_ALIASES[raw.trim().toLowerCase()] ?? 'medium';
}

export function normalizePriority(raw: string): 'high' | 'medium' | 'low' | undefined {
  const value = raw.trim().toLowerCase();
  if (value === 'high' || value === 'medium' || value === 'low') return value;
  if (value === 'critical') return 'high';
  return undefined;
}

const severitySchema = z.string().transform(normalizeSeverity);

export const bugSchema = z
  .object({
    description: z.string().min(1),
    cause: z.string().optional().default(''),
    severity: severitySchema.optional().default('medium'),
    location: z.string().optional().default(''),
    impact: z.string().optional().default(''),
    remediation: z.string().optional(),
    // older prompt revisions named the field "recommendations"
    recommendations: z.string().optional(),
  })
  .transform(({ recommendations, remediation, ...bug }) => ({
    ...bug,
    remediation: remediation ?? recommendations ?? '',
  }));

export const recommendationSchema = z
  .object({
    text: z.string().min(1),
    priority: z.string().transform(normalizePriority).optional(),
    /** 1 is the most urgent. */
    priority_level: z.number().int().min(1).optional(),
    category: z.string().optional(),
    type: z.string().optional(),
    affected_requirements: z.array(z.string()).optional(),
    affected_code: z.array(z.string()).optional(),
  })
  .transform(({ type, category, ...rec }) => ({ ...rec, category: category ?? type }));

export const securityFindingSchema = z
  .object({
    type: z.string().optional().default('unspecified'),
    severity: severitySchema.optional().default('medium'),
    description: z.string().min(1),
    location: z.string().optional(),
    file_path: z.string().optional(),
    line_number: z.number().int().optional(),
    code_snippet: z.string().optional(),
    mitigation: z.string().optional(),
    cwe_id: z.string().optional(),
  })
  .transform(({ file_path, line_number, location, ...finding }) => {
    const derived = [file_path, line_number?.toString()].filter(Boolean).join(':');
    return { ...finding, location: location ?? (derived || undefined) };
  });

const stringList = z.array(z.string()).optional().default([]);
const bugList = z.array(bugSchema).optional().default([]);

// --- Stage payloads ---

export const requirementsPayloadSchema = z.object({
  summary: z.string(),
  functional_requirements: stringList,
  non_functional_requirements: stringList,
  issues: stringList,
  bugs: bugList,
  recommendations: stringList,
});

export const codePayloadSchema = z.object({
  summary: z.string(),
  quality_rating: z.number().min(0).max(10).optional(),
  strengths: stringList,
  weaknesses: stringList,
  bugs: bugList,
  recommendations: stringList,
});

export const testPayloadSchema = z.object({
  summary: z.string(),
  coverage_percentage: z.number().min(0).max(100).optional(),
  testing_gaps: stringList,
  bugs: bugList,
  recommendations: stringList,
});

export const documentationPayloadSchema = z.object({
  summary: z.string(),
  completeness: z.number().min(0).max(10).optional(),
  gaps: stringList,
  bugs: bugList,
  recommendations: stringList,
});

export const securityPayloadSchema = z.object({
  vulnerabilities: z.array(securityFindingSchema).optional().default([]),
  overall_security_score: z.number().min(0).max(10),
  recommendations: stringList,
});

export const bugAnalysisPayloadSchema = z.object({
  bug_count: z.number().int().min(0),
  bugs: bugList,
  summary: z.string().optional().default(''),
});

export const reportPayloadSchema = z.object({
  final_report: z.string().min(1),
  recommendations: z.array(recommendationSchema).optional().default([]),
});

/** Fields shared by the four per-artifact analysis stages. */
export const stageFindingsSchema = z.object({
  summary: z.string(),
  bugs: bugList,
  recommendations: stringList,
});

export type RequirementsPayload = z.infer<typeof requirementsPayloadSchema>;
export type CodePayload = z.infer<typeof codePayloadSchema>;
export type TestPayload = z.infer<typeof testPayloadSchema>;
export type DocumentationPayload = z.infer<typeof documentationPayloadSchema>;
export type SecurityPayload = z.infer<typeof securityPayloadSchema>;
export type BugAnalysisPayload = z.infer<typeof bugAnalysisPayloadSchema>;
export type ReportPayload = z.infer<typeof reportPayloadSchema>;
export type StageFindings = z.infer<typeof stageFindingsSchema>;

// --- Inbound ---

export const analysisRequestSchema = z.object({
  requirements: z.string(),
  code: z.string(),
  test_cases: z.string(),
  documentation: z.string().optional().default(''),
  analyze_security: z.boolean().optional(),
});

export const analysisBundleSchema = z.object({
  requirements: z.string(),
  code: z.string(),
  tests: z.string(),
  documentation: z.string(),
  flags: z.object({
    analyzeSecurity: z.boolean(),
  }),
});

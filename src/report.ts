import type { z } from 'zod';
import {
  bugAnalysisPayloadSchema,
  codePayloadSchema,
  documentationPayloadSchema,
  reportPayloadSchema,
  requirementsPayloadSchema,
  securityPayloadSchema,
  stageFindingsSchema,
  testPayloadSchema,
  type StageFindings,
} from './schemas.js';
import { STAGE_LABELS } from './stages.js';
import type {
  AggregateReport,
  Bug,
  Recommendation,
  ReportStatus,
  SecurityFinding,
  StageDiagnostic,
  StageName,
  StageResult,
} from './types.js';

export const ANALYSIS_INCOMPLETE_NARRATIVE =
  'Analysis could not be completed: no analysis stage produced usable output.';

export const STRUCTURED_ANALYSIS_INCOMPLETE =
  'Analysis could not be completed: no analysis stage returned structured output.';

const FINDING_STAGES: ReadonlyArray<readonly [StageName, z.ZodType<StageFindings, z.ZodTypeDef, unknown>]> = [
  ['requirements', requirementsPayloadSchema],
  ['code', codePayloadSchema],
  ['tests', testPayloadSchema],
  ['documentation', documentationPayloadSchema],
];

export interface BuildReportOptions {
  securityEnabled: boolean;
}

/**
 * Typed view of a stage's structured payload. Stored payloads were produced by
 * the same schema, so re-validation returns them unchanged.
 */
export function payloadOf<T>(
  results: readonly StageResult[],
  stage: StageName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
  const record = results.find((r) => r.stage === stage);
  if (record === undefined || record.result.kind !== 'structured') return undefined;
  const parsed = schema.safeParse(record.result.payload);
  return parsed.success ? parsed.data : undefined;
}

function bugKey(bug: Bug): string {
  return `${bug.description.trim().toLowerCase()}|${bug.location.trim().toLowerCase()}`;
}

function dedupeBugs(bugs: Bug[]): Bug[] {
  const seen = new Set<string>();
  return bugs.filter((bug) => {
    const key = bugKey(bug);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function collectBugs(results: readonly StageResult[], warnings: string[]): Bug[] {
  const synthesis = payloadOf(results, 'bugs', bugAnalysisPayloadSchema);
  if (synthesis) {
    if (synthesis.bug_count !== synthesis.bugs.length) {
      warnings.push(
        `Bug synthesis reported bug_count=${synthesis.bug_count} but listed ${synthesis.bugs.length}; the listed bugs are used`,
      );
    }
    return dedupeBugs(synthesis.bugs);
  }

  // Only stages that returned structured data contribute; nothing is inferred
  // from prose or from failed stages.
  const bugs: Bug[] = [];
  for (const [stage, schema] of FINDING_STAGES) {
    const findings = payloadOf(results, stage, schema);
    if (findings) bugs.push(...findings.bugs);
  }
  if (results.some((r) => r.stage === 'bugs')) {
    warnings.push('Bug synthesis unavailable; bugs were collected from the individual analyses');
  }
  return dedupeBugs(bugs);
}

function collectRecommendations(results: readonly StageResult[]): Recommendation[] {
  const report = payloadOf(results, 'report', reportPayloadSchema);
  if (report) {
    const rank = (rec: Recommendation) => rec.priority_level ?? Number.MAX_SAFE_INTEGER;
    return report.recommendations
      .map((rec) => ({ ...rec, source: 'report' as const }))
      .sort((a, b) => rank(a) - rank(b));
  }

  const seen = new Set<string>();
  const recommendations: Recommendation[] = [];
  const push = (text: string, source: StageName) => {
    const key = text.trim().toLowerCase();
    if (key === '' || seen.has(key)) return;
    seen.add(key);
    recommendations.push({ text: text.trim(), source });
  };

  for (const [stage, schema] of FINDING_STAGES) {
    payloadOf(results, stage, schema)?.recommendations.forEach((text) => push(text, stage));
  }
  payloadOf(results, 'security', securityPayloadSchema)?.recommendations.forEach((text) =>
    push(text, 'security'),
  );
  return recommendations;
}

function bugsExplanation(results: readonly StageResult[]): string {
  const synthesis = payloadOf(results, 'bugs', bugAnalysisPayloadSchema);
  if (synthesis) return synthesis.summary.trim();
  const record = results.find((r) => r.stage === 'bugs');
  return record !== undefined && record.result.kind === 'text' ? record.result.text.trim() : '';
}

function collectSecurityFindings(results: readonly StageResult[]): SecurityFinding[] {
  return payloadOf(results, 'security', securityPayloadSchema)?.vulnerabilities ?? [];
}

function summaryOf(record: StageResult): string {
  switch (record.result.kind) {
    case 'structured': {
      const findings = stageFindingsSchema.safeParse(record.result.payload);
      if (findings.success && findings.data.summary.trim() !== '') return findings.data.summary.trim();
      return 'structured result available';
    }
    case 'text': {
      const text = record.result.text.trim();
      return text.length > 300 ? `${text.slice(0, 300)}...` : text;
    }
    case 'failure':
      return `unavailable (${record.result.reason})`;
  }
}

function composeNarrative(results: readonly StageResult[], bugCount: number): string {
  const lines = [
    'The final report could not be synthesised; the individual analyses are summarised below.',
    '',
    ...results
      .filter((record) => record.stage !== 'report')
      .map((record) => `- ${STAGE_LABELS[record.stage]}: ${summaryOf(record)}`),
    '',
    `Bugs identified: ${bugCount}.`,
  ];
  return lines.join('\n');
}

function reportStatus(results: readonly StageResult[]): ReportStatus {
  if (results.length > 0 && results.every((r) => r.status === 'succeeded')) return 'complete';
  if (results.every((r) => r.status === 'failed')) return 'failed';
  return 'partial';
}

export function toDiagnostic(record: StageResult): StageDiagnostic {
  const diagnostic: StageDiagnostic = {
    stage: record.stage,
    status: record.status,
    path: record.result.kind,
    elapsed_ms: Math.round(record.elapsedMs),
    attempts: record.attempts,
  };
  if (record.result.kind === 'failure') diagnostic.error = record.result.reason;
  if (record.errorCode !== undefined) diagnostic.error_code = record.errorCode;
  return diagnostic;
}

/**
 * Merge the recorded stage results into the final report. Every recorded stage
 * appears in the diagnostics, whatever its outcome.
 */
export function buildReport(results: readonly StageResult[], options: BuildReportOptions): AggregateReport {
  const warnings: string[] = [];
  const status = reportStatus(results);
  const diagnostics = { stages: results.map(toDiagnostic), warnings };

  if (status === 'failed') {
    return {
      status,
      final_report: ANALYSIS_INCOMPLETE_NARRATIVE,
      bug_count: 0,
      bugs: [],
      bugs_explanation: '',
      recommendations: [],
      ...(options.securityEnabled ? { security_findings: [] } : {}),
      diagnostics,
    };
  }

  const bugs = collectBugs(results, warnings);
  const recommendations = collectRecommendations(results);

  let finalReport: string;
  const reportRecord = results.find((r) => r.stage === 'report');
  const synthesized = payloadOf(results, 'report', reportPayloadSchema);
  if (synthesized) {
    finalReport = synthesized.final_report;
  } else if (reportRecord !== undefined && reportRecord.result.kind === 'text') {
    finalReport = reportRecord.result.text;
  } else {
    finalReport = composeNarrative(results, bugs.length);
  }

  // Prose alone never counts as a completed analysis.
  if (!results.some((r) => r.status === 'succeeded')) {
    warnings.push('No stage returned structured output; the report is built from free text only');
    finalReport = `${STRUCTURED_ANALYSIS_INCOMPLETE}\n\n${finalReport}`;
  }

  return {
    status,
    final_report: finalReport,
    bug_count: bugs.length,
    bugs,
    bugs_explanation: bugsExplanation(results),
    recommendations,
    ...(options.securityEnabled ? { security_findings: collectSecurityFindings(results) } : {}),
    diagnostics,
  };
}

const SEVERITY_ORDER: Record<Bug['severity'], number> = { critical: 0, high: 1, medium: 2, low: 3 };

export function formatReport(report: AggregateReport): string {
  const lines: string[] = [];

  lines.push('# Analysis Report');
  lines.push('');
  lines.push(`**Status:** ${report.status}`);
  lines.push(`**Bugs found:** ${report.bug_count}`);

  lines.push('');
  lines.push('## Summary');
  lines.push(report.final_report);

  lines.push('');
  lines.push('## Bugs');
  if (report.bugs_explanation) {
    lines.push(report.bugs_explanation);
    lines.push('');
  }
  if (report.bugs.length === 0) {
    lines.push('No bugs identified.');
  } else {
    const sorted = [...report.bugs].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
    sorted.forEach((bug, i) => {
      lines.push(`${i + 1}. **[${bug.severity}]** ${bug.description}`);
      if (bug.location) lines.push(`   - Location: ${bug.location}`);
      if (bug.cause) lines.push(`   - Cause: ${bug.cause}`);
      if (bug.impact) lines.push(`   - Impact: ${bug.impact}`);
      if (bug.remediation) lines.push(`   - Fix: ${bug.remediation}`);
    });
  }

  if (report.security_findings !== undefined) {
    lines.push('');
    lines.push('## Security');
    if (report.security_findings.length === 0) {
      lines.push('No security findings.');
    } else {
      for (const finding of report.security_findings) {
        const cwe = finding.cwe_id ? ` (${finding.cwe_id})` : '';
        lines.push(`- **[${finding.severity}] ${finding.type}${cwe}:** ${finding.description}`);
        if (finding.mitigation) lines.push(`  - Mitigation: ${finding.mitigation}`);
      }
    }
  }

  lines.push('');
  lines.push('## Recommendations');
  if (report.recommendations.length === 0) {
    lines.push('No recommendations.');
  } else {
    for (const rec of report.recommendations) {
      const priority = rec.priority ? `[${rec.priority}] ` : '';
      const category = rec.category ? ` (${rec.category})` : '';
      lines.push(`- ${priority}${rec.text}${category}`);
      if (rec.affected_requirements?.length) {
        lines.push(`  - Requirements: ${rec.affected_requirements.join('; ')}`);
      }
      if (rec.affected_code?.length) lines.push(`  - Code: ${rec.affected_code.join('; ')}`);
    }
  }

  lines.push('');
  lines.push('## Stages');
  for (const stage of report.diagnostics.stages) {
    const detail = stage.error ? ` (${stage.error})` : '';
    lines.push(`- ${stage.stage}: ${stage.status}, ${stage.attempts} attempt(s), ${stage.elapsed_ms}ms${detail}`);
  }
  for (const warning of report.diagnostics.warnings) {
    lines.push(`- warning: ${warning}`);
  }

  return lines.join('\n');
}

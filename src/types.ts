// --- Gateway wire protocol ---

export type MessageRole = 'system' | 'user' | 'assistant' | 'function';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface JsonSchema {
  type: 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean';
  description?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  enum?: string[];
}

export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: JsonSchema;
}

/** "auto" lets the model choose, "none" forbids calls, a name forces one. */
export type FunctionCallMode = 'auto' | 'none' | { name: string };

export interface SamplingParameters {
  temperature: number;
  max_tokens: number;
}

export interface RequestEnvelope {
  readonly messages: readonly ChatMessage[];
  readonly model: string;
  readonly sampling: Readonly<SamplingParameters>;
  readonly functions?: readonly FunctionDefinition[];
  readonly function_call?: FunctionCallMode;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  functions?: FunctionDefinition[];
  function_call?: FunctionCallMode;
}

export type FinishReason = 'stop' | 'function_call' | 'length' | 'error';

export interface FunctionCall {
  name: string;
  arguments: string;
}

export interface CompletionChoice {
  index: number;
  finish_reason: FinishReason;
  message: {
    role: string;
    content?: string;
    function_call?: FunctionCall;
  };
}

export interface RawResponse {
  readonly choices: readonly CompletionChoice[];
  readonly model?: string;
}

export interface TokenResponse {
  access_token: string;
  expires_at: number;
}

// --- Extraction ---

export interface StructuredPayload<T> {
  kind: 'structured';
  name: string;
  payload: T;
}

export interface TextFallback {
  kind: 'text';
  text: string;
}

export interface ExtractionFailure {
  kind: 'failure';
  reason: string;
  /** Argument string as received, kept when it failed to parse or validate. */
  rawArguments?: string;
}

export type ExtractedResult<T = unknown> = StructuredPayload<T> | TextFallback | ExtractionFailure;

// --- Analysis domain ---

export type StageName =
  | 'requirements'
  | 'code'
  | 'tests'
  | 'documentation'
  | 'security'
  | 'bugs'
  | 'report';

export type StageStatus = 'succeeded' | 'degraded' | 'failed';

export interface StageResult<T = unknown> {
  stage: StageName;
  status: StageStatus;
  result: ExtractedResult<T>;
  elapsedMs: number;
  attempts: number;
  /** Error code of the thrown error when the stage failed before extraction. */
  errorCode?: string;
}

export interface AnalysisFlags {
  analyzeSecurity: boolean;
}

export interface AnalysisBundle {
  readonly requirements: string;
  readonly code: string;
  readonly tests: string;
  readonly documentation: string;
  readonly flags: Readonly<AnalysisFlags>;
}

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export interface Bug {
  description: string;
  cause: string;
  severity: Severity;
  location: string;
  impact: string;
  remediation: string;
}

export interface Recommendation {
  text: string;
  priority?: 'high' | 'medium' | 'low';
  priority_level?: number;
  category?: string;
  affected_requirements?: string[];
  affected_code?: string[];
  source?: StageName;
}

export interface SecurityFinding {
  type: string;
  severity: Severity;
  description: string;
  location?: string;
  code_snippet?: string;
  mitigation?: string;
  cwe_id?: string;
}

export interface StageDiagnostic {
  stage: StageName;
  status: StageStatus;
  path: ExtractedResult['kind'];
  elapsed_ms: number;
  attempts: number;
  error?: string;
  error_code?: string;
}

export type ReportStatus = 'complete' | 'partial' | 'failed';

export interface AggregateReport {
  status: ReportStatus;
  final_report: string;
  bug_count: number;
  bugs: Bug[];
  /** Bug-synthesis explanation of the defects; empty when that stage gave none. */
  bugs_explanation: string;
  recommendations: Recommendation[];
  security_findings?: SecurityFinding[];
  diagnostics: {
    stages: StageDiagnostic[];
    warnings: string[];
  };
}

// --- Inbound request surface ---

export interface AnalysisRequest {
  requirements: string;
  code: string;
  test_cases: string;
  documentation?: string;
  analyze_security?: boolean;
}

export { loadConfig, parseConfig, type AuditConfig, type GatewayConfig } from './config.js';
export { CredentialManager, type CredentialManagerOptions, type CredentialSnapshot } from './credentials.js';
export {
  ResilientTransport,
  redactSecret,
  sleep,
  type CredentialSource,
  type ExecuteOptions,
  type ResilientTransportOptions,
  type TransportRequest,
  type TransportResponse,
} from './transport.js';
export {
  GatewayClient,
  buildChatRequest,
  buildEnvelope,
  parseRawResponse,
  type CompletionGateway,
  type GatewayClientOptions,
} from './client.js';
export { extract, stageStatusOf } from './extractor.js';
export { ANALYSIS_STAGES, STAGE_LABELS, renderStageContext, type StageDescriptor } from './stages.js';
export {
  AnalysisOrchestrator,
  createAnalysisRuntime,
  parseAnalysisRequest,
  runAnalysis,
  validateBundle,
  type AnalysisRuntime,
  type OrchestratorOptions,
  type RunOptions,
} from './pipeline.js';
export {
  buildReport,
  formatReport,
  payloadOf,
  ANALYSIS_INCOMPLETE_NARRATIVE,
  STRUCTURED_ANALYSIS_INCOMPLETE,
} from './report.js';
export * from './errors.js';
export * from './types.js';

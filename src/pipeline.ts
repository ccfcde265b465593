import { buildEnvelope, DEFAULT_SAMPLING, GatewayClient, type CompletionGateway } from './client.js';
import type { AuditConfig } from './config.js';
import { CredentialManager } from './credentials.js';
import { CancelledError, ValidationError, attemptsOf, isCodeAuditError, toErrorMessage } from './errors.js';
import { extract, stageStatusOf } from './extractor.js';
import { createLogger, type Logger } from './logger.js';
import { buildReport } from './report.js';
import { analysisBundleSchema, analysisRequestSchema } from './schemas.js';
import { ANALYSIS_STAGES, type StageDescriptor } from './stages.js';
import { ResilientTransport, redactSecret, type SleepFn } from './transport.js';
import type { AggregateReport, AnalysisBundle, SamplingParameters, StageResult } from './types.js';

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function assertHasContent(bundle: AnalysisBundle): void {
  const fields = [bundle.requirements, bundle.code, bundle.tests, bundle.documentation];
  if (fields.every((field) => field.trim() === '')) {
    throw new ValidationError('Nothing to analyze: requirements, code, tests and documentation are all empty');
  }
}

/** Validate a bundle handed to the orchestrator and freeze it for the run. */
export function validateBundle(input: unknown): AnalysisBundle {
  const parsed = analysisBundleSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new ValidationError(`Malformed analysis bundle: ${issues.join('; ')}`, issues);
  }
  const bundle: AnalysisBundle = Object.freeze({
    ...parsed.data,
    flags: Object.freeze({ ...parsed.data.flags }),
  });
  assertHasContent(bundle);
  return bundle;
}

/**
 * Map the inbound request shape (`test_cases`, `analyze_security`) to a bundle.
 */
export function parseAnalysisRequest(body: unknown, defaults: { analyzeSecurity: boolean } = { analyzeSecurity: true }): AnalysisBundle {
  const parsed = analysisRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new ValidationError(`Malformed analysis request: ${issues.join('; ')}`, issues);
  }
  return validateBundle({
    requirements: parsed.data.requirements,
    code: parsed.data.code,
    tests: parsed.data.test_cases,
    documentation: parsed.data.documentation,
    flags: { analyzeSecurity: parsed.data.analyze_security ?? defaults.analyzeSecurity },
  });
}

export interface OrchestratorOptions {
  model: string;
  sampling?: SamplingParameters;
  stages?: readonly StageDescriptor[];
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Runs the analysis stages in order against one bundle and merges their
 * results. A failing stage is recorded and the run continues; only a malformed
 * bundle or cancellation rejects.
 */
export class AnalysisOrchestrator {
  private readonly gateway: CompletionGateway;
  private readonly model: string;
  private readonly sampling: SamplingParameters;
  private readonly stages: readonly StageDescriptor[];
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(gateway: CompletionGateway, options: OrchestratorOptions) {
    this.gateway = gateway;
    this.model = options.model;
    this.sampling = options.sampling ?? DEFAULT_SAMPLING;
    this.stages = options.stages ?? ANALYSIS_STAGES;
    this.now = options.now ?? (() => performance.now());
    this.logger = createLogger('orchestrator');
  }

  async run(input: AnalysisBundle, options: RunOptions = {}): Promise<AggregateReport> {
    const bundle = validateBundle(input);
    const { signal } = options;
    const results: StageResult[] = [];
    const started = this.now();

    for (const stage of this.stages) {
      if (stage.enabled && !stage.enabled(bundle)) {
        this.logger.debug({ stage: stage.name }, 'Stage disabled for this run');
        continue;
      }
      if (signal?.aborted) {
        this.logger.warn({ stage: stage.name, completed: results.length }, 'Run cancelled; skipping remaining stages');
        throw new CancelledError('Analysis run was cancelled');
      }
      results.push(await this.runStage(stage, bundle, results, signal));
    }

    const report = buildReport(results, { securityEnabled: bundle.flags.analyzeSecurity });
    this.logger.info(
      {
        status: report.status,
        bugCount: report.bug_count,
        degraded: results.filter((r) => r.status === 'degraded').map((r) => r.stage),
        failed: results.filter((r) => r.status === 'failed').map((r) => r.stage),
        durationMs: Math.round(this.now() - started),
      },
      'Analysis run finished',
    );
    return report;
  }

  private async runStage(
    stage: StageDescriptor,
    bundle: AnalysisBundle,
    prior: readonly StageResult[],
    signal: AbortSignal | undefined,
  ): Promise<StageResult> {
    const started = this.now();
    let attempts = 0;
    const envelope = buildEnvelope(
      [
        { role: 'system', content: stage.systemPrompt },
        { role: 'user', content: stage.buildInput(bundle, prior) },
      ],
      this.model,
      this.sampling,
    );

    this.logger.info({ stage: stage.name }, 'Stage started');

    try {
      const response = await this.gateway.completeStructured(envelope, [stage.definition], 'auto', {
        signal,
        onAttempt: (attempt) => {
          attempts = attempt;
        },
      });
      const result = extract(response, stage.definition.name, stage.schema);
      const status = stageStatusOf(result);
      const elapsedMs = this.now() - started;

      if (result.kind === 'failure') {
        this.logger.warn(
          { stage: stage.name, reason: result.reason, rawArguments: result.rawArguments },
          'Stage response could not be extracted',
        );
      } else if (result.kind === 'text') {
        this.logger.warn({ stage: stage.name }, 'Model answered in free text; stage degraded');
      } else {
        this.logger.info({ stage: stage.name, elapsedMs: Math.round(elapsedMs), attempts }, 'Stage succeeded');
      }
      return { stage: stage.name, status, result, elapsedMs, attempts };
    } catch (err: unknown) {
      if (err instanceof CancelledError || signal?.aborted) {
        throw err instanceof CancelledError ? err : new CancelledError('Analysis run was cancelled');
      }
      const reason = toErrorMessage(err);
      this.logger.error({ stage: stage.name, err: reason }, 'Stage failed');
      const record: StageResult = {
        stage: stage.name,
        status: 'failed',
        result: { kind: 'failure', reason },
        elapsedMs: this.now() - started,
        attempts: attemptsOf(err) ?? attempts,
      };
      if (isCodeAuditError(err)) record.errorCode = err.code;
      return record;
    }
  }
}

export interface RuntimeDeps {
  fetchFn?: typeof globalThis.fetch;
  sleepFn?: SleepFn;
  random?: () => number;
  now?: () => number;
}

/** Process-wide collaborators shared by every analysis run. */
export interface AnalysisRuntime {
  transport: ResilientTransport;
  credentials: CredentialManager;
  client: GatewayClient;
  orchestrator: AnalysisOrchestrator;
  defaults: { analyzeSecurity: boolean };
}

export function createAnalysisRuntime(config: AuditConfig, deps: RuntimeDeps = {}): AnalysisRuntime {
  const { gateway } = config;
  const transport = new ResilientTransport({
    maxRetries: gateway.maxRetries,
    retryDelayMs: gateway.retryDelayMs,
    timeoutMs: gateway.timeoutMs,
    fetchFn: deps.fetchFn,
    sleepFn: deps.sleepFn,
    random: deps.random,
    redact: (text) => redactSecret(text, gateway.apiKey),
  });
  const credentials = new CredentialManager({
    secret: gateway.apiKey,
    authUrl: gateway.authUrl,
    scope: gateway.scope,
    transport,
    marginMs: gateway.tokenMarginMs,
    now: deps.now,
  });
  const client = new GatewayClient({ apiBase: gateway.apiBase, credentials, transport });
  const orchestrator = new AnalysisOrchestrator(client, {
    model: gateway.model,
    sampling: { temperature: gateway.temperature, max_tokens: gateway.maxTokens },
  });
  return {
    transport,
    credentials,
    client,
    orchestrator,
    defaults: { analyzeSecurity: config.analysis.analyzeSecurity },
  };
}

/**
 * Run the full analysis pipeline and return the aggregate report.
 */
export async function runAnalysis(
  bundle: AnalysisBundle,
  runtime: AnalysisRuntime,
  options: RunOptions = {},
): Promise<AggregateReport> {
  return runtime.orchestrator.run(bundle, options);
}

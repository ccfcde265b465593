import { GatewayError } from './errors.js';
import { rawResponseSchema } from './schemas.js';
import type { CredentialSource, ExecuteOptions, ResilientTransport } from './transport.js';
import type {
  ChatCompletionRequest,
  ChatMessage,
  FunctionCallMode,
  FunctionDefinition,
  RawResponse,
  RequestEnvelope,
  SamplingParameters,
} from './types.js';

export const DEFAULT_SAMPLING: SamplingParameters = {
  temperature: 0.7,
  max_tokens: 4096,
};

export function buildEnvelope(
  messages: readonly ChatMessage[],
  model: string,
  sampling: SamplingParameters = DEFAULT_SAMPLING,
): RequestEnvelope {
  return Object.freeze({
    messages: Object.freeze([...messages]),
    model,
    sampling: Object.freeze({ ...sampling }),
  });
}

export function buildChatRequest(envelope: RequestEnvelope): ChatCompletionRequest {
  const request: ChatCompletionRequest = {
    model: envelope.model,
    messages: [...envelope.messages],
    temperature: envelope.sampling.temperature,
    max_tokens: envelope.sampling.max_tokens,
  };
  if (envelope.functions && envelope.functions.length > 0) {
    request.functions = [...envelope.functions];
    request.function_call = envelope.function_call ?? 'auto';
  }
  return request;
}

export function parseRawResponse(data: unknown, status: number, attempts: number): RawResponse {
  const parsed = rawResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new GatewayError(status, issues, attempts, 'unrecognized completion body');
  }
  return parsed.data;
}

/** What the orchestrator needs from a gateway; GatewayClient is the production implementation. */
export interface CompletionGateway {
  complete(envelope: RequestEnvelope, options?: ExecuteOptions): Promise<RawResponse>;
  completeStructured(
    envelope: RequestEnvelope,
    schemas: readonly FunctionDefinition[],
    mode?: FunctionCallMode,
    options?: ExecuteOptions,
  ): Promise<RawResponse>;
}

export interface GatewayClientOptions {
  apiBase: string;
  credentials: CredentialSource;
  transport: ResilientTransport;
}

export class GatewayClient implements CompletionGateway {
  private readonly completionsUrl: string;
  private readonly credentials: CredentialSource;
  private readonly transport: ResilientTransport;

  constructor(options: GatewayClientOptions) {
    this.completionsUrl = `${options.apiBase.replace(/\/+$/, '')}/chat/completions`;
    this.credentials = options.credentials;
    this.transport = options.transport;
  }

  /** Free-form chat completion. Any schema set on the envelope is ignored. */
  async complete(envelope: RequestEnvelope, options?: ExecuteOptions): Promise<RawResponse> {
    const { functions: _functions, function_call: _mode, ...plain } = envelope;
    return this.send(buildChatRequest(plain), options);
  }

  /**
   * Completion that offers `schemas` to the model as callable functions.
   * The model may still answer in free text; callers must handle both shapes.
   */
  async completeStructured(
    envelope: RequestEnvelope,
    schemas: readonly FunctionDefinition[],
    mode: FunctionCallMode = 'auto',
    options?: ExecuteOptions,
  ): Promise<RawResponse> {
    return this.send(buildChatRequest({ ...envelope, functions: schemas, function_call: mode }), options);
  }

  private async send(body: ChatCompletionRequest, options?: ExecuteOptions): Promise<RawResponse> {
    const response = await this.transport.execute(
      {
        url: this.completionsUrl,
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
        credential: this.credentials,
        label: 'chat/completions',
      },
      options,
    );
    return parseRawResponse(response.data, response.status, response.attempts);
  }
}

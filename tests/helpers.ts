import type { CompletionGateway } from '../src/client.js';
import type { ExecuteOptions } from '../src/transport.js';
import type { FunctionCallMode, FunctionDefinition, RawResponse, RequestEnvelope } from '../src/types.js';

export const noSleep = async () => {};

export const API_BASE = 'https://gateway.test/api/v1';
export const AUTH_URL = 'https://auth.test/api/v2/oauth';
export const COMPLETIONS_URL = `${API_BASE}/chat/completions`;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

export function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

export function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = init?.headers;
  if (headers === undefined || headers instanceof Headers || Array.isArray(headers)) return undefined;
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}

export function jsonBodyOf(init: RequestInit | undefined): Record<string, unknown> {
  if (typeof init?.body !== 'string') throw new Error('expected a string body');
  const parsed: unknown = JSON.parse(init.body);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('expected a JSON object body');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Name of the first function offered in a chat-completion request body. */
export function functionNameOf(init: RequestInit | undefined): string | undefined {
  const functions = jsonBodyOf(init).functions;
  if (!Array.isArray(functions)) return undefined;
  const first: unknown = functions[0];
  if (typeof first === 'object' && first !== null && 'name' in first && typeof first.name === 'string') {
    return first.name;
  }
  return undefined;
}

export function functionCallCompletion(name: string, args: unknown, content?: string) {
  return {
    choices: [
      {
        index: 0,
        finish_reason: 'function_call',
        message: {
          role: 'assistant',
          content: content ?? '',
          function_call: { name, arguments: JSON.stringify(args) },
        },
      },
    ],
  };
}

export function textCompletion(content: string) {
  return {
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

export function functionCallResponse(name: string, args: unknown, content?: string): RawResponse {
  return {
    choices: [
      {
        index: 0,
        finish_reason: 'function_call',
        message: {
          role: 'assistant',
          content,
          function_call: { name, arguments: JSON.stringify(args) },
        },
      },
    ],
  };
}

export function textRawResponse(content: string): RawResponse {
  return {
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

export const ZERO_BUG_PAYLOADS: Record<string, unknown> = {
  requirements_analysis: {
    summary: 'A single requirement: authentication is required.',
    functional_requirements: ['Users must authenticate'],
    issues: [],
    bugs: [],
    recommendations: ['State the lockout policy'],
  },
  code_analysis: {
    summary: 'login compares the supplied credentials against fixed values.',
    quality_rating: 5,
    bugs: [],
    recommendations: ['Move credentials out of the source'],
  },
  test_analysis: {
    summary: 'One positive test case.',
    coverage_percentage: 50,
    testing_gaps: ['No rejected-login case'],
    bugs: [],
    recommendations: ['Add a rejected-login test'],
  },
  documentation_analysis: {
    summary: 'No documentation was provided.',
    completeness: 0,
    gaps: ['Usage is undocumented'],
    bugs: [],
    recommendations: [],
  },
  security_analysis: {
    vulnerabilities: [],
    overall_security_score: 6,
    recommendations: [],
  },
  bug_analysis: {
    bug_count: 0,
    bugs: [],
    summary: 'The code satisfies the requirement.',
  },
  report_synthesis: {
    final_report: 'The login function meets the stated authentication requirement.',
    recommendations: [{ text: 'Add a rejected-login test', priority: 'High', category: 'Quality' }],
  },
};

export interface RecordedCall {
  envelope: RequestEnvelope;
  schemas: readonly FunctionDefinition[];
  mode: FunctionCallMode;
}

type Responder = (functionName: string, envelope: RequestEnvelope) => RawResponse | Promise<RawResponse>;

/** In-process gateway: answers per offered function name, records every call. */
export class FakeGateway implements CompletionGateway {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(): Promise<RawResponse> {
    throw new Error('complete() is not used by the orchestrator');
  }

  async completeStructured(
    envelope: RequestEnvelope,
    schemas: readonly FunctionDefinition[],
    mode: FunctionCallMode = 'auto',
    options?: ExecuteOptions,
  ): Promise<RawResponse> {
    this.calls.push({ envelope, schemas, mode });
    options?.onAttempt?.(1);
    const [schema] = schemas;
    if (schema === undefined) throw new Error('no schema offered');
    return this.respond(schema.name, envelope);
  }

  functionNames(): string[] {
    return this.calls.map((call) => call.schemas[0]?.name ?? '');
  }

  userMessageFor(functionName: string): string {
    const call = this.calls.find((c) => c.schemas[0]?.name === functionName);
    return call?.envelope.messages.find((m) => m.role === 'user')?.content ?? '';
  }
}

/** Responder that answers every stage with its zero-bug payload. */
export function zeroBugResponder(functionName: string): RawResponse {
  return functionCallResponse(functionName, ZERO_BUG_PAYLOADS[functionName]);
}

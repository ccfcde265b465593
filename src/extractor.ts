import type { z } from 'zod';
import { toErrorMessage } from './errors.js';
import type { ExtractedResult, ExtractionFailure, RawResponse, StageStatus } from './types.js';

function failure(reason: string, rawArguments?: string): ExtractionFailure {
  return rawArguments === undefined ? { kind: 'failure', reason } : { kind: 'failure', reason, rawArguments };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Normalise a completion into structured data, a text fallback, or a failure.
 *
 * 1. No choices: failure ("empty response").
 * 2. First choice finished with a call to `expectedSchemaName`: parse its
 *    arguments (and validate them when a schema is given). Bad arguments are a
 *    failure that keeps the raw argument string.
 * 3. Otherwise any non-blank text is returned as a text fallback.
 * 4. Otherwise: failure ("unrecognized response shape").
 *
 * A choice carrying both a matching call and text yields the structured payload.
 */
export function extract(response: RawResponse, expectedSchemaName: string): ExtractedResult<unknown>;
export function extract<T>(
  response: RawResponse,
  expectedSchemaName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ExtractedResult<T>;
export function extract<T>(
  response: RawResponse,
  expectedSchemaName: string,
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>,
): ExtractedResult<T | unknown> {
  const [choice] = response.choices;
  if (choice === undefined) {
    return failure('empty response');
  }

  const call = choice.message.function_call;
  if (choice.finish_reason === 'function_call' && call !== undefined && call.name === expectedSchemaName) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(call.arguments);
    } catch (err: unknown) {
      return failure(`arguments of ${call.name} are not valid JSON: ${toErrorMessage(err)}`, call.arguments);
    }

    if (schema === undefined) {
      return { kind: 'structured', name: call.name, payload: parsed };
    }
    const validated = schema.safeParse(parsed);
    if (!validated.success) {
      return failure(`arguments of ${call.name} do not match its schema: ${describeIssues(validated.error)}`, call.arguments);
    }
    return { kind: 'structured', name: call.name, payload: validated.data };
  }

  const text = choice.message.content;
  if (text !== undefined && text.trim() !== '') {
    return { kind: 'text', text };
  }

  return failure('unrecognized response shape');
}

export function stageStatusOf(result: ExtractedResult<unknown>): StageStatus {
  switch (result.kind) {
    case 'structured':
      return 'succeeded';
    case 'text':
      return 'degraded';
    case 'failure':
      return 'failed';
    default: {
      const unreachable: never = result;
      return unreachable;
    }
  }
}

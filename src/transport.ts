import { CancelledError, GatewayError, TransportError, toErrorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const MAX_JITTER_MS = 500;
export const BODY_EXCERPT_LIMIT = 500;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal` aborts.
 * The underlying promise keeps running; only this caller stops waiting.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CancelledError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export function redactSecret(text: string, secret: string): string {
  if (!secret) return text;
  const escaped = secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return text.replace(new RegExp(escaped, 'g'), '[REDACTED]');
}

function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LIMIT ? `${body.slice(0, BODY_EXCERPT_LIMIT)}...` : body;
}

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429 || status === 408;
}

function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const cause: unknown = err.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    if (NETWORK_ERROR_CODES.has(cause.code) || cause.code.startsWith('UND_ERR')) return true;
  }
  const msg = err.message.toLowerCase();
  return (
    msg.includes('fetch failed') ||
    msg.includes('network') ||
    msg.includes('econnrefused') ||
    msg.includes('econnreset') ||
    msg.includes('etimedout') ||
    msg.includes('socket')
  );
}

/** Bearer credential consulted on every attempt of an authenticated request. */
export interface CredentialSource {
  token(signal?: AbortSignal): Promise<string>;
  /** Discard `token` (or, without one, whatever is cached) after the gateway rejected it. */
  invalidate(token?: string): void;
}

export interface TransportRequest {
  url: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  /** When set, 401/403 answers invalidate it and are retried. */
  credential?: CredentialSource;
  /** Short name for logs and error messages. */
  label?: string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
}

export interface TransportResponse {
  status: number;
  data: unknown;
  attempts: number;
}

export interface ResilientTransportOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  fetchFn?: typeof globalThis.fetch;
  sleepFn?: SleepFn;
  random?: () => number;
  /** Applied to every body excerpt and error message that leaves the transport. */
  redact?: (text: string) => string;
}

type TransientReason = 'network' | 'timeout' | 'auth' | 'status';

type AttemptOutcome =
  | { kind: 'success'; status: number; data: unknown }
  | { kind: 'transient'; reason: TransientReason; cause: Error; sentToken?: string }
  | { kind: 'fatal'; error: unknown };

/**
 * Executes HTTP requests with bounded retries and exponential backoff.
 *
 * Each attempt is classified into an outcome; only the terminal outcome of a
 * call throws. No retry budget is shared between calls.
 */
export class ResilientTransport {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number;
  private fetchFn: typeof globalThis.fetch;
  private sleepFn: SleepFn;
  private random: () => number;
  private redact: (text: string) => string;
  private logger: Logger;

  constructor(options: ResilientTransportOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.sleepFn = options.sleepFn ?? sleep;
    this.random = options.random ?? Math.random;
    this.redact = options.redact ?? ((text) => text);
    this.logger = createLogger('transport');

    if (this.maxRetries < 1) {
      throw new RangeError(`maxRetries must be at least 1, got ${this.maxRetries}`);
    }
  }

  /** Delay after the k-th failed attempt (k >= 1): d * 2^(k-1) plus up to 500ms of jitter. */
  backoffDelay(attempt: number): number {
    return this.retryDelayMs * Math.pow(2, attempt - 1) + this.random() * MAX_JITTER_MS;
  }

  async execute(request: TransportRequest, options: ExecuteOptions = {}): Promise<TransportResponse> {
    const { signal } = options;
    const label = request.label ?? request.url;
    let last: Extract<AttemptOutcome, { kind: 'transient' }> | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) throw new CancelledError();
      options.onAttempt?.(attempt);

      const outcome = await this.attempt(request, attempt, signal);

      switch (outcome.kind) {
        case 'success':
          return { status: outcome.status, data: outcome.data, attempts: attempt };
        case 'fatal':
          throw outcome.error;
        case 'transient': {
          last = outcome;
          if (outcome.reason === 'auth') {
            request.credential?.invalidate(outcome.sentToken);
          }
          if (attempt < this.maxRetries) {
            const delayMs = this.backoffDelay(attempt);
            this.logger.warn(
              { label, attempt, maxRetries: this.maxRetries, reason: outcome.reason, delayMs: Math.round(delayMs) },
              `Transient failure: ${outcome.cause.message}; retrying`,
            );
            await this.sleepFn(delayMs, signal);
          }
          break;
        }
      }
    }

    this.logger.error({ label, attempts: this.maxRetries, reason: last?.reason }, 'Retries exhausted');

    if (last?.reason === 'status' && last.cause instanceof GatewayError) {
      throw last.cause;
    }
    const cause = last?.cause;
    throw new TransportError(
      `Request to ${label} failed after ${this.maxRetries} attempts: ${cause ? cause.message : 'unknown error'}`,
      this.maxRetries,
      cause,
    );
  }

  private async attempt(
    request: TransportRequest,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<AttemptOutcome> {
    const headers: Record<string, string> = { ...request.headers };
    let sentToken: string | undefined;

    if (request.credential) {
      try {
        sentToken = await request.credential.token(signal);
        headers.Authorization = `Bearer ${sentToken}`;
      } catch (err: unknown) {
        return { kind: 'fatal', error: err };
      }
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      if (response.ok) {
        try {
          return { kind: 'success', status: response.status, data: JSON.parse(body) };
        } catch {
          return {
            kind: 'fatal',
            error: new GatewayError(response.status, this.redact(excerpt(body)), attempt, 'invalid JSON body'),
          };
        }
      }

      const error = new GatewayError(response.status, this.redact(excerpt(body)), attempt);
      if (isAuthStatus(response.status) && request.credential) {
        return { kind: 'transient', reason: 'auth', cause: error, sentToken };
      }
      if (isTransientStatus(response.status)) {
        return { kind: 'transient', reason: 'status', cause: error };
      }
      return { kind: 'fatal', error };
    } catch (err: unknown) {
      if (signal?.aborted) {
        return { kind: 'fatal', error: new CancelledError() };
      }
      if (controller.signal.aborted) {
        return {
          kind: 'transient',
          reason: 'timeout',
          cause: new Error(`Attempt ${attempt} timed out after ${this.timeoutMs}ms`),
        };
      }
      if (isNetworkError(err)) {
        return {
          kind: 'transient',
          reason: 'network',
          cause: new Error(this.redact(`Network error: ${toErrorMessage(err)}`), { cause: err }),
        };
      }
      return { kind: 'fatal', error: err };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

import { randomUUID } from 'node:crypto';
import { AuthError, toErrorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { tokenResponseSchema } from './schemas.js';
import { abortable, type CredentialSource, type ResilientTransport } from './transport.js';

export const DEFAULT_TOKEN_MARGIN_MS = 5 * 60_000;

/** Owned exclusively by one CredentialManager; never written by anyone else. */
interface Credential {
  readonly secret: string;
  accessToken: string | undefined;
  /** Epoch ms after which the token is no longer used (issued expiry minus margin). */
  expiresAt: number;
}

export interface CredentialSnapshot {
  hasToken: boolean;
  expiresAt: number | undefined;
  refreshing: boolean;
}

export interface CredentialManagerOptions {
  secret: string;
  authUrl: string;
  scope: string;
  transport: ResilientTransport;
  marginMs?: number;
  now?: () => number;
  requestId?: () => string;
}

/**
 * Acquires and caches the bearer token for the gateway.
 *
 * Concurrent `token()` calls while a refresh is in flight share that refresh,
 * so N callers cause one exchange.
 */
export class CredentialManager implements CredentialSource {
  private readonly credential: Credential;
  private readonly authUrl: string;
  private readonly scope: string;
  private readonly transport: ResilientTransport;
  private readonly marginMs: number;
  private readonly now: () => number;
  private readonly requestId: () => string;
  private readonly logger: Logger;
  private refreshing: Promise<string> | null = null;

  constructor(options: CredentialManagerOptions) {
    if (!options.secret) {
      throw new AuthError('A gateway secret is required');
    }
    this.credential = { secret: options.secret, accessToken: undefined, expiresAt: 0 };
    this.authUrl = options.authUrl;
    this.scope = options.scope;
    this.transport = options.transport;
    this.marginMs = Math.max(0, options.marginMs ?? DEFAULT_TOKEN_MARGIN_MS);
    this.now = options.now ?? Date.now;
    this.requestId = options.requestId ?? randomUUID;
    this.logger = createLogger('credentials');
  }

  /**
   * Resolve a usable bearer token, refreshing when absent or expired.
   * `signal` only stops this caller from waiting; a shared refresh keeps going.
   */
  async token(signal?: AbortSignal): Promise<string> {
    const { accessToken, expiresAt } = this.credential;
    if (accessToken !== undefined && this.now() < expiresAt) {
      return accessToken;
    }

    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = null;
      });
    }
    return abortable(this.refreshing, signal);
  }

  /**
   * Drop the cached token so the next `token()` performs an exchange. With
   * `token`, only that token is dropped: a rejection that arrives after a
   * refresh leaves the newer token in place.
   */
  invalidate(token?: string): void {
    const { accessToken } = this.credential;
    if (accessToken === undefined) return;
    if (token !== undefined && token !== accessToken) {
      this.logger.debug('Rejected token was already replaced');
      return;
    }
    this.logger.info('Access token invalidated');
    this.credential.accessToken = undefined;
    this.credential.expiresAt = 0;
  }

  snapshot(): CredentialSnapshot {
    return {
      hasToken: this.credential.accessToken !== undefined,
      expiresAt: this.credential.accessToken !== undefined ? this.credential.expiresAt : undefined,
      refreshing: this.refreshing !== null,
    };
  }

  private async refresh(): Promise<string> {
    let data: unknown;
    try {
      const response = await this.transport.execute({
        url: this.authUrl,
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          RqUID: this.requestId(),
          Authorization: `Basic ${this.credential.secret}`,
        },
        body: new URLSearchParams({ scope: this.scope }).toString(),
        label: 'token-exchange',
      });
      data = response.data;
    } catch (err: unknown) {
      this.logger.error({ err: toErrorMessage(err) }, 'Credential exchange failed');
      throw new AuthError(`Credential exchange failed: ${toErrorMessage(err)}`, err);
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError(
        `Credential exchange returned an unexpected body: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`,
      );
    }

    const expiresAt = parsed.data.expires_at - this.marginMs;
    this.credential.accessToken = parsed.data.access_token;
    this.credential.expiresAt = expiresAt;

    if (expiresAt <= this.now()) {
      this.logger.warn(
        { issuedExpiry: parsed.data.expires_at, marginMs: this.marginMs },
        'Issued token lifetime is shorter than the safety margin',
      );
    } else {
      this.logger.info({ expiresAt }, 'Obtained new access token');
    }
    return parsed.data.access_token;
  }
}

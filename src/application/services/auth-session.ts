import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import type { CredentialStorePort } from '../../ports/credential-store.port.js';
import type { HttpClientPort, HttpError } from '../../ports/http-client.port.js';
import type { AuthCode, AuthToken, ToastEntry, Unsubscribe } from '../../domain/types.js';
import { asAuthCode, asAuthToken } from '../../domain/types.js';
import { ToastLog } from './toast-log.js';
import { ToastFactory } from './toast-factory.js';
import { RequestGenerations } from './request-generations.js';

export const NO_CODE_FAILURE = 'no code from provider';

export interface AuthSessionState {
  readonly token: AuthToken | null;
  /** Code received from the login popup whose exchange is still in flight. */
  readonly pendingCode: AuthCode | null;
  /** Oldest first. */
  readonly failures: readonly string[];
}

export type CodeExchangeOutcome =
  | { readonly kind: 'signed_in'; readonly cached: boolean }
  | { readonly kind: 'no_code' }
  | { readonly kind: 'failed'; readonly error: HttpError }
  /** A newer code (or a sign-out) arrived first; this response was dropped. */
  | { readonly kind: 'stale' };

// The exchange service answers 200 with `{ error }` for a rejected code.
const TokenResponseSchema = z.object({
  token: z.string().min(1).optional(),
  error: z.string().optional(),
});

// Popup → opener message: `{ detail: { payload } }`, payload absent on cancel.
const LoginMessageSchema = z.object({
  detail: z.object({ payload: z.string().nullish() }),
});

function decodeToken(body: unknown): Result<AuthToken, HttpError> {
  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    return err({ code: 'HTTP_UNEXPECTED_PAYLOAD', message: 'Unexpected token payload', detail: parsed.error.message } as const);
  }
  if (parsed.data.token === undefined) {
    return err({
      code: 'HTTP_UNEXPECTED_PAYLOAD',
      message: 'No token in exchange response',
      detail: parsed.data.error ?? 'missing token',
    } as const);
  }
  return ok(asAuthToken(parsed.data.token));
}

/**
 * Owns the GitHub sign-in: one-time code → token exchange, the cached token,
 * and the failures the user should hear about.
 *
 * Only the latest exchange may change state; an older response that arrives
 * later is logged and dropped.
 */
@singleton()
export class AuthSession {
  private state: AuthSessionState = { token: null, pendingCode: null, failures: [] };
  private readonly listeners = new Set<(state: AuthSessionState) => void>();
  private readonly generations = new RequestGenerations<'code_exchange'>();
  private readonly logger: Logger;
  private readonly exchangeUrl: string;
  private readonly tokenKey: string;

  constructor(
    @inject(DI.Ports.CredentialStore) private readonly store: CredentialStorePort,
    @inject(DI.Ports.HttpClient) private readonly http: HttpClientPort,
    @inject(DI.Services.ToastLog) private readonly toastLog: ToastLog,
    @inject(DI.Services.ToastFactory) private readonly toasts: ToastFactory,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Infra.LoggerFactory) loggers: ILoggerFactory
  ) {
    this.logger = loggers.create('AuthSession');
    this.exchangeUrl = config.auth.exchangeUrl;
    this.tokenKey = config.auth.tokenStorageKey;
  }

  /** Restore a cached token. Missing or unreadable cache is silent. */
  async init(): Promise<void> {
    const cached = await this.store.get(this.tokenKey);
    if (cached.isErr()) {
      this.logger.warn({ code: cached.error.code, reason: cached.error.message }, 'Token cache unreadable; starting signed out');
      return;
    }
    // A code exchange may have finished while the cache was being read.
    if (cached.value !== null && cached.value !== '' && this.state.token === null) {
      this.update({ token: asAuthToken(cached.value) });
      this.logger.info('Restored cached GitHub token');
    }
  }

  async receiveCode(code: string | null): Promise<CodeExchangeOutcome> {
    if (code === null || code === '') {
      this.fail(NO_CODE_FAILURE, this.toasts.forSignInFailure(`Signing in to GitHub failed: ${NO_CODE_FAILURE}.`));
      return { kind: 'no_code' };
    }

    const authCode = asAuthCode(code);
    const generation = this.generations.issue('code_exchange');
    this.update({ pendingCode: authCode });
    this.logger.info({ generation }, 'Exchanging sign-in code');

    const result = await this.http
      .send({ method: 'GET', url: `${this.exchangeUrl}/authenticate/${encodeURIComponent(authCode)}` })
      .andThen(decodeToken);

    if (!this.generations.isCurrent('code_exchange', generation)) {
      this.logger.debug({ generation }, 'Dropping stale code exchange response');
      return { kind: 'stale' };
    }

    if (result.isErr()) {
      this.update({ pendingCode: null });
      this.fail(`Sign-in failed: ${result.error.message}`, this.toasts.forHttpError('signing in to GitHub', result.error));
      return { kind: 'failed', error: result.error };
    }

    const token = result.value;
    this.update({ token, pendingCode: null });
    this.logger.info('Signed in to GitHub');

    const cached = await this.store.set(this.tokenKey, token);
    if (cached.isErr()) {
      // Still signed in for this run; only the next reload loses the token.
      this.logger.warn({ code: cached.error.code, reason: cached.error.message }, 'Token cache write failed');
      this.fail(`Could not cache the GitHub token: ${cached.error.message}`, this.toasts.forTokenCacheFailure(cached.error));
      return { kind: 'signed_in', cached: false };
    }
    return { kind: 'signed_in', cached: true };
  }

  /** Entry point for the login popup's message event. Malformed events count as "no code". */
  receiveLoginMessage(event: unknown): Promise<CodeExchangeOutcome> {
    const parsed = LoginMessageSchema.safeParse(event);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Malformed login message');
      return this.receiveCode(null);
    }
    return this.receiveCode(parsed.data.detail.payload ?? null);
  }

  async signOut(): Promise<void> {
    this.generations.invalidate('code_exchange');
    this.update({ token: null, pendingCode: null });
    this.logger.info('Signed out');

    const removed = await this.store.remove(this.tokenKey);
    if (removed.isErr()) {
      this.logger.warn({ code: removed.error.code, reason: removed.error.message }, 'Token cache removal failed');
      this.fail(`Could not clear the cached GitHub token: ${removed.error.message}`, this.toasts.forTokenCacheFailure(removed.error));
    }
  }

  currentToken(): AuthToken | null {
    return this.state.token;
  }

  isSigningIn(): boolean {
    return this.state.pendingCode !== null;
  }

  getState(): AuthSessionState {
    return this.state;
  }

  subscribe(listener: (state: AuthSessionState) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private fail(message: string, toast: ToastEntry): void {
    this.update({ failures: [...this.state.failures, message] });
    this.toastLog.push(toast);
  }

  private update(patch: Partial<AuthSessionState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}

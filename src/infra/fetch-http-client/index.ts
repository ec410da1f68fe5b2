import type { Result } from 'neverthrow';
import { ResultAsync, ok, err } from 'neverthrow';
import type { HttpClientPort, HttpError, HttpRequest } from '../../ports/http-client.port.js';
import type { Logger } from '../../core/logging/types.js';

interface RawResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly text: string;
}

/** Drops the query string so `access_token` never reaches a log line. */
export function redactUrl(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * HttpClientPort over the global `fetch`.
 *
 * - One attempt per request; the timeout aborts it via AbortController
 * - A 2xx body must be non-empty JSON
 */
export class FetchHttpClient implements HttpClientPort {
  constructor(
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  send(request: HttpRequest): ResultAsync<unknown, HttpError> {
    return new ResultAsync(this.transmit(request)).andThen((raw) => decodeJson(request, raw));
  }

  private async transmit(request: HttpRequest): Promise<Result<RawResponse, HttpError>> {
    const path = redactUrl(request.url);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: {
          Accept: 'application/json',
          ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      const text = await response.text();
      this.logger.debug(
        { method: request.method, path, status: response.status, durationMs: Date.now() - startedAt },
        'HTTP response'
      );
      return ok({ status: response.status, ok: response.ok, text });
    } catch (e) {
      if (controller.signal.aborted) {
        this.logger.warn({ method: request.method, path, timeoutMs: this.timeoutMs }, 'HTTP request timed out');
        return err({
          code: 'HTTP_TIMEOUT',
          message: `${request.method} ${path} timed out after ${this.timeoutMs}ms`,
          timeoutMs: this.timeoutMs,
        } as const);
      }
      this.logger.warn({ method: request.method, path, err: e }, 'HTTP request failed');
      return err({ code: 'HTTP_NETWORK_ERROR', message: `${request.method} ${path} failed: ${describe(e)}` } as const);
    } finally {
      clearTimeout(timer);
    }
  }
}

function decodeJson(request: HttpRequest, raw: RawResponse): Result<unknown, HttpError> {
  const path = redactUrl(request.url);

  if (!raw.ok) {
    return err({
      code: 'HTTP_BAD_STATUS',
      message: `${request.method} ${path} returned ${raw.status}`,
      status: raw.status,
      body: raw.text,
    } as const);
  }

  if (raw.text.trim() === '') {
    return err({ code: 'HTTP_UNEXPECTED_PAYLOAD', message: `Empty response from ${path}`, detail: 'empty body' } as const);
  }

  try {
    const parsed: unknown = JSON.parse(raw.text);
    return ok(parsed);
  } catch (e) {
    return err({
      code: 'HTTP_UNEXPECTED_PAYLOAD',
      message: `Response from ${path} is not JSON`,
      detail: describe(e),
    } as const);
  }
}

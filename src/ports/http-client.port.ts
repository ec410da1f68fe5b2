import type { ResultAsync } from 'neverthrow';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  /** Serialized as JSON when present. */
  readonly body?: unknown;
}

export type HttpError =
  | { readonly code: 'HTTP_TIMEOUT'; readonly message: string; readonly timeoutMs: number }
  | { readonly code: 'HTTP_NETWORK_ERROR'; readonly message: string }
  | { readonly code: 'HTTP_BAD_STATUS'; readonly message: string; readonly status: number; readonly body: string }
  | { readonly code: 'HTTP_UNEXPECTED_PAYLOAD'; readonly message: string; readonly detail: string };

/**
 * Port: JSON-over-HTTP transport.
 *
 * Guarantees:
 * - 2xx responses resolve to the parsed JSON body (`unknown`; callers decode it)
 * - Non-2xx responses fail with HTTP_BAD_STATUS carrying status and raw body text
 * - Unparseable 2xx bodies fail with HTTP_UNEXPECTED_PAYLOAD
 * - No retries, no cancellation once issued
 */
export interface HttpClientPort {
  send(request: HttpRequest): ResultAsync<unknown, HttpError>;
}

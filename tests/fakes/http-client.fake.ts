import type { Result } from 'neverthrow';
import { ResultAsync, ok, err } from 'neverthrow';
import type { HttpClientPort, HttpError, HttpRequest } from '../../src/ports/http-client.port.js';

export type HttpReply = Result<unknown, HttpError>;

interface Parked {
  readonly request: HttpRequest;
  readonly resolve: (reply: HttpReply) => void;
}

/**
 * Scripted HTTP transport.
 *
 * With a handler installed every request is answered at once. Without one,
 * requests park until the test settles them, in any order, which is how
 * out-of-order responses are produced.
 */
export class FakeHttpClient implements HttpClientPort {
  readonly requests: HttpRequest[] = [];
  private readonly parked: Parked[] = [];
  private handler: ((request: HttpRequest) => HttpReply) | null = null;

  send(request: HttpRequest): ResultAsync<unknown, HttpError> {
    this.requests.push(request);
    const handler = this.handler;
    if (handler !== null) {
      return new ResultAsync(Promise.resolve(handler(request)));
    }
    return new ResultAsync(
      new Promise<HttpReply>((resolve) => {
        this.parked.push({ request, resolve });
      })
    );
  }

  // Test utilities
  replyWith(handler: (request: HttpRequest) => HttpReply): void {
    this.handler = handler;
  }

  /** Answer the n-th request that is still parked (0 = oldest). */
  settle(index: number, reply: HttpReply): void {
    const [entry] = this.parked.splice(index, 1);
    if (entry === undefined) throw new Error(`No parked request at index ${index}`);
    entry.resolve(reply);
  }

  get parkedCount(): number {
    return this.parked.length;
  }
}

export function jsonReply(body: unknown): HttpReply {
  return ok(body);
}

export function statusReply(status: number, body = ''): HttpReply {
  return err({ code: 'HTTP_BAD_STATUS', message: `request returned ${status}`, status, body });
}

export function networkFailure(message = 'socket hang up'): HttpReply {
  return err({ code: 'HTTP_NETWORK_ERROR', message });
}

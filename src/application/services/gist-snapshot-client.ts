import { z } from 'zod';
import type { Result, ResultAsync } from 'neverthrow';
import { ok, err, errAsync } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import type { HttpClientPort, HttpError } from '../../ports/http-client.port.js';
import type {
  FetchError,
  RemoteSnapshotPort,
  SaveError,
  SaveRequest,
  SnapshotContent,
} from '../../ports/remote-snapshot.port.js';
import type { RemoteId, ResourceName } from '../../domain/types.js';
import { asRemoteId } from '../../domain/types.js';

const GistSavedSchema = z.object({ id: z.string().min(1) });

const GistSchema = z.object({ files: z.record(z.string(), z.unknown()) });

const GistFileSchema = z.object({
  content: z.string(),
  truncated: z.boolean().default(false),
});

function decode<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): Result<z.output<S>, HttpError> {
  const parsed = schema.safeParse(body);
  if (parsed.success) return ok(parsed.data);
  const detail = parsed.error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
  return err({ code: 'HTTP_UNEXPECTED_PAYLOAD', message: `Unexpected ${what} payload`, detail } as const);
}

function transport(cause: HttpError): { readonly code: 'TRANSPORT'; readonly message: string; readonly cause: HttpError } {
  return { code: 'TRANSPORT', message: cause.message, cause };
}

/**
 * RemoteSnapshotPort against the GitHub gist REST API.
 *
 * Create:  POST  <api>/gists?access_token=<token>        → { id }
 * Update:  PATCH <api>/gists/<id>?access_token=<token>   → { id }
 * Fetch:   GET   <api>/gists/<id>                       → { files: { <name>: { content, truncated } } }
 *
 * Truncation is the remote's verdict; no local size check is made.
 */
@singleton()
export class GistSnapshotClient implements RemoteSnapshotPort {
  private readonly apiUrl: string;
  private readonly logger: Logger;

  constructor(
    @inject(DI.Ports.HttpClient) private readonly http: HttpClientPort,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Infra.LoggerFactory) loggers: ILoggerFactory
  ) {
    this.apiUrl = config.gist.apiUrl;
    this.logger = loggers.create('GistSnapshotClient');
  }

  createOrUpdate(request: SaveRequest): ResultAsync<RemoteId, SaveError> {
    if (request.content === null || request.content === '') {
      return errAsync({ code: 'NO_FILE_CONTENTS', message: 'No file contents to save' } as const);
    }
    if (request.token === null || request.token === '') {
      return errAsync({ code: 'NO_GITHUB_TOKEN', message: 'Not signed in to GitHub' } as const);
    }

    const existing = request.remoteId ?? null;
    const path = existing === null ? '/gists' : `/gists/${encodeURIComponent(existing)}`;
    const mode = existing === null ? 'create' : 'update';
    this.logger.info({ mode, remoteId: existing, resourceName: request.resourceName }, 'Saving gist');

    return this.http
      .send({
        method: existing === null ? 'POST' : 'PATCH',
        url: `${this.apiUrl}${path}?access_token=${encodeURIComponent(request.token)}`,
        body: { files: { [request.resourceName]: { content: request.content } } },
      })
      .andThen((body) => decode(GistSavedSchema, body, 'gist save'))
      .map((saved) => asRemoteId(saved.id))
      .mapErr((cause): SaveError => {
        this.logger.warn({ mode, code: cause.code }, 'Gist save failed');
        return transport(cause);
      });
  }

  fetch(remoteId: RemoteId, resourceName: ResourceName): ResultAsync<SnapshotContent, FetchError> {
    this.logger.info({ remoteId, resourceName }, 'Fetching gist');

    return this.http
      .send({ method: 'GET', url: `${this.apiUrl}/gists/${encodeURIComponent(remoteId)}` })
      .mapErr((cause): FetchError =>
        cause.code === 'HTTP_BAD_STATUS' && cause.status === 404
          ? { code: 'NOT_FOUND', message: `Gist ${remoteId} was not found`, remoteId }
          : transport(cause)
      )
      .andThen((body) => this.extractFile(body, remoteId, resourceName));
  }

  private extractFile(body: unknown, remoteId: RemoteId, resourceName: ResourceName): Result<SnapshotContent, FetchError> {
    const gist = decode(GistSchema, body, 'gist');
    if (gist.isErr()) return err(transport(gist.error));

    const entry = gist.value.files[resourceName];
    if (entry === undefined) {
      return err(
        transport({
          code: 'HTTP_UNEXPECTED_PAYLOAD',
          message: 'Unexpected gist payload',
          detail: `the gist has no file named ${resourceName}`,
        })
      );
    }

    const file = decode(GistFileSchema, entry, 'gist file');
    if (file.isErr()) return err(transport(file.error));

    if (file.value.truncated) {
      this.logger.warn({ remoteId, resourceName }, 'Gist file is truncated');
      return err({
        code: 'TRUNCATED',
        message: `${resourceName} in gist ${remoteId} is truncated`,
        remoteId,
        resourceName,
      } as const);
    }

    return ok({ content: file.value.content });
  }
}

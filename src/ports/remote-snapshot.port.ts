import type { ResultAsync } from 'neverthrow';
import type { AuthToken, RemoteId, ResourceName } from '../domain/types.js';
import type { HttpError } from './http-client.port.js';

export type SaveError =
  | { readonly code: 'NO_FILE_CONTENTS'; readonly message: string }
  | { readonly code: 'NO_GITHUB_TOKEN'; readonly message: string }
  | { readonly code: 'TRANSPORT'; readonly message: string; readonly cause: HttpError };

export type FetchError =
  | { readonly code: 'NOT_FOUND'; readonly message: string; readonly remoteId: RemoteId }
  | { readonly code: 'TRUNCATED'; readonly message: string; readonly remoteId: RemoteId; readonly resourceName: ResourceName }
  | { readonly code: 'TRANSPORT'; readonly message: string; readonly cause: HttpError };

export interface SaveRequest {
  readonly resourceName: ResourceName;
  readonly content: string | null;
  readonly token: AuthToken | null;
  /** Present when the document was already published; the existing gist is updated. */
  readonly remoteId?: RemoteId | null;
}

export interface SnapshotContent {
  readonly content: string;
}

/**
 * Port: remote snapshot store (gist-style).
 *
 * Guarantees:
 * - Precondition failures (NO_FILE_CONTENTS, NO_GITHUB_TOKEN) issue no request
 * - Each failure is reported once; no retries
 */
export interface RemoteSnapshotPort {
  createOrUpdate(request: SaveRequest): ResultAsync<RemoteId, SaveError>;
  fetch(remoteId: RemoteId, resourceName: ResourceName): ResultAsync<SnapshotContent, FetchError>;
}

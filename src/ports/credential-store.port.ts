import type { ResultAsync } from 'neverthrow';

export type CredentialStoreError =
  | { readonly code: 'CREDENTIAL_STORE_UNAVAILABLE'; readonly message: string }
  | { readonly code: 'CREDENTIAL_STORE_IO_ERROR'; readonly message: string };

/**
 * Port: persistent key-value slot for the cached auth token.
 *
 * Guarantees:
 * - Values survive a reload of the host page/process
 * - get() returns null for a missing key (not an error)
 * - Never throws; platform failures (quota, privacy mode, missing storage) come back as errors
 *
 * Callers treat every error as "carry on without caching".
 */
export interface CredentialStorePort {
  get(key: string): ResultAsync<string | null, CredentialStoreError>;
  set(key: string, value: string): ResultAsync<void, CredentialStoreError>;
  remove(key: string): ResultAsync<void, CredentialStoreError>;
}

import type { ResultAsync } from 'neverthrow';
import { Result, okAsync, errAsync } from 'neverthrow';
import type { CredentialStoreError, CredentialStorePort } from '../../ports/credential-store.port.js';

/**
 * The subset of the DOM `Storage` interface the credential slot needs.
 * `window.localStorage` satisfies it as-is.
 */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

function isKeyValueStorage(value: unknown): value is KeyValueStorage {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'getItem') === 'function' &&
    typeof Reflect.get(value, 'setItem') === 'function' &&
    typeof Reflect.get(value, 'removeItem') === 'function'
  );
}

/**
 * Finds `localStorage` on the given scope. Reading the property throws in some
 * privacy modes; that counts as "no storage".
 */
export function detectWebStorage(scope: object = globalThis): KeyValueStorage | null {
  try {
    const candidate: unknown = Reflect.get(scope, 'localStorage');
    return isKeyValueStorage(candidate) ? candidate : null;
  } catch {
    return null;
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Credential slot backed by Web Storage.
 *
 * Storage calls are synchronous and may throw (quota exceeded, access denied);
 * each call is lifted into a ResultAsync so nothing escapes the port boundary.
 */
export class WebStorageCredentialStore implements CredentialStorePort {
  constructor(private readonly storage: KeyValueStorage | null) {}

  get(key: string): ResultAsync<string | null, CredentialStoreError> {
    return this.run('read', (s) => s.getItem(key));
  }

  set(key: string, value: string): ResultAsync<void, CredentialStoreError> {
    return this.run('write', (s) => s.setItem(key, value));
  }

  remove(key: string): ResultAsync<void, CredentialStoreError> {
    return this.run('remove', (s) => s.removeItem(key));
  }

  private run<T>(operation: string, fn: (storage: KeyValueStorage) => T): ResultAsync<T, CredentialStoreError> {
    const storage = this.storage;
    if (storage === null) {
      return errAsync({ code: 'CREDENTIAL_STORE_UNAVAILABLE', message: 'No persistent storage is available' } as const);
    }

    const attempt = Result.fromThrowable(
      () => fn(storage),
      (e): CredentialStoreError => ({ code: 'CREDENTIAL_STORE_IO_ERROR', message: `Storage ${operation} failed: ${describe(e)}` })
    );
    const result = attempt();
    return result.isOk() ? okAsync(result.value) : errAsync(result.error);
  }
}

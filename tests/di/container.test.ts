import { describe, it, expect } from 'vitest';
import { bootstrap, container, initializeContainer, isInitialized } from '../../src/di/container.js';
import { DI } from '../../src/di/tokens.js';
import type { KeyValueStorage } from '../../src/infra/web-storage-credential-store/index.js';
import { FakeHttpClient, ScriptedBasenamePrompt, jsonReply } from '../fakes/index.js';
import { TEST_ENV } from '../helpers/test-config.js';

class MapStorage implements KeyValueStorage {
  readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

describe('initializeContainer', () => {
  it('wires a signed-out shell', () => {
    const shell = initializeContainer({
      env: TEST_ENV,
      storage: new MapStorage(),
      basenamePrompt: new ScriptedBasenamePrompt(),
    })._unsafeUnwrap();

    expect(shell.present()).toEqual({ control: { kind: 'enable_integration' }, toasts: [] });
    expect(isInitialized()).toBe(true);
  });

  it('returns the same shell on a second call', () => {
    const options = { env: TEST_ENV, storage: null, basenamePrompt: new ScriptedBasenamePrompt() };
    const first = initializeContainer(options)._unsafeUnwrap();

    expect(initializeContainer(options)._unsafeUnwrap()).toBe(first);
  });

  it('shares one toast log between the services', async () => {
    const shell = initializeContainer({ env: TEST_ENV, storage: null, basenamePrompt: new ScriptedBasenamePrompt() })._unsafeUnwrap();

    await shell.auth.receiveCode(null);

    expect(shell.present().toasts.map((t) => t.message)).toEqual([
      'Signing in to GitHub failed: no code from provider.',
    ]);
    expect(container.resolve(DI.Services.ToastLog)).toBe(shell.toasts);
  });

  it('fails on a bad environment', () => {
    const error = initializeContainer({
      env: { PSVG_HTTP_TIMEOUT_MS: '1' },
      basenamePrompt: new ScriptedBasenamePrompt(),
    })._unsafeUnwrapErr();

    expect(error._tag).toBe('ConfigInvalid');
    expect(isInitialized()).toBe(false);
  });

  it('fails without a basename prompt', () => {
    const error = initializeContainer({ env: TEST_ENV, storage: null })._unsafeUnwrapErr();

    expect(error).toEqual({
      _tag: 'StartupFailed',
      phase: 'container',
      message: 'No basename prompt was provided',
      cause: undefined,
    });
  });

  it('keeps ports registered ahead of time', async () => {
    const http = new FakeHttpClient();
    http.replyWith(() => jsonReply({ token: 'test-token' }));
    container.register(DI.Ports.HttpClient, { useValue: http });

    const shell = initializeContainer({ env: TEST_ENV, storage: null, basenamePrompt: new ScriptedBasenamePrompt() })._unsafeUnwrap();
    await shell.auth.receiveCode('test-code');

    expect(http.requests[0]?.url).toBe('https://auth.test/authenticate/test-code');
    expect(shell.present().control).toEqual({ kind: 'save_unsaved' });
  });
});

describe('bootstrap', () => {
  it('restores the cached token', async () => {
    const storage = new MapStorage();
    storage.items.set('test-token-slot', 'test-token');

    const shell = (await bootstrap({ env: TEST_ENV, storage, basenamePrompt: new ScriptedBasenamePrompt() }))._unsafeUnwrap();

    expect(shell.auth.currentToken()).toBe('test-token');
    expect(shell.present().control).toEqual({ kind: 'save_unsaved' });
  });

  it('starts signed out when there is no storage', async () => {
    const shell = (await bootstrap({ env: TEST_ENV, storage: null, basenamePrompt: new ScriptedBasenamePrompt() }))._unsafeUnwrap();

    expect(shell.auth.currentToken()).toBeNull();
  });
});

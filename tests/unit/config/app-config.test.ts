import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';

describe('loadConfig', () => {
  it('fills every value from defaults when the environment is empty', () => {
    const config = loadConfig({ env: {} })._unsafeUnwrap();

    expect(config).toEqual({
      gist: { apiUrl: 'https://api.github.com', webUrl: 'https://gist.github.com' },
      auth: { exchangeUrl: 'http://localhost:9999', tokenStorageKey: 'parametric-svg-editor:github-token' },
      http: { timeoutMs: 10_000 },
      issuesUrl: 'https://github.com/parametric-svg/editor/issues',
      logLevel: 'silent',
    });
  });

  it('reads overrides and strips trailing slashes from URLs', () => {
    const config = loadConfig({
      env: {
        PSVG_GIST_API_URL: 'https://api.gist.test/',
        PSVG_AUTH_API_URL: 'https://auth.test//',
        PSVG_HTTP_TIMEOUT_MS: '2500',
        PSVG_LOG_LEVEL: 'DEBUG',
        PSVG_TOKEN_STORAGE_KEY: 'slot',
      },
    })._unsafeUnwrap();

    expect(config.gist.apiUrl).toBe('https://api.gist.test');
    expect(config.auth.exchangeUrl).toBe('https://auth.test');
    expect(config.auth.tokenStorageKey).toBe('slot');
    expect(config.http.timeoutMs).toBe(2500);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a non-http URL', () => {
    const error = loadConfig({ env: { PSVG_GIST_API_URL: 'ftp://files.test' } })._unsafeUnwrapErr();

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([
      { path: 'PSVG_GIST_API_URL', message: 'PSVG_GIST_API_URL must use http or https' },
    ]);
  });

  it('rejects a timeout below the floor', () => {
    const error = loadConfig({ env: { PSVG_HTTP_TIMEOUT_MS: '50' } })._unsafeUnwrapErr();

    expect(error.issues).toEqual([{ path: 'PSVG_HTTP_TIMEOUT_MS', message: 'PSVG_HTTP_TIMEOUT_MS must be >= 100' }]);
  });

  it('rejects a timeout that is not a number', () => {
    const error = loadConfig({ env: { PSVG_HTTP_TIMEOUT_MS: 'soon' } })._unsafeUnwrapErr();

    expect(error.issues.map((i) => i.path)).toEqual(['PSVG_HTTP_TIMEOUT_MS']);
  });

  it('rejects an unknown log level', () => {
    const error = loadConfig({ env: { PSVG_LOG_LEVEL: 'loud' } })._unsafeUnwrapErr();

    expect(error.issues.map((i) => i.path)).toEqual(['PSVG_LOG_LEVEL']);
  });

  it('reports every bad variable at once', () => {
    const error = loadConfig({
      env: { PSVG_GIST_WEB_URL: 'not a url', PSVG_TOKEN_STORAGE_KEY: '' },
    })._unsafeUnwrapErr();

    expect([...new Set(error.issues.map((i) => i.path))].sort()).toEqual(['PSVG_GIST_WEB_URL', 'PSVG_TOKEN_STORAGE_KEY']);
  });
});

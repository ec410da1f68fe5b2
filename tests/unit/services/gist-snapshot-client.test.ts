import { describe, it, expect, beforeEach } from 'vitest';
import { GistSnapshotClient } from '../../../src/application/services/gist-snapshot-client.js';
import { ToastFactory } from '../../../src/application/services/toast-factory.js';
import { asAuthToken, asRemoteId } from '../../../src/domain/types.js';
import { toResourceName } from '../../../src/domain/resource-name.js';
import { FakeHttpClient, jsonReply, statusReply, networkFailure } from '../../fakes/index.js';
import { CapturingLoggerFactory } from '../../helpers/capturing-logger-factory.js';
import { testConfig } from '../../helpers/test-config.js';

const NAME = toResourceName('x')._unsafeUnwrap();
const TOKEN = asAuthToken('test-token');

describe('GistSnapshotClient', () => {
  let http: FakeHttpClient;
  let loggers: CapturingLoggerFactory;
  let client: GistSnapshotClient;

  beforeEach(() => {
    http = new FakeHttpClient();
    loggers = new CapturingLoggerFactory();
    client = new GistSnapshotClient(http, testConfig(), loggers);
  });

  describe('createOrUpdate', () => {
    it('creates a gist when no id is known', async () => {
      http.replyWith(() => jsonReply({ id: 'g1', html_url: 'https://gist.test/g1' }));

      const result = await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: TOKEN });

      expect(result._unsafeUnwrap()).toBe('g1');
      expect(http.requests).toEqual([
        {
          method: 'POST',
          url: 'https://api.gist.test/gists?access_token=test-token',
          body: { files: { 'x.parametric.svg': { content: '<svg/>' } } },
        },
      ]);
    });

    it('updates the existing gist when an id is known', async () => {
      http.replyWith(() => jsonReply({ id: 'g1' }));

      await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: TOKEN, remoteId: asRemoteId('g1') });

      expect(http.requests[0]?.method).toBe('PATCH');
      expect(http.requests[0]?.url).toBe('https://api.gist.test/gists/g1?access_token=test-token');
    });

    it('encodes the token into the query string', async () => {
      http.replyWith(() => jsonReply({ id: 'g1' }));

      await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: asAuthToken('a&b') });

      expect(http.requests[0]?.url).toBe('https://api.gist.test/gists?access_token=a%26b');
    });

    it('refuses to save without a token and sends nothing', async () => {
      const error = (await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: null }))._unsafeUnwrapErr();

      expect(error.code).toBe('NO_GITHUB_TOKEN');
      expect(http.requests).toEqual([]);
    });

    it('treats an empty token as no token', async () => {
      const error = (
        await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: asAuthToken('') })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('NO_GITHUB_TOKEN');
      expect(http.requests).toEqual([]);
    });

    it('refuses to save without file contents and sends nothing', async () => {
      const error = (await client.createOrUpdate({ resourceName: NAME, content: null, token: null }))._unsafeUnwrapErr();

      expect(error.code).toBe('NO_FILE_CONTENTS');
      expect(http.requests).toEqual([]);
    });

    it('wraps a transport failure', async () => {
      http.replyWith(() => statusReply(401, '{"message":"Bad credentials"}'));

      const error = (await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: TOKEN }))._unsafeUnwrapErr();

      expect(error.code).toBe('TRANSPORT');
      if (error.code !== 'TRANSPORT') return;
      expect(error.cause.code).toBe('HTTP_BAD_STATUS');
    });

    it('fails when the response has no id', async () => {
      http.replyWith(() => jsonReply({ url: 'https://api.gist.test/gists/g1' }));

      const error = (await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: TOKEN }))._unsafeUnwrapErr();

      expect(error).toEqual({
        code: 'TRANSPORT',
        message: 'Unexpected gist save payload',
        cause: { code: 'HTTP_UNEXPECTED_PAYLOAD', message: 'Unexpected gist save payload', detail: 'id: Required' },
      });
    });

    it('never logs the token', async () => {
      http.replyWith(() => jsonReply({ id: 'g1' }));

      await client.createOrUpdate({ resourceName: NAME, content: '<svg/>', token: TOKEN });

      const [line] = loggers.withMessage('Saving gist');
      expect(line?.['mode']).toBe('create');
      expect(line?.['resourceName']).toBe('x.parametric.svg');
      expect(Object.values(line ?? {})).not.toContain('test-token');
    });
  });

  describe('fetch', () => {
    it('returns the content of the named file', async () => {
      http.replyWith(() => jsonReply({ files: { 'x.parametric.svg': { content: '<svg/>', truncated: false } } }));

      const result = await client.fetch(asRemoteId('g1'), NAME);

      expect(result._unsafeUnwrap()).toEqual({ content: '<svg/>' });
      expect(http.requests).toEqual([{ method: 'GET', url: 'https://api.gist.test/gists/g1' }]);
    });

    it('accepts a file entry without a truncated flag', async () => {
      http.replyWith(() => jsonReply({ files: { 'x.parametric.svg': { content: '<svg></svg>' } } }));

      expect((await client.fetch(asRemoteId('g1'), NAME))._unsafeUnwrap()).toEqual({ content: '<svg></svg>' });
    });

    it('maps 404 to NOT_FOUND with a toast naming the id', async () => {
      http.replyWith(() => statusReply(404, '{"message":"Not Found"}'));

      const error = (await client.fetch(asRemoteId('abc'), NAME))._unsafeUnwrapErr();

      expect(error).toEqual({ code: 'NOT_FOUND', message: 'Gist abc was not found', remoteId: 'abc' });
      const toast = new ToastFactory(testConfig()).forFetchError(error);
      expect(toast.message).toBe("We couldn't find the gist abc. Make sure the link is right.");
      expect(toast.actionUrl).toBe('https://gist.test/abc');
    });

    it('reports a truncated file', async () => {
      http.replyWith(() => jsonReply({ files: { 'x.parametric.svg': { content: '<svg', truncated: true } } }));

      const error = (await client.fetch(asRemoteId('g1'), NAME))._unsafeUnwrapErr();

      expect(error).toEqual({
        code: 'TRUNCATED',
        message: 'x.parametric.svg in gist g1 is truncated',
        remoteId: 'g1',
        resourceName: 'x.parametric.svg',
      });
    });

    it('fails when the gist has no file by that name', async () => {
      http.replyWith(() => jsonReply({ files: { 'other.parametric.svg': { content: '<svg/>' } } }));

      const error = (await client.fetch(asRemoteId('g1'), NAME))._unsafeUnwrapErr();

      expect(error.code).toBe('TRANSPORT');
      if (error.code !== 'TRANSPORT') return;
      expect(error.cause).toEqual({
        code: 'HTTP_UNEXPECTED_PAYLOAD',
        message: 'Unexpected gist payload',
        detail: 'the gist has no file named x.parametric.svg',
      });
    });

    it('fails when the file entry has no content', async () => {
      http.replyWith(() => jsonReply({ files: { 'x.parametric.svg': { truncated: false } } }));

      const error = (await client.fetch(asRemoteId('g1'), NAME))._unsafeUnwrapErr();

      expect(error.code).toBe('TRANSPORT');
      if (error.code !== 'TRANSPORT') return;
      expect(error.cause.code).toBe('HTTP_UNEXPECTED_PAYLOAD');
      expect(error.cause.message).toBe('Unexpected gist file payload');
    });

    it('wraps other transport failures', async () => {
      http.replyWith(() => networkFailure());

      const error = (await client.fetch(asRemoteId('g1'), NAME))._unsafeUnwrapErr();

      expect(error).toEqual({
        code: 'TRANSPORT',
        message: 'socket hang up',
        cause: { code: 'HTTP_NETWORK_ERROR', message: 'socket hang up' },
      });
    });
  });
});

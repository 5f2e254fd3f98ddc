import * as assert from 'assert';
import { suite, test } from 'mocha';

import { DictionaryHttpClient } from '../../src/services/DictionaryHttpClient';
import { createFetchStub, createTestLogger, hangingResponse, jsonResponse } from './helpers';

const PRIMARY = 'https://primary.test';
const MIRROR = 'https://mirror.test';

suite('DictionaryHttpClient', () => {
  test('returns the body and latency from the first server that answers', async () => {
    const { logger } = createTestLogger();
    const stub = createFetchStub(() => jsonResponse({ def: [] }, { headers: { 'x-ratelimit-requests-remaining': '9' } }));
    const client = new DictionaryHttpClient(logger, stub.fetch);

    const attempt = await client.getFirstAvailable([PRIMARY, MIRROR], { path: '/lookup?text=apple', timeoutMs: 1000 });

    assert.strictEqual(attempt.ok, true);
    assert.deepStrictEqual(stub.urls, ['https://primary.test/lookup?text=apple']);

    if (attempt.ok) {
      assert.deepStrictEqual(attempt.body, { def: [] });
      assert.strictEqual(attempt.server, PRIMARY);
      assert.strictEqual(attempt.headers.get('x-ratelimit-requests-remaining'), '9');
      assert.ok(attempt.latencyMs >= 0);
    }
  });

  test('falls back to the mirror after a timeout', async () => {
    const { logger, channel } = createTestLogger();
    const stub = createFetchStub((url, init) =>
      url.origin === PRIMARY ? hangingResponse(init) : jsonResponse({ def: [] }),
    );
    const client = new DictionaryHttpClient(logger, stub.fetch);

    const attempt = await client.getFirstAvailable([PRIMARY, MIRROR], { path: '/lookup', timeoutMs: 20 });

    assert.strictEqual(attempt.ok, true);
    assert.strictEqual(attempt.server, MIRROR);
    assert.deepStrictEqual(stub.urls, ['https://primary.test/lookup', 'https://mirror.test/lookup']);
    assert.ok(
      channel.lines.some((line) =>
        line.endsWith('Dictionary server https://primary.test failed: Request timed out after 20 ms.'),
      ),
    );
  });

  test('reports the last failure when every server fails', async () => {
    const { logger } = createTestLogger();
    const stub = createFetchStub((url) => new Response('', { status: url.origin === PRIMARY ? 503 : 401 }));
    const client = new DictionaryHttpClient(logger, stub.fetch);

    const attempt = await client.getFirstAvailable([PRIMARY, MIRROR], { path: '/lookup', timeoutMs: 1000 });

    assert.strictEqual(attempt.ok, false);

    if (!attempt.ok) {
      assert.strictEqual(attempt.server, MIRROR);
      assert.strictEqual(attempt.error.code, 'authentication');
      assert.strictEqual(attempt.error.status, 401);
      assert.strictEqual(attempt.error.retryable, false);
      assert.strictEqual(attempt.error.message, 'Incorrect response code 401 from the server https://mirror.test');
    }
  });

  test('maps status codes to error codes', async () => {
    const { logger } = createTestLogger();
    const cases: Array<[number, string]> = [
      [403, 'authentication'],
      [408, 'timeout'],
      [429, 'rateLimit'],
      [500, 'server'],
      [404, 'unknown'],
    ];

    for (const [status, code] of cases) {
      const stub = createFetchStub(() => new Response('', { status }));
      const attempt = await new DictionaryHttpClient(logger, stub.fetch).getJson(PRIMARY, {
        path: '/lookup',
        timeoutMs: 1000,
      });

      assert.strictEqual(attempt.ok ? 'ok' : attempt.error.code, code, `status ${status}`);
    }
  });

  test('rejects bodies that are not JSON or fail validation', async () => {
    const { logger } = createTestLogger();
    const broken = new DictionaryHttpClient(logger, createFetchStub(() => new Response('not json')).fetch);
    const unexpected = new DictionaryHttpClient(logger, createFetchStub(() => jsonResponse(['en-fr'])).fetch);

    const parsed = await broken.getJson(PRIMARY, { path: '/lookup', timeoutMs: 1000 });
    const validated = await unexpected.getJson(PRIMARY, {
      path: '/lookup',
      timeoutMs: 1000,
      validate: (body) => !Array.isArray(body),
    });

    assert.strictEqual(parsed.ok ? 'ok' : parsed.error.code, 'invalidResponse');
    assert.ok(!parsed.ok && parsed.error.message.startsWith('JSON error: '));
    assert.strictEqual(validated.ok ? 'ok' : validated.error.message, 'Unexpected response structure.');
  });

  test('classifies connection failures as network errors', async () => {
    const { logger } = createTestLogger();
    const stub = createFetchStub(() => {
      throw new TypeError('fetch failed');
    });

    const attempt = await new DictionaryHttpClient(logger, stub.fetch).getJson(PRIMARY, {
      path: '/lookup',
      timeoutMs: 1000,
    });

    assert.strictEqual(attempt.ok ? 'ok' : attempt.error.code, 'network');
    assert.strictEqual(attempt.ok ? undefined : attempt.error.retryable, true);
  });

  test('reports a configuration error without servers', async () => {
    const { logger } = createTestLogger();
    const stub = createFetchStub(() => jsonResponse({}));

    const attempt = await new DictionaryHttpClient(logger, stub.fetch).getFirstAvailable([], {
      path: '/lookup',
      timeoutMs: 1000,
    });

    assert.strictEqual(attempt.ok ? 'ok' : attempt.error.code, 'configuration');
    assert.deepStrictEqual(stub.urls, []);
  });
});

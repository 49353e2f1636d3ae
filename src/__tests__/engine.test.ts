/**
 * Tests for request execution, retry and pagination through the async client.
 */

import {
  GitHubError,
  InMemoryLogger,
  NotFoundError,
  RateLimitError,
  buildUrl,
  collectAll,
  createClient,
  take,
  type ClientOptions,
} from '../index.js';
import { MockTransport, requestJson, requestQuery } from '../mocks/index.js';

function setup(options: ClientOptions = {}) {
  const transport = new MockTransport();
  const sleep = vi.fn(async (_seconds: number) => {});
  const clientPromise = createClient({ token: 'test-token', transport, sleep, ...options });
  return { transport, sleep, clientPromise };
}

describe('buildUrl', () => {
  it('should join base and path and drop undefined query values', () => {
    expect(buildUrl('https://api.github.com/', '/repos/o/r', { a: 1, b: undefined, c: true })).toBe(
      'https://api.github.com/repos/o/r?a=1&c=true'
    );
  });

  it('should append to an existing query string', () => {
    expect(buildUrl('https://api.github.com', '/x?y=1', { z: 'a b' })).toBe('https://api.github.com/x?y=1&z=a+b');
  });
});

describe('request', () => {
  it('should send the standard headers', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /user', { body: { login: 'octocat' } });
    const client = await clientPromise;

    await expect(client.request('GET', '/user')).resolves.toEqual({ login: 'octocat' });

    const [call] = transport.getCalls();
    expect(call.url).toBe('https://api.github.com/user');
    expect(call.headers).toEqual({
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'github-rest-kit/0.1.0',
      Authorization: 'Bearer test-token',
    });
    expect(call.body).toBeUndefined();
    expect(call.timeout).toBe(30000);
  });

  it('should omit Authorization when the token is disabled', async () => {
    const { transport, clientPromise } = setup({ token: null });
    transport.mock('GET /meta', { body: {} });
    const client = await clientPromise;

    await client.request('GET', '/meta');

    expect(client.authenticated).toBe(false);
    expect(transport.getCalls()[0].headers.Authorization).toBeUndefined();
  });

  it('should encode JSON bodies', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('POST /markdown', { body: { ok: true } });
    const client = await clientPromise;

    await client.request('POST', '/markdown', { body: { text: 'Hello' } });

    const [call] = transport.getCalls();
    expect(call.headers['Content-Type']).toBe('application/json');
    expect(requestJson(call)).toEqual({ text: 'Hello' });
  });

  it('should return undefined for 204 without parsing', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('DELETE /repos/o/r', { status: 204, body: 'not json', raw: true });
    const client = await clientPromise;

    await expect(client.request('DELETE', '/repos/o/r')).resolves.toBeUndefined();
  });

  it('should return undefined for an empty success body', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('PUT /user/starred/o/r', { status: 200 });
    const client = await clientPromise;

    await expect(client.request('PUT', '/user/starred/o/r')).resolves.toBeUndefined();
  });

  it('should reject invalid JSON in a success body', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /broken', { body: '<html>', raw: true });
    const client = await clientPromise;

    const error = await client.request('GET', '/broken').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GitHubError);
    expect(error).toHaveProperty('message', 'Invalid JSON in response to GET https://api.github.com/broken');
    expect(error).toHaveProperty('statusCode', 200);
  });

  it('should throw the classified error', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /repos/o/missing', { status: 404, body: { message: 'Not Found' } });
    const client = await clientPromise;

    const error = await client.request('GET', '/repos/o/missing').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty('statusCode', 404);
    expect(error).toHaveProperty('responseData', { message: 'Not Found' });
  });
});

describe('rate-limit retry', () => {
  it('should make exactly maxRetries + 1 attempts before giving up', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true, maxRetries: 3 });
    for (let i = 0; i < 4; i++) {
      transport.mock('GET /user', { status: 429, headers: { 'Retry-After': '1' }, body: { message: 'slow down' } });
    }
    transport.mock('GET /user', { body: { login: 'never' } });
    const client = await clientPromise;

    await expect(client.request('GET', '/user')).rejects.toBeInstanceOf(RateLimitError);
    expect(transport.getCalls()).toHaveLength(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(transport.pending).toBe(1);
  });

  it('should wait Retry-After seconds and return the retried body', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true });
    transport
      .mock('GET /user', { status: 429, headers: { 'Retry-After': '1' } })
      .mock('GET /user', { body: { login: 'octocat' } });
    const client = await clientPromise;

    await expect(client.request('GET', '/user')).resolves.toEqual({ login: 'octocat' });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1);
  });

  it('should wait until the reset time for an exhausted quota', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true });
    const reset = String(Math.floor(Date.now() / 1000) + 5);
    transport
      .mock('GET /user', {
        status: 403,
        headers: { 'X-RateLimit-Remaining': '0', 'X-RateLimit-Reset': reset },
        body: { message: 'API rate limit exceeded' },
      })
      .mock('GET /user', { body: { login: 'octocat' } });
    const client = await clientPromise;

    await client.request('GET', '/user');

    const waited = sleep.mock.calls[0][0];
    expect(waited).toBeGreaterThanOrEqual(4);
    expect(waited).toBeLessThanOrEqual(6);
  });

  it('should not retry when auto-retry is off', async () => {
    const { transport, sleep, clientPromise } = setup();
    transport.mock('GET /user', { status: 429, headers: { 'Retry-After': '1' } });
    const client = await clientPromise;

    await expect(client.request('GET', '/user')).rejects.toBeInstanceOf(RateLimitError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry a permission failure', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true });
    transport.mock('GET /orgs/acme', {
      status: 403,
      headers: { 'X-RateLimit-Remaining': '4999' },
      body: { message: 'Must have admin rights' },
    });
    const client = await clientPromise;

    await expect(client.request('GET', '/orgs/acme')).rejects.toBeInstanceOf(RateLimitError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should log each backoff', async () => {
    const logger = new InMemoryLogger();
    const { transport, clientPromise } = setup({ autoRetry: true, logger });
    transport
      .mock('GET /user', { status: 429, headers: { 'Retry-After': '3' } })
      .mock('GET /user', { body: {} });
    const client = await clientPromise;

    await client.request('GET', '/user');

    const warnings = logger.byLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Rate limited, retrying');
    expect(warnings[0].fields).toEqual({
      method: 'GET',
      url: 'https://api.github.com/user',
      status: 429,
      waitSeconds: 3,
      attempt: 1,
      maxRetries: 3,
    });
  });
});

describe('paginate', () => {
  it('should concatenate pages and stop at the first empty one', async () => {
    const { transport, clientPromise } = setup();
    transport
      .mock('GET /repos/o/r/tags', { body: [{ id: 1 }, { id: 2 }] })
      .mock('GET /repos/o/r/tags', { body: [{ id: 3 }] })
      .mock('GET /repos/o/r/tags', { body: [] })
      .mock('GET /repos/o/r/tags', { body: [{ id: 4 }] });
    const client = await clientPromise;

    const items = await collectAll(client.paginate('/repos/o/r/tags'));

    expect(items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(transport.getCalls().map((call) => requestQuery(call))).toEqual([
      { per_page: '30', page: '1' },
      { per_page: '30', page: '2' },
      { per_page: '30', page: '3' },
    ]);
    expect(transport.pending).toBe(1);
  });

  it('should cap the page size at 100', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /x', { body: [] });
    const client = await clientPromise;

    await collectAll(client.paginate('/x', { per_page: 500, query: { state: 'all' } }));

    expect(requestQuery(transport.getCalls()[0])).toEqual({ state: 'all', per_page: '100', page: '1' });
  });

  it('should not fetch before the first item is pulled', async () => {
    const { transport, clientPromise } = setup();
    const client = await clientPromise;

    client.paginate('/x');

    expect(transport.getCalls()).toHaveLength(0);
  });

  it('should stop fetching once the consumer stops', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /x', { body: [{ id: 1 }, { id: 2 }] }).mock('GET /x', { body: [{ id: 3 }] });
    const client = await clientPromise;

    await expect(take(client.paginate('/x'), 2)).resolves.toEqual([{ id: 1 }, { id: 2 }]);
    expect(transport.getCalls()).toHaveLength(1);
  });

  it('should retry a rate-limited page and carry on', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true });
    transport
      .mock('GET /x', { body: [{ id: 1 }] })
      .mock('GET /x', { status: 429, headers: { 'Retry-After': '2' } })
      .mock('GET /x', { body: [{ id: 2 }] })
      .mock('GET /x', { body: [] });
    const client = await clientPromise;

    await expect(collectAll(client.paginate('/x'))).resolves.toEqual([{ id: 1 }, { id: 2 }]);
    expect(sleep).toHaveBeenCalledWith(2);
  });

  it('should reject a non-list page', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /x', { body: { id: 1 } });
    const client = await clientPromise;

    await expect(collectAll(client.paginate('/x'))).rejects.toThrow('Expected a list from /x');
  });
});

describe('search pagination', () => {
  function items(from: number, count: number) {
    return Array.from({ length: count }, (_, i) => ({ id: from + i }));
  }

  it('should stop after a short page', async () => {
    const { transport, clientPromise } = setup();
    transport
      .mock('GET /search/code', { body: { total_count: 150, incomplete_results: false, items: items(1, 100) } })
      .mock('GET /search/code', { body: { total_count: 150, incomplete_results: false, items: items(101, 50) } });
    const client = await clientPromise;

    const results = await collectAll(client.search.code('addClass repo:jquery/jquery'));

    expect(results).toHaveLength(150);
    expect(transport.getCalls().map((call) => requestQuery(call))).toEqual([
      { q: 'addClass repo:jquery/jquery', order: 'desc', per_page: '100', page: '1' },
      { q: 'addClass repo:jquery/jquery', order: 'desc', per_page: '100', page: '2' },
    ]);
  });

  it('should stop once total_count is reached', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /search/code', { body: { total_count: 100, items: items(1, 100) } });
    const client = await clientPromise;

    await expect(collectAll(client.search.code('q'))).resolves.toHaveLength(100);
    expect(transport.getCalls()).toHaveLength(1);
  });

  it('should pass sort and order', async () => {
    const { transport, clientPromise } = setup();
    transport.mock('GET /search/commits', { body: { total_count: 0, items: [] } });
    const client = await clientPromise;

    await collectAll(client.search.commits('fix', { sort: 'author-date', order: 'asc' }));

    expect(requestQuery(transport.getCalls()[0])).toEqual({
      q: 'fix',
      order: 'asc',
      sort: 'author-date',
      per_page: '100',
      page: '1',
    });
  });

  it('should not retry rate limits unless retrySearch is set', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true });
    transport.mock('GET /search/code', { status: 429, headers: { 'Retry-After': '1' } });
    const client = await clientPromise;

    await expect(collectAll(client.search.code('q'))).rejects.toBeInstanceOf(RateLimitError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry rate limits when retrySearch is set', async () => {
    const { transport, sleep, clientPromise } = setup({ autoRetry: true, retrySearch: true });
    transport
      .mock('GET /search/code', { status: 429, headers: { 'Retry-After': '1' } })
      .mock('GET /search/code', { body: { total_count: 1, items: [{ id: 1 }] } });
    const client = await clientPromise;

    await expect(collectAll(client.search.code('q'))).resolves.toEqual([{ id: 1 }]);
    expect(sleep).toHaveBeenCalledWith(1);
  });
});

describe('client lifecycle', () => {
  it('should close the transport', async () => {
    const { transport, clientPromise } = setup();
    const client = await clientPromise;

    await client.close();

    expect(transport.closed).toBe(true);
  });

  it('should report its mode', async () => {
    const { clientPromise } = setup();
    const client = await clientPromise;
    expect(client.mode).toBe('async');
  });
});

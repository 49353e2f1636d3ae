/**
 * Tests for the undici transport, using undici's in-process MockAgent.
 */

import { MockAgent } from 'undici';
import { GitHubError, UndiciTransport, createClient, normalizeHeaders } from '../index.js';

describe('normalizeHeaders', () => {
  it('should lowercase names and join repeated values', () => {
    expect(normalizeHeaders({ 'X-RateLimit-Remaining': '0', 'Set-Cookie': ['a=1', 'b=2'], Missing: undefined })).toEqual({
      'x-ratelimit-remaining': '0',
      'set-cookie': 'a=1, b=2',
    });
  });
});

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should send the request and return status, headers and body', async () => {
    agent
      .get('https://api.github.com')
      .intercept({ path: '/rate_limit', method: 'GET' })
      .reply(200, '{"resources":{}}', { headers: { 'X-RateLimit-Limit': '5000' } });
    const transport = new UndiciTransport({ dispatcher: agent });

    const response = await transport.send({
      method: 'GET',
      url: 'https://api.github.com/rate_limit',
      headers: { Accept: 'application/vnd.github+json' },
      timeout: 1000,
    });

    expect(response.status).toBe(200);
    expect(response.headers['x-ratelimit-limit']).toBe('5000');
    expect(response.body).toBe('{"resources":{}}');
  });

  it('should wrap connection failures in a transport error', async () => {
    agent
      .get('https://api.github.com')
      .intercept({ path: '/user', method: 'GET' })
      .replyWithError(new Error('socket hang up'));
    const transport = new UndiciTransport({ dispatcher: agent });

    const sent = transport.send({ method: 'GET', url: 'https://api.github.com/user', headers: {}, timeout: 1000 });

    await expect(sent).rejects.toBeInstanceOf(GitHubError);
    await expect(sent).rejects.toThrow(/^Request failed: /);
  });

  it('should refuse to send once closed', async () => {
    const transport = new UndiciTransport({ dispatcher: agent });
    await transport.close();

    await expect(
      transport.send({ method: 'GET', url: 'https://api.github.com/user', headers: {}, timeout: 1000 })
    ).rejects.toThrow('Transport is closed');
  });

  it('should carry a client request end to end', async () => {
    agent
      .get('https://api.github.com')
      .intercept({ path: '/repos/octocat/hello-world', method: 'GET' })
      .reply(200, { id: 1, name: 'hello-world', full_name: 'octocat/hello-world' });
    const client = await createClient({ token: 'test-token', transport: new UndiciTransport({ dispatcher: agent }) });

    const repo = await client.repos.get('octocat', 'hello-world');

    expect(repo.full_name).toBe('octocat/hello-world');
    await client.close();
  });
});

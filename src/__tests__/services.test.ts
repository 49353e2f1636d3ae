/**
 * Tests for the resource services against a scripted transport.
 */

import {
  AuthenticationError,
  Branch,
  Issue,
  Repository,
  User,
  collectAll,
  createClient,
  type GitHubClient,
} from '../index.js';
import { MockTransport, requestJson, requestQuery } from '../mocks/index.js';

const repoPayload = {
  id: 1296269,
  name: 'hello-world',
  full_name: 'octocat/hello-world',
  owner: { login: 'octocat', id: 1 },
  stargazers_count: 80,
};

const issuePayload = {
  id: 1001,
  number: 42,
  title: 'Crash on start',
  state: 'open',
};

const pullPayload = {
  id: 2002,
  number: 8,
  title: 'Add feature',
  state: 'open',
  head: { ref: 'feature', sha: 'abc123' },
  base: { ref: 'main', sha: 'def456' },
};

describe('services', () => {
  let transport: MockTransport;
  let client: GitHubClient<'async'>;

  beforeEach(async () => {
    transport = new MockTransport();
    client = await createClient({ token: 'test-token', transport });
  });

  afterEach(async () => {
    await client.close();
  });

  function lastCall() {
    const calls = transport.getCalls();
    return calls[calls.length - 1];
  }

  describe('repositories', () => {
    it('should get a repository bound to the client', async () => {
      transport
        .mock('GET /repos/octocat/hello-world', { body: repoPayload })
        .mock('PUT /user/starred/octocat/hello-world', { status: 204 });

      const repo = await client.repos.get('octocat', 'hello-world');
      expect(repo).toBeInstanceOf(Repository);
      expect(repo.stars).toBe(80);

      await repo.star();
      expect(lastCall().method).toBe('PUT');
      expect(lastCall().url).toBe('https://api.github.com/user/starred/octocat/hello-world');
    });

    it('should list user repositories with default filters', async () => {
      transport.mock('GET /users/octocat/repos', { body: [repoPayload] }).mock('GET /users/octocat/repos', { body: [] });

      const repos = await collectAll(client.repos.listForUser('octocat'));

      expect(repos.map((repo) => repo.full_name)).toEqual(['octocat/hello-world']);
      expect(requestQuery(transport.getCalls()[0])).toEqual({
        type: 'owner',
        sort: 'full_name',
        direction: 'asc',
        per_page: '30',
        page: '1',
      });
    });

    it('should create a repository with defaults and omit unset fields', async () => {
      transport.mock('POST /user/repos', { status: 201, body: repoPayload });

      await client.repos.create({ name: 'hello-world', description: 'My first repo' });

      expect(requestJson(lastCall())).toEqual({
        name: 'hello-world',
        description: 'My first repo',
        private: false,
        auto_init: false,
      });
    });

    it('should map languages to byte counts', async () => {
      transport.mock('GET /repos/octocat/hello-world/languages', { body: { TypeScript: 1200, Shell: 40 } });

      await expect(client.repos.listLanguages('octocat', 'hello-world')).resolves.toEqual({
        TypeScript: 1200,
        Shell: 40,
      });
    });

    it('should list branches as models', async () => {
      transport
        .mock('GET /repos/octocat/hello-world/branches', { body: [{ name: 'main', commit: { sha: 'c0ffee' } }] })
        .mock('GET /repos/octocat/hello-world/branches', { body: [] });

      const branches = await collectAll(client.repos.listBranches('octocat', 'hello-world', { protected: true }));

      expect(branches[0]).toBeInstanceOf(Branch);
      expect(branches[0].sha).toBe('c0ffee');
      expect(requestQuery(transport.getCalls()[0]).protected).toBe('true');
    });

    it('should send anon=false for contributors by default', async () => {
      transport.mock('GET /repos/octocat/hello-world/contributors', { body: [] });

      await collectAll(client.repos.listContributors('octocat', 'hello-world'));

      expect(requestQuery(lastCall()).anon).toBe('false');
    });

    it('should turn 404 into false for isStarred', async () => {
      transport
        .mock('GET /user/starred/octocat/hello-world', { status: 204 })
        .mock('GET /user/starred/octocat/spoon-knife', { status: 404, body: { message: 'Not Found' } });

      await expect(client.repos.isStarred('octocat', 'hello-world')).resolves.toBe(true);
      await expect(client.repos.isStarred('octocat', 'spoon-knife')).resolves.toBe(false);
    });

    it('should let other failures through isStarred', async () => {
      transport.mock('GET /user/starred/octocat/hello-world', { status: 401, body: { message: 'Requires authentication' } });

      await expect(client.repos.isStarred('octocat', 'hello-world')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should fork without a body unless options are given', async () => {
      transport
        .mock('POST /repos/octocat/hello-world/forks', { status: 202, body: repoPayload })
        .mock('POST /repos/octocat/hello-world/forks', { status: 202, body: repoPayload });

      await client.repos.fork('octocat', 'hello-world');
      expect(transport.getCalls()[0].body).toBeUndefined();

      await client.repos.fork('octocat', 'hello-world', { organization: 'acme' });
      expect(requestJson(transport.getCalls()[1])).toEqual({ organization: 'acme' });
    });

    it('should subscribe with a JSON body', async () => {
      transport.mock('PUT /repos/octocat/hello-world/subscription', { body: { subscribed: true } });

      await client.repos.subscribe('octocat', 'hello-world');

      expect(requestJson(lastCall())).toEqual({ subscribed: true });
    });
  });

  describe('issues', () => {
    it('should skip pull requests when listing', async () => {
      transport
        .mock('GET /repos/octocat/hello-world/issues', {
          body: [issuePayload, { ...issuePayload, id: 1002, number: 43, pull_request: { url: 'x' } }],
        })
        .mock('GET /repos/octocat/hello-world/issues', { body: [] });

      const issues = await collectAll(client.issues.list('octocat', 'hello-world', { labels: 'bug' }));

      expect(issues.map((issue) => issue.number)).toEqual([42]);
      expect(requestQuery(transport.getCalls()[0])).toEqual({
        state: 'open',
        sort: 'created',
        direction: 'desc',
        labels: 'bug',
        per_page: '30',
        page: '1',
      });
    });

    it('should create an issue and act on it', async () => {
      transport
        .mock('POST /repos/octocat/hello-world/issues', { status: 201, body: issuePayload })
        .mock('POST /repos/octocat/hello-world/issues/42/comments', {
          status: 201,
          body: { id: 77, body: 'Reproduced' },
        })
        .mock('POST /repos/octocat/hello-world/issues/42/labels', {
          body: [{ id: 1, name: 'bug' }, { id: 2, name: 'p1' }],
        })
        .mock('PUT /repos/octocat/hello-world/issues/42/lock', { status: 204 });

      const issue = await client.issues.create('octocat', 'hello-world', { title: 'Crash on start', labels: ['bug'] });
      expect(requestJson(transport.getCalls()[0])).toEqual({ title: 'Crash on start', labels: ['bug'] });

      const comment = await issue.addComment('Reproduced');
      expect(comment.id).toBe(77);
      expect(requestJson(transport.getCalls()[1])).toEqual({ body: 'Reproduced' });

      const labels = await issue.addLabels('bug', 'p1');
      expect(labels.map((label) => label.name)).toEqual(['bug', 'p1']);
      expect(requestJson(transport.getCalls()[2])).toEqual({ labels: ['bug', 'p1'] });

      await issue.lock('resolved');
      expect(requestJson(transport.getCalls()[3])).toEqual({ lock_reason: 'resolved' });
    });

    it('should lock with an empty body when no reason is given', async () => {
      transport.mock('PUT /repos/octocat/hello-world/issues/42/lock', { status: 204 });

      await client.issues.lock('octocat', 'hello-world', 42);

      expect(requestJson(lastCall())).toEqual({});
    });

    it('should encode label names in paths', async () => {
      transport.mock({ method: 'DELETE', url: /\/issues\/42\/labels\/good%20first%20issue$/ }, { body: [] });

      await client.issues.removeLabel('octocat', 'hello-world', 42, 'good first issue');

      expect(lastCall().url).toBe(
        'https://api.github.com/repos/octocat/hello-world/issues/42/labels/good%20first%20issue'
      );
    });

    it('should edit and delete comments through the comment model', async () => {
      transport
        .mock('GET /repos/octocat/hello-world/issues/42/comments', { body: [{ id: 5, body: 'first' }] })
        .mock('GET /repos/octocat/hello-world/issues/42/comments', { body: [] })
        .mock('PATCH /repos/octocat/hello-world/issues/comments/5', { body: { id: 5, body: 'edited' } })
        .mock('DELETE /repos/octocat/hello-world/issues/comments/5', { status: 204 });

      const [comment] = await collectAll(client.issues.listComments('octocat', 'hello-world', 42));
      const edited = await comment.edit('edited');
      expect(edited.body).toBe('edited');
      await edited.delete();

      expect(transport.pending).toBe(0);
    });
  });

  describe('pull requests', () => {
    it('should create with draft and maintainer defaults', async () => {
      transport.mock('POST /repos/octocat/hello-world/pulls', { status: 201, body: pullPayload });

      const pr = await client.pulls.create('octocat', 'hello-world', { title: 'Add feature', head: 'feature', base: 'main' });

      expect(pr.head_ref).toBe('feature');
      expect(requestJson(lastCall())).toEqual({
        title: 'Add feature',
        head: 'feature',
        base: 'main',
        draft: false,
        maintainer_can_modify: true,
      });
    });

    it('should review, merge and check merge state', async () => {
      transport
        .mock('GET /repos/octocat/hello-world/pulls/8', { body: pullPayload })
        .mock('POST /repos/octocat/hello-world/pulls/8/reviews', { body: { id: 1, state: 'APPROVED' } })
        .mock('PUT /repos/octocat/hello-world/pulls/8/merge', { body: { sha: 'abc', merged: true, message: 'ok' } })
        .mock('GET /repos/octocat/hello-world/pulls/8/merge', { status: 204 });

      const pr = await client.pulls.get('octocat', 'hello-world', 8);

      await pr.approve();
      expect(requestJson(transport.getCalls()[1])).toEqual({ event: 'APPROVE' });

      await expect(pr.merge({ merge_method: 'squash' })).resolves.toEqual({ sha: 'abc', merged: true, message: 'ok' });
      expect(requestJson(transport.getCalls()[2])).toEqual({ merge_method: 'squash' });

      await expect(pr.isMerged()).resolves.toBe(true);
    });

    it('should default the merge method', async () => {
      transport.mock('PUT /repos/octocat/hello-world/pulls/8/merge', { body: { merged: true } });

      await client.pulls.merge('octocat', 'hello-world', 8);

      expect(requestJson(lastCall())).toEqual({ merge_method: 'merge' });
    });

    it('should report unmerged pull requests as false', async () => {
      transport.mock('GET /repos/octocat/hello-world/pulls/9/merge', { status: 404, body: { message: 'Not Found' } });

      await expect(client.pulls.isMerged('octocat', 'hello-world', 9)).resolves.toBe(false);
    });

    it('should request changes with a body', async () => {
      transport
        .mock('GET /repos/octocat/hello-world/pulls/8', { body: pullPayload })
        .mock('POST /repos/octocat/hello-world/pulls/8/reviews', { body: { id: 2 } });

      const pr = await client.pulls.get('octocat', 'hello-world', 8);
      await pr.requestChanges('Please add tests');

      expect(requestJson(lastCall())).toEqual({ event: 'REQUEST_CHANGES', body: 'Please add tests' });
    });

    it('should only send the reviewer lists that are given', async () => {
      transport.mock('POST /repos/octocat/hello-world/pulls/8/requested_reviewers', { status: 201, body: pullPayload });

      await client.pulls.requestReviewers('octocat', 'hello-world', 8, { reviewers: ['hubot'] });

      expect(requestJson(lastCall())).toEqual({ reviewers: ['hubot'] });
    });
  });

  describe('users', () => {
    it('should get the authenticated user', async () => {
      transport.mock('GET /user', { body: { login: 'octocat', id: 1, name: 'The Octocat' } });

      const user = await client.users.getAuthenticated();

      expect(user).toBeInstanceOf(User);
      expect(user.name).toBe('The Octocat');
    });

    it('should check follows with a 404 probe', async () => {
      transport
        .mock('GET /users/octocat/following/hubot', { status: 204 })
        .mock('GET /users/octocat/following/nobody', { status: 404, body: { message: 'Not Found' } });

      await expect(client.users.isFollowing('octocat', 'hubot')).resolves.toBe(true);
      await expect(client.users.isFollowing('octocat', 'nobody')).resolves.toBe(false);
    });

    it('should delete emails with a JSON body', async () => {
      transport.mock('DELETE /user/emails', { status: 204 });

      await client.users.deleteEmails(['old@example.com']);

      expect(requestJson(lastCall())).toEqual({ emails: ['old@example.com'] });
    });
  });

  describe('releases', () => {
    const releasePayload = { id: 3, tag_name: 'v1.0.0', upload_url: 'https://uploads.github.com/x{?name,label}' };

    it('should create with defaults', async () => {
      transport.mock('POST /repos/octocat/hello-world/releases', { status: 201, body: releasePayload });

      const release = await client.releases.create('octocat', 'hello-world', { tag_name: 'v1.0.0', name: 'First' });

      expect(release.tag_name).toBe('v1.0.0');
      expect(requestJson(lastCall())).toEqual({
        tag_name: 'v1.0.0',
        name: 'First',
        draft: false,
        prerelease: false,
        generate_release_notes: false,
      });
    });

    it('should fetch by tag', async () => {
      transport.mock('GET /repos/octocat/hello-world/releases/tags/v1.0.0', { body: releasePayload });

      await expect(client.releases.getByTag('octocat', 'hello-world', 'v1.0.0')).resolves.toHaveProperty('id', 3);
    });

    it('should upload bytes to the upload host without retrying', async () => {
      transport.mock('POST /repos/octocat/hello-world/releases/3/assets', {
        status: 201,
        body: { id: 11, name: 'notes.txt', content_type: 'text/plain', size: 5 },
      });

      const asset = await client.releases.uploadAsset('octocat', 'hello-world', 3, {
        data: new TextEncoder().encode('hello'),
        name: 'notes.txt',
        contentType: 'text/plain',
      });

      expect(asset.content_type).toBe('text/plain');
      const call = lastCall();
      expect(call.url).toBe('https://uploads.github.com/repos/octocat/hello-world/releases/3/assets?name=notes.txt');
      expect(call.headers['Content-Type']).toBe('text/plain');
      expect(call.headers.Authorization).toBe('Bearer test-token');
      expect(call.body).toEqual(new TextEncoder().encode('hello'));
    });

    it('should default the asset content type', async () => {
      transport.mock('POST /repos/octocat/hello-world/releases/3/assets', { status: 201, body: { id: 12, name: 'a.bin' } });

      await client.releases.uploadAsset('octocat', 'hello-world', 3, { data: new Uint8Array([0]), name: 'a.bin' });

      expect(lastCall().headers['Content-Type']).toBe('application/octet-stream');
    });
  });

  describe('search', () => {
    it('should bind issue results to their repository', async () => {
      transport
        .mock('GET /search/issues', {
          body: {
            total_count: 1,
            items: [{ ...issuePayload, repository_url: 'https://api.github.com/repos/octocat/hello-world' }],
          },
        })
        .mock('PATCH /repos/octocat/hello-world/issues/42', { body: { ...issuePayload, state: 'closed' } });

      const [issue] = await collectAll(client.search.issues('is:open crash'));
      expect(issue).toBeInstanceOf(Issue);

      const closed = await issue.close();
      expect(closed.isClosed).toBe(true);
    });

    it('should fetch a single page of results', async () => {
      transport.mock('GET /search/repositories', {
        body: { total_count: 250, incomplete_results: false, items: [repoPayload] },
      });

      const page = await client.search.page('repositories', 'stars:>1000', { page: 3, per_page: 10 });

      expect(page.total_count).toBe(250);
      expect(page.items).toEqual([repoPayload]);
      expect(requestQuery(lastCall())).toEqual({ q: 'stars:>1000', order: 'desc', per_page: '10', page: '3' });
    });
  });

  describe('rateLimit', () => {
    it('should return the rate limit document', async () => {
      transport.mock('GET /rate_limit', { body: { resources: { core: { limit: 5000, remaining: 4999 } } } });

      await expect(client.rateLimit()).resolves.toEqual({ resources: { core: { limit: 5000, remaining: 4999 } } });
    });
  });
});

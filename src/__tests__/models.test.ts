/**
 * Tests for typed models.
 */

import { ZodError } from 'zod';
import {
  Branch,
  Comment,
  Issue,
  Label,
  Milestone,
  PullRequest,
  Release,
  Repository,
  SearchResult,
  UnboundModelError,
  User,
} from '../index.js';

const issueRaw = {
  id: 1001,
  number: 42,
  title: 'Crash on start',
  body: null,
  state: 'open',
  user: { login: 'octocat', id: 1, type: 'User' },
  labels: [{ id: 5, name: 'bug', color: 'd73a4a' }],
  milestone: { id: 3, number: 1, title: 'v1.0', due_on: '2024-06-01T00:00:00Z' },
  comments: 2,
  created_at: '2024-01-15T10:30:00Z',
  updated_at: '2024-01-16T08:00:00+02:00',
  closed_at: null,
  node_id: 'I_kwDOA',
};

describe('User', () => {
  it('should apply defaults for missing optional fields', () => {
    const user = User.fromRaw({ login: 'octocat', id: 1 });
    expect(user.login).toBe('octocat');
    expect(user.type).toBe('User');
    expect(user.avatar_url).toBe('');
    expect(user.name).toBeNull();
    expect(user.followers).toBeNull();
    expect(user.created_at).toBeNull();
  });

  it('should reject payloads missing required fields', () => {
    expect(() => User.fromRaw({ id: 1 })).toThrow(ZodError);
  });
});

describe('Issue', () => {
  it('should convert nested objects and timestamps', () => {
    const issue = Issue.fromRaw(issueRaw);

    expect(issue.number).toBe(42);
    expect(issue.body).toBeNull();
    expect(issue.user).toBeInstanceOf(User);
    expect(issue.user?.login).toBe('octocat');
    expect(issue.assignee).toBeNull();
    expect(issue.assignees).toEqual([]);
    expect(issue.labels[0]).toBeInstanceOf(Label);
    expect(issue.labels[0].name).toBe('bug');
    expect(issue.milestone).toBeInstanceOf(Milestone);
    expect(issue.milestone?.due_on?.toISOString()).toBe('2024-06-01T00:00:00.000Z');
    expect(issue.created_at?.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(issue.updated_at?.toISOString()).toBe('2024-01-16T06:00:00.000Z');
    expect(issue.closed_at).toBeNull();
    expect(issue.locked).toBe(false);
  });

  it('should retain the raw payload including unmodeled fields', () => {
    const issue = Issue.fromRaw(issueRaw);
    expect(issue.raw).toEqual(issueRaw);
    expect(issue.raw.node_id).toBe('I_kwDOA');
  });

  it('should not follow later changes to the source payload', () => {
    const payload = structuredClone(issueRaw);
    const issue = Issue.fromRaw(payload);

    payload.title = 'Edited';
    payload.labels[0].name = 'wontfix';

    expect(issue.raw.title).toBe('Crash on start');
    expect(issue.raw).toEqual(issueRaw);
    expect(Object.isFrozen(issue.raw)).toBe(true);
    expect(Object.isFrozen(issue.raw.labels)).toBe(true);
    expect(Object.isFrozen(payload)).toBe(false);
  });

  it('should rebuild an equal model from its raw payload', () => {
    const issue = Issue.fromRaw(issueRaw);
    const again = Issue.fromRaw(issue.raw);
    expect(again.title).toBe(issue.title);
    expect(again.created_at).toEqual(issue.created_at);
    expect(again.labels.map((label) => label.name)).toEqual(['bug']);
  });

  it('should expose state helpers', () => {
    expect(Issue.fromRaw(issueRaw).isOpen).toBe(true);
    expect(Issue.fromRaw({ ...issueRaw, state: 'closed' }).isClosed).toBe(true);
  });

  it('should throw when acting without a repository', () => {
    const issue = Issue.fromRaw(issueRaw);
    expect(() => issue.close()).toThrow(UnboundModelError);
    expect(() => issue.addComment('hi')).toThrow('Issue not bound to a repository');
    expect(() => issue.listComments()).toThrow(UnboundModelError);
  });
});

describe('Comment', () => {
  it('should require a repository to edit', () => {
    const comment = Comment.fromRaw({ id: 9, body: 'hello' });
    expect(comment.body).toBe('hello');
    expect(() => comment.edit('bye')).toThrow('Comment not bound to a repository');
  });
});

describe('PullRequest', () => {
  const prRaw = {
    id: 2002,
    number: 8,
    title: 'Add feature',
    state: 'open',
    draft: true,
    mergeable: null,
    head: { ref: 'feature', sha: 'abc123', label: 'octocat:feature' },
    base: { ref: 'main', sha: 'def456' },
    merged_at: null,
  };

  it('should flatten head and base refs', () => {
    const pr = PullRequest.fromRaw(prRaw);
    expect(pr.head_ref).toBe('feature');
    expect(pr.head_sha).toBe('abc123');
    expect(pr.base_ref).toBe('main');
    expect(pr.base_sha).toBe('def456');
    expect(pr.draft).toBe(true);
    expect(pr.merged).toBe(false);
    expect(pr.mergeable).toBeNull();
    expect(pr.raw.head).toEqual(prRaw.head);
  });

  it('should tolerate missing refs', () => {
    const pr = PullRequest.fromRaw({ id: 1, number: 1, title: 'x' });
    expect(pr.head_ref).toBe('');
    expect(pr.base_sha).toBe('');
  });

  it('should throw when acting without a repository', () => {
    expect(() => PullRequest.fromRaw(prRaw).merge()).toThrow('PullRequest not bound to a repository');
  });
});

describe('Repository', () => {
  const repoRaw = {
    id: 1296269,
    name: 'hello-world',
    full_name: 'octocat/hello-world',
    owner: { login: 'octocat', id: 1 },
    stargazers_count: 80,
    forks_count: 9,
    fork: false,
  };

  it('should expose counts', () => {
    const repo = Repository.fromRaw(repoRaw);
    expect(repo.stars).toBe(80);
    expect(repo.forks).toBe(9);
    expect(repo.fork).toBe(false);
    expect(repo.default_branch).toBe('main');
    expect(repo.owner?.login).toBe('octocat');
  });

  it('should throw when acting without a client', () => {
    expect(() => Repository.fromRaw(repoRaw).star()).toThrow('Repository not bound to a client');
  });
});

describe('Branch', () => {
  it('should take the sha from the commit', () => {
    const branch = Branch.fromRaw({ name: 'main', protected: true, commit: { sha: 'c0ffee', url: 'x' } });
    expect(branch.name).toBe('main');
    expect(branch.protected).toBe(true);
    expect(branch.sha).toBe('c0ffee');
  });
});

describe('Release', () => {
  it('should convert assets with defaults', () => {
    const release = Release.fromRaw({
      id: 1,
      tag_name: 'v1.0.0',
      assets: [{ id: 7, name: 'app.zip' }],
      published_at: '2024-02-01T12:00:00Z',
    });
    expect(release.tag_name).toBe('v1.0.0');
    expect(release.draft).toBe(false);
    expect(release.assets).toHaveLength(1);
    expect(release.assets[0].content_type).toBe('application/octet-stream');
    expect(release.assets[0].state).toBe('uploaded');
    expect(release.published_at?.getUTCFullYear()).toBe(2024);
  });
});

describe('SearchResult', () => {
  it('should keep raw items by default', () => {
    const result = SearchResult.fromRaw({ total_count: 2, incomplete_results: false, items: [{ id: 1 }, { id: 2 }] });
    expect(result.total_count).toBe(2);
    expect(result.items).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('should convert items with a parser', () => {
    const result = SearchResult.fromRaw({ total_count: 1, items: [{ login: 'octocat', id: 1 }] }, User.fromRaw);
    expect(result.items[0]).toBeInstanceOf(User);
    expect(result.incomplete_results).toBe(false);
  });
});

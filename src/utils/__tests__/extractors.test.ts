/**
 * Payload extractor tests
 */

import {
  BODY_PREVIEW_LENGTH,
  parseDirectoryListing,
  parseIssue,
  parseIssues,
  parsePullRequests,
  parseSearchResults,
  parseWorkflowListing,
  readFileText,
  truncateText,
} from '../extractors';
import { setLogLevel } from '../../shared/logger';

const rawIssue = (overrides: Record<string, unknown> = {}) => ({
  number: 7,
  title: 'Login fails',
  state: 'open',
  labels: [{ name: 'bug' }, { name: 'auth' }],
  created_at: '2024-03-01T10:00:00Z',
  updated_at: '2024-03-02T10:00:00Z',
  closed_at: null,
  user: { login: 'alice' },
  assignees: [{ login: 'bob' }, { login: 'carol' }, { login: 'bob' }],
  comments: 3,
  body: 'Steps to reproduce',
  html_url: 'https://github.com/acme/shop/issues/7',
  milestone: { title: 'v1.0' },
  ...overrides,
});

const rawPullRequest = (overrides: Record<string, unknown> = {}) => ({
  number: 12,
  title: 'Add basket service',
  state: 'open',
  user: { login: 'dave' },
  created_at: '2024-03-05T10:00:00Z',
  updated_at: '2024-03-06T10:00:00Z',
  merged_at: null,
  closed_at: null,
  labels: [{ name: 'feature' }],
  draft: true,
  html_url: 'https://github.com/acme/shop/pull/12',
  body: 'Implements the basket',
  assignees: [{ login: 'erin' }],
  requested_reviewers: [{ login: 'frank' }],
  head: { ref: 'feature/basket' },
  base: { ref: 'main' },
  ...overrides,
});

beforeAll(() => setLogLevel('silent'));
afterAll(() => setLogLevel('info'));

describe('parseIssues', () => {
  it('should normalize an issue', () => {
    const [issue] = parseIssues(JSON.stringify([rawIssue()]));

    expect(issue).toEqual({
      number: 7,
      title: 'Login fails',
      state: 'open',
      labels: ['bug', 'auth'],
      created_at: '2024-03-01T10:00:00Z',
      updated_at: '2024-03-02T10:00:00Z',
      closed_at: null,
      author: 'alice',
      assignees: ['bob', 'carol'],
      comment_count: 3,
      body_preview: 'Steps to reproduce',
      url: 'https://github.com/acme/shop/issues/7',
      milestone: 'v1.0',
    });
  });

  it('should drop entries flagged as pull requests', () => {
    const payload = JSON.stringify([
      rawIssue({ number: 1 }),
      rawIssue({ number: 2, pull_request: { url: 'https://api.github.com/repos/acme/shop/pulls/2' } }),
      rawIssue({ number: 3 }),
    ]);

    expect(parseIssues(payload).map((issue) => issue.number)).toEqual([1, 3]);
  });

  it('should truncate bodies to the preview length', () => {
    const [issue] = parseIssues(JSON.stringify([rawIssue({ body: 'x'.repeat(1200) })]));

    expect(issue.body_preview).toHaveLength(BODY_PREVIEW_LENGTH);
  });

  it('should not split an emoji at the preview boundary', () => {
    const [issue] = parseIssues(JSON.stringify([rawIssue({ body: `${'a'.repeat(499)}😀tail` })]));

    expect(issue.body_preview).toBe(`${'a'.repeat(499)}😀`);
    expect(JSON.stringify(issue.body_preview)).not.toContain('\\ud83d');
  });

  it('should default missing optional fields', () => {
    const [issue] = parseIssues(JSON.stringify([{ number: 9, title: 'Bare' }]));

    expect(issue).toMatchObject({
      labels: [],
      assignees: [],
      author: null,
      comment_count: 0,
      body_preview: '',
      milestone: null,
      state: 'open',
    });
  });

  it('should skip entries without a numeric number', () => {
    const payload = JSON.stringify([rawIssue({ number: 'seven' }), null, rawIssue({ number: 8 })]);

    expect(parseIssues(payload).map((issue) => issue.number)).toEqual([8]);
  });

  it('should accept plain string labels', () => {
    const [issue] = parseIssues(JSON.stringify([rawIssue({ labels: ['docs', { name: '' }] })]));

    expect(issue.labels).toEqual(['docs']);
  });

  it('should return [] for null, invalid JSON or a non-array payload', () => {
    expect(parseIssues(null)).toEqual([]);
    expect(parseIssues('not json')).toEqual([]);
    expect(parseIssues('{"message": "Not Found"}')).toEqual([]);
  });
});

describe('truncateText', () => {
  it('should count code points', () => {
    expect(truncateText('日本語テキスト', 3)).toBe('日本語');
    expect(truncateText('👍👍👍', 2)).toBe('👍👍');
  });

  it('should return short text unchanged', () => {
    expect(truncateText('short', 10)).toBe('short');
  });
});

describe('parseIssue', () => {
  it('should normalize a single issue payload', () => {
    expect(parseIssue(JSON.stringify(rawIssue()))?.number).toBe(7);
  });

  it('should return null for null or invalid input', () => {
    expect(parseIssue(null)).toBeNull();
    expect(parseIssue('oops')).toBeNull();
  });
});

describe('parsePullRequests', () => {
  it('should normalize a pull request', () => {
    const [pr] = parsePullRequests(JSON.stringify([rawPullRequest()]));

    expect(pr).toEqual({
      number: 12,
      title: 'Add basket service',
      state: 'open',
      author: 'dave',
      created_at: '2024-03-05T10:00:00Z',
      updated_at: '2024-03-06T10:00:00Z',
      merged_at: null,
      closed_at: null,
      labels: ['feature'],
      is_draft: true,
      url: 'https://github.com/acme/shop/pull/12',
      body_preview: 'Implements the basket',
      assignees: ['erin'],
      requested_reviewers: ['frank'],
      head_ref: 'feature/basket',
      base_ref: 'main',
    });
  });

  it('should truncate bodies to the preview length', () => {
    const [pr] = parsePullRequests(JSON.stringify([rawPullRequest({ body: 'y'.repeat(501) })]));

    expect(pr.body_preview).toBe('y'.repeat(500));
  });

  it('should return [] for invalid JSON', () => {
    expect(parsePullRequests('[{')).toEqual([]);
  });
});

describe('parseDirectoryListing', () => {
  it('should keep only directories', () => {
    const payload = JSON.stringify([
      { name: 'Catalog.API', path: 'src/Catalog.API', type: 'dir' },
      { name: 'README.md', path: 'src/README.md', type: 'file' },
      { name: 'WebApp', path: 'src/WebApp', type: 'dir' },
    ]);

    expect(parseDirectoryListing(payload)).toEqual([
      { name: 'Catalog.API', path: 'src/Catalog.API', type: 'dir' },
      { name: 'WebApp', path: 'src/WebApp', type: 'dir' },
    ]);
  });

  it('should return [] for a file payload', () => {
    expect(parseDirectoryListing(JSON.stringify({ type: 'file', content: 'hello' }))).toEqual([]);
  });
});

describe('parseWorkflowListing', () => {
  it('should keep only files', () => {
    const payload = JSON.stringify([
      { name: 'ci.yml', path: '.github/workflows/ci.yml', type: 'file' },
      { name: 'templates', path: '.github/workflows/templates', type: 'dir' },
    ]);

    expect(parseWorkflowListing(payload)).toEqual([{ name: 'ci.yml', path: '.github/workflows/ci.yml' }]);
  });
});

describe('parseSearchResults', () => {
  it('should return name and path of each item', () => {
    const payload = JSON.stringify({
      total_count: 2,
      items: [
        { name: 'Catalog.API.csproj', path: 'src/Catalog.API/Catalog.API.csproj', sha: 'abc' },
        { name: 'WebApp.csproj', path: 'src/WebApp/WebApp.csproj', sha: 'def' },
      ],
    });

    expect(parseSearchResults(payload)).toEqual([
      { name: 'Catalog.API.csproj', path: 'src/Catalog.API/Catalog.API.csproj' },
      { name: 'WebApp.csproj', path: 'src/WebApp/WebApp.csproj' },
    ]);
  });

  it('should return [] when items is missing', () => {
    expect(parseSearchResults('{"total_count": 0}')).toEqual([]);
    expect(parseSearchResults(null)).toEqual([]);
  });
});

describe('readFileText', () => {
  it('should unwrap the content of a file payload', () => {
    const payload = JSON.stringify({ type: 'file', encoding: 'base64', content: '# Shop\n' });

    expect(readFileText(payload)).toBe('# Shop\n');
  });

  it('should return plain text unchanged', () => {
    expect(readFileText('# Shop')).toBe('# Shop');
  });

  it('should return directory listings unchanged', () => {
    const listing = JSON.stringify([{ name: 'a', type: 'dir' }]);
    expect(readFileText(listing)).toBe(listing);
  });

  it('should pass null through', () => {
    expect(readFileText(null)).toBeNull();
  });
});

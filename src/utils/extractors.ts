/**
 * Payload extractors
 * Convert raw GitHub JSON payloads into normalized records.
 * Every extractor returns [] for null input, invalid JSON or an unexpected shape.
 */

import { DirectoryEntry, FileRef, Issue, IssueState, PullRequest } from '../types/index.js';
import { createLogger } from '../shared/index.js';
import { asString, isRecord } from './json-response.js';

const log = createLogger('Extractors');

/** Long bodies are cut to this many characters */
export const BODY_PREVIEW_LENGTH = 500;

function decodeArray(content: string | null, what: string): unknown[] {
  if (!content) {
    return [];
  }
  try {
    const data: unknown = JSON.parse(content);
    return Array.isArray(data) ? data : [];
  } catch (error) {
    log.warn(`Error parsing ${what}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}

function loginOf(value: unknown): string | null {
  return isRecord(value) ? asString(value.login) : null;
}

/**
 * Logins of a user list, deduplicated in first-seen order
 */
function loginsOf(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const logins = new Set<string>();
  for (const entry of value) {
    const login = loginOf(entry);
    if (login) {
      logins.add(login);
    }
  }
  return [...logins];
}

function labelNames(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const names: string[] = [];
  for (const label of value) {
    if (isRecord(label) && typeof label.name === 'string' && label.name) {
      names.push(label.name);
    } else if (typeof label === 'string' && label) {
      names.push(label);
    }
  }
  return names;
}

function stateOf(value: unknown): IssueState {
  return value === 'closed' ? 'closed' : 'open';
}

/**
 * Keep the first `length` characters, counted in code points so that
 * a surrogate pair is never split
 */
export function truncateText(text: string, length: number): string {
  if (text.length <= length) {
    return text;
  }
  return Array.from(text).slice(0, length).join('');
}

function previewOf(value: unknown): string {
  return typeof value === 'string' ? truncateText(value, BODY_PREVIEW_LENGTH) : '';
}

function refOf(value: unknown): string | null {
  return isRecord(value) ? asString(value.ref) : null;
}

function toIssue(raw: unknown): Issue | null {
  if (!isRecord(raw) || raw.pull_request || typeof raw.number !== 'number') {
    return null;
  }
  return {
    number: raw.number,
    title: asString(raw.title) ?? '',
    state: stateOf(raw.state),
    labels: labelNames(raw.labels),
    created_at: asString(raw.created_at),
    updated_at: asString(raw.updated_at),
    closed_at: asString(raw.closed_at),
    author: loginOf(raw.user),
    assignees: loginsOf(raw.assignees),
    comment_count: typeof raw.comments === 'number' && raw.comments > 0 ? raw.comments : 0,
    body_preview: previewOf(raw.body),
    url: asString(raw.html_url) ?? '',
    milestone: isRecord(raw.milestone) ? asString(raw.milestone.title) : null,
  };
}

/**
 * Parse issues from a list_issues payload.
 * Entries carrying a pull_request marker are pull requests and are dropped.
 */
export function parseIssues(content: string | null): Issue[] {
  const issues: Issue[] = [];
  for (const raw of decodeArray(content, 'issues')) {
    const issue = toIssue(raw);
    if (issue) {
      issues.push(issue);
    }
  }
  return issues;
}

/**
 * Parse a single get_issue payload
 */
export function parseIssue(content: string | null): Issue | null {
  if (!content) {
    return null;
  }
  try {
    return toIssue(JSON.parse(content));
  } catch (error) {
    log.warn(`Error parsing issue: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Parse pull requests from a list_pull_requests payload
 */
export function parsePullRequests(content: string | null): PullRequest[] {
  const prs: PullRequest[] = [];
  for (const raw of decodeArray(content, 'pull requests')) {
    if (!isRecord(raw) || typeof raw.number !== 'number') {
      continue;
    }
    prs.push({
      number: raw.number,
      title: asString(raw.title) ?? '',
      state: stateOf(raw.state),
      author: loginOf(raw.user),
      created_at: asString(raw.created_at),
      updated_at: asString(raw.updated_at),
      merged_at: asString(raw.merged_at),
      closed_at: asString(raw.closed_at),
      labels: labelNames(raw.labels),
      is_draft: raw.draft === true,
      url: asString(raw.html_url) ?? '',
      body_preview: previewOf(raw.body),
      assignees: loginsOf(raw.assignees),
      requested_reviewers: loginsOf(raw.requested_reviewers),
      head_ref: refOf(raw.head),
      base_ref: refOf(raw.base),
    });
  }
  return prs;
}

function entriesOfType(content: string | null, type: string, what: string): FileRef[] {
  const entries: FileRef[] = [];
  for (const raw of decodeArray(content, what)) {
    if (!isRecord(raw) || raw.type !== type) {
      continue;
    }
    const name = asString(raw.name);
    if (name === null) {
      continue;
    }
    entries.push({ name, path: asString(raw.path) ?? name });
  }
  return entries;
}

/**
 * Parse a directory listing, keeping only sub-directories
 */
export function parseDirectoryListing(content: string | null): DirectoryEntry[] {
  return entriesOfType(content, 'dir', 'directory listing').map((entry): DirectoryEntry => ({ ...entry, type: 'dir' }));
}

/**
 * Parse a workflow directory listing, keeping only files
 */
export function parseWorkflowListing(content: string | null): FileRef[] {
  return entriesOfType(content, 'file', 'workflow listing');
}

/**
 * Parse code search results into name/path pairs
 */
export function parseSearchResults(content: string | null): FileRef[] {
  if (!content) {
    return [];
  }
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    log.warn(`Error parsing search results: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
  if (!isRecord(data) || !Array.isArray(data.items)) {
    return [];
  }
  const results: FileRef[] = [];
  for (const item of data.items) {
    if (!isRecord(item)) {
      continue;
    }
    const name = asString(item.name);
    const path = asString(item.path);
    if (name !== null && path !== null) {
      results.push({ name, path });
    }
  }
  return results;
}

/**
 * Unwrap the text of a get_file_contents payload.
 * For files both backends answer with the contents API object, its `content`
 * already decoded to text; that field is returned. Any other payload is
 * returned unchanged.
 */
export function readFileText(content: string | null): string | null {
  if (content === null) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return content;
  }
  if (isRecord(data) && data.type === 'file' && typeof data.content === 'string') {
    return data.content;
  }
  return content;
}

/**
 * GitHub tool client
 * Typed wrapper over the GitHub MCP server tools. Every call is one-shot and
 * non-retrying; a fault of any kind surfaces as null.
 */

import { createLogger, extractTextContent, getErrorMessage, isErrorResult } from '../shared/index.js';

const log = createLogger('GitHubTools');

/**
 * Anything that can invoke a named tool with an argument map.
 * Implemented by the MCP session and by the REST backend.
 */
export interface ToolCaller {
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
}

export type IssueStateFilter = 'open' | 'closed' | 'all';

export interface GetFileOptions {
  branch?: string;
  /** Suppress fault logging, for probes where absence is expected */
  silent?: boolean;
}

export interface ListIssuesOptions {
  state?: IssueStateFilter;
  perPage?: number;
  page?: number;
}

export interface ListPullRequestsOptions {
  state?: IssueStateFilter;
  perPage?: number;
}

export class GitHubTools {
  constructor(private readonly caller: ToolCaller) {}

  /**
   * Get contents of a file or directory
   */
  async getFileContents(owner: string, repo: string, path: string, options: GetFileOptions = {}): Promise<string | null> {
    const args: Record<string, unknown> = { owner, repo, path };
    if (options.branch) {
      args.branch = options.branch;
    }
    return this.invoke('get_file_contents', args, `getting ${path || '/'}`, options.silent ?? false);
  }

  /**
   * List issues in repository (a single page)
   */
  async listIssues(owner: string, repo: string, options: ListIssuesOptions = {}): Promise<string | null> {
    return this.invoke('list_issues', {
      owner,
      repo,
      state: options.state ?? 'open',
      per_page: options.perPage ?? 30,
      page: options.page ?? 1,
    }, 'listing issues');
  }

  /**
   * Get details of a specific issue
   */
  async getIssue(owner: string, repo: string, issueNumber: number): Promise<string | null> {
    return this.invoke('get_issue', { owner, repo, issue_number: issueNumber }, `getting issue #${issueNumber}`);
  }

  /**
   * List pull requests (a single page)
   */
  async listPullRequests(owner: string, repo: string, options: ListPullRequestsOptions = {}): Promise<string | null> {
    return this.invoke('list_pull_requests', {
      owner,
      repo,
      state: options.state ?? 'open',
      per_page: options.perPage ?? 30,
    }, 'listing PRs');
  }

  /**
   * Search code, scoped to the repository
   */
  async searchCode(owner: string, repo: string, query: string, perPage: number = 10): Promise<string | null> {
    return this.invoke('search_code', { q: `${query} repo:${owner}/${repo}`, per_page: perPage }, 'searching code');
  }

  private async invoke(
    tool: string,
    args: Record<string, unknown>,
    operation: string,
    silent: boolean = false
  ): Promise<string | null> {
    try {
      const result = await this.caller.callTool(tool, args);
      const text = extractTextContent(result);
      if (isErrorResult(result)) {
        throw new Error(text ?? `${tool} returned an error`);
      }
      return text;
    } catch (error) {
      const message = getErrorMessage(error);
      // Expected 404s are not worth reporting
      if (!silent && !message.includes('Not Found')) {
        log.error(`Error ${operation}: ${message}`);
      }
      return null;
    }
  }
}

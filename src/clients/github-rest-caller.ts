/**
 * GitHub REST backend
 * Answers the GitHub MCP tool names straight from the REST API, with the same
 * JSON text payloads the MCP server produces.
 */

import axios, { AxiosInstance } from 'axios';
import { MCPTextContent, ValidationError, createTextResponse, toGitHubApiError } from '../shared/index.js';
import { ToolCaller } from './github-tools.js';

export interface GitHubRestConfig {
  baseUrl: string;
  token: string;
  timeout?: number;
}

function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
}

function numberArg(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== 'number') {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

function optionalArg(args: Record<string, unknown>, key: string): string | number | undefined {
  const value = args[key];
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

function encodePath(path: string): string {
  return path.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}

export class GitHubRestToolCaller implements ToolCaller {
  private client: AxiosInstance;

  constructor(config: GitHubRestConfig, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Accept': 'application/vnd.github+json',
        'Authorization': `Bearer ${config.token}`,
        'X-GitHub-Api-Version': '2022-11-28'
      },
      timeout: config.timeout ?? 30000
    });
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<{ content: MCPTextContent[] }> {
    const data = await this.dispatch(name, args);
    return createTextResponse(JSON.stringify(data, null, 2));
  }

  private async dispatch(name: string, args: Record<string, unknown>): Promise<unknown> {
    switch (name) {
      case 'get_file_contents':
        return this.getFileContents(args);
      case 'list_issues':
        return this.get(`/repos/${stringArg(args, 'owner')}/${stringArg(args, 'repo')}/issues`, {
          state: optionalArg(args, 'state'),
          per_page: optionalArg(args, 'per_page'),
          page: optionalArg(args, 'page'),
        });
      case 'get_issue':
        return this.get(`/repos/${stringArg(args, 'owner')}/${stringArg(args, 'repo')}/issues/${numberArg(args, 'issue_number')}`);
      case 'list_pull_requests':
        return this.get(`/repos/${stringArg(args, 'owner')}/${stringArg(args, 'repo')}/pulls`, {
          state: optionalArg(args, 'state'),
          per_page: optionalArg(args, 'per_page'),
        });
      case 'search_code':
        return this.get('/search/code', {
          q: stringArg(args, 'q'),
          per_page: optionalArg(args, 'per_page'),
        });
      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  }

  /**
   * Directories come back as entry lists; file bodies are decoded from base64
   * the way the MCP server does
   */
  private async getFileContents(args: Record<string, unknown>): Promise<unknown> {
    const path = encodePath(stringArg(args, 'path'));
    const url = `/repos/${stringArg(args, 'owner')}/${stringArg(args, 'repo')}/contents/${path}`;
    const data = await this.get(url, { ref: optionalArg(args, 'branch') });

    if (data && typeof data === 'object' && !Array.isArray(data) && 'content' in data && typeof data.content === 'string') {
      const encoding = 'encoding' in data ? data.encoding : undefined;
      if (encoding === 'base64') {
        return { ...data, content: Buffer.from(data.content, 'base64').toString('utf8'), encoding: 'utf-8' };
      }
    }
    return data;
  }

  private async get(url: string, params?: Record<string, string | number | undefined>): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      const response = axios.isAxiosError(error) ? error.response : undefined;
      throw toGitHubApiError('GET', url, response && {
        status: response.status,
        data: response.data,
        headers: response.headers,
      }, error);
    }
  }
}

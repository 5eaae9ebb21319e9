/**
 * Error taxonomy
 * Configuration, validation and GitHub API failures, and the MCP error code
 * each one surfaces as from a tool call.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

export type AnalyzerErrorCode =
  | 'INTERNAL_ERROR'
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'GITHUB_API_ERROR'
  | 'NOT_FOUND'
  | 'AUTH_ERROR'
  | 'RATE_LIMITED';

// Caller mistakes are InvalidParams; everything else is the server's problem
const MCP_ERROR_CODES: Record<AnalyzerErrorCode, ErrorCode> = {
  INTERNAL_ERROR: ErrorCode.InternalError,
  VALIDATION_ERROR: ErrorCode.InvalidParams,
  CONFIG_ERROR: ErrorCode.InvalidParams,
  GITHUB_API_ERROR: ErrorCode.InternalError,
  NOT_FOUND: ErrorCode.InternalError,
  AUTH_ERROR: ErrorCode.InternalError,
  RATE_LIMITED: ErrorCode.InternalError,
};

/**
 * Base error for analyzer operations
 */
export class AnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: AnalyzerErrorCode = 'INTERNAL_ERROR',
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AnalyzerError';
  }

  toMcpError(): McpError {
    return new McpError(MCP_ERROR_CODES[this.code], this.message);
  }
}

export class ValidationError extends AnalyzerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AnalyzerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * A failed GitHub REST request. `status` is absent when no response arrived.
 */
export class GitHubApiError extends AnalyzerError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
    code: AnalyzerErrorCode = 'GITHUB_API_ERROR'
  ) {
    super(message, code, cause);
    this.name = 'GitHubApiError';
  }
}

/**
 * 404. The message starts with "Not Found", which GitHubTools treats as an
 * expected miss.
 */
export class NotFoundError extends GitHubApiError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Not Found: ${path}`, 404, cause, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * 401, or a 403 that is not a rate limit: the token is missing, wrong or
 * lacks a scope
 */
export class AuthenticationError extends GitHubApiError {
  constructor(message: string, status: number, cause?: unknown) {
    super(message, status, cause, 'AUTH_ERROR');
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends GitHubApiError {
  constructor(
    message: string,
    status: number,
    public readonly resetAt: Date | null,
    cause?: unknown
  ) {
    super(message, status, cause, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

/**
 * The parts of an HTTP error response the GitHub mapping looks at
 */
export interface GitHubErrorResponse {
  status: number;
  data?: unknown;
  headers?: unknown;
}

function headerValue(headers: unknown, name: string): string | null {
  if (!headers || typeof headers !== 'object') {
    return null;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && (typeof value === 'string' || typeof value === 'number')) {
      return String(value);
    }
  }
  return null;
}

function responseMessage(data: unknown): string | null {
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string' && data.message) {
    return data.message;
  }
  return null;
}

function rateLimitReset(headers: unknown): Date | null {
  const seconds = Number(headerValue(headers, 'x-ratelimit-reset'));
  return Number.isFinite(seconds) && seconds > 0 ? new Date(seconds * 1000) : null;
}

/**
 * Classify a failed GitHub request by status and rate-limit headers
 */
export function toGitHubApiError(
  method: string,
  path: string,
  response: GitHubErrorResponse | undefined,
  cause: unknown
): GitHubApiError {
  const context = `${method} ${path}`;
  if (!response) {
    return new GitHubApiError(`${context}: ${getErrorMessage(cause)}`, undefined, cause);
  }

  const { status, data, headers } = response;
  const message = `${context}: ${responseMessage(data) ?? getErrorMessage(cause)}`;

  if (status === 404) {
    return new NotFoundError(path, cause);
  }
  if (status === 429 || (status === 403 && headerValue(headers, 'x-ratelimit-remaining') === '0')) {
    return new RateLimitError(message, status, rateLimitReset(headers), cause);
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(message, status, cause);
  }
  return new GitHubApiError(message, status, cause);
}

/**
 * Run a tool call, rethrowing every failure as an McpError
 */
export async function withErrorHandling<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof AnalyzerError) {
      throw error.toMcpError();
    }
    throw new McpError(ErrorCode.InternalError, `Error: ${getErrorMessage(error)}`);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

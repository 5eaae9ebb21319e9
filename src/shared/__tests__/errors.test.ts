/**
 * Error taxonomy tests
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  AnalyzerError,
  AuthenticationError,
  ConfigurationError,
  GitHubApiError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  getErrorMessage,
  toGitHubApiError,
  withErrorHandling,
} from '../errors';

describe('errors', () => {
  describe('taxonomy', () => {
    it('should carry codes and names', () => {
      expect(new ValidationError('bad').code).toBe('VALIDATION_ERROR');
      expect(new GitHubApiError('down', 503).status).toBe(503);
      expect(new NotFoundError('/repos/acme/shop').code).toBe('NOT_FOUND');
      expect(new AuthenticationError('no', 401).name).toBe('AuthenticationError');
      expect(new ConfigurationError('missing')).toBeInstanceOf(AnalyzerError);
    });

    it('should map validation and configuration errors to InvalidParams', () => {
      expect(new ValidationError('bad').toMcpError().code).toBe(ErrorCode.InvalidParams);
      expect(new ConfigurationError('missing').toMcpError().code).toBe(ErrorCode.InvalidParams);
      expect(new GitHubApiError('down').toMcpError().code).toBe(ErrorCode.InternalError);
      expect(new RateLimitError('slow down', 429, null).toMcpError().code).toBe(ErrorCode.InternalError);
    });

    it('should keep the cause', () => {
      const cause = new Error('socket hang up');

      expect(new GitHubApiError('GET /repos/acme/shop: socket hang up', undefined, cause).cause).toBe(cause);
    });
  });

  describe('getErrorMessage', () => {
    it('should read messages from errors, strings and message-bearing objects', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('toGitHubApiError', () => {
    const cause = new Error('Request failed');

    it('should map 404 to NotFoundError on the path', () => {
      const error = toGitHubApiError('GET', '/repos/acme/shop/contents/LICENSE', { status: 404, data: { message: 'Not Found' } }, cause);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe('Not Found: /repos/acme/shop/contents/LICENSE');
      expect(error.status).toBe(404);
    });

    it('should map 401 to AuthenticationError with the GitHub message', () => {
      const error = toGitHubApiError('GET', '/repos/acme/shop/issues', { status: 401, data: { message: 'Bad credentials' } }, cause);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error.message).toBe('GET /repos/acme/shop/issues: Bad credentials');
    });

    it('should map an exhausted 403 to RateLimitError with the reset time', () => {
      const error = toGitHubApiError('GET', '/search/code', {
        status: 403,
        data: { message: 'API rate limit exceeded' },
        headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' },
      }, cause);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.resetAt).toEqual(new Date(1700000000 * 1000));
    });

    it('should map 429 to RateLimitError without a reset header', () => {
      const error = toGitHubApiError('GET', '/search/code', { status: 429 }, cause);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.resetAt).toBeNull();
      expect(error.message).toBe('GET /search/code: Request failed');
    });

    it('should map a 403 with quota left to AuthenticationError', () => {
      const error = toGitHubApiError('GET', '/repos/acme/shop', {
        status: 403,
        data: { message: 'Resource not accessible by integration' },
        headers: { 'x-ratelimit-remaining': '4999' },
      }, cause);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error.code).toBe('AUTH_ERROR');
    });

    it('should keep other statuses as GitHubApiError', () => {
      const error = toGitHubApiError('GET', '/repos/acme/shop/pulls', { status: 502, data: {} }, cause);

      expect(error.code).toBe('GITHUB_API_ERROR');
      expect(error.status).toBe(502);
      expect(error.message).toBe('GET /repos/acme/shop/pulls: Request failed');
      expect(error.cause).toBe(cause);
    });

    it('should report a missing response without a status', () => {
      const error = toGitHubApiError('GET', '/repos/acme/shop', undefined, new Error('socket hang up'));

      expect(error.status).toBeUndefined();
      expect(error.message).toBe('GET /repos/acme/shop: socket hang up');
    });
  });

  describe('withErrorHandling', () => {
    it('should return the value of a successful call', async () => {
      await expect(withErrorHandling(async () => 'ok')).resolves.toBe('ok');
    });

    it('should convert analyzer errors to MCP errors', async () => {
      await expect(withErrorHandling(async () => {
        throw new ValidationError('owner is required');
      })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('should pass MCP errors through', async () => {
      const original = new McpError(ErrorCode.MethodNotFound, 'Unknown tool: nope');

      await expect(withErrorHandling(async () => {
        throw original;
      })).rejects.toBe(original);
    });

    it('should wrap unknown errors as InternalError', async () => {
      const promise = withErrorHandling(async () => {
        throw new Error('boom');
      });

      await expect(promise).rejects.toBeInstanceOf(McpError);
      await expect(promise).rejects.toMatchObject({ code: ErrorCode.InternalError });
    });
  });
});

/**
 * Base Handler for Common MCP Tool Operations
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { MCPResponse, AnalyzerError, createTextResponse, getErrorMessage } from '../shared/index.js';

export type ToolArgs = Record<string, unknown>;

export abstract class BaseHandler {

  /**
   * Validate required parameters
   */
  protected validateRequired(params: ToolArgs, required: string[]): void {
    for (const param of required) {
      if (!params[param]) {
        throw new McpError(ErrorCode.InvalidParams, `${param} is required`);
      }
    }
  }

  /**
   * Read a string parameter, rejecting any other type
   */
  protected stringParam(params: ToolArgs, name: string): string | undefined {
    const value = params[name];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new McpError(ErrorCode.InvalidParams, `${name} must be a string`);
    }
    return value;
  }

  /**
   * Read a boolean parameter, rejecting any other type
   */
  protected booleanParam(params: ToolArgs, name: string): boolean | undefined {
    const value = params[name];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new McpError(ErrorCode.InvalidParams, `${name} must be a boolean`);
    }
    return value;
  }

  /**
   * Handle errors consistently
   */
  protected handleError(error: unknown, operation: string): never {
    if (error instanceof McpError) {
      throw error;
    }

    if (error instanceof AnalyzerError) {
      const mcpError = error.toMcpError();
      if (mcpError.code === ErrorCode.InvalidParams) {
        throw mcpError;
      }
    }

    throw new McpError(
      ErrorCode.InternalError,
      `Failed to ${operation}: ${getErrorMessage(error)}`
    );
  }

  /**
   * Format success response
   */
  protected formatResponse(text: string): MCPResponse {
    return createTextResponse(text);
  }
}

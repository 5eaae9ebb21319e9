/**
 * Shared type definitions
 * MCP content shapes and response helpers used by the tool client and the server
 */

// ============================================
// MCP Response Types
// ============================================

/**
 * Standard MCP text content item
 */
export type MCPTextContent = {
  type: 'text';
  text: string;
};

/**
 * Standard MCP response structure.
 * Type aliases, not interfaces: the SDK result types carry an index signature.
 */
export type MCPResponse = {
  content: MCPTextContent[];
  isError?: boolean;
};

/**
 * MCP tool definition structure
 */
export type MCPTool = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

// ============================================
// Common Response Formatting Utilities
// ============================================

/**
 * Create a standard MCP text response
 */
export function createTextResponse(text: string): MCPResponse {
  return {
    content: [{ type: 'text', text }]
  };
}

/**
 * Find the first text item in an MCP tool result.
 * Anything that is not shaped like a content list yields null.
 */
export function extractTextContent(result: unknown): string | null {
  if (!result || typeof result !== 'object' || !('content' in result)) {
    return null;
  }
  const items = result.content;
  if (!Array.isArray(items)) {
    return null;
  }
  for (const item of items) {
    if (item && typeof item === 'object' && 'text' in item && typeof item.text === 'string') {
      return item.text;
    }
  }
  return null;
}

/**
 * Whether an MCP tool result is flagged as an error
 */
export function isErrorResult(result: unknown): boolean {
  return !!result && typeof result === 'object' && 'isError' in result && result.isError === true;
}

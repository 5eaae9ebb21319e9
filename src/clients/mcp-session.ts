/**
 * MCP session
 * Spawns the GitHub MCP server as a child process and talks to it over stdio
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { createLogger, getErrorMessage } from '../shared/index.js';
import { ToolSession } from './tool-session.js';

const log = createLogger('McpSession');

/**
 * The slice of the SDK client a session uses
 */
export interface McpClient {
  connect(transport: Transport): Promise<void>;
  callTool(params: { name: string; arguments?: Record<string, unknown> }): Promise<unknown>;
  close(): Promise<void>;
}

export interface McpServerLaunch {
  command: string;
  args: string[];
  token: string;
}

/**
 * Build the child process environment: the SDK's safe defaults, the caller's
 * own environment, and the token the GitHub MCP server reads.
 */
export function buildServerEnv(token: string, source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = { ...getDefaultEnvironment() };
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  env.GITHUB_PERSONAL_ACCESS_TOKEN = token;
  return env;
}

/**
 * Spawn the GitHub MCP server over stdio and connect a client to it
 */
export async function openMcpSession(
  launch: McpServerLaunch,
  client: McpClient = new Client({ name: 'repo-insight', version: '1.0.0' }),
  transport: Transport = new StdioClientTransport({
    command: launch.command,
    args: launch.args,
    env: buildServerEnv(launch.token),
  })
): Promise<ToolSession> {
  try {
    await client.connect(transport);
  } catch (error) {
    // The child process may already be running
    try {
      await transport.close();
    } catch (closeError) {
      log.warn(`Failed to close transport after connect failure: ${getErrorMessage(closeError)}`);
    }
    throw error;
  }
  log.debug(`Connected to ${launch.command} ${launch.args.join(' ')}`);

  return {
    caller: {
      callTool: (name, args) => client.callTool({ name, arguments: args }),
    },
    close: () => client.close(),
  };
}

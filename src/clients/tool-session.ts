/**
 * Tool sessions
 * A session is acquired once per run, shared read-only by both agents, and
 * released on every exit path.
 */

import { createLogger, getErrorMessage } from '../shared/index.js';
import { GitHubRestToolCaller } from './github-rest-caller.js';
import { ToolCaller } from './github-tools.js';

const log = createLogger('ToolSession');

export interface ToolSession {
  caller: ToolCaller;
  close(): Promise<void>;
}

export type ToolSessionFactory = () => Promise<ToolSession>;

/**
 * Open a session backed by the GitHub REST API; there is nothing to tear down
 */
export async function openRestSession(baseUrl: string, token: string): Promise<ToolSession> {
  return {
    caller: new GitHubRestToolCaller({ baseUrl, token }),
    close: async () => undefined,
  };
}

/**
 * Acquire a session, run `fn` with its caller, and release the session
 * whether `fn` resolves or throws
 */
export async function withToolSession<T>(
  factory: ToolSessionFactory,
  fn: (caller: ToolCaller) => Promise<T>
): Promise<T> {
  const session = await factory();
  try {
    return await fn(session.caller);
  } finally {
    try {
      await session.close();
    } catch (error) {
      log.warn(`Failed to close tool session: ${getErrorMessage(error)}`);
    }
  }
}

/**
 * Tool session lifecycle tests
 */

import { ToolSession, openRestSession, withToolSession } from '../tool-session';
import { GitHubRestToolCaller } from '../github-rest-caller';
import { setLogLevel } from '../../shared';

function fakeSession(close: () => Promise<void> = async () => undefined) {
  const closeMock = jest.fn(close);
  const session: ToolSession = {
    caller: { callTool: jest.fn().mockResolvedValue({ content: [] }) },
    close: closeMock,
  };
  return { session, closeMock };
}

describe('withToolSession', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('info');
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should pass the caller through and close after success', async () => {
    const { session, closeMock } = fakeSession();

    const result = await withToolSession(async () => session, async (caller) => {
      expect(caller).toBe(session.caller);
      return 'done';
    });

    expect(result).toBe('done');
    expect(closeMock).toHaveBeenCalledTimes(1);
  });

  it('should close when the body throws', async () => {
    const { session, closeMock } = fakeSession();

    await expect(withToolSession(async () => session, async () => {
      throw new Error('explorer failed');
    })).rejects.toThrow('explorer failed');

    expect(closeMock).toHaveBeenCalledTimes(1);
  });

  it('should only warn when closing fails', async () => {
    const { session } = fakeSession(async () => {
      throw new Error('pipe closed');
    });

    await expect(withToolSession(async () => session, async () => 42)).resolves.toBe(42);
    expect(errorSpy).toHaveBeenCalledWith('[ToolSession] WARN: Failed to close tool session: pipe closed');
  });

  it('should not run the body when the session cannot be opened', async () => {
    const body = jest.fn();

    await expect(withToolSession(async () => {
      throw new Error('spawn npx ENOENT');
    }, body)).rejects.toThrow('spawn npx ENOENT');

    expect(body).not.toHaveBeenCalled();
  });
});

describe('openRestSession', () => {
  it('should wrap a REST caller', async () => {
    const session = await openRestSession('https://api.github.test', 'test-token');

    expect(session.caller).toBeInstanceOf(GitHubRestToolCaller);
    await expect(session.close()).resolves.toBeUndefined();
  });
});

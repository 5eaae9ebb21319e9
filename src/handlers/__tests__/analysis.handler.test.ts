/**
 * AnalysisHandler Unit Tests
 * Tests the analyze_repository tool handler
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { AnalysisHandler, AnalysisRunner } from '../analysis';
import { AnalysisOutcome } from '../../analyzer';
import { ConfigurationError } from '../../shared';
import { sampleReport } from '../../__tests__/fixtures';

const REPO = { owner: 'acme', name: 'shop' };

describe('AnalysisHandler', () => {
  const report = sampleReport(REPO, '2026-10-19T08:05:03.000Z');
  let runner: jest.Mock<Promise<AnalysisOutcome>, Parameters<AnalysisRunner>>;
  let handler: AnalysisHandler;

  beforeEach(() => {
    runner = jest.fn();
    handler = new AnalysisHandler(runner);
  });

  describe('analyzeRepository', () => {
    it('should return the report as JSON text', async () => {
      runner.mockResolvedValue({ report, outputPath: null });

      const response = await handler.analyzeRepository({ owner: 'acme', repo: 'shop' });

      expect(runner).toHaveBeenCalledWith({ owner: 'acme', name: 'shop' }, false);
      expect(response.content).toEqual([{ type: 'text', text: JSON.stringify(report, null, 2) }]);
    });

    it('should mention the saved file when the report was written', async () => {
      runner.mockResolvedValue({ report, outputPath: 'output/acme_shop_20261019_080503.json' });

      const response = await handler.analyzeRepository({ owner: 'acme', repo: 'shop', write_output: true });

      expect(runner).toHaveBeenCalledWith({ owner: 'acme', name: 'shop' }, true);
      expect(response.content[1]).toEqual({ type: 'text', text: 'Report saved to: output/acme_shop_20261019_080503.json' });
    });

    it('should require owner and repo', async () => {
      const call = handler.analyzeRepository({ repo: 'shop' });

      await expect(call).rejects.toBeInstanceOf(McpError);
      await expect(call).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
      await expect(call).rejects.toThrow('owner is required');
      expect(runner).not.toHaveBeenCalled();
    });

    it('should reject a non-boolean write_output', async () => {
      await expect(handler.analyzeRepository({ owner: 'acme', repo: 'shop', write_output: 'yes' }))
        .rejects.toThrow('write_output must be a boolean');
    });

    it('should report configuration problems as invalid params', async () => {
      runner.mockRejectedValue(new ConfigurationError('Required environment variable GITHUB_TOKEN is not set'));

      await expect(handler.analyzeRepository({ owner: 'acme', repo: 'shop' })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
      });
    });

    it('should wrap other failures as internal errors', async () => {
      runner.mockRejectedValue(new Error('spawn npx ENOENT'));

      const call = handler.analyzeRepository({ owner: 'acme', repo: 'shop' });

      await expect(call).rejects.toMatchObject({ code: ErrorCode.InternalError });
      await expect(call).rejects.toThrow('Failed to analyze acme/shop: spawn npx ENOENT');
    });
  });
});

/**
 * Analysis Operations Handler
 * Handles analyze_repository
 */

import { AnalysisOutcome } from '../analyzer.js';
import { MCPResponse } from '../shared/index.js';
import { RepositoryRef } from '../types/index.js';
import { BaseHandler, ToolArgs } from './base-handler.js';

/**
 * Runs one full analysis of a repository
 */
export type AnalysisRunner = (repository: RepositoryRef, writeOutput: boolean) => Promise<AnalysisOutcome>;

export class AnalysisHandler extends BaseHandler {
  constructor(private runAnalysis: AnalysisRunner) {
    super();
  }

  async analyzeRepository(args: ToolArgs): Promise<MCPResponse> {
    this.validateRequired(args, ['owner', 'repo']);
    const owner = this.stringParam(args, 'owner') ?? '';
    const repo = this.stringParam(args, 'repo') ?? '';
    const writeOutput = this.booleanParam(args, 'write_output') ?? false;

    try {
      const outcome = await this.runAnalysis({ owner, name: repo }, writeOutput);
      const response = this.formatResponse(JSON.stringify(outcome.report, null, 2));
      if (outcome.outputPath) {
        response.content.push({ type: 'text', text: `Report saved to: ${outcome.outputPath}` });
      }
      return response;
    } catch (error) {
      this.handleError(error, `analyze ${owner}/${repo}`);
    }
  }
}

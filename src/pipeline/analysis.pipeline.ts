/**
 * Analysis Pipeline
 * Three nodes in a fixed order, each returning a new state snapshot:
 * explore_repository → analyze_issues → combine_results
 */

import { ValidationError } from '../shared/index.js';
import { ProgressReporter, silentProgress } from '../services/progress-reporter.js';
import {
  AnalysisState,
  CombinedReport,
  IssuesAnalyzerResult,
  RepositoryExplorerResult,
  RepositoryRef,
} from '../types/index.js';
import { BasePipelineStep, ValidationResult } from './pipeline-step.interface.js';

export const ANALYZER_VERSION = '1.0.0';

export const NODE_ORDER = ['explore_repository', 'analyze_issues', 'combine_results'] as const;

export type Clock = () => Date;

export interface RepositoryExploring {
  explore(): Promise<RepositoryExplorerResult>;
}

export interface IssuesAnalyzing {
  analyze(): Promise<IssuesAnalyzerResult>;
}

export interface AnalysisPipelineOptions {
  progress?: ProgressReporter;
  clock?: Clock;
}

export function createInitialState(repository: RepositoryRef): AnalysisState {
  const state: AnalysisState = {
    repository: { owner: repository.owner, name: repository.name },
    repository_analysis: null,
    issues_analysis: null,
    final_output: null,
    status: 'initialized',
  };
  return Object.freeze(state);
}

function announce(progress: ProgressReporter, title: string): void {
  progress.step('='.repeat(60));
  progress.info(`NODE: ${title}`);
  progress.info('='.repeat(60));
}

class ExploreRepositoryStep extends BasePipelineStep<AnalysisState, AnalysisState> {
  constructor(private explorer: RepositoryExploring, private progress: ProgressReporter) {
    super();
  }

  getName(): string {
    return 'explore_repository';
  }

  validate(state: AnalysisState): ValidationResult {
    const errors = state.status === 'initialized' ? [] : [`expected status initialized, got ${state.status}`];
    return { isValid: errors.length === 0, errors };
  }

  async execute(state: AnalysisState): Promise<AnalysisState> {
    announce(this.progress, 'Repository Explorer');
    const result = await this.explorer.explore();
    this.logExecution(`found ${result.services.length} services`);
    const next: AnalysisState = { ...state, repository_analysis: result, status: 'repository_explored' };
    return Object.freeze(next);
  }
}

class AnalyzeIssuesStep extends BasePipelineStep<AnalysisState, AnalysisState> {
  constructor(private analyzer: IssuesAnalyzing, private progress: ProgressReporter) {
    super();
  }

  getName(): string {
    return 'analyze_issues';
  }

  validate(state: AnalysisState): ValidationResult {
    const errors = state.status === 'repository_explored' ? [] : [`expected status repository_explored, got ${state.status}`];
    return { isValid: errors.length === 0, errors };
  }

  async execute(state: AnalysisState): Promise<AnalysisState> {
    announce(this.progress, 'Issues Analyzer');
    const result = await this.analyzer.analyze();
    this.logExecution(`analyzed ${result.summary.total_issues} issues and ${result.summary.total_prs} PRs`);
    const next: AnalysisState = { ...state, issues_analysis: result, status: 'issues_analyzed' };
    return Object.freeze(next);
  }
}

class CombineResultsStep extends BasePipelineStep<AnalysisState, AnalysisState> {
  constructor(private clock: Clock, private progress: ProgressReporter) {
    super();
  }

  getName(): string {
    return 'combine_results';
  }

  validate(state: AnalysisState): ValidationResult {
    const errors: string[] = [];
    if (state.status !== 'issues_analyzed') {
      errors.push(`expected status issues_analyzed, got ${state.status}`);
    }
    if (!state.repository_analysis) {
      errors.push('repository analysis is missing');
    }
    if (!state.issues_analysis) {
      errors.push('issues analysis is missing');
    }
    return { isValid: errors.length === 0, errors };
  }

  async execute(state: AnalysisState): Promise<AnalysisState> {
    announce(this.progress, 'Combining Results');
    if (!state.repository_analysis || !state.issues_analysis) {
      throw new ValidationError('Cannot combine results before both analyses have run');
    }

    const finalOutput: CombinedReport = {
      analysis_metadata: {
        analyzed_at: this.clock().toISOString(),
        repository: state.repository,
        analyzer_version: ANALYZER_VERSION,
      },
      repository: state.repository_analysis,
      issues: state.issues_analysis,
    };

    this.progress.info('✅ Results combined successfully');
    const next: AnalysisState = { ...state, final_output: finalOutput, status: 'completed' };
    return Object.freeze(next);
  }
}

export class AnalysisPipeline {
  private readonly steps: ReadonlyArray<BasePipelineStep<AnalysisState, AnalysisState>>;
  private readonly progress: ProgressReporter;

  constructor(
    private explorer: RepositoryExploring,
    private issuesAnalyzer: IssuesAnalyzing,
    options: AnalysisPipelineOptions = {}
  ) {
    this.progress = options.progress ?? silentProgress;
    const clock = options.clock ?? (() => new Date());
    this.steps = [
      new ExploreRepositoryStep(explorer, this.progress),
      new AnalyzeIssuesStep(issuesAnalyzer, this.progress),
      new CombineResultsStep(clock, this.progress),
    ];
  }

  /**
   * Node names in execution order
   */
  getNodeNames(): string[] {
    return this.steps.map((step) => step.getName());
  }

  /**
   * Run every node once, in order, with no retries
   * @throws ValidationError when the pipeline or a node's input is invalid
   */
  async run(initialState: AnalysisState): Promise<AnalysisState> {
    const check = this.validatePipeline();
    if (!check.isValid) {
      throw new ValidationError(`Analysis pipeline is misconfigured: ${check.errors.join('; ')}`);
    }

    this.progress.step('='.repeat(60));
    this.progress.info('STARTING ANALYSIS PIPELINE');
    this.progress.info('='.repeat(60));

    let state = initialState;
    for (const step of this.steps) {
      const validation = step.validate(state);
      if (!validation.isValid) {
        throw new ValidationError(`${step.getName()}: ${validation.errors.join('; ')}`);
      }
      state = await step.execute(state);
    }
    return state;
  }

  /**
   * Validate pipeline configuration and dependencies
   */
  validatePipeline(): ValidationResult {
    const errors: string[] = [];

    if (!this.explorer) {
      errors.push('RepositoryExplorer is not configured');
    }

    if (!this.issuesAnalyzer) {
      errors.push('IssuesAnalyzer is not configured');
    }

    const names = this.getNodeNames();
    if (names.length !== NODE_ORDER.length || names.some((name, index) => name !== NODE_ORDER[index])) {
      errors.push(`Unexpected node order: ${names.join(' → ')}`);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}

/**
 * Analysis runner
 * Acquires one tool session, builds both agents over a shared GitHubTools
 * handle, runs the pipeline and writes the report. The session is released on
 * every exit path.
 */

import { AnalyzerConfig } from './config.js';
import { GitHubTools } from './clients/github-tools.js';
import { TextGenerator } from './clients/text-generator.js';
import { ToolSessionFactory, withToolSession } from './clients/tool-session.js';
import { AnalysisPipeline, Clock, createInitialState } from './pipeline/analysis.pipeline.js';
import { IssuesAnalyzer } from './services/issues-analyzer.js';
import { ProgressReporter, silentProgress } from './services/progress-reporter.js';
import { ReportWriter } from './services/report-writer.js';
import { ProjectConventions, RepositoryExplorer } from './services/repository-explorer.js';
import { createLogger, ValidationError } from './shared/index.js';
import { CombinedReport } from './types/index.js';

const log = createLogger('Analyzer');

export interface RunAnalysisDependencies {
  sessionFactory: ToolSessionFactory;
  generator: TextGenerator;
  progress?: ProgressReporter;
  clock?: Clock;
  conventions?: ProjectConventions;
  /** Skip writing the report file */
  writeOutput?: boolean;
}

export interface AnalysisOutcome {
  report: CombinedReport;
  /** Path of the written report, null when writing was skipped */
  outputPath: string | null;
}

export async function runAnalysis(config: AnalyzerConfig, deps: RunAnalysisDependencies): Promise<AnalysisOutcome> {
  const progress = deps.progress ?? silentProgress;
  const clock = deps.clock ?? (() => new Date());
  const { repository } = config;

  progress.step('🚀 GitHub Repository Analyzer');
  progress.info('='.repeat(60));
  progress.info(`Target: ${repository.owner}/${repository.name}`);
  progress.info('='.repeat(60));

  return withToolSession(deps.sessionFactory, async (caller) => {
    const github = new GitHubTools(caller);
    const explorer = new RepositoryExplorer(github, deps.generator, repository, {
      progress,
      conventions: deps.conventions,
    });
    const issuesAnalyzer = new IssuesAnalyzer(github, deps.generator, repository, {
      progress,
      llmInsights: config.llmInsights,
    });

    const pipeline = new AnalysisPipeline(explorer, issuesAnalyzer, { progress, clock });
    log.debug(`running ${pipeline.getNodeNames().join(' → ')} for ${repository.owner}/${repository.name}`);
    const finalState = await pipeline.run(createInitialState(repository));

    if (!finalState.final_output) {
      throw new ValidationError(`Analysis pipeline ended with status ${finalState.status} and no report`);
    }

    if (deps.writeOutput === false) {
      return { report: finalState.final_output, outputPath: null };
    }

    const writer = new ReportWriter(config.outputDir, { progress });
    const outputPath = await writer.write(finalState.final_output, repository, clock());
    return { report: finalState.final_output, outputPath };
  });
}

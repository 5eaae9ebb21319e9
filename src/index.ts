/**
 * Public API
 */

export * from './types/index.js';
export * from './shared/index.js';

export { loadConfig, type AnalyzerConfig, type LlmConfig, type LlmProvider, type GitHubTransport } from './config.js';
export { createTextGenerator, createToolSessionFactory } from './factories.js';
export { runAnalysis, type RunAnalysisDependencies, type AnalysisOutcome } from './analyzer.js';

export { GitHubTools, type ToolCaller } from './clients/github-tools.js';
export { GitHubRestToolCaller } from './clients/github-rest-caller.js';
export { openMcpSession } from './clients/mcp-session.js';
export { openRestSession, withToolSession, type ToolSession, type ToolSessionFactory } from './clients/tool-session.js';
export { LocalLLMClient, AzureOpenAIClient } from './clients/local-llm-client.js';
export { OllamaClient } from './clients/ollama-client.js';
export { type TextGenerator, type GenerateOptions } from './clients/text-generator.js';

export { RepositoryExplorer, DEFAULT_PROJECT_CONVENTIONS, type ProjectConventions } from './services/repository-explorer.js';
export { IssuesAnalyzer } from './services/issues-analyzer.js';
export { ReportWriter, reportFileName } from './services/report-writer.js';
export { ConsoleProgressReporter, silentProgress, type ProgressReporter } from './services/progress-reporter.js';

export { AnalysisPipeline, createInitialState, ANALYZER_VERSION } from './pipeline/analysis.pipeline.js';

export * from './utils/extractors.js';
export * from './utils/analyzers.js';

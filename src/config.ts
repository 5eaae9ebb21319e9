/**
 * Analyzer configuration, read from the environment
 */

import {
  ConfigurationError,
  LogLevel,
  getEnv,
  getEnvBoolean,
  getEnvNumber,
  getEnvOrThrow,
  parseLogLevel,
} from './shared/index.js';
import { RepositoryRef } from './types/index.js';

export type LlmProvider = 'azure' | 'openai' | 'ollama';
export type GitHubTransport = 'mcp' | 'rest';

export interface LlmConfig {
  provider: LlmProvider;
  /** Endpoint root; the Azure resource endpoint for azure */
  baseUrl: string;
  /** Model name; the deployment name for azure */
  model: string;
  apiKey?: string;
  apiVersion?: string;
  temperature: number;
  timeout: number;
}

export interface AnalyzerConfig {
  repository: RepositoryRef;
  githubToken: string;
  outputDir: string;
  transport: GitHubTransport;
  mcpCommand: string;
  mcpArgs: string[];
  githubApiUrl: string;
  llm: LlmConfig;
  /** Run the LLM categorization and pattern steps of the issues analysis */
  llmInsights: boolean;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  /** Target repository; when given, GITHUB_REPO_OWNER/NAME are not read */
  repository?: RepositoryRef;
}

export const DEFAULT_AZURE_API_VERSION = '2024-06-01';
export const DEFAULT_MCP_COMMAND = 'npx';
export const DEFAULT_MCP_ARGS = ['-y', '@modelcontextprotocol/server-github'];

function parseTransport(value: string): GitHubTransport {
  if (value === 'mcp' || value === 'rest') {
    return value;
  }
  throw new ConfigurationError(`GITHUB_TRANSPORT must be "mcp" or "rest", got "${value}"`);
}

function parseProvider(value: string): LlmProvider {
  if (value === 'azure' || value === 'openai' || value === 'ollama') {
    return value;
  }
  throw new ConfigurationError(`LLM_PROVIDER must be "azure", "openai" or "ollama", got "${value}"`);
}

function loadLlmConfig(): LlmConfig {
  const provider = parseProvider(getEnv('LLM_PROVIDER', getEnv('AZURE_OPENAI_ENDPOINT') ? 'azure' : 'openai'));
  const temperature = getEnvNumber('LLM_TEMPERATURE', 0.1);
  const timeout = getEnvNumber('LLM_TIMEOUT_MS', 120000);

  switch (provider) {
    case 'azure':
      return {
        provider,
        baseUrl: getEnvOrThrow('AZURE_OPENAI_ENDPOINT'),
        model: getEnvOrThrow('AZURE_OPENAI_DEPLOYMENT'),
        apiKey: getEnvOrThrow('AZURE_OPENAI_API_KEY'),
        apiVersion: getEnv('AZURE_OPENAI_API_VERSION', DEFAULT_AZURE_API_VERSION),
        temperature,
        timeout,
      };
    case 'ollama':
      return {
        provider,
        baseUrl: getEnv('LLM_BASE_URL', 'http://localhost:11434'),
        model: getEnv('LLM_MODEL', 'qwen3:30b-a3b-instruct-2507-q4_K_M'),
        temperature,
        timeout,
      };
    case 'openai':
      return {
        provider,
        baseUrl: getEnv('LLM_BASE_URL', 'http://localhost:1234'),
        model: getEnv('LLM_MODEL', 'qwen/qwen3-30b-a3b-2507'),
        apiKey: getEnv('LLM_API_KEY') || undefined,
        temperature,
        timeout,
      };
  }
}

/**
 * Build the analyzer configuration from process.env.
 * Call loadEnv() first to pick up the project's .env file.
 *
 * @throws ConfigurationError when a required variable is missing or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AnalyzerConfig {
  const repository = options.repository ?? {
    owner: getEnvOrThrow('GITHUB_REPO_OWNER'),
    name: getEnvOrThrow('GITHUB_REPO_NAME'),
  };
  const mcpArgs = getEnv('GITHUB_MCP_ARGS');

  return {
    repository,
    githubToken: getEnvOrThrow('GITHUB_TOKEN'),
    outputDir: getEnv('OUTPUT_DIR', 'output'),
    transport: parseTransport(getEnv('GITHUB_TRANSPORT', 'mcp').toLowerCase()),
    mcpCommand: getEnv('GITHUB_MCP_COMMAND', DEFAULT_MCP_COMMAND),
    mcpArgs: mcpArgs ? mcpArgs.split(/\s+/) : [...DEFAULT_MCP_ARGS],
    githubApiUrl: getEnv('GITHUB_API_URL', 'https://api.github.com'),
    llm: loadLlmConfig(),
    llmInsights: getEnvBoolean('ANALYZER_LLM_INSIGHTS'),
    logLevel: parseLogLevel(getEnv('LOG_LEVEL', 'info')),
  };
}

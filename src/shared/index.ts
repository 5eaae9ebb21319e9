/**
 * Shared utilities and types
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  getEnvOrThrow,
  getEnvNumber,
  getEnvBoolean,
  type EnvLoaderOptions,
} from './env-loader.js';

// Types
export {
  type MCPTextContent,
  type MCPResponse,
  type MCPTool,
  createTextResponse,
  extractTextContent,
  isErrorResult,
} from './types.js';

// Error handling
export {
  AnalyzerError,
  ValidationError,
  ConfigurationError,
  GitHubApiError,
  NotFoundError,
  AuthenticationError,
  RateLimitError,
  toGitHubApiError,
  withErrorHandling,
  getErrorMessage,
  type AnalyzerErrorCode,
  type GitHubErrorResponse,
} from './errors.js';

// Logging
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from './logger.js';

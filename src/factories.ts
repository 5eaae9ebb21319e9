/**
 * Build the tool session and text generator a configuration asks for
 */

import { AnalyzerConfig, DEFAULT_AZURE_API_VERSION, LlmConfig } from './config.js';
import { openMcpSession } from './clients/mcp-session.js';
import { openRestSession, ToolSessionFactory } from './clients/tool-session.js';
import { AzureOpenAIClient, LocalLLMClient } from './clients/local-llm-client.js';
import { OllamaClient } from './clients/ollama-client.js';
import { TextGenerator } from './clients/text-generator.js';

export function createTextGenerator(config: LlmConfig): TextGenerator {
  const defaults = { temperature: config.temperature, timeout: config.timeout };

  switch (config.provider) {
    case 'azure':
      return new AzureOpenAIClient(
        config.baseUrl,
        config.model,
        config.apiVersion ?? DEFAULT_AZURE_API_VERSION,
        { ...defaults, apiKey: config.apiKey }
      );
    case 'ollama':
      return new OllamaClient(config.baseUrl, config.model, defaults);
    case 'openai':
      return new LocalLLMClient(config.baseUrl, config.model, { ...defaults, apiKey: config.apiKey });
  }
}

export function createToolSessionFactory(config: AnalyzerConfig): ToolSessionFactory {
  if (config.transport === 'rest') {
    return () => openRestSession(config.githubApiUrl, config.githubToken);
  }
  return () => openMcpSession({
    command: config.mcpCommand,
    args: config.mcpArgs,
    token: config.githubToken,
  });
}

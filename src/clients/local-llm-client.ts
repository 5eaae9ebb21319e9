/**
 * Chat-completions LLM clients
 * LocalLLMClient speaks the OpenAI-compatible API (LM Studio, vLLM, OpenAI).
 * AzureOpenAIClient targets an Azure OpenAI deployment.
 */

import { createLogger } from '../shared/index.js';
import { GenerateOptions, TextGenerator } from './text-generator.js';

const log = createLogger('LLM');

export interface ChatClientDefaults {
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
}

function messageContent(data: unknown): string {
  if (!data || typeof data !== 'object' || !('choices' in data) || !Array.isArray(data.choices)) {
    return '';
  }
  const choice: unknown = data.choices[0];
  if (!choice || typeof choice !== 'object' || !('message' in choice)) {
    return '';
  }
  const message = choice.message;
  if (message && typeof message === 'object' && 'content' in message && typeof message.content === 'string') {
    return message.content;
  }
  return '';
}

export class LocalLLMClient implements TextGenerator {
  protected baseUrl: string;
  protected model: string;
  protected defaults: ChatClientDefaults;

  constructor(
    baseUrl: string = 'http://localhost:1234',
    model: string = 'qwen/qwen3-30b-a3b-2507',
    defaults: ChatClientDefaults = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.model = model;
    this.defaults = defaults;
  }

  /**
   * Generate a response from the model
   */
  async generate(systemPrompt: string, userPrompt: string, options: GenerateOptions = {}): Promise<string> {
    const {
      temperature = this.defaults.temperature ?? 0.1,
      maxTokens = this.defaults.maxTokens ?? 2048,
      timeout = this.defaults.timeout ?? 120000
    } = options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    try {
      const response = await fetch(this.getEndpoint(), {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(this.buildBody(systemPrompt, userPrompt, temperature, maxTokens)),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new Error(`LLM API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      const duration = Date.now() - startTime;
      log.debug(`generate completed in ${duration}ms (prompt: ${userPrompt.length} chars)`);

      return messageContent(data).trim();
    } catch (error) {
      const duration = Date.now() - startTime;
      log.warn(`generate failed after ${duration}ms: ${error}`);
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  protected getEndpoint(): string {
    return `${this.baseUrl}/v1/chat/completions`;
  }

  protected getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.defaults.apiKey) {
      headers['Authorization'] = `Bearer ${this.defaults.apiKey}`;
    }
    return headers;
  }

  protected buildBody(systemPrompt: string, userPrompt: string, temperature: number, maxTokens: number): Record<string, unknown> {
    return {
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt }
      ],
      temperature,
      max_tokens: maxTokens,
      stream: false
    };
  }

  /**
   * Get the model name
   */
  getModel(): string {
    return this.model;
  }

  /**
   * Get the base URL
   */
  getBaseUrl(): string {
    return this.baseUrl;
  }
}

export class AzureOpenAIClient extends LocalLLMClient {
  private apiVersion: string;

  constructor(endpoint: string, deployment: string, apiVersion: string, defaults: ChatClientDefaults = {}) {
    super(endpoint, deployment, defaults);
    this.apiVersion = apiVersion;
  }

  protected getEndpoint(): string {
    return `${this.baseUrl}/openai/deployments/${encodeURIComponent(this.model)}/chat/completions?api-version=${encodeURIComponent(this.apiVersion)}`;
  }

  protected getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.defaults.apiKey) {
      headers['api-key'] = this.defaults.apiKey;
    }
    return headers;
  }

  protected buildBody(systemPrompt: string, userPrompt: string, temperature: number, maxTokens: number): Record<string, unknown> {
    // The deployment in the URL selects the model
    const body = super.buildBody(systemPrompt, userPrompt, temperature, maxTokens);
    delete body.model;
    return body;
  }
}

/**
 * Ollama LLM Client
 * Uses the native /api/generate endpoint with a separate system prompt
 */

import { createLogger } from '../shared/index.js';
import { GenerateOptions, TextGenerator } from './text-generator.js';

const log = createLogger('Ollama');

export interface OllamaResponse {
  model: string;
  created_at: string;
  response: string;
  thinking?: string;
  done: boolean;
}

function isOllamaResponse(data: unknown): data is OllamaResponse {
  return !!data && typeof data === 'object' && 'response' in data && typeof data.response === 'string';
}

export class OllamaClient implements TextGenerator {
  private baseUrl: string;
  private model: string;
  private defaults: GenerateOptions;

  constructor(
    baseUrl: string = 'http://localhost:11434',
    model: string = 'qwen3:30b-a3b-instruct-2507-q4_K_M',
    defaults: GenerateOptions = {}
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
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          system: systemPrompt,
          prompt: userPrompt,
          stream: false,
          options: {
            temperature,
            num_predict: maxTokens
          }
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new Error(`Ollama API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      const duration = Date.now() - startTime;
      log.debug(`generate completed in ${duration}ms (prompt: ${userPrompt.length} chars)`);

      if (!isOllamaResponse(data)) {
        return '';
      }
      // Qwen3 puts thinking in separate field, actual output in response
      if (data.response.trim()) {
        return data.response;
      }
      return typeof data.thinking === 'string' ? data.thinking : '';
    } catch (error) {
      const duration = Date.now() - startTime;
      log.warn(`generate failed after ${duration}ms: ${error}`);
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
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

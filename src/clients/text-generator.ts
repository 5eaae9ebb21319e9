/**
 * Text generation contract shared by the LLM clients.
 * A generator takes a system instruction and a user prompt and returns the
 * model's text. It may throw; callers treat that like an undecodable reply.
 */

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
}

export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string>;
  getModel(): string;
}

/**
 * Pipeline Step Interface
 * Defines the contract for individual nodes of the analysis pipeline
 */

import { Logger, createLogger } from '../shared/index.js';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface IPipelineStep<TInput, TOutput> {
  /**
   * Execute this step in the pipeline
   */
  execute(input: TInput): Promise<TOutput>;

  /**
   * Get the name of this pipeline step
   */
  getName(): string;

  /**
   * Validate that this step can execute with the given input
   */
  validate(input: TInput): ValidationResult;
}

/**
 * Base pipeline step with common functionality
 */
export abstract class BasePipelineStep<TInput, TOutput> implements IPipelineStep<TInput, TOutput> {
  private logger: Logger | null = null;

  abstract execute(input: TInput): Promise<TOutput>;
  abstract getName(): string;

  validate(_input: TInput): ValidationResult {
    return { isValid: true, errors: [] };
  }

  protected logExecution(message: string): void {
    this.log().info(message);
  }

  private log(): Logger {
    if (!this.logger) {
      this.logger = createLogger(this.getName());
    }
    return this.logger;
  }
}

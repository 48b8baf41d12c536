/**
 * LLM Provider Abstract Base Class
 *
 * Defines the interface that all summary providers must implement.
 * Enables switching between OpenAI, Claude and Gemini via configuration.
 */

import { LLMConfig, SummaryRequest, SummaryResult } from './types';
import { buildSummaryPrompt } from './prompts/shared';
import { calculateModelCost } from './pricing';

export abstract class LLMProvider {
  protected modelName: string;
  protected apiKey: string;
  protected config: LLMConfig;

  constructor(apiKey: string, modelName: string, config?: LLMConfig) {
    this.apiKey = apiKey;
    this.modelName = modelName;
    this.config = config || {};
  }

  /**
   * Summarize a block of news text
   * Each provider calls its own SDK
   *
   * @throws LLMError when the provider call fails
   */
  abstract generateSummary(request: SummaryRequest): Promise<SummaryResult>;

  protected buildPrompt(request: SummaryRequest): string {
    return buildSummaryPrompt(request);
  }

  protected calculateCost(inputTokens: number, outputTokens: number): number {
    return calculateModelCost(this.modelName, inputTokens, outputTokens);
  }

  /**
   * Get provider name for logging/debugging
   */
  public getProviderName(): string {
    return this.constructor.name;
  }

  public getModelName(): string {
    return this.modelName;
  }
}

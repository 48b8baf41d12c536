/**
 * LLM Provider Factory
 *
 * Creates summary providers from the explicit summary configuration.
 */

import { SummaryConfig } from '../config';
import { LLMProvider } from './LLMProvider';
import { ClaudeProvider } from './ClaudeProvider';
import { GeminiProvider } from './GeminiProvider';
import { OpenAIProvider } from './OpenAIProvider';
import { LLMConfig, LLMProviderType } from './types';

export class LLMFactory {
  /**
   * Create a specific provider instance
   * @param modelName - Optional model name override; each provider has its own default
   */
  static createProvider(
    type: LLMProviderType,
    apiKey: string,
    modelName?: string,
    config?: LLMConfig
  ): LLMProvider {
    switch (type) {
      case 'openai':
        return new OpenAIProvider(apiKey, modelName, config);

      case 'claude':
        return new ClaudeProvider(apiKey, modelName, config);

      case 'gemini':
        return new GeminiProvider(apiKey, modelName, config);
    }
  }

  /**
   * Create provider from the summary configuration
   * @returns null when the selected provider has no API key (summaries fall back to extractive)
   */
  static fromConfig(summary: SummaryConfig): LLMProvider | null {
    if (!summary.apiKey) {
      return null;
    }

    return this.createProvider(summary.provider, summary.apiKey, summary.model);
  }
}

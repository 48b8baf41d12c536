/**
 * Google Gemini Provider Implementation
 *
 * Default: gemini-2.0-flash
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { ContextConfig } from '../../config/context-config';
import { LLMError } from '../errors';
import { LLMProvider } from './LLMProvider';
import { LLMConfig, SummaryRequest, SummaryResult } from './types';
import { SUMMARY_SYSTEM_PROMPT } from './prompts/shared';

export class GeminiProvider extends LLMProvider {
  private client: GoogleGenerativeAI;

  constructor(apiKey: string, modelName: string = 'gemini-2.0-flash', config?: LLMConfig) {
    super(apiKey, modelName, config);
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generateSummary(request: SummaryRequest): Promise<SummaryResult> {
    const startTime = Date.now();

    try {
      const model = this.client.getGenerativeModel({
        model: this.modelName,
        systemInstruction: SUMMARY_SYSTEM_PROMPT,
        generationConfig: {
          maxOutputTokens: this.config.maxTokens ?? ContextConfig.SUMMARY_MAX_OUTPUT_TOKENS,
          temperature: this.config.temperature ?? 0.2,
        },
      });

      const result = await model.generateContent(this.buildPrompt(request));
      const response = result.response;
      const text = response.text();

      // Gemini reports usage in metadata
      const usageMetadata = response.usageMetadata;
      const inputTokens = usageMetadata?.promptTokenCount || 0;
      const outputTokens = usageMetadata?.candidatesTokenCount || 0;

      return {
        content: text.trim(),
        modelUsed: this.modelName,
        tokensUsed: {
          input: inputTokens,
          output: outputTokens,
        },
        latencyMs: Date.now() - startTime,
        cost: this.calculateCost(inputTokens, outputTokens),
      };
    } catch (error) {
      throw new LLMError('Gemini', error instanceof Error ? error.message : String(error));
    }
  }
}
